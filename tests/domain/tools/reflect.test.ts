import {
  parseSource,
  reflectDeclaredSignature,
  reflectRuntimeSignature,
} from '../../../src/domain/tools/reflect';

function reflect(source: string, name: string) {
  return reflectDeclaredSignature(parseSource('/tmp/tool.ts', source), name);
}

describe('reflect', () => {
  test('plain parameters are positional-or-keyword with literal defaults', () => {
    const signature = reflect(
      [
        '/**',
        ' * Adds two numbers.',
        ' * @param a first',
        ' */',
        'export function add(a: number, b = 1): number {',
        '  return a + b;',
        '}',
      ].join('\n'),
      'add'
    );

    expect(signature).toEqual({
      parameters: [
        {
          name: 'a',
          kind: 'positional-or-keyword',
          required: true,
          default: null,
          annotation: { type: 'float', raw: 'number' },
        },
        {
          name: 'b',
          kind: 'positional-or-keyword',
          required: false,
          default: 1,
          annotation: { type: 'any', raw: null },
        },
      ],
      slots: [
        { kind: 'positional', name: 'a', required: true },
        { kind: 'positional', name: 'b', required: false },
      ],
      docstring: 'Adds two numbers.\n@param a first',
      returnAnnotation: 'number',
    });
  });

  test('arrow functions bound to a const are found with their docs', () => {
    const signature = reflect(
      [
        '/** Greets someone. */',
        'export const greet = (name: string, loud?: boolean): string =>',
        '  loud ? name.toUpperCase() : name;',
      ].join('\n'),
      'greet'
    );
    expect(signature?.docstring).toBe('Greets someone.');
    expect(signature?.parameters.map((p) => [p.name, p.required, p.annotation.type])).toEqual([
      ['name', true, 'str'],
      ['loud', false, 'bool'],
    ]);
    expect(signature?.returnAnnotation).toBe('string');
  });

  test('destructured members are keyword-only and the rest member is var-keyword', () => {
    const signature = reflect(
      [
        'export function search(',
        '  { query, limit = 10, ...rest }: { query: string; limit?: number; [key: string]: unknown }',
        ') {',
        '  return [query, limit, rest];',
        '}',
      ].join('\n'),
      'search'
    );

    expect(signature?.parameters).toEqual([
      {
        name: 'query',
        kind: 'keyword-only',
        required: true,
        default: null,
        annotation: { type: 'str', raw: 'string' },
      },
      {
        name: 'limit',
        kind: 'keyword-only',
        required: false,
        default: 10,
        annotation: { type: 'float', raw: 'number' },
      },
      {
        name: 'rest',
        kind: 'var-keyword',
        required: false,
        default: null,
        annotation: { type: 'json', raw: null },
      },
    ]);
    expect(signature?.slots).toEqual([
      { kind: 'keywords', names: ['query', 'limit'], required: ['query'], restName: 'rest' },
    ]);
  });

  test('rest parameters are var-positional', () => {
    const signature = reflect(
      'export function total(label: string, ...values: number[]) { return label + values.length; }',
      'total'
    );
    expect(signature?.parameters[1]).toEqual({
      name: 'values',
      kind: 'var-positional',
      required: false,
      default: null,
      annotation: { type: 'json', raw: 'number[]' },
    });
    expect(signature?.slots).toEqual([
      { kind: 'positional', name: 'label', required: true },
      { kind: 'rest', name: 'values' },
    ]);
  });

  test('non-literal defaults are reported as their source text', () => {
    const signature = reflect(
      'export function d(a = -2, b = "x", c = [1, "y"], e = { k: true }, f = Date.now()) {}',
      'd'
    );
    expect(signature?.parameters.map((p) => p.default)).toEqual([-2, 'x', [1, 'y'], { k: true }, 'Date.now()']);
  });

  test('this parameters are not part of the signature', () => {
    const signature = reflect('export function bound(this: unknown, a: number) { return a; }', 'bound');
    expect(signature?.parameters.map((p) => p.name)).toEqual(['a']);
  });

  test('overload signatures are skipped in favour of the implementation', () => {
    const signature = reflect(
      [
        'export function pick(a: string): string;',
        'export function pick(a: string, b?: number): string {',
        '  return a;',
        '}',
      ].join('\n'),
      'pick'
    );
    expect(signature?.parameters.map((p) => p.name)).toEqual(['a', 'b']);
  });

  test('returns null when no declaration matches', () => {
    expect(reflect('export function other() {}', 'missing')).toBeNull();
    expect(reflect('export const value = 3;', 'value')).toBeNull();
  });

  test('runtime reflection reads the function text', () => {
    const signature = reflectRuntimeSignature('function (a, b = 2) { return a + b; }');
    expect(signature.parameters.map((p) => [p.name, p.required, p.default])).toEqual([
      ['a', true, null],
      ['b', false, 2],
    ]);
    expect(signature.docstring).toBeNull();

    const arrow = reflectRuntimeSignature('(x) => x * 2');
    expect(arrow.slots).toEqual([{ kind: 'positional', name: 'x', required: true }]);
  });
});

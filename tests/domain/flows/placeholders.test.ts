import {
  parsePlaceholder,
  resolveParams,
  resolveValue,
  type ResolutionScope,
} from '../../../src/domain/flows/placeholders';
import { UnresolvedReferenceError } from '../../../src/shared/errors';

function scope(): ResolutionScope {
  return { inputs: { a: 5, empty: null }, ctx: new Map<string, unknown>([['sum', 7]]) };
}

describe('placeholders', () => {
  test('only whole-value prefixes with a key are placeholders', () => {
    expect(parsePlaceholder('$inputs.a')).toEqual({ scope: 'inputs', key: 'a' });
    expect(parsePlaceholder('$ctx.sum')).toEqual({ scope: 'ctx', key: 'sum' });
    expect(parsePlaceholder('$ctx.a.b')).toEqual({ scope: 'ctx', key: 'a.b' });
    expect(parsePlaceholder('$inputs.')).toBeNull();
    expect(parsePlaceholder('total: $ctx.sum')).toBeNull();
    expect(parsePlaceholder('$other.x')).toBeNull();
    expect(parsePlaceholder(3)).toBeNull();
  });

  test('resolves inputs and context values', () => {
    expect(resolveValue('$inputs.a', scope())).toBe(5);
    expect(resolveValue('$inputs.empty', scope())).toBeNull();
    expect(resolveValue('$ctx.sum', scope())).toBe(7);
  });

  test('literals pass through untouched', () => {
    const literal = { nested: '$ctx.sum' };
    expect(resolveValue(literal, scope())).toBe(literal);
    expect(resolveValue('plain', scope())).toBe('plain');
    expect(resolveValue(false, scope())).toBe(false);
  });

  test('unknown references raise UnresolvedReferenceError', () => {
    expect(() => resolveValue('$inputs.b', scope())).toThrow(UnresolvedReferenceError);
    expect(() => resolveValue('$ctx.later', scope())).toThrow(
      'Flow reference "$ctx.later" could not be resolved from context.'
    );
  });

  test('resolveParams resolves every param', () => {
    expect(resolveParams({ a: '$inputs.a', b: '$ctx.sum', c: 1 }, scope())).toEqual({ a: 5, b: 7, c: 1 });
    expect(() => resolveParams({ a: '$inputs.a', b: '$ctx.missing' }, scope())).toThrow(
      UnresolvedReferenceError
    );
  });
});

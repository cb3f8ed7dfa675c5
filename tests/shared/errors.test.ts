import {
  describeError,
  ExecutionError,
  FlowsmithError,
  isFlowsmithError,
  NotFoundError,
  UnresolvedReferenceError,
  ValidationError,
} from '../../src/shared/errors';

describe('shared/errors', () => {
  test('every error carries a code and extends FlowsmithError', () => {
    const errors = [
      new NotFoundError('tool', 'add'),
      new ValidationError('bad', 'name'),
      new UnresolvedReferenceError('$ctx.sum', 'ctx'),
      new ExecutionError('add', { type: 'TypeError', message: 'boom' }),
    ];
    expect(errors.map((err) => err.code)).toEqual(['not_found', 'validation', 'reference', 'execution']);
    for (const err of errors) {
      expect(err).toBeInstanceOf(FlowsmithError);
      expect(isFlowsmithError(err)).toBe(true);
    }
    expect(isFlowsmithError(new Error('plain'))).toBe(false);
  });

  test('NotFoundError names the missing subject', () => {
    const err = new NotFoundError('flow', 'nightly');
    expect(err.message).toBe('The flow "nightly" does not exist or could not be loaded.');
    expect(err.name).toBe('NotFoundError');
    expect(err.kind).toBe('flow');
    expect(err.subject).toBe('nightly');
  });

  test('UnresolvedReferenceError describes the scope it looked in', () => {
    expect(new UnresolvedReferenceError('$inputs.a', 'inputs').message).toBe(
      'Flow reference "$inputs.a" could not be resolved from inputs.'
    );
    expect(new UnresolvedReferenceError('$ctx.sum', 'ctx').message).toBe(
      'Flow reference "$ctx.sum" could not be resolved from context.'
    );
  });

  test('ExecutionError keeps the cause and can be tagged with a step', () => {
    const err = new ExecutionError('divide', { type: 'RangeError', message: 'division by zero' });
    expect(err.message).toBe('Tool "divide" raised RangeError: division by zero');
    expect(err.stepId).toBeNull();

    const tagged = err.atStep('s2');
    expect(tagged).toBeInstanceOf(ExecutionError);
    expect(tagged.stepId).toBe('s2');
    expect(tagged.toolName).toBe('divide');
    expect(tagged.causeType).toBe('RangeError');
    expect(tagged.causeMessage).toBe('division by zero');
    expect(tagged.message).toBe('Step "s2" failed: tool "divide" raised RangeError: division by zero');
  });

  test('describeError reads errors structurally', () => {
    expect(describeError(new TypeError('nope'))).toEqual({ type: 'TypeError', message: 'nope' });
    expect(describeError({ name: 'CustomError', message: 'from elsewhere' })).toEqual({
      type: 'CustomError',
      message: 'from elsewhere',
    });
    expect(describeError({ message: 'no name' })).toEqual({ type: 'Error', message: 'no name' });
    expect(describeError('just text')).toEqual({ type: 'string', message: 'just text' });
  });
});

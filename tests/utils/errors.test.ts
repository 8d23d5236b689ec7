import {
  EmptyExtractionResult,
  InvalidTemplateError,
  ModelInvocationError,
  OutputWriteError,
  UnreadablePdfError,
  ValidationError,
  describeError,
  isPipelineError,
} from '../../src/utils/errors.js';

describe('describeError', () => {
  it('prefixes pipeline errors with their stage and appends the cause', () => {
    const error = new UnreadablePdfError('zh.pdf is not a readable PDF', 'zh.pdf', new Error('Invalid PDF structure'));
    expect(describeError(error)).toBe('[acquisition] zh.pdf is not a readable PDF: Invalid PDF structure');
  });

  it('includes the HTTP status of a failed model call', () => {
    const error = new ModelInvocationError('Model call to davinci-002 failed', { modelId: 'davinci-002', status: 429 });
    expect(describeError(error)).toBe('[invocation] Model call to davinci-002 failed (status 429)');
  });

  it('renders errors without a cause', () => {
    expect(describeError(new EmptyExtractionResult('No term pairs found in any window'))).toBe(
      '[parsing] No term pairs found in any window'
    );
  });

  it('falls back to the message of other errors', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});

describe('isPipelineError', () => {
  it('recognizes the stage errors only', () => {
    expect(isPipelineError(new InvalidTemplateError('missing'))).toBe(true);
    expect(isPipelineError(new OutputWriteError('cannot write', 'out.csv'))).toBe(true);
    expect(isPipelineError(new ValidationError('bad request'))).toBe(false);
    expect(isPipelineError(new Error('other'))).toBe(false);
  });
});

export type PipelineStage = 'acquisition' | 'prompt' | 'invocation' | 'parsing' | 'registry' | 'output';

export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UnreadablePdfError extends Error {
  code = 'UNREADABLE_PDF';
  readonly stage: PipelineStage = 'acquisition';
  constructor(message: string, public source: string, public details?: unknown) {
    super(message);
    this.name = 'UnreadablePdfError';
  }
}

export class InvalidTemplateError extends Error {
  code = 'INVALID_TEMPLATE';
  readonly stage: PipelineStage = 'prompt';
  constructor(message: string, public missingMarkers: string[] = [], public details?: unknown) {
    super(message);
    this.name = 'InvalidTemplateError';
  }
}

export interface ModelInvocationFailure {
  modelId: string;
  status?: number;
  aborted?: boolean;
  details?: unknown;
}

export class ModelInvocationError extends Error {
  code = 'MODEL_INVOCATION_ERROR';
  readonly stage: PipelineStage = 'invocation';
  readonly modelId: string;
  readonly status?: number;
  readonly aborted: boolean;
  readonly details?: unknown;

  constructor(message: string, failure: ModelInvocationFailure) {
    super(message);
    this.name = 'ModelInvocationError';
    this.modelId = failure.modelId;
    this.status = failure.status;
    this.aborted = failure.aborted ?? false;
    this.details = failure.details;
  }
}

// Recoverable: callers report "no terms found" instead of crashing.
export class EmptyExtractionResult extends Error {
  code = 'EMPTY_EXTRACTION_RESULT';
  readonly stage: PipelineStage = 'parsing';
  constructor(message: string, public rawPreview: string = '') {
    super(message);
    this.name = 'EmptyExtractionResult';
  }
}

export class OutputWriteError extends Error {
  code = 'OUTPUT_WRITE_ERROR';
  readonly stage: PipelineStage = 'output';
  constructor(message: string, public path: string, public details?: unknown) {
    super(message);
    this.name = 'OutputWriteError';
  }
}

export type PipelineError =
  | UnreadablePdfError
  | InvalidTemplateError
  | ModelInvocationError
  | EmptyExtractionResult
  | OutputWriteError;

export function isPipelineError(error: unknown): error is PipelineError {
  return (
    error instanceof UnreadablePdfError ||
    error instanceof InvalidTemplateError ||
    error instanceof ModelInvocationError ||
    error instanceof EmptyExtractionResult ||
    error instanceof OutputWriteError
  );
}

function causeMessage(details: unknown): string | undefined {
  if (details instanceof Error) return details.message;
  if (typeof details === 'string' && details.length > 0) return details;
  return undefined;
}

/**
 * One-line, user-facing description: `[stage] message: cause`.
 */
export function describeError(error: unknown): string {
  if (isPipelineError(error)) {
    const cause = 'details' in error ? causeMessage(error.details) : undefined;
    const status = error instanceof ModelInvocationError && error.status ? ` (status ${error.status})` : '';
    return `[${error.stage}] ${error.message}${status}${cause ? `: ${cause}` : ''}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type ErrorKind = 'expected' | 'validation' | 'not_found' | 'internal';

export type BatchstatErrorOptions = {
  code: string;
  message: string;
  userMessage?: string;
  kind?: ErrorKind;
  exitCode?: number;
  details?: Record<string, unknown>;
  nextSteps?: string[];
  cause?: unknown;
};

export class BatchstatError extends Error {
  code: string;
  kind: ErrorKind;
  userMessage: string;
  exitCode: number;
  details?: Record<string, unknown>;
  nextSteps?: string[];
  override cause?: unknown;

  constructor(options: BatchstatErrorOptions) {
    super(options.message);
    this.name = 'BatchstatError';
    this.code = options.code;
    this.kind = options.kind ?? 'expected';
    this.userMessage = options.userMessage ?? options.message;
    this.exitCode = options.exitCode ?? (this.kind === 'validation' ? 2 : 1);
    if (options.details !== undefined) {
      this.details = options.details;
    }
    if (options.nextSteps !== undefined) {
      this.nextSteps = options.nextSteps;
    }
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isBatchstatError(error: unknown, code?: string): error is BatchstatError {
  if (!(error instanceof BatchstatError)) return false;
  return code === undefined || error.code === code;
}

export function normalizeError(error: unknown): BatchstatError {
  if (error instanceof BatchstatError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new BatchstatError({
    code: 'unexpected_error',
    message,
    userMessage: message || 'Unexpected error.',
    kind: 'internal',
    exitCode: 1,
    cause: error,
  });
}

// Failure taxonomy shared by every pipeline stage

export type PipelineErrorCode =
  | 'RATE_LIMIT'
  | 'HTTP_ERROR'
  | 'LOAD_ERROR'
  | 'ANALYSIS_ERROR'
  | 'STAGE_FAILED';

export type PipelineStage = 'extract' | 'transform' | 'load' | 'analyze';

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  /** Whether a fresh run may succeed without operator action */
  readonly retryable: boolean;

  protected constructor(
    message: string,
    options: { cause?: unknown; retryable?: boolean } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
  }
}

/** Quota stayed exhausted past the client's retry ceiling. */
export class RateLimitExceededError extends PipelineError {
  readonly code = 'RATE_LIMIT' as const;

  constructor(
    readonly attempts: number,
    readonly resetAt: Date | null,
  ) {
    super(
      `GitHub rate limit still exhausted after ${attempts} attempts` +
        (resetAt ? ` (quota resets at ${resetAt.toISOString()})` : ''),
      { retryable: true },
    );
  }
}

export class HttpError extends PipelineError {
  readonly code = 'HTTP_ERROR' as const;

  constructor(
    readonly status: number,
    readonly body: unknown,
    route?: string,
  ) {
    super(`GitHub responded ${status}${route ? ` for ${route}` : ''}: ${describeBody(body)}`);
  }
}

/** Schema or write failure; the store must be treated as undefined. */
export class LoadError extends PipelineError {
  readonly code = 'LOAD_ERROR' as const;

  constructor(cause: unknown) {
    super(`Loading commits into the store failed: ${errorMessage(cause)}`, { cause });
  }
}

/** A read query failed, usually because the store was never loaded. */
export class AnalysisError extends PipelineError {
  readonly code = 'ANALYSIS_ERROR' as const;

  constructor(
    readonly query: string,
    cause: unknown,
  ) {
    super(`Analysis query "${query}" failed: ${errorMessage(cause)}`, { cause });
  }
}

export class PipelineStageError extends PipelineError {
  readonly code = 'STAGE_FAILED' as const;

  constructor(
    readonly stage: PipelineStage,
    cause: unknown,
  ) {
    super(`${stage} stage failed: ${errorMessage(cause)}`, {
      cause,
      retryable: cause instanceof PipelineError && cause.retryable,
    });
  }
}

function describeBody(body: unknown): string {
  if (typeof body === 'string') return body;
  if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return JSON.stringify(body) ?? 'no body';
}

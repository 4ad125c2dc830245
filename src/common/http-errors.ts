import {
  BadGatewayException,
  ConflictException,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import {
  AnalysisError,
  HttpError,
  PipelineStageError,
  RateLimitExceededError,
  errorMessage,
} from './errors.js';

function rootCause(error: unknown): unknown {
  let current = error;
  while (current instanceof PipelineStageError) current = current.cause;
  return current;
}

/** Maps pipeline failures onto HTTP responses; the outer message is kept */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) return error;

  const message = errorMessage(error);
  const cause = rootCause(error);

  if (cause instanceof RateLimitExceededError) {
    return new HttpException(message, HttpStatus.TOO_MANY_REQUESTS, { cause: error });
  }
  if (cause instanceof HttpError) {
    return cause.status === 404
      ? new NotFoundException(message, { cause: error })
      : new BadGatewayException(message, { cause: error });
  }
  if (cause instanceof AnalysisError) {
    return new ConflictException(message, { cause: error });
  }
  return new InternalServerErrorException(message, { cause: error });
}

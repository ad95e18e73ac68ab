import { HttpStatus } from '@nestjs/common';
import { AppError } from './AppError';

/**
 * Request-level errors. Each carries the HTTP status it maps to, so the
 * exception filter needs no per-class knowledge.
 */

/** Malformed query, path or body parameter. Always raised before store access. */
export class ValidationError extends AppError {
  constructor(
    readonly param: string,
    readonly value: string,
    reason?: string,
  ) {
    super(
      `bad request: invalid parameter, ${param}: ${value}${reason ? ` (${reason})` : ''}`,
      'VALIDATION_FAILED',
      HttpStatus.BAD_REQUEST,
    );
    this.name = 'ValidationError';
  }
}

/** None of the query parameters a route needs was supplied. */
export class MissingParameterError extends AppError {
  constructor(readonly params: ReadonlyArray<string>) {
    const names =
      params.length > 1
        ? `${params.slice(0, -1).join(', ')} or ${params[params.length - 1]}`
        : params.join('');
    super(
      `bad request: required query parameter: ${names}`,
      'VALIDATION_FAILED',
      HttpStatus.BAD_REQUEST,
    );
    this.name = 'MissingParameterError';
  }
}

export class NotFoundError extends AppError {
  constructor(
    readonly entityType: string,
    readonly id: string,
    readonly versionId?: string,
  ) {
    super(
      versionId
        ? `not found: ${entityType} ${id} version ${versionId}`
        : `not found: ${entityType} ${id}`,
      'NOT_FOUND',
      HttpStatus.NOT_FOUND,
    );
    this.name = 'NotFoundError';
  }
}

/** The body parsed, but the entity it describes is not acceptable. */
export class UnprocessableEntityError extends AppError {
  constructor(
    readonly entityType: string,
    readonly problems: ReadonlyArray<string>,
  ) {
    super(
      `unprocessable entity: ${entityType}: ${problems.join(', ')}`,
      'UNPROCESSABLE_ENTITY',
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
    this.name = 'UnprocessableEntityError';
  }
}

/** The client went away before the response was assembled. */
export class RequestAbortedError extends AppError {
  constructor(cause?: unknown) {
    super('request aborted', 'REQUEST_ABORTED', 499, cause);
    this.name = 'RequestAbortedError';
  }
}

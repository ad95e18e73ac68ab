import { HttpStatus } from '@nestjs/common';

export class AppError extends Error {
  public readonly code: string;
  public readonly status: number;
  public readonly cause?: unknown;

  constructor(
    message: string,
    code = 'APP_ERROR',
    status: number = HttpStatus.INTERNAL_SERVER_ERROR,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
    this.cause = cause;
  }
}

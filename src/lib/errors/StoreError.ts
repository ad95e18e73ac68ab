import { HttpStatus } from '@nestjs/common';
import { AppError } from './AppError';

/**
 * Store operation names. Open-ended so new table methods need no churn here.
 */
export type StoreOperation =
  | 'connect'
  | 'readEntity'
  | 'readIds'
  | 'readTextValues'
  | 'readEntities'
  | 'readKeys'
  | 'readVersion'
  | 'readVersions'
  | 'writeEntity'
  | 'deleteEntity'
  | 'entityExists'
  | 'deleteVersion'
  | (string & {});

export interface StoreErrorContext {
  readonly operation: StoreOperation;
  /** Entity type name, e.g. "Content". */
  readonly entityType?: string;
  readonly collection?: string;
  /** Sanitized arguments; never whole bodies. */
  readonly argsPreview?: Readonly<Record<string, unknown>>;
  readonly driverCode?: number | string;
}

/**
 * A backing-store failure. Surfaces as HTTP 500; the driver error is kept as
 * the cause.
 */
export class StoreError extends AppError {
  public readonly context: Readonly<StoreErrorContext>;

  constructor(message: string, context: StoreErrorContext, cause?: unknown) {
    super(message, 'STORE_ERROR', HttpStatus.INTERNAL_SERVER_ERROR, cause);
    this.name = 'StoreError';
    this.context = Object.freeze({ ...context });
  }

  /** Human-readable summary for logs. */
  public summary(): string {
    const parts = [
      `op=${this.context.operation}`,
      this.context.entityType ? `type=${this.context.entityType}` : undefined,
      this.context.collection ? `coll=${this.context.collection}` : undefined,
      this.context.driverCode !== undefined
        ? `driverCode=${String(this.context.driverCode)}`
        : undefined,
    ].filter((p): p is string => p !== undefined);
    return `store action failed: ${parts.join(' ')}`;
  }

  public toJSON(): {
    name: string;
    message: string;
    context: StoreErrorContext;
    cause?: { name: string; message: string };
  } {
    const c = this.cause;
    return {
      name: this.name,
      message: this.message,
      context: this.context,
      cause: c instanceof Error ? { name: c.name, message: c.message } : undefined,
    };
  }

  /**
   * Wrap a thrown value with store context. Application errors (not found,
   * validation, an existing StoreError) pass through untouched.
   */
  public static wrap(
    err: unknown,
    context: StoreErrorContext,
    fallbackMessage = 'store action failed',
  ): AppError {
    if (err instanceof AppError) return err;
    const { message, driverCode } = extractDriverDetails(err);
    return new StoreError(
      message ?? fallbackMessage,
      { ...context, driverCode },
      err,
    );
  }
}

/** Pull message/code off driver errors without trusting their shape. */
function extractDriverDetails(err: unknown): {
  message?: string;
  driverCode?: number | string;
} {
  if (err && typeof err === 'object') {
    const maybe = err as Record<string, unknown>;
    const message =
      typeof maybe.message === 'string' && maybe.message.length > 0
        ? maybe.message
        : undefined;
    const code =
      typeof maybe.code === 'number' || typeof maybe.code === 'string'
        ? maybe.code
        : undefined;
    return { message, driverCode: code };
  }
  return {};
}

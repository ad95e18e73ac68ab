import {
  Injectable,
  type CallHandler,
  type ExecutionContext,
  type NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { type Observable, tap } from 'rxjs';
import { toApiEvent } from '../../lib/errors/api-exception.filter';
import { StoreError } from '../../lib/errors/StoreError';
import { isEntityId } from '../../lib/ids/entity-id';
import { AuditService } from './audit.service';
import { AUDITED_ENTITY_TYPE } from './audited.decorator';

const VERBS: Readonly<Record<string, string>> = {
  POST: 'create',
  PUT: 'update',
  PATCH: 'update',
  DELETE: 'delete',
};

/**
 * Emits an INFO event for each successful mutation on an @Audited controller,
 * and an ERROR event for any request on one that fails with a 5xx.
 */
@Injectable()
export class AuditInterceptor implements NestInterceptor {
  constructor(
    private readonly reflector: Reflector,
    private readonly audit: AuditService,
  ) {}

  intercept(ctx: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (ctx.getType() !== 'http') return next.handle();
    const entityType = this.reflector.getAllAndOverride<string | undefined>(
      AUDITED_ENTITY_TYPE,
      [ctx.getHandler(), ctx.getClass()],
    );
    if (!entityType) return next.handle();
    const req = ctx.switchToHttp().getRequest<Request>();
    const mutation = VERBS[req.method];
    const pathId = typeof req.params.id === 'string' ? req.params.id : undefined;
    const uri = req.originalUrl;

    return next.handle().pipe(
      tap({
        next: (body: unknown) => {
          if (!mutation) return;
          const entityId = idOf(body) ?? pathId;
          this.audit.record({
            entityId: entityId && isEntityId(entityId) ? entityId : undefined,
            entityType,
            logLevel: 'INFO',
            message: `${mutation}d ${entityType}${entityId ? ` ${entityId}` : ''}`,
            uri,
          });
        },
        error: (err: unknown) => {
          const event = toApiEvent(err, uri);
          if (event.code < 500) return;
          const cause = err instanceof StoreError ? ` [${err.summary()}]` : '';
          this.audit.record({
            entityId: pathId && isEntityId(pathId) ? pathId : undefined,
            entityType,
            logLevel: 'ERROR',
            message: `${mutation ?? 'read'} ${entityType}${pathId ? ` ${pathId}` : ''}: ${event.message}${cause}`,
            uri,
          });
        },
      }),
    );
  }
}

function idOf(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('id' in body)) return undefined;
  return typeof body.id === 'string' ? body.id : undefined;
}

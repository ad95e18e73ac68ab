import {
  createParamDecorator,
  type ExecutionContext,
} from '@nestjs/common';
import type { Request, Response } from 'express';

const signals = new WeakMap<Request, AbortSignal>();

/**
 * Signal that fires when the client disconnects before the response has been
 * written. One per request; repeated calls return the same signal.
 */
export function requestSignal(req: Request, res: Response): AbortSignal {
  const existing = signals.get(req);
  if (existing) return existing;
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) controller.abort(new Error('client disconnected'));
  });
  signals.set(req, controller.signal);
  return controller.signal;
}

/** Injects the request's AbortSignal into a handler parameter. */
export const RequestSignal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AbortSignal => {
    const http = ctx.switchToHttp();
    return requestSignal(http.getRequest<Request>(), http.getResponse<Response>());
  },
);

/** Global route prefix, set in main.ts. */
export const API_PREFIX = 'api';

/** Value for the Location header of a newly created entity. */
export function resourceLocation(route: string, id: string): string {
  return `/${API_PREFIX}/${route}/${id}`;
}

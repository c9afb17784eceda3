import { Injectable, NestMiddleware } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { NextFunction, Request, Response } from 'express';
import { Principal } from '../auth/auth.types';

/** What the middleware chain and the auth guard attach to an express request. */
export type ContextualRequest = Request & {
  requestId?: string;
  principal?: Principal;
};

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

// Untrusted ids end up in log lines and audit correlation; anything unusual is replaced.
export function acceptRequestId(incoming: string | string[] | undefined): string {
  const candidate = Array.isArray(incoming) ? incoming[0] : incoming;
  return candidate !== undefined && REQUEST_ID_PATTERN.test(candidate) ? candidate : randomUUID();
}

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  use(req: ContextualRequest, res: Response, next: NextFunction): void {
    req.requestId = acceptRequestId(req.headers[REQUEST_ID_HEADER]);
    // the guard fills this in from the bearer token; nothing upstream may
    req.principal = undefined;
    res.setHeader(REQUEST_ID_HEADER, req.requestId);
    next();
  }
}

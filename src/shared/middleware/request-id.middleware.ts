import { Injectable, NestMiddleware } from '@nestjs/common';
import { IncomingHttpHeaders } from 'http';
import { v4 as uuidv4 } from 'uuid';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Return the request's X-Request-ID, assigning one on the request headers
 * when the caller sent none. Later calls for the same request return the
 * same id.
 */
export function ensureRequestId(req: { headers: IncomingHttpHeaders }): string {
  const incoming = req.headers[REQUEST_ID_HEADER];
  if (typeof incoming === 'string' && incoming.length > 0) {
    return incoming;
  }

  const requestId = `req-${uuidv4()}`;
  req.headers[REQUEST_ID_HEADER] = requestId;
  return requestId;
}

/**
 * Echoes the request id back as X-Request-ID. The id is usually assigned
 * earlier by the HTTP logger's genReqId.
 */
@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(
    req: { headers: IncomingHttpHeaders },
    res: { setHeader(name: string, value: string): unknown },
    next: () => void,
  ): void {
    res.setHeader('X-Request-ID', ensureRequestId(req));
    next();
  }
}

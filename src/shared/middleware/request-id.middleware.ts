import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Propagates the caller's X-Request-ID, or assigns `req-<uuid>`
 */
@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.headers[REQUEST_ID_HEADER];
    const requestId =
      typeof incoming === 'string' && incoming ? incoming : `req-${uuidv4()}`;

    req.headers[REQUEST_ID_HEADER] = requestId;
    res.locals.requestId = requestId;
    res.setHeader('X-Request-ID', requestId);
    next();
  }
}

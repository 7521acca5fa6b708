import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, RequestContext } from '../context/request-context';

export const REQUEST_ID_HEADER = 'x-request-id';

function incomingRequestId(req: Request): string | undefined {
  const header = req.headers[REQUEST_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction) {
    const requestId = incomingRequestId(req) ?? randomUUID();
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const context: RequestContext = {
      requestId,
      startTime: Date.now(),
      clientIp: req.ip || req.socket.remoteAddress,
      method: req.method,
      path: req.path,
    };

    // Everything downstream (pipes, handlers, fetch tasks) sees this store
    requestContext.run(context, () => {
      next();
    });
  }
}

import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { AppLogger } from '../logger/app-logger.service';
import { getRequestContext } from '../context/request-context';

function countUrls(body: unknown): number | undefined {
  if (typeof body !== 'object' || body === null || !('urls' in body)) {
    return undefined;
  }
  return Array.isArray(body.urls) ? body.urls.length : undefined;
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = AppLogger.create('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const { method, path } = request;
    const requestCtx = getRequestContext();
    const startedAt = requestCtx?.startTime ?? Date.now();

    this.logger.info('Incoming request', {
      event: 'request_start',
      method,
      path,
      urlCount: countUrls(request.body),
      clientIp: requestCtx?.clientIp,
    });

    return next.handle().pipe(
      tap(() => {
        this.logger.info('Request completed', {
          event: 'request_complete',
          method,
          path,
          statusCode: http.getResponse<Response>().statusCode,
          durationMs: Date.now() - startedAt,
        });
      }),
      catchError((error: unknown) => {
        this.logger.error('Request failed', {
          event: 'request_error',
          method,
          path,
          statusCode: error instanceof HttpException ? error.getStatus() : 500,
          errorMessage: error instanceof Error ? error.message : String(error),
          durationMs: Date.now() - startedAt,
        });

        throw error;
      }),
    );
  }
}

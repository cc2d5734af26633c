import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { randomUUID } from 'node:crypto';

import { HierarchyLogger } from './hierarchy-logger.service';
import { LogCategory } from './log-levels';

const SLOW_REQUEST_MS = 2000;

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: HierarchyLogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const startedAt = Date.now();
    const url = request.originalUrl ?? request.url;

    // Generate or propagate correlation request ID
    const header = request.headers['x-request-id'];
    const requestId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
    response.setHeader('X-Request-Id', requestId);

    // Run the entire request pipeline within a correlation context
    return new Observable(subscriber => {
      this.logger.runWithContext(
        { requestId, method: request.method, path: url, startTime: startedAt },
        () => {
          this.logger.info(LogCategory.HTTP, `→ ${request.method} ${url}`, {
            userAgent: request.headers['user-agent'],
            ip: request.ip,
          });
          this.logger.trace(LogCategory.HTTP, 'Request body', { body: request.body as unknown });

          next.handle().pipe(
            tap((responseBody: unknown) => {
              const durationMs = Date.now() - startedAt;
              this.logger.info(LogCategory.HTTP, `← ${response.statusCode} ${request.method} ${url}`, {
                status: response.statusCode,
                durationMs,
              });
              this.logger.trace(LogCategory.HTTP, 'Response body', { body: responseBody });

              if (durationMs > SLOW_REQUEST_MS) {
                this.logger.warn(LogCategory.HTTP, `Slow request: ${durationMs}ms`, {
                  status: response.statusCode,
                  durationMs,
                });
              }
            }),
            catchError((error: unknown) => {
              const durationMs = Date.now() - startedAt;
              const status = this.extractStatusCode(error, response);
              this.logger.error(LogCategory.HTTP, `← ${status} ${request.method} ${url}`, error, { status, durationMs });
              throw error;
            })
          ).subscribe(subscriber);
        }
      );
    });
  }

  private extractStatusCode(error: unknown, response: Response): number {
    if (error instanceof HttpException) {
      return error.getStatus();
    }
    return response.statusCode;
  }
}

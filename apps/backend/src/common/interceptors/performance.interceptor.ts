import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

const SLOW_REQUEST_MS = 10000;

/**
 * Logs method, URL, status and response time for each request. Slow requests
 * (evaluation calls usually are) are logged at warn level.
 */
@Injectable()
export class PerformanceInterceptor implements NestInterceptor {
  private readonly logger = new Logger(PerformanceInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const { method, url } = http.getRequest<Request>();
    const start = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = Date.now() - start;
          const { statusCode } = http.getResponse<Response>();
          const line = `${method} ${url} ${statusCode} - ${duration}ms`;
          if (duration >= SLOW_REQUEST_MS) {
            this.logger.warn(`${line} (slow)`);
          } else {
            this.logger.log(line);
          }
        },
        error: (error: unknown) => {
          const duration = Date.now() - start;
          const message = error instanceof Error ? error.message : 'Unknown error';
          this.logger.error(`${method} ${url} - ${duration}ms - ERROR: ${message}`);
        },
      }),
    );
  }
}

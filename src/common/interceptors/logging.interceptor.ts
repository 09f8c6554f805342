import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

const REDACTED_QUERY_PARAMS = ['cursor'];

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();

    const { method, ip } = request;
    const url = redactUrl(request.originalUrl);
    const startedAt = Date.now();

    this.logger.log(`Incoming Request: ${method} ${url} IP: ${ip ?? 'unknown'}`);

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(
            `Outgoing Response: ${method} ${url} Status: ${response.statusCode} Response Time: ${Date.now() - startedAt}ms`,
          );
        },
        error: (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(
            `Request Error: ${method} ${url} Response Time: ${Date.now() - startedAt}ms Error: ${message}`,
          );
        },
      }),
    );
  }
}

/** Cursors are bearer-like tokens; keep them out of the logs. */
export function redactUrl(originalUrl: string): string {
  const queryStart = originalUrl.indexOf('?');
  if (queryStart === -1) return originalUrl;

  const params = new URLSearchParams(originalUrl.slice(queryStart + 1));
  for (const name of REDACTED_QUERY_PARAMS) {
    if (params.has(name)) params.set(name, '*****');
  }
  return `${originalUrl.slice(0, queryStart)}?${params.toString()}`;
}

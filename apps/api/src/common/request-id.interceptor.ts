// apps/api/src/common/request-id.interceptor.ts
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
import { runWithLogContext } from './log-context';

const REQUEST_ID_HEADER = 'x-request-id';

function readHeaderId(request: Request): string | undefined {
  const raw = request.headers[REQUEST_ID_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function generateRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Opens the log context for one HTTP request: picks up or mints a request
 * id, echoes it in the response and logs method, url, status and latency.
 */
@Injectable()
export class RequestIdInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RequestIdInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const start = Date.now();

    const requestId = readHeaderId(request) ?? generateRequestId();
    response.setHeader(REQUEST_ID_HEADER, requestId);

    const { method, originalUrl } = request;
    const line = () =>
      `[reqId=${requestId}] ${method} ${originalUrl} - ${response.statusCode} (${Date.now() - start}ms)`;

    return runWithLogContext({ requestId }, () =>
      next.handle().pipe(
        tap({
          next: () => this.logger.log(line()),
          error: (err: unknown) =>
            this.logger.error(
              line(),
              err instanceof Error ? err.stack : undefined,
            ),
        }),
      ),
    );
  }
}

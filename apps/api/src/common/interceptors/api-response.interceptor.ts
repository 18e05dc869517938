// apps/api/src/common/interceptors/api-response.interceptor.ts
import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { RAW_RESPONSE_KEY } from '../decorators/raw-response.decorator';

export type ApiEnvelope = {
  code: string;
  message: string;
  details: unknown;
};

// tag check also covers Dates created in another realm
function isDate(value: unknown): value is Date {
  return (
    value instanceof Date ||
    Object.prototype.toString.call(value) === '[object Date]'
  );
}

function serialize(value: unknown, seen: WeakSet<object>): unknown {
  if (isDate(value)) return value.toISOString();
  if (typeof value === 'bigint') return value.toString();
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map((v) => serialize(v, seen));

  if (typeof value === 'object') {
    if (seen.has(value)) return '[Circular]';
    seen.add(value);

    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = serialize(val, seen);
    }
    return result;
  }

  return value;
}

export function toJsonSafe(data: unknown): unknown {
  return serialize(data, new WeakSet<object>());
}

@Injectable()
export class ApiResponseInterceptor implements NestInterceptor {
  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') return next.handle();

    const raw = this.reflector.getAllAndOverride<boolean | undefined>(
      RAW_RESPONSE_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (raw) return next.handle();

    return next.handle().pipe(
      map(
        (data: unknown): ApiEnvelope => ({
          code: 'OK',
          message: 'success',
          details: toJsonSafe(typeof data === 'undefined' ? null : data),
        }),
      ),
    );
  }
}

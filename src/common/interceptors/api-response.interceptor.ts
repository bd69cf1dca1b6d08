import { CallHandler, ExecutionContext, Injectable, NestInterceptor, StreamableFile } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export type ApiEnvelope<T> = { data: T } & Record<string, unknown>;

function isEnvelope(value: unknown): value is ApiEnvelope<unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'data' in value;
}

/** Wraps a handler result as `{ data }`. Existing envelopes and streams pass through. */
export function toApiEnvelope(body: unknown): unknown {
  if (body instanceof StreamableFile || isEnvelope(body)) return body;
  return { data: body === undefined ? null : body };
}

@Injectable()
export class ApiResponseInterceptor implements NestInterceptor {
  intercept(_context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next.handle().pipe(map(toApiEnvelope));
  }
}

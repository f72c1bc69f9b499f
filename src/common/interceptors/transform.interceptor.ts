import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable, map } from 'rxjs';
import { PaginatedResult } from '../dtos/pagination.dto';

export interface ApiEnvelope<T> {
  success: true;
  data: T;
  meta?: PaginatedResult<unknown>['meta'];
  timestamp: string;
}

function isPaginated(value: unknown): value is PaginatedResult<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'data' in value &&
    Array.isArray(value.data) &&
    'meta' in value
  );
}

/**
 * Wraps every controller result as `{ success, data, meta?, timestamp }`.
 * Paginated results keep their `meta` beside `data`.
 */
@Injectable()
export class TransformInterceptor<T> implements NestInterceptor<T, ApiEnvelope<unknown>> {
  intercept(_context: ExecutionContext, next: CallHandler<T>): Observable<ApiEnvelope<unknown>> {
    return next.handle().pipe(
      map((result) => {
        const timestamp = new Date().toISOString();
        if (isPaginated(result)) {
          return { success: true as const, data: result.data, meta: result.meta, timestamp };
        }
        return { success: true as const, data: result, timestamp };
      }),
    );
  }
}

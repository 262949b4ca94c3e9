import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpStatus,
} from '@nestjs/common';
import { Response } from 'express';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import {
  ApiResponse,
  PaginatedResult,
  createSuccessResponse,
  createPaginatedResponse,
} from '../dto/api-response.dto';

/**
 * Wraps every controller result in the ApiResponse envelope
 */
@Injectable()
export class ResponseTransformInterceptor implements NestInterceptor<
  unknown,
  ApiResponse<unknown>
> {
  intercept(
    context: ExecutionContext,
    next: CallHandler<unknown>
  ): Observable<ApiResponse<unknown>> {
    const response = context.switchToHttp().getResponse<Response>();

    return next.handle().pipe(
      map((data) => {
        const statusCode = response.statusCode || HttpStatus.OK;

        if (this.isApiResponse(data)) {
          return data;
        }

        if (this.isPaginatedResult(data)) {
          const { data: items, meta } = data;
          return createPaginatedResponse(
            items,
            {
              pageSize: meta.limit,
              pageNumber: meta.page,
              totalPages: meta.totalPages,
              total: meta.total,
            },
            'Successful',
            statusCode
          );
        }

        return createSuccessResponse(data ?? null, 'Successful', statusCode);
      })
    );
  }

  private isApiResponse(data: unknown): data is ApiResponse<unknown> {
    return (
      typeof data === 'object' &&
      data !== null &&
      'message' in data &&
      'status' in data &&
      'error' in data &&
      'data' in data
    );
  }

  private isPaginatedResult(data: unknown): data is PaginatedResult<unknown> {
    if (typeof data !== 'object' || data === null) return false;
    if (!('data' in data) || !('meta' in data)) return false;

    const { meta } = data;
    return (
      Array.isArray(data.data) &&
      typeof meta === 'object' &&
      meta !== null &&
      'page' in meta &&
      'limit' in meta &&
      'totalPages' in meta &&
      'total' in meta
    );
  }
}

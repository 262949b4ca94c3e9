/**
 * Pagination block attached to list responses
 */
export interface PaginationMeta {
  pageSize: number;
  pageNumber: number;
  totalPages: number;
  total: number;
}

export type ApiErrorDetails = string | Record<string, string[]>;

/**
 * Envelope returned by every endpoint, successful or not
 */
export interface ApiResponse<T = unknown> {
  message: string;
  status: number;
  error: ApiErrorDetails | null;
  data: T | null;
  pagination?: PaginationMeta;
}

/**
 * Shape services return for paginated lists; the response interceptor turns
 * `meta` into the envelope's `pagination` block.
 */
export interface PaginatedResult<T> {
  data: T[];
  meta: {
    page: number;
    limit: number;
    totalPages: number;
    total: number;
  };
}

export function createSuccessResponse<T>(
  data: T,
  message: string = 'Success',
  status: number = 200
): ApiResponse<T> {
  return {
    message,
    status,
    error: null,
    data,
  };
}

export function createPaginatedResponse<T>(
  data: T[],
  pagination: PaginationMeta,
  message: string = 'Success',
  status: number = 200
): ApiResponse<T[]> {
  return {
    message,
    status,
    error: null,
    data,
    pagination,
  };
}

export function createErrorResponse(
  error: ApiErrorDetails,
  message: string = 'An error occurred',
  status: number = 500
): ApiResponse<null> {
  return {
    message,
    status,
    error,
    data: null,
  };
}

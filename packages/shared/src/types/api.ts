export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type ApiResponse<T> = ApiSuccess<T> | ApiError;

export interface Paginated<T> {
  count: number;
  results: T[];
}

export function createSuccessResponse<T>(data: T): ApiSuccess<T> {
  return { success: true, data };
}

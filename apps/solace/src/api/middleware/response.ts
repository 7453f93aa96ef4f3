/**
 * API Response Middleware
 *
 * Standardized response envelope for all API endpoints.
 */

export const API_VERSION = '1.0.0';

export interface ApiErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Standard API response wrapper
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data: T | null;
  error: ApiErrorBody | null;
  timestamp: string;
  meta?: {
    version?: string;
    requestId?: string;
  };
}

/**
 * Create a standardized API response
 */
export function apiResponse<T>(data: T, meta?: { requestId?: string }): ApiResponse<T> {
  return {
    success: true,
    data,
    error: null,
    timestamp: new Date().toISOString(),
    meta: {
      version: API_VERSION,
      ...meta,
    },
  };
}

/**
 * Create an error response
 */
export function apiErrorResponse(code: string, message: string, details?: unknown): ApiResponse<null> {
  return {
    success: false,
    data: null,
    error: {
      code,
      message,
      details,
    },
    timestamp: new Date().toISOString(),
  };
}

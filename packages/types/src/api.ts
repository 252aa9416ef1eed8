/**
 * API Types
 * Response envelopes shared by the HTTP surface and its clients.
 */

/** Successful response wrapper */
export interface ApiResponse<T> {
  success: true;
  data: T;
  timestamp: string;
}

/** Error payload */
export interface ApiError {
  code: number | string;
  key?: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
}

/** Failed response wrapper */
export interface ErrorResponse {
  success: false;
  error: ApiError;
  requestId?: string;
  timestamp: string;
}

/** Health check response */
export interface HealthCheckResponse {
  status: "ok" | "degraded";
  service: string;
  version: string;
  timestamp: string;
}

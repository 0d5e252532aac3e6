/**
 * Response envelopes for the JSON API.
 */
export interface ErrorResponse {
  success: false;
  message: string;
  errors?: Array<{ path: string; message: string }>;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(
  message: string,
  errors?: Array<{ path: string; message: string }>
): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}

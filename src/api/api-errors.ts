export type ApiError = {
  message: string;
  status?: number;
  // Server-provided reason, when the body was a management API error.
  reason?: string;
};

export function isAuthError(error: ApiError): boolean {
  return error.status === 401 || error.status === 403;
}

export function getDisplayMessage(error: ApiError): string {
  if (isAuthError(error)) {
    return `${error.reason || error.message} (log in again or provide a fresh token)`;
  }
  return error.reason ? `${error.message}: ${error.reason}` : error.message;
}

export function toApiError(error: unknown): ApiError {
  if (error instanceof Error) return { message: error.message };
  return { message: String(error) };
}

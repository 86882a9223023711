import axios from 'axios';

/**
 * Turn a failed upstream call into an Error whose message says what went wrong,
 * keeping the status-code wording used across the HTTP clients.
 */
export function upstreamError(serviceName: string, action: string, error: unknown): Error {
  const status = axios.isAxiosError(error) ? error.response?.status : undefined;

  if (status === 401 || status === 403) {
    return new Error(`Invalid ${serviceName} API key`);
  } else if (status === 429) {
    return new Error(`${serviceName} rate limit exceeded. Please try again later.`);
  } else if (status !== undefined && status >= 500) {
    return new Error(`${serviceName} service error. Please try again later.`);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new Error(`Failed to ${action}: ${message}`);
}

/** Status and body of an axios error, for logging. */
export function errorDetails(error: unknown): Record<string, unknown> {
  if (axios.isAxiosError(error)) {
    return {
      message: error.message,
      status: error.response?.status,
      response: error.response?.data,
    };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * JSON Output Utilities
 * Helpers for formatting command output as JSON
 */

export interface JsonResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  timestamp: string;
}

export function jsonSuccess<T>(data: T): JsonResponse<T> {
  return {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
}

export function jsonError<T>(error: string | Error, data?: T): JsonResponse<T> {
  return {
    success: false,
    data,
    error: error instanceof Error ? error.message : error,
    timestamp: new Date().toISOString(),
  };
}

export function outputJson<T>(response: JsonResponse<T>): void {
  console.log(JSON.stringify(response, null, 2));
}

export function isJsonMode(options: { json?: boolean }): boolean {
  return options.json === true;
}

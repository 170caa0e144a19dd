import type { ApiResponse } from "../types/api.js";

export function createApiError(
  code: string,
  message: string,
  details?: unknown,
): ApiResponse<never> {
  return { success: false, error: { code, message, details } };
}

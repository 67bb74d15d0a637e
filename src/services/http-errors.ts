import { isAxiosError } from "axios";
import { ChatbotError, TimeoutFailure, UpstreamServiceFailure } from "../errors";
import { describeError } from "../utils/logger";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export function isTimeoutError(error: unknown): boolean {
  return isAxiosError(error) && !!error.code && TIMEOUT_CODES.has(error.code);
}

/**
 * Turns an axios failure into the chatbot's error taxonomy.
 */
export function toServiceError(
  service: string,
  error: unknown,
  timeoutMs?: number
): ChatbotError {
  if (error instanceof ChatbotError) return error;

  if (isTimeoutError(error)) {
    return new TimeoutFailure(service, timeoutMs, error);
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    const body =
      typeof error.response?.data === "string"
        ? error.response.data.slice(0, 200)
        : error.message;
    return new UpstreamServiceFailure(
      service,
      status ? `HTTP ${status}: ${body}` : body,
      status,
      error
    );
  }

  return new UpstreamServiceFailure(service, describeError(error), undefined, error);
}

/** Timeouts, dropped connections, 429 and 5xx. */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof TimeoutFailure) return true;
  if (error instanceof UpstreamServiceFailure) {
    const status = error.upstreamStatus;
    return status === undefined || status === 429 || status >= 500;
  }
  return false;
}

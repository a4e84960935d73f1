import type { ApiErrorResponse } from "@graphrag-demo/shared";

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT"
]);

export interface OllamaFailure {
  statusCode: number;
  body: ApiErrorResponse;
}

/**
 * Maps a failed Ollama call onto the status and body relayed to the caller.
 * HTTP errors keep Ollama's status, connection failures become 503.
 */
export function describeOllamaFailure(operation: string, error: unknown): OllamaFailure {
  const details = error instanceof Error ? error.message : String(error);

  const upstreamStatus = getUpstreamStatus(error);
  if (upstreamStatus !== null) {
    return {
      statusCode: upstreamStatus,
      body: { error: `${operation} failed`, details }
    };
  }

  if (isConnectionError(error)) {
    return {
      statusCode: 503,
      body: { error: "Ollama unavailable", details }
    };
  }

  return {
    statusCode: 500,
    body: { error: `${operation} failed`, details }
  };
}

// The ollama client raises errors carrying `status_code` for non-2xx replies.
function getUpstreamStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("status_code" in error)) {
    return null;
  }

  const status = error.status_code;
  if (typeof status === "number" && status >= 400 && status <= 599) {
    return status;
  }
  return null;
}

function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (hasConnectionCode(error) || hasConnectionCode(error.cause)) {
    return true;
  }
  return error.message === "fetch failed";
}

function hasConnectionCode(value: unknown): boolean {
  if (typeof value !== "object" || value === null || !("code" in value)) {
    return false;
  }
  return typeof value.code === "string" && CONNECTION_ERROR_CODES.has(value.code);
}

import { StructuralBackendError, TransientBackendError } from "../../domain/errors/AgentErrors";

export type BackendErrorKind = "transient" | "structural";

const TRANSIENT_STATUS = new Set([408, 409, 425, 429]);
const TRANSIENT_CODES = new Set(["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "EAI_AGAIN", "EPIPE", "UND_ERR_SOCKET"]);
const TRANSIENT_TEXT = /time(d)?\s?out|connection|socket hang up|network|overloaded/i;

/**
 * Decides whether a failed backend call is worth retrying. Works on the error
 * surfaces of the OpenAI, Anthropic and Gemini SDKs, which all expose an HTTP
 * `status` when the server answered.
 */
export function classifyBackendError(error: unknown): BackendErrorKind {
  if (error instanceof TransientBackendError) return "transient";
  if (error instanceof StructuralBackendError) return "structural";

  const status = readNumber(error, "status");
  if (status !== undefined) {
    return TRANSIENT_STATUS.has(status) || status >= 500 ? "transient" : "structural";
  }

  const code = readString(error, "code");
  if (code !== undefined && TRANSIENT_CODES.has(code)) return "transient";

  if (error instanceof Error && TRANSIENT_TEXT.test(`${error.name} ${error.message}`)) {
    return "transient";
  }

  return "structural";
}

function readNumber(value: unknown, key: string): number | undefined {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "number" ? field : undefined;
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}

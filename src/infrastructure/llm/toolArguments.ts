import { z } from "zod";

const argumentsSchema = z.record(z.unknown());

/**
 * Normalizes the arguments a model attached to a tool call. Anything that is
 * not a JSON object becomes `{}`; the tool registry then reports the missing
 * fields back to the model.
 */
export function parseToolArguments(raw: unknown): Record<string, unknown> {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      return {};
    }
  }
  const parsed = argumentsSchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

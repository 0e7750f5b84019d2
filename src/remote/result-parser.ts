import { outputText, type CommandResponse } from "./protocol.js";
import { scanBalanced } from "./json-stream.js";

export const RESULT_SENTINEL = "RESULT:";

export type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Find the last well-formed JSON object that follows `sentinel` in `text`.
 *
 * Payload scripts print freely, so the result line may be surrounded by
 * unrelated output or even share a line with it. Occurrences are tried from
 * last to first; the first that yields a parseable object wins.
 */
export function extractResult(text: string, sentinel: string = RESULT_SENTINEL): JsonObject | null {
  let at = text.lastIndexOf(sentinel);
  while (at >= 0) {
    let start = at + sentinel.length;
    while (start < text.length && /\s/.test(text[start])) start++;
    if (text[start] === "{") {
      const end = scanBalanced(text, start);
      if (end >= 0) {
        try {
          const value: unknown = JSON.parse(text.slice(start, end + 1));
          if (isObject(value)) return value;
        } catch {
          // malformed candidate, try an earlier occurrence
        }
      }
    }
    at = at === 0 ? -1 : text.lastIndexOf(sentinel, at - 1);
  }
  return null;
}

export type ParsedResult = JsonObject & { success: boolean; error?: string };

/**
 * Turn a script's CommandResponse into its JSON result.
 *
 * Prefers a sentinel-tagged object; otherwise falls back to the last output
 * line that is itself a JSON object.
 */
export function parseJsonResult(response: CommandResponse, sentinel: string = RESULT_SENTINEL): ParsedResult {
  if (!response.success) {
    return { success: false, error: response.error ?? "Execution failed" };
  }
  if (response.output.length === 0) {
    return { success: false, error: "No output from script" };
  }

  const text = outputText(response);
  const tagged = extractResult(text, sentinel);
  if (tagged) return withSuccess(tagged);

  const lines = text.split("\n");
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line.startsWith("{")) continue;
    try {
      const value: unknown = JSON.parse(line);
      if (isObject(value)) return withSuccess(value);
    } catch {
      // keep looking
    }
  }
  return { success: false, error: "No valid JSON found in output" };
}

function withSuccess(value: JsonObject): ParsedResult {
  const success = typeof value.success === "boolean" ? value.success : true;
  return { ...value, success };
}

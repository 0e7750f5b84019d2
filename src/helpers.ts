import { RemoteExecutionError, UERemoteError } from "./errors.js";
import { outputText, type CommandResponse } from "./remote/protocol.js";

// --- Tool result shapes ---

export function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

export function errorResult(error: Error | string) {
  let text: string;
  if (typeof error === "string") text = error;
  else if (error instanceof UERemoteError) text = `Error (${error.code}${error.retryable ? ", retryable" : ""}): ${error.message}`;
  else text = `Error (${error.name}): ${error.message}`;
  return { content: [{ type: "text" as const, text }], isError: true };
}

/** A response whose remote code raised, as an error carrying the formatted response. */
export function remoteFailure(response: CommandResponse): RemoteExecutionError {
  return new RemoteExecutionError(formatResponse(response));
}

export function jsonResult(value: unknown) {
  return textResult(JSON.stringify(value, null, 2));
}

// --- Formatting ---

/** Render a command response: status, result value, then captured output. */
export function formatResponse(response: CommandResponse): string {
  const lines: string[] = [response.success ? "Success" : `Failed: ${response.error ?? "unknown error"}`];
  if (response.result !== null && response.result !== "" && response.result !== "None" && response.success) {
    lines.push(`Result: ${response.result}`);
  }
  const output = outputText(response);
  if (output) {
    lines.push("", "Output:", output);
  }
  return lines.join("\n");
}

export function formatDuration(ms: number): string {
  return ms >= 1000 ? `${(ms / 1000).toFixed(1)}s` : `${ms}ms`;
}

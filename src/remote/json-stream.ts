import { StringDecoder } from "node:string_decoder";
import { fail, ok, FramingError, type Result } from "../errors.js";

export const DEFAULT_MAX_MESSAGE_BYTES = 64 * 1024 * 1024;

/**
 * Index of the brace that closes the object opening at `start`, or -1 when
 * the text ends first. Braces inside JSON strings are ignored.
 */
export function scanBalanced(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{" || ch === "[") depth++;
    else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Reassembles JSON objects written back-to-back on a byte stream.
 *
 * The editor sends each message as one JSON object with no length prefix, so
 * message boundaries are found by tracking brace depth. A chunk may hold part
 * of a message, exactly one, or several.
 */
export class JsonStreamDecoder {
  private readonly utf8 = new StringDecoder("utf8");
  private buffer = "";
  private scanPos = 0;
  private start = -1;
  private depth = 0;
  private inString = false;
  private escaped = false;

  constructor(private readonly maxMessageBytes: number = DEFAULT_MAX_MESSAGE_BYTES) {}

  /** Bytes held for a message that has not completed yet. */
  get pending(): number {
    return Buffer.byteLength(this.buffer);
  }

  push(chunk: Buffer | string): Result<unknown[], FramingError> {
    this.buffer += typeof chunk === "string" ? chunk : this.utf8.write(chunk);
    const messages: unknown[] = [];
    let consumed = 0;

    for (let i = this.scanPos; i < this.buffer.length; i++) {
      const ch = this.buffer[i];

      if (this.depth === 0) {
        if (ch === " " || ch === "\n" || ch === "\r" || ch === "\t") {
          consumed = i + 1;
          continue;
        }
        if (ch !== "{") {
          return this.abort(`Unexpected byte ${JSON.stringify(ch)} between messages`);
        }
        this.start = i;
        this.depth = 1;
        continue;
      }

      if (this.inString) {
        if (this.escaped) this.escaped = false;
        else if (ch === "\\") this.escaped = true;
        else if (ch === '"') this.inString = false;
        continue;
      }

      if (ch === '"') this.inString = true;
      else if (ch === "{" || ch === "[") this.depth++;
      else if (ch === "}" || ch === "]") {
        this.depth--;
        if (this.depth === 0) {
          const text = this.buffer.slice(this.start, i + 1);
          try {
            messages.push(JSON.parse(text));
          } catch {
            return this.abort("Message is not valid JSON");
          }
          this.start = -1;
          consumed = i + 1;
        }
      }
    }

    this.buffer = this.buffer.slice(consumed);
    this.scanPos = this.buffer.length;
    if (this.start >= 0) this.start -= consumed;

    if (this.pending > this.maxMessageBytes) {
      return this.abort(`Message exceeds ${this.maxMessageBytes} bytes`);
    }
    return ok(messages);
  }

  reset(): void {
    this.buffer = "";
    this.scanPos = 0;
    this.start = -1;
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
  }

  private abort(message: string): { ok: false; error: FramingError } {
    this.reset();
    return fail(new FramingError(message));
  }
}

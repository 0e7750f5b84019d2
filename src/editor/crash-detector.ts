import * as fs from "node:fs/promises";

/** Substrings the engine writes to its log or output when it goes down. */
export const CRASH_INDICATORS = [
  "[CRASH]",
  "Fatal error:",
  "Access violation",
  "Unhandled Exception",
  "SIGSEGV",
  "Assertion failed",
  "Ensure condition failed",
  "LowLevelFatalError",
  "Out of memory",
  "GPU crash",
  "D3D11/12 crash",
  "Rendering thread exception",
  "Game thread exception",
] as const;

/** Windows NTSTATUS crash codes, as signed 32-bit exit codes. */
export const WINDOWS_CRASH_CODES: ReadonlyMap<number, string> = new Map([
  [-1073741819, "ACCESS_VIOLATION (0xC0000005)"],
  [-1073741795, "ILLEGAL_INSTRUCTION (0xC000001D)"],
  [-1073741571, "STACK_OVERFLOW (0xC00000FD)"],
  [-1073740791, "HEAP_CORRUPTION (0xC0000374)"],
  [-1073740940, "STATUS_STACK_BUFFER_OVERRUN (0xC0000409)"],
  [-1073741676, "INTEGER_DIVIDE_BY_ZERO (0xC0000094)"],
  [-1073741675, "INTEGER_OVERFLOW (0xC0000095)"],
  [-1073741674, "PRIVILEGED_INSTRUCTION (0xC0000096)"],
  [-1073741811, "INVALID_HANDLE (0xC0000008)"],
  [-1073741801, "INVALID_PARAMETER (0xC000000D)"],
  [-1073740777, "FATAL_APP_EXIT (0xC0000417)"],
]);

/** Signals that mean the process died rather than being asked to stop. */
const CRASH_SIGNALS = new Set<NodeJS.Signals>(["SIGSEGV", "SIGABRT", "SIGBUS", "SIGFPE", "SIGILL"]);

export type ExitType = "normal" | "error" | "crash" | "signal";

export interface ExitInfo {
  exitType: ExitType;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  hexCode?: string;
  description: string;
}

export function classifyExit(exitCode: number | null, signal: NodeJS.Signals | null = null): ExitInfo {
  if (signal) {
    return {
      exitType: CRASH_SIGNALS.has(signal) ? "crash" : "signal",
      exitCode,
      signal,
      description: CRASH_SIGNALS.has(signal) ? `Editor crashed: ${signal}` : `Editor terminated by ${signal}`,
    };
  }
  if (exitCode === null || exitCode === 0) {
    return { exitType: "normal", exitCode, signal, description: "Editor exited normally" };
  }

  // Windows reports NTSTATUS codes either signed or as their unsigned value.
  const signed = exitCode | 0;
  if (signed > 0) {
    return { exitType: "error", exitCode, signal, description: `Editor exited with error code ${exitCode}` };
  }
  const hexCode = `0x${(signed >>> 0).toString(16)}`;
  const name = WINDOWS_CRASH_CODES.get(signed);
  return {
    exitType: "crash",
    exitCode,
    signal,
    hexCode,
    description: name ? `Editor crashed: ${name}` : `Editor crashed with code ${hexCode}`,
  };
}

/** The first crash indicator found in `content`, or null. */
export function findCrashIndicator(content: string): string | null {
  return CRASH_INDICATORS.find((indicator) => content.includes(indicator)) ?? null;
}

/** Scan the last `tailBytes` of a log for a crash indicator. */
export async function checkLogForCrash(logPath: string, tailBytes = 100 * 1024): Promise<string | null> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(logPath, "r");
  } catch {
    return null;
  }
  try {
    const { size } = await handle.stat();
    const length = Math.min(tailBytes, size);
    const buffer = Buffer.alloc(length);
    await handle.read(buffer, 0, length, size - length);
    return findCrashIndicator(buffer.toString("utf-8"));
  } finally {
    await handle.close();
  }
}

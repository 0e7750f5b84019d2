import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { delay } from "../delay.js";
import { errorMessage, isErrno } from "../errors.js";

export const DEFAULT_POLL_INTERVAL_MS = 500;

/** Task ids become file names, so keep them to a safe alphabet. */
export const TASK_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

const markerSchema = z.object({ success: z.boolean() }).passthrough();

export interface CompletionMarker {
  taskId: string;
  success: boolean;
  /** Everything the editor-side job wrote besides `success`. */
  payload: Record<string, unknown>;
}

export type WatchOutcome =
  | { status: "completed"; marker: CompletionMarker }
  | { status: "timeout"; waitedMs: number }
  | { status: "cancelled" };

export interface WatchOptions {
  /** Project root; markers live under `Saved/Logs`. */
  root: string;
  taskId: string;
  timeoutMs: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
  /** Delete the marker once read. Defaults to true. */
  consume?: boolean;
}

export function markerPath(root: string, taskId: string): string {
  return path.join(root, "Saved", "Logs", `${taskId}_completed`);
}

/**
 * Poll for the marker an editor-side job writes when it finishes.
 *
 * A marker only counts once its content parses and carries a boolean
 * `success`; anything else is treated as a write still in progress.
 */
export async function watchCompletion(options: WatchOptions): Promise<WatchOutcome> {
  const { root, taskId, timeoutMs, signal } = options;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const file = markerPath(root, taskId);
  const started = Date.now();
  const deadline = started + timeoutMs;

  console.error(`[UERemote] Watching for completion marker: ${file}`);

  for (;;) {
    if (signal?.aborted) return { status: "cancelled" };

    const marker = await readMarker(file, taskId);
    if (marker) {
      if (options.consume ?? true) await removeMarker(file);
      return { status: "completed", marker };
    }

    const now = Date.now();
    if (now >= deadline) {
      console.error(`[UERemote] Completion watcher for ${taskId} timed out after ${timeoutMs}ms`);
      return { status: "timeout", waitedMs: now - started };
    }
    const slept = await delay(Math.min(pollIntervalMs, deadline - now), signal);
    if (!slept) return { status: "cancelled" };
  }
}

/** The parsed marker, or null when it is absent or not fully written yet. */
export async function readMarker(file: string, taskId: string): Promise<CompletionMarker | null> {
  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch (err) {
    if (isErrno(err, "ENOENT")) return null;
    console.error(`[UERemote] Could not read completion marker ${file}: ${errorMessage(err)}`);
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  const parsed = markerSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { success, ...payload } = parsed.data;
  return { taskId, success, payload };
}

async function removeMarker(file: string): Promise<void> {
  try {
    await fs.rm(file, { force: true });
  } catch (err) {
    console.error(`[UERemote] Could not delete completion marker ${file}: ${errorMessage(err)}`);
  }
}

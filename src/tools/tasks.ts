import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorResult, formatDuration, jsonResult, textResult } from "../helpers.js";
import { parseJsonResult } from "../remote/result-parser.js";
import { TASK_ID_PATTERN, watchCompletion, type WatchOutcome } from "../tracking/completion-watcher.js";
import { getManager } from "../ue-bridge.js";
import { scriptParamsSchema } from "./execution.js";

/** Slack added to a task's own duration before giving up on its marker. */
export const TASK_WATCH_MARGIN_SECONDS = 60;

export function newTaskId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 8);
}

export function formatOutcome(taskId: string, outcome: WatchOutcome) {
  switch (outcome.status) {
    case "completed": {
      const { success, payload } = outcome.marker;
      const body = { task_id: taskId, ...payload, success };
      return success ? jsonResult(body) : errorResult(JSON.stringify(body, null, 2));
    }
    case "timeout":
      return errorResult(`Task ${taskId} did not complete within ${formatDuration(outcome.waitedMs)}. It may still be running; call editor_wait_task to keep waiting.`);
    case "cancelled":
      return textResult(`Stopped waiting for task ${taskId}.`);
  }
}

export function registerTaskTools(server: McpServer): void {
  server.tool(
    "editor_run_task",
    "Start a long-running editor script (e.g. a Play-In-Editor capture) and wait for the completion marker it writes to Saved/Logs/<task_id>_completed. The script receives MCP_PARAMS with an added task_id and must write that marker as JSON with a boolean `success` when done.",
    {
      script_path: z.string().min(1).describe("Absolute path to the .py script that starts the task"),
      params: scriptParamsSchema.optional().describe("Parameters passed to the script as MCP_PARAMS"),
      duration_seconds: z.number().nonnegative().max(3600).optional().describe("Expected task duration (default 0)"),
      wait: z.boolean().optional().describe("Wait for completion (default true). With false, returns the task_id at once."),
    },
    async ({ script_path, params, duration_seconds, wait }, extra) => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);
      const manager = managed.value;

      const scriptPath = path.resolve(script_path);
      if (!fs.existsSync(scriptPath)) return errorResult(`Script not found: ${scriptPath}`);

      const taskId = newTaskId();
      const started = await manager.executeScriptFile(scriptPath, { ...params, task_id: taskId }, 30_000);
      if (!started.ok) return errorResult(started.error);
      const parsed = parseJsonResult(started.value);
      if (!parsed.success) return errorResult(`Task failed to start: ${parsed.error ?? "unknown error"}`);

      if (!(wait ?? true)) return jsonResult({ ...parsed, task_id: taskId });

      const outcome = await watchCompletion({
        root: manager.projectRoot,
        taskId,
        timeoutMs: ((duration_seconds ?? 0) + TASK_WATCH_MARGIN_SECONDS) * 1000,
        signal: extra.signal,
      });
      return formatOutcome(taskId, outcome);
    },
  );

  server.tool(
    "editor_wait_task",
    "Wait for the completion marker of a task started with editor_run_task.",
    {
      task_id: z.string().regex(TASK_ID_PATTERN).describe("Task id returned by editor_run_task"),
      timeout_seconds: z.number().positive().max(3600).optional().describe("How long to wait (default 60)"),
    },
    async ({ task_id, timeout_seconds }, extra) => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);

      const outcome = await watchCompletion({
        root: managed.value.projectRoot,
        taskId: task_id,
        timeoutMs: (timeout_seconds ?? 60) * 1000,
        signal: extra.signal,
      });
      return formatOutcome(task_id, outcome);
    },
  );
}

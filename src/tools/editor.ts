import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { levelMatches } from "../editor/level-match.js";
import { errorResult, jsonResult, textResult } from "../helpers.js";
import { RESULT_SENTINEL, parseJsonResult } from "../remote/result-parser.js";
import { getConfig, getManager } from "../ue-bridge.js";

/** Editor-side snippet that loads a level and reports the level now open. */
export function loadLevelScript(levelPath: string): string {
  return [
    "import json, unreal",
    `unreal.get_editor_subsystem(unreal.LevelEditorSubsystem).load_level(${JSON.stringify(levelPath)})`,
    "world = unreal.get_editor_subsystem(unreal.UnrealEditorSubsystem).get_editor_world()",
    "outer = world.get_outer() if world else None",
    `print("${RESULT_SENTINEL}" + json.dumps({"success": True, "current_level": outer.get_path_name() if outer else ""}))`,
  ].join("\n");
}

export function registerEditorTools(server: McpServer): void {
  server.tool(
    "editor_launch",
    "Launch the Unreal Editor for the configured project and connect to it over Python remote execution. Fails fast if C++ modules need to be built first. With wait=false, returns immediately and keeps connecting in the background.",
    {
      wait: z.boolean().optional().describe("Block until the editor accepts commands (default true)"),
      wait_timeout_seconds: z.number().positive().max(3600).optional().describe("How long to wait for the connection (default 120)"),
    },
    async ({ wait, wait_timeout_seconds }) => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);

      const result = await managed.value.launch({
        wait: wait ?? true,
        waitTimeoutMs: (wait_timeout_seconds ?? 120) * 1000,
      });
      if (!result.ok) return errorResult(result.error);

      const { message, status } = result.value;
      return textResult(`${message}\n\n${JSON.stringify(status, null, 2)}`);
    },
  );

  server.tool(
    "editor_status",
    "Report the managed editor's state (not_running, launching, running, stopping, crashed), PID, log file and connection.",
    {},
    async () => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);
      return jsonResult(managed.value.getStatus());
    },
  );

  server.tool(
    "editor_read_log",
    "Read the editor's log file for the current or most recent launch. The log survives editor_stop.",
    {
      tail_lines: z.number().int().positive().optional().describe("Only return the last N lines"),
    },
    async ({ tail_lines }) => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);

      const log = await managed.value.readLog(tail_lines);
      if (!log.ok) return errorResult(log.error);
      const { logFilePath, fileSize, content } = log.value;
      return textResult(`Log: ${logFilePath} (${fileSize} bytes)\n\n${content}`);
    },
  );

  server.tool(
    "editor_stop",
    "Stop the managed editor: asks it to quit, then terminates the process if it does not exit in time.",
    {},
    async () => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);

      const stopped = await managed.value.stop();
      if (!stopped.ok) return errorResult(stopped.error);
      return textResult(stopped.value.message);
    },
  );

  server.tool(
    "editor_load_level",
    "Open a level in the editor (e.g. /Game/Maps/MyLevel) and confirm it is the level now loaded.",
    {
      level_path: z.string().startsWith("/").describe("Package path of the level, e.g. /Game/Maps/MyLevel"),
    },
    async ({ level_path }) => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);

      const executed = await managed.value.execute(loadLevelScript(level_path), 60_000);
      if (!executed.ok) return errorResult(executed.error);

      const parsed = parseJsonResult(executed.value);
      if (!parsed.success) return errorResult(`Level load failed: ${parsed.error ?? "unknown error"}`);

      const current = typeof parsed.current_level === "string" ? parsed.current_level : "";
      const policy = getConfig().levelMatch;
      if (!levelMatches(level_path, current, policy)) {
        return errorResult(`Level load failed: current level is ${current || "<none>"} (match policy: ${policy})`);
      }
      return textResult(`Level loaded: ${level_path}\nCurrent level: ${current}`);
    },
  );
}

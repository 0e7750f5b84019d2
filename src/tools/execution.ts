import * as fs from "node:fs";
import * as path from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorResult, formatResponse, jsonResult, remoteFailure, textResult } from "../helpers.js";
import { parseJsonResult } from "../remote/result-parser.js";
import { getManager } from "../ue-bridge.js";

export const scriptParamsSchema = z.record(z.unknown());

export function registerExecutionTools(server: McpServer): void {
  server.tool(
    "editor_execute_code",
    "Execute Python code in the running Unreal Editor. Multi-line code is supported. Returns success, the printed output and any error.",
    {
      code: z.string().min(1).describe("Python code to run inside the editor"),
      timeout_seconds: z.number().positive().max(3600).optional().describe("Execution timeout (default 30)"),
    },
    async ({ code, timeout_seconds }) => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);

      const result = await managed.value.execute(code, (timeout_seconds ?? 30) * 1000);
      if (!result.ok) return errorResult(result.error);
      return result.value.success ? textResult(formatResponse(result.value)) : errorResult(remoteFailure(result.value));
    },
  );

  server.tool(
    "editor_evaluate",
    "Evaluate a single Python expression in the editor and return its value.",
    {
      expression: z.string().min(1).describe("Expression to evaluate, e.g. unreal.SystemLibrary.get_engine_version()"),
      timeout_seconds: z.number().positive().max(3600).optional().describe("Execution timeout (default 30)"),
    },
    async ({ expression, timeout_seconds }) => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);

      const result = await managed.value.evaluate(expression, (timeout_seconds ?? 30) * 1000);
      if (!result.ok) return errorResult(result.error);
      if (!result.value.success) return errorResult(remoteFailure(result.value));
      return textResult(result.value.result ?? "None");
    },
  );

  server.tool(
    "editor_execute_script",
    "Run a Python script file in the editor. `params` are passed to the script as the MCP_PARAMS dict in its globals. By default the script's JSON result (a line starting with RESULT: or a JSON object line) is parsed and returned.",
    {
      script_path: z.string().min(1).describe("Absolute path to the .py script"),
      params: scriptParamsSchema.optional().describe("Parameters made available to the script as MCP_PARAMS"),
      parse_json: z.boolean().optional().describe("Parse the script's JSON result (default true)"),
      timeout_seconds: z.number().positive().max(3600).optional().describe("Execution timeout (default 120)"),
    },
    async ({ script_path, params, parse_json, timeout_seconds }) => {
      const managed = getManager();
      if (!managed.ok) return errorResult(managed.error);

      const scriptPath = path.resolve(script_path);
      if (!fs.existsSync(scriptPath)) return errorResult(`Script not found: ${scriptPath}`);

      const result = await managed.value.executeScriptFile(scriptPath, params ?? {}, (timeout_seconds ?? 120) * 1000);
      if (!result.ok) return errorResult(result.error);

      if (parse_json ?? true) {
        const parsed = parseJsonResult(result.value);
        return parsed.success ? jsonResult(parsed) : errorResult(JSON.stringify(parsed, null, 2));
      }
      return result.value.success ? textResult(formatResponse(result.value)) : errorResult(remoteFailure(result.value));
    },
  );
}

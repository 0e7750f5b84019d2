import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerEditorStatusResource } from "./resources/editor-status.js";
import { registerEditorTools } from "./tools/editor.js";
import { registerExecutionTools } from "./tools/execution.js";
import { registerTaskTools } from "./tools/tasks.js";

export function createServer(): McpServer {
  const server = new McpServer({
    name: "ue-remote-mcp",
    version: "0.1.0",
  });

  registerEditorTools(server);
  registerExecutionTools(server);
  registerTaskTools(server);
  registerEditorStatusResource(server);

  return server;
}

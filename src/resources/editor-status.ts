import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { getManager } from "../ue-bridge.js";

export function registerEditorStatusResource(server: McpServer): void {
  server.resource(
    "editor-status",
    "editor://status",
    { description: "State of the managed Unreal Editor process", mimeType: "application/json" },
    async (uri) => {
      const managed = getManager();
      const body = managed.ok ? managed.value.getStatus() : { status: "unconfigured", error: managed.error.message };
      return { contents: [{ uri: uri.href, text: JSON.stringify(body, null, 2), mimeType: "application/json" }] };
    },
  );
}

#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";
import { getConfig, getManager, shutdown } from "./ue-bridge.js";

// --- Start ---

async function main() {
  // Fail fast on bad configuration before the transport is up.
  getConfig();
  const managed = getManager();
  if (managed.ok) {
    console.error(`[UERemote] Ready. The editor for ${managed.value.projectName} starts on editor_launch.`);
  } else {
    console.error(`[UERemote] ${managed.error.message}`);
  }

  // SIGINT/SIGTERM: stop the editor we launched, then exit.
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, () => {
      shutdown()
        .catch((err) => console.error("[UERemote] Shutdown failed:", err))
        .finally(() => process.exit());
    });
  }

  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});

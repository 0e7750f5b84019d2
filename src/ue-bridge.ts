import { loadConfig, type Config } from "./config.js";
import { ConfigError, fail, ok, type Result } from "./errors.js";
import { EditorProcessManager } from "./editor/process-manager.js";
import { findUProject } from "./editor/project.js";

// --- Mutable state singleton ---

interface BridgeState {
  config: Config | null;
  manager: EditorProcessManager | null;
}

export const state: BridgeState = {
  config: null,
  manager: null,
};

export function getConfig(): Config {
  if (!state.config) state.config = loadConfig();
  return state.config;
}

/**
 * The process manager for the configured project, created on first use.
 * Fails when no .uproject can be found from UE_PROJECT_PATH or the cwd.
 */
export function getManager(): Result<EditorProcessManager, ConfigError> {
  if (state.manager) return ok(state.manager);

  const config = getConfig();
  const start = config.projectPath ?? process.cwd();
  const uproject = findUProject(start);
  if (!uproject) {
    return fail(new ConfigError(`No .uproject file found from ${start}. Set UE_PROJECT_PATH.`));
  }

  state.manager = new EditorProcessManager({
    uproject,
    editorCmd: config.editorCmd,
    multicastGroup: config.multicastGroup,
    multicastBindAddress: config.multicastBindAddress,
    portRange: config.portRange,
    commandHost: config.commandHost,
    logDir: config.logDir,
  });
  console.error(`[UERemote] Managing project ${state.manager.projectName} (${uproject})`);
  return ok(state.manager);
}

/** Stop the editor we launched, if any. */
export async function shutdown(): Promise<void> {
  const manager = state.manager;
  if (!manager || manager.getStatus().status === "not_running") return;
  await manager.stop();
}

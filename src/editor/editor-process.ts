import { spawn, type ChildProcess } from "node:child_process";
import { errorMessage, fail, ok, ProcessLaunchFailedError, type Result } from "../errors.js";

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** The slice of a child process the manager needs. */
export interface EditorProcess {
  readonly pid: number;
  hasExited(): boolean;
  onExit(listener: (status: ExitStatus) => void): void;
  /** Resolves true once the process is gone, false if it outlives `timeoutMs`. */
  waitForExit(timeoutMs: number): Promise<boolean>;
  kill(signal?: NodeJS.Signals): void;
}

export type ProcessLauncher = (command: string, args: string[]) => Result<EditorProcess, ProcessLaunchFailedError>;

class ChildEditorProcess implements EditorProcess {
  private status: ExitStatus | null = null;
  private readonly listeners = new Set<(status: ExitStatus) => void>();

  constructor(private readonly child: ChildProcess, readonly pid: number) {
    child.once("exit", (code, signal) => {
      this.status = { code, signal };
      for (const listener of [...this.listeners]) listener({ code, signal });
      this.listeners.clear();
    });
  }

  hasExited(): boolean {
    return this.status !== null;
  }

  onExit(listener: (status: ExitStatus) => void): void {
    if (this.status) listener(this.status);
    else this.listeners.add(listener);
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.status) return Promise.resolve(true);
    return new Promise((resolve) => {
      const listener = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.listeners.delete(listener);
        resolve(false);
      }, timeoutMs);
      this.listeners.add(listener);
    });
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.status) return;
    try {
      this.child.kill(signal);
    } catch (e) {
      console.error(`[UERemote] Failed to send ${signal} to editor (PID: ${this.pid}):`, errorMessage(e));
    }
  }
}

/**
 * Spawn the editor detached from our stdio. Its output goes to the log file
 * named on the command line, so nothing is piped back.
 */
export const spawnEditorProcess: ProcessLauncher = (command, args) => {
  let child: ChildProcess;
  try {
    child = spawn(command, args, {
      stdio: "ignore",
      // Own process group, so the editor outlives a restart of this server.
      detached: process.platform !== "win32",
      windowsHide: false,
    });
  } catch (e) {
    return fail(new ProcessLaunchFailedError(`Failed to launch editor: ${errorMessage(e)}`));
  }

  child.on("error", (err) => {
    console.error(`[UERemote] Editor process error: ${err.message}`);
  });

  if (child.pid === undefined) {
    return fail(new ProcessLaunchFailedError(`Failed to launch editor: ${command}`, "Check UE_EDITOR_CMD"));
  }
  return ok(new ChildEditorProcess(child, child.pid));
};

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { delay } from "../delay.js";
import {
  errorMessage,
  fail,
  isErrno,
  ok,
  BuildRequiredError,
  LogNotFoundError,
  NoPortAvailableError,
  NotConnectedError,
  ProcessLaunchFailedError,
  type Result,
} from "../errors.js";
import { findAvailablePort, PORT_RANGE_END, PORT_RANGE_START } from "../remote/port-allocator.js";
import { DEFAULT_MULTICAST_GROUP, ExecTypes, type CommandResponse, type ExecType } from "../remote/protocol.js";
import { RemoteExecutionClient, type ExecuteError, type RemoteClientOptions } from "../remote/remote-client.js";
import { checkLogForCrash, classifyExit, type ExitInfo } from "./crash-detector.js";
import { findEditorCmd } from "./editor-locator.js";
import { spawnEditorProcess, type EditorProcess, type ExitStatus, type ProcessLauncher } from "./editor-process.js";
import { hostPlatform, needsBuild, projectNameOf, type EditorPlatform } from "./project.js";

export type EditorState = "not_running" | "launching" | "running" | "stopping" | "crashed";

export interface ManagerTimings {
  /** Discovery budget for one connection attempt while launching. */
  connectAttemptMs: number;
  connectRetryMs: number;
  backgroundRetryMs: number;
  reconnectTimeoutMs: number;
  quitTimeoutMs: number;
  gracePeriodMs: number;
  killTimeoutMs: number;
  initTimeoutMs: number;
  restartCooldownMs: number;
  maxRestartAttempts: number;
}

export const DEFAULT_TIMINGS: ManagerTimings = {
  connectAttemptMs: 1000,
  connectRetryMs: 500,
  backgroundRetryMs: 5000,
  reconnectTimeoutMs: 5000,
  quitTimeoutMs: 5000,
  gracePeriodMs: 5000,
  killTimeoutMs: 5000,
  initTimeoutMs: 10_000,
  restartCooldownMs: 10_000,
  maxRestartAttempts: 3,
};

export const DEFAULT_WAIT_TIMEOUT_MS = 120_000;

const QUIT_EDITOR = "import unreal; unreal.SystemLibrary.quit_editor()";

export interface EditorManagerOptions {
  uproject: string;
  multicastGroup?: string;
  multicastBindAddress?: string;
  portRange?: { start: number; end: number };
  commandHost?: string;
  /** Defaults to `<project>/Saved/Logs`. */
  logDir?: string;
  editorCmd?: string;
  platform?: EditorPlatform;
  /** Relaunch after a crash. Defaults to true. */
  autoRestart?: boolean;
  /** Script file run once in the editor after each successful connect. */
  initScript?: string;
  timings?: Partial<ManagerTimings>;
  launcher?: ProcessLauncher;
  createClient?: (options: RemoteClientOptions) => RemoteExecutionClient;
  allocatePort?: (start: number, end: number) => Promise<Result<number, NoPortAvailableError>>;
  locateEditor?: () => string | null;
}

export interface LaunchOptions {
  wait?: boolean;
  waitTimeoutMs?: number;
}

export interface EditorStatus {
  status: EditorState;
  projectName: string;
  projectPath: string;
  pid: number | null;
  startedAt: string | null;
  connected: boolean;
  nodeId: string | null;
  logFilePath: string | null;
  multicastPort: number | null;
  backgroundConnecting: boolean;
  restartCount: number;
  exit?: ExitInfo;
  crashIndicator?: string;
}

export interface LaunchReport {
  message: string;
  backgroundConnecting: boolean;
  status: EditorStatus;
}

export type LaunchError = BuildRequiredError | ProcessLaunchFailedError | NoPortAvailableError;

export interface LogContent {
  logFilePath: string;
  content: string;
  fileSize: number;
}

export interface StopReport {
  message: string;
  method: "none" | "graceful" | "terminated" | "killed";
}

interface EditorInstance {
  process: EditorProcess;
  multicastPort: number;
  logFilePath: string;
  startedAt: Date;
  waitTimeoutMs: number;
  client: RemoteExecutionClient | null;
  nodeId: string | null;
  backgroundConnecting: boolean;
  /** Set once launch hands the process over to crash monitoring. */
  monitored: boolean;
  intentionalStop: boolean;
  /** Aborts the connect loops of this instance. */
  abort: AbortController;
  exit: ExitInfo | null;
  crashIndicator: string | null;
}

// --- Pure helpers ---

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `ue-mcp-<project>-YYYYMMDD_HHMMSS.log`, local time. */
export function logFileName(projectName: string, at: Date): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `ue-mcp-${projectName}-${date}_${time}.log`;
}

export function launchArgs(uproject: string, logFilePath: string, multicastGroup: string, multicastPort: number): string[] {
  return [
    uproject,
    `-ABSLOG=${logFilePath}`,
    `-ini:Engine:[/Script/PythonScriptPlugin.PythonScriptPluginSettings]:RemoteExecutionMulticastGroupEndpoint=${multicastGroup}:${multicastPort}`,
    "-AutoDeclinePackageRecovery",
    "-NoLiveCoding",
  ];
}

/** ExecuteStatement takes one statement, so multi-line code goes through exec(). */
export function wrapStatement(code: string): string {
  if (!code.includes("\n")) return code;
  const escaped = code.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
  return `exec('''${escaped}''')`;
}

/**
 * One statement that runs a script file with its parameters bound as
 * `MCP_PARAMS` in the script's own globals. Nothing is left behind in the
 * editor's interpreter.
 */
export function scriptInvocation(scriptPath: string, params: Record<string, unknown>): string {
  // A JSON string literal is also a valid Python string literal.
  const file = JSON.stringify(scriptPath);
  const payload = JSON.stringify(JSON.stringify(params));
  return (
    `(lambda p, s: exec(compile(__import__("pathlib").Path(p).read_text(encoding="utf-8"), p, "exec"), ` +
    `{"__name__": "__main__", "__file__": p, "MCP_PARAMS": __import__("json").loads(s)}))(${file}, ${payload})`
  );
}

/** Last `count` lines of `text`, line endings kept. */
export function tailLines(text: string, count: number): string {
  return text.split(/(?<=\n)/).slice(-count).join("");
}

// --- Manager ---

/**
 * Owns one editor process for one project: launch, connection, crash
 * recovery, log access and shutdown.
 */
export class EditorProcessManager {
  readonly uproject: string;
  readonly projectName: string;
  readonly projectRoot: string;

  private state: EditorState = "not_running";
  private instance: EditorInstance | null = null;
  private lastLogFilePath: string | null = null;
  private restartCount = 0;
  private lastRestartAt: number | null = null;
  private background: Promise<void> | null = null;
  private exitHandling: Promise<void> | null = null;
  /** Shared so concurrent launches spawn one editor. */
  private startup: Promise<Result<LaunchReport, LaunchError>> | null = null;

  private readonly timings: ManagerTimings;
  private readonly logDir: string;
  private readonly launcher: ProcessLauncher;
  private readonly createClient: (options: RemoteClientOptions) => RemoteExecutionClient;
  private readonly allocatePort: (start: number, end: number) => Promise<Result<number, NoPortAvailableError>>;
  private readonly locateEditor: () => string | null;

  constructor(private readonly options: EditorManagerOptions) {
    this.uproject = path.resolve(options.uproject);
    this.projectName = projectNameOf(this.uproject);
    this.projectRoot = path.dirname(this.uproject);
    this.logDir = options.logDir ?? path.join(this.projectRoot, "Saved", "Logs");
    this.timings = { ...DEFAULT_TIMINGS, ...options.timings };
    this.launcher = options.launcher ?? spawnEditorProcess;
    this.createClient = options.createClient ?? ((o) => new RemoteExecutionClient(o));
    this.allocatePort = options.allocatePort ?? ((start, end) => findAvailablePort(start, end));
    this.locateEditor =
      options.locateEditor ??
      (() => findEditorCmd({ override: options.editorCmd, uproject: this.uproject, platform: options.platform }));
  }

  /** Current state. Never blocks and never touches the network. */
  getStatus(): EditorStatus {
    const i = this.instance;
    const status: EditorStatus = {
      status: this.state,
      projectName: this.projectName,
      projectPath: this.uproject,
      pid: i?.process.pid ?? null,
      startedAt: i ? i.startedAt.toISOString() : null,
      connected: i?.client?.isConnected() ?? false,
      nodeId: i?.nodeId ?? null,
      logFilePath: i?.logFilePath ?? this.lastLogFilePath,
      multicastPort: i?.multicastPort ?? null,
      backgroundConnecting: i?.backgroundConnecting ?? false,
      restartCount: this.restartCount,
    };
    if (i?.exit) status.exit = i.exit;
    if (i?.crashIndicator) status.crashIndicator = i.crashIndicator;
    return status;
  }

  /** A launch already in flight is joined rather than repeated; its options win. */
  launch(options: LaunchOptions = {}): Promise<Result<LaunchReport, LaunchError>> {
    if (this.startup) return this.startup;
    this.restartCount = 0;
    this.lastRestartAt = null;
    return this.startOnce(options.wait ?? true, options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS);
  }

  async readLog(tailLineCount?: number): Promise<Result<LogContent, LogNotFoundError>> {
    const logFilePath = this.instance?.logFilePath ?? this.lastLogFilePath;
    if (!logFilePath) {
      return fail(new LogNotFoundError("No log file path available. Editor may not have been launched yet."));
    }

    let data: Buffer;
    try {
      data = await fs.readFile(logFilePath);
    } catch (e) {
      if (isErrno(e, "ENOENT")) return fail(new LogNotFoundError(`Log file does not exist: ${logFilePath}`));
      return fail(new LogNotFoundError(`Failed to read log file: ${errorMessage(e)}`));
    }

    const text = data.toString("utf-8");
    const content = tailLineCount !== undefined && tailLineCount > 0 ? tailLines(text, tailLineCount) : text;
    return ok({ logFilePath, content, fileSize: data.length });
  }

  /**
   * Ask the editor to quit, then escalate to SIGTERM and SIGKILL. The log
   * file is left in place.
   */
  async stop(): Promise<Result<StopReport>> {
    const instance = this.instance;
    if (!instance) return ok({ message: "No editor is running", method: "none" });

    instance.intentionalStop = true;
    instance.abort.abort();

    if (instance.process.hasExited()) {
      this.reset();
      return ok({ message: "Editor was already stopped", method: "none" });
    }

    this.state = "stopping";
    console.error("[UERemote] Stopping editor...");

    const client = instance.client;
    instance.client = null;
    let quitSent = false;
    if (client?.isConnected()) {
      console.error("[UERemote] Attempting graceful shutdown...");
      const quit = await client.execute(QUIT_EDITOR, ExecTypes.ExecuteStatement, this.timings.quitTimeoutMs);
      if (quit.ok) quitSent = true;
      else console.error(`[UERemote] Graceful shutdown command failed: ${quit.error.message}`);
    }
    await client?.disconnect();

    let method: StopReport["method"] = "graceful";
    if (!quitSent || !(await instance.process.waitForExit(this.timings.gracePeriodMs))) {
      if (quitSent) console.error("[UERemote] Graceful shutdown timed out, forcing termination...");
      method = "terminated";
      instance.process.kill("SIGTERM");
      if (!(await instance.process.waitForExit(this.timings.killTimeoutMs))) {
        console.error("[UERemote] Termination timed out, killing process...");
        method = "killed";
        instance.process.kill("SIGKILL");
        await instance.process.waitForExit(this.timings.killTimeoutMs);
      }
    }

    this.reset();
    console.error(`[UERemote] Editor stopped (${method})`);
    return ok({ message: `Editor stopped (${method})`, method });
  }

  /** Run code in the editor. Multi-line code is wrapped so it runs as one statement. */
  execute(code: string, timeoutMs = 30_000): Promise<Result<CommandResponse, ExecuteError>> {
    return this.run(wrapStatement(code), ExecTypes.ExecuteStatement, timeoutMs);
  }

  /** Evaluate one expression; the response's `result` holds its repr. */
  evaluate(expression: string, timeoutMs = 30_000): Promise<Result<CommandResponse, ExecuteError>> {
    return this.run(expression, ExecTypes.EvaluateStatement, timeoutMs);
  }

  /** Run a script file with `params` available to it as `MCP_PARAMS`. */
  executeScriptFile(
    scriptPath: string,
    params: Record<string, unknown> = {},
    timeoutMs = 120_000,
  ): Promise<Result<CommandResponse, ExecuteError>> {
    return this.run(scriptInvocation(scriptPath, params), ExecTypes.ExecuteStatement, timeoutMs);
  }

  /** Resolves once the background connect loop and any exit handling have finished. */
  async settled(): Promise<void> {
    await this.background;
    await this.exitHandling;
  }

  // --- Launch ---

  private startOnce(wait: boolean, waitTimeoutMs: number): Promise<Result<LaunchReport, LaunchError>> {
    if (!this.startup) {
      this.startup = this.launchInternal(wait, waitTimeoutMs).finally(() => {
        this.startup = null;
      });
    }
    return this.startup;
  }

  private async launchInternal(wait: boolean, waitTimeoutMs: number): Promise<Result<LaunchReport, LaunchError>> {
    if (this.instance && !this.instance.process.hasExited()) {
      return fail(new ProcessLaunchFailedError("Editor is already running", "Call editor_stop first"));
    }

    const build = needsBuild(this.projectRoot, this.projectName, this.options.platform ?? hostPlatform());
    if (build.needed) return fail(new BuildRequiredError(build.reason));

    const editorCmd = this.locateEditor();
    if (!editorCmd) {
      return fail(new ProcessLaunchFailedError("Could not find Unreal Editor executable", "Set UE_EDITOR_CMD"));
    }

    const range = this.options.portRange ?? { start: PORT_RANGE_START, end: PORT_RANGE_END };
    const port = await this.allocatePort(range.start, range.end);
    if (!port.ok) return port;

    const logFilePath = path.join(this.logDir, logFileName(this.projectName, new Date()));
    try {
      await fs.mkdir(this.logDir, { recursive: true });
    } catch (e) {
      return fail(new ProcessLaunchFailedError(`Could not create log directory ${this.logDir}: ${errorMessage(e)}`));
    }

    console.error(`[UERemote] Launching editor: ${editorCmd}`);
    console.error(`[UERemote] Editor log file: ${logFilePath}`);
    const group = this.options.multicastGroup ?? DEFAULT_MULTICAST_GROUP;
    const spawned = this.launcher(editorCmd, launchArgs(this.uproject, logFilePath, group, port.value));
    if (!spawned.ok) return spawned;

    const instance: EditorInstance = {
      process: spawned.value,
      multicastPort: port.value,
      logFilePath,
      startedAt: new Date(),
      waitTimeoutMs,
      client: null,
      nodeId: null,
      backgroundConnecting: false,
      monitored: false,
      intentionalStop: false,
      abort: new AbortController(),
      exit: null,
      crashIndicator: null,
    };
    this.instance = instance;
    this.lastLogFilePath = logFilePath;
    this.state = "launching";
    instance.process.onExit((status) => {
      this.exitHandling = this.handleExit(instance, status).catch((e) => {
        console.error("[UERemote] Error while handling editor exit:", errorMessage(e));
      });
    });
    console.error(`[UERemote] Editor process started (PID: ${instance.process.pid})`);

    if (!wait) {
      instance.monitored = true;
      this.startBackgroundConnect(instance);
      return ok({
        message: "Editor process started, waiting for connection in background",
        backgroundConnecting: true,
        status: this.getStatus(),
      });
    }

    const started = Date.now();
    const outcome = await this.waitForConnection(instance, waitTimeoutMs);
    switch (outcome) {
      case "connected":
        instance.monitored = true;
        return ok({
          message: `Editor launched and connected (elapsed: ${((Date.now() - started) / 1000).toFixed(1)}s)`,
          backgroundConnecting: false,
          status: this.getStatus(),
        });
      case "timeout":
        console.error("[UERemote] Timeout waiting for editor connection, continuing in background...");
        instance.monitored = true;
        this.startBackgroundConnect(instance);
        return ok({
          message: "Timeout waiting for editor to enable remote execution. Background connection continues.",
          backgroundConnecting: true,
          status: this.getStatus(),
        });
      case "exited": {
        const exit = instance.exit ?? classifyExit(null);
        return fail(new ProcessLaunchFailedError(`Editor process exited unexpectedly: ${exit.description}`, `See ${logFilePath}`));
      }
      case "cancelled":
        return fail(new ProcessLaunchFailedError("Launch was cancelled by a stop request"));
    }
  }

  private async waitForConnection(
    instance: EditorInstance,
    timeoutMs: number,
  ): Promise<"connected" | "timeout" | "exited" | "cancelled"> {
    console.error(`[UERemote] Waiting for editor connection (timeout: ${timeoutMs}ms)...`);
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (this.instance !== instance || instance.intentionalStop) return "cancelled";
      if (instance.process.hasExited()) return "exited";

      const remaining = deadline - Date.now();
      if (await this.tryConnect(instance, Math.min(this.timings.connectAttemptMs, Math.max(remaining, 1)))) {
        return "connected";
      }
      const left = deadline - Date.now();
      if (left > 0) await delay(Math.min(this.timings.connectRetryMs, left), instance.abort.signal);
    }
    if (instance.process.hasExited()) return "exited";
    return "timeout";
  }

  private startBackgroundConnect(instance: EditorInstance): void {
    instance.backgroundConnecting = true;
    this.background = this.backgroundConnectLoop(instance).catch((e) => {
      console.error("[UERemote] Background connection loop failed:", errorMessage(e));
    });
  }

  /** Keep trying until connected, the process exits, or the instance is stopped. */
  private async backgroundConnectLoop(instance: EditorInstance): Promise<void> {
    console.error("[UERemote] Starting background connection loop...");
    try {
      while (this.instance === instance && !instance.intentionalStop && !instance.process.hasExited()) {
        if (instance.client?.isConnected()) return;
        if (await this.tryConnect(instance, this.timings.connectAttemptMs * 2)) {
          console.error(`[UERemote] Background connect succeeded (node_id: ${instance.nodeId ?? "unknown"})`);
          return;
        }
        await delay(this.timings.backgroundRetryMs, instance.abort.signal);
      }
    } finally {
      instance.backgroundConnecting = false;
    }
  }

  private clientOptions(instance: EditorInstance, extra: Partial<RemoteClientOptions> = {}): RemoteClientOptions {
    return {
      multicastGroup: this.options.multicastGroup,
      multicastPort: instance.multicastPort,
      multicastBindAddress: this.options.multicastBindAddress,
      commandHost: this.options.commandHost,
      projectName: this.projectName,
      expectedPid: instance.process.pid,
      ...extra,
    };
  }

  /** One discovery + connect attempt, verified against the launched pid. */
  private async tryConnect(instance: EditorInstance, timeoutMs: number): Promise<boolean> {
    if (instance.client?.isConnected()) return true;

    const client = this.createClient(this.clientOptions(instance));
    const connected = await client.connect(timeoutMs);
    if (!connected.ok) {
      if (connected.error.code === "IDENTITY_MISMATCH") console.error(`[UERemote] ${connected.error.message}`);
      return false;
    }
    if (this.instance !== instance || instance.intentionalStop || instance.process.hasExited()) {
      await client.disconnect();
      return false;
    }
    if (instance.client?.isConnected()) {
      // Another path connected first.
      await client.disconnect();
      return true;
    }
    await this.adopt(instance, client, true);
    return true;
  }

  private async adopt(instance: EditorInstance, client: RemoteExecutionClient, runInit: boolean): Promise<void> {
    const previous = instance.client;
    instance.client = client;
    instance.nodeId = client.nodeIdentity()?.nodeId ?? instance.nodeId;
    instance.backgroundConnecting = false;
    this.state = "running";
    console.error(`[UERemote] Connected to editor (node_id: ${instance.nodeId ?? "unknown"})`);
    if (previous && previous !== client) await previous.disconnect();
    if (runInit) await this.runInitScript(client);
  }

  private async runInitScript(client: RemoteExecutionClient): Promise<void> {
    const script = this.options.initScript;
    if (!script) return;
    console.error("[UERemote] Running editor initialization script...");
    const result = await client.execute(script, ExecTypes.ExecuteFile, this.timings.initTimeoutMs);
    if (!result.ok) console.error(`[UERemote] Editor initialization failed: ${result.error.message}`);
    else if (!result.value.success) console.error(`[UERemote] Editor initialization returned failure: ${result.value.error ?? ""}`);
    else console.error("[UERemote] Editor initialization completed successfully");
  }

  // --- Execution ---

  private async run(code: string, execType: ExecType, timeoutMs: number): Promise<Result<CommandResponse, ExecuteError>> {
    const instance = this.instance;
    if (!instance) return fail(new NotConnectedError("No editor is running. Call editor_launch first."));
    if (this.state !== "running") return fail(new NotConnectedError(`Editor is not ready (status: ${this.state})`));

    const client = await this.ensureClient(instance);
    if (!client.ok) return client;

    const result = await client.value.execute(code, execType, timeoutMs);
    if (!result.ok && result.error.code === "CONNECTION_LOST") {
      console.error("[UERemote] Editor connection lost (may have crashed)");
    }
    return result;
  }

  /** The live client, reconnecting to the same node and pid when the channel dropped. */
  private async ensureClient(instance: EditorInstance): Promise<Result<RemoteExecutionClient, NotConnectedError>> {
    if (instance.client?.isConnected()) return ok(instance.client);

    console.error("[UERemote] Remote client disconnected, attempting to reconnect...");
    const stale = instance.client;
    instance.client = null;
    await stale?.disconnect();

    const client = this.createClient(this.clientOptions(instance, { expectedNodeId: instance.nodeId ?? undefined }));
    const connected = await client.connect(this.timings.reconnectTimeoutMs);
    if (!connected.ok || this.instance !== instance) {
      await client.disconnect();
      return fail(new NotConnectedError("Failed to reconnect to editor. Editor may have crashed."));
    }
    await this.adopt(instance, client, false);
    console.error("[UERemote] Reconnected successfully");
    return ok(client);
  }

  // --- Crash handling ---

  private async handleExit(instance: EditorInstance, status: ExitStatus): Promise<void> {
    if (this.instance !== instance) return;
    const exit = classifyExit(status.code, status.signal);
    instance.exit = exit;
    instance.abort.abort();
    // stop() owns the transition when it asked for the exit.
    if (instance.intentionalStop) return;

    const client = instance.client;
    instance.client = null;
    instance.backgroundConnecting = false;

    if (exit.exitType === "normal") {
      console.error("[UERemote] Editor exited normally");
      this.state = "not_running";
      await client?.disconnect();
      return;
    }

    console.error(`[UERemote] Editor process exited unexpectedly: ${exit.description}`);
    this.state = "crashed";
    await client?.disconnect();

    instance.crashIndicator = await checkLogForCrash(instance.logFilePath);
    if (instance.crashIndicator) console.error(`[UERemote] Crash indicator in log: ${instance.crashIndicator}`);

    if (instance.monitored && (this.options.autoRestart ?? true)) await this.attemptRestart(instance);
  }

  private async attemptRestart(previous: EditorInstance): Promise<void> {
    const { maxRestartAttempts, restartCooldownMs } = this.timings;
    if (this.restartCount >= maxRestartAttempts) {
      console.error(`[UERemote] Maximum restart attempts (${maxRestartAttempts}) reached. Restart manually with editor_launch.`);
      return;
    }

    if (this.lastRestartAt !== null) {
      const elapsed = Date.now() - this.lastRestartAt;
      if (elapsed < restartCooldownMs) {
        console.error(`[UERemote] Restart cooldown: waiting ${((restartCooldownMs - elapsed) / 1000).toFixed(1)}s`);
        await delay(restartCooldownMs - elapsed, previous.abort.signal);
      }
    }
    // A stop or a manual launch during the cooldown takes precedence.
    if (this.instance !== previous || previous.intentionalStop) return;

    this.restartCount++;
    this.lastRestartAt = Date.now();
    console.error(`[UERemote] Attempting restart ${this.restartCount}/${maxRestartAttempts}...`);

    const result = await this.startOnce(true, previous.waitTimeoutMs);
    if (result.ok) {
      console.error("[UERemote] Editor restart successful");
    } else if (result.error instanceof BuildRequiredError) {
      console.error("[UERemote] Editor requires build. Cannot auto-restart until built.");
    } else {
      console.error(`[UERemote] Editor restart failed: ${result.error.message}`);
    }
  }

  private reset(): void {
    this.instance = null;
    this.state = "not_running";
  }
}

/**
 * helpers.ts: in-process stand-ins for the editor side of the protocol.
 *
 *   InMemoryBus   replaces the multicast group; every joined transport hears
 *                 every datagram, the sender included.
 *   FakeEditor    answers ping, dials back on open_connection and replies
 *                 to commands over a real loopback TCP socket.
 *   FakeProcess   an EditorProcess whose exit the test controls.
 *   harness()     an EditorProcessManager wired to all three, with short
 *                 timings, over a generated temp project.
 */

import * as net from "node:net";
import type { DiscoveryTransport } from "../src/remote/discovery.js";
import type { EditorProcess, ExitStatus } from "../src/editor/editor-process.js";
import { EditorProcessManager, type EditorManagerOptions, type ManagerTimings } from "../src/editor/process-manager.js";
import { ok } from "../src/errors.js";
import { JsonStreamDecoder } from "../src/remote/json-stream.js";
import { RemoteExecutionClient } from "../src/remote/remote-client.js";
import { CLIENT_NODE_ID, decodeMessage, type OutputEntry, type ProtocolMessage } from "../src/remote/protocol.js";
import { generateTempProject } from "./bootstrap.js";

// ---------------------------------------------------------------------------
// Discovery bus
// ---------------------------------------------------------------------------

class BusTransport implements DiscoveryTransport {
  readonly handlers: Array<(data: Buffer) => void> = [];
  closed = false;

  constructor(private readonly bus: InMemoryBus) {}

  async send(data: Buffer): Promise<void> {
    if (this.closed) throw new Error("transport closed");
    this.bus.broadcast(data);
  }

  onMessage(handler: (data: Buffer) => void): void {
    this.handlers.push(handler);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class InMemoryBus {
  private readonly members: BusTransport[] = [];
  /** Every datagram sent on the bus, decoded. */
  readonly sent: ProtocolMessage[] = [];

  transport(): DiscoveryTransport {
    const t = new BusTransport(this);
    this.members.push(t);
    return t;
  }

  /** Transports not yet closed. */
  openCount(): number {
    return this.members.filter((m) => !m.closed).length;
  }

  broadcast(data: Buffer): void {
    try {
      const message = decodeMessage(JSON.parse(data.toString("utf-8")));
      if (message) this.sent.push(message);
    } catch {
      // raw datagrams are still delivered
    }
    for (const member of this.members) {
      if (member.closed) continue;
      const copy = Buffer.from(data);
      setImmediate(() => {
        if (member.closed) return;
        for (const handler of member.handlers) handler(copy);
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Fake editor node
// ---------------------------------------------------------------------------

export interface FakeCommand {
  command: string;
  execMode: string;
}

export interface FakeReply {
  success: boolean;
  result?: string;
  output?: OutputEntry[];
}

export interface FakeEditorOptions {
  nodeId?: string;
  projectName?: string;
  engineVersion?: string;
  pid?: number;
  /** Include process_id in pongs. Defaults to false, like a stock editor. */
  advertisePid?: boolean;
  /** Reply to a command; return null to fall back to the defaults. */
  respond?: (command: FakeCommand) => FakeReply | null;
  /** Never answer commands. */
  silent?: boolean;
}

export const PID_QUERY = "import os; print(os.getpid())";

export class FakeEditor {
  readonly nodeId: string;
  readonly pid: number;
  readonly commands: FakeCommand[] = [];
  private readonly transport: DiscoveryTransport;
  private socket: net.Socket | null = null;
  private respondToPing = true;

  constructor(bus: InMemoryBus, private readonly options: FakeEditorOptions = {}) {
    this.nodeId = options.nodeId ?? "fake-node-1";
    this.pid = options.pid ?? 4242;
    this.transport = bus.transport();
    this.transport.onMessage((data) => this.onDatagram(data));
  }

  /** True while a command connection is open. */
  isDialedIn(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  /** Stop answering pings, as a node that is still starting up. */
  mute(): void {
    this.respondToPing = false;
  }

  unmute(): void {
    this.respondToPing = true;
  }

  /** Drop the command connection without a close_connection. */
  dropConnection(): void {
    this.socket?.destroy();
    this.socket = null;
  }

  /** Write raw bytes on the command connection. */
  writeRaw(text: string): void {
    this.socket?.write(text);
  }

  async close(): Promise<void> {
    this.dropConnection();
    await this.transport.close();
  }

  private send(message: ProtocolMessage): void {
    this.transport.send(Buffer.from(JSON.stringify(message))).catch(() => undefined);
  }

  private onDatagram(data: Buffer): void {
    let message: ProtocolMessage | null;
    try {
      message = decodeMessage(JSON.parse(data.toString("utf-8")));
    } catch {
      return;
    }
    if (!message || message.source === this.nodeId) return;

    if (message.type === "ping" && this.respondToPing) {
      const pong: Record<string, unknown> = {
        user: "tester",
        machine: "test-host",
        engine_version: this.options.engineVersion ?? "5.4.0",
        project_name: this.options.projectName ?? "TestProject",
        project_root: "/projects/TestProject",
      };
      if (this.options.advertisePid) pong.process_id = this.pid;
      this.send({ version: 1, magic: "ue_py", type: "pong", source: this.nodeId, dest: message.source, data: pong });
      return;
    }

    if (message.dest !== this.nodeId) return;
    if (message.type === "open_connection") {
      const ip = message.data?.command_ip;
      const port = message.data?.command_port;
      if (typeof ip === "string" && typeof port === "number") this.dial(ip, port);
    } else if (message.type === "close_connection") {
      this.dropConnection();
    }
  }

  private dial(ip: string, port: number): void {
    this.dropConnection();
    const socket = net.connect(port, ip);
    const decoder = new JsonStreamDecoder();
    socket.on("error", () => undefined);
    socket.on("data", (chunk: Buffer) => {
      const decoded = decoder.push(chunk);
      if (!decoded.ok) return;
      for (const raw of decoded.value) {
        const message = decodeMessage(raw);
        if (message?.type === "command") this.onCommand(socket, message);
      }
    });
    this.socket = socket;
  }

  private onCommand(socket: net.Socket, message: ProtocolMessage): void {
    const command = String(message.data?.command ?? "");
    const execMode = String(message.data?.exec_mode ?? "");
    this.commands.push({ command, execMode });
    if (this.options.silent) return;

    // The editor echoes the command before answering it.
    socket.write(JSON.stringify({ ...message, source: CLIENT_NODE_ID }));
    const reply = this.options.respond?.({ command, execMode }) ?? this.defaultReply(command, execMode);
    socket.write(
      JSON.stringify({
        version: 1,
        magic: "ue_py",
        type: "command_result",
        source: this.nodeId,
        dest: CLIENT_NODE_ID,
        data: { success: reply.success, command, result: reply.result ?? "None", output: reply.output ?? [] },
      }),
    );
  }

  private defaultReply(command: string, execMode: string): FakeReply {
    if (command === PID_QUERY) {
      return { success: true, output: [{ type: "Info", output: `${this.pid}\n` }] };
    }
    if (execMode === "EvaluateStatement" && command === "1+1") {
      return { success: true, result: "2" };
    }
    return { success: true };
  }
}

// ---------------------------------------------------------------------------
// Fake editor process
// ---------------------------------------------------------------------------

export class FakeProcess implements EditorProcess {
  readonly signals: NodeJS.Signals[] = [];
  private status: ExitStatus | null = null;
  private readonly listeners: Array<(status: ExitStatus) => void> = [];

  /** @param exitOn signals that make the fake exit when sent. */
  constructor(readonly pid: number, private readonly exitOn: NodeJS.Signals[] = ["SIGTERM", "SIGKILL"]) {}

  hasExited(): boolean {
    return this.status !== null;
  }

  onExit(listener: (status: ExitStatus) => void): void {
    if (this.status) listener(this.status);
    else this.listeners.push(listener);
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.status) return Promise.resolve(true);
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      this.listeners.push(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.status) return;
    this.signals.push(signal);
    if (this.exitOn.includes(signal)) this.exit(null, signal);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.status) return;
    this.status = { code, signal };
    for (const listener of this.listeners.splice(0)) listener({ code, signal });
  }
}

/** Resolve once `predicate` holds, polling every 10ms. */
export async function waitUntil(predicate: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((r) => setTimeout(r, 10));
  }
}

// ---------------------------------------------------------------------------
// Manager harness
// ---------------------------------------------------------------------------

export const QUIT = "import unreal; unreal.SystemLibrary.quit_editor()";

export interface Harness {
  manager: EditorProcessManager;
  editor: FakeEditor;
  processes: FakeProcess[];
  launches: Array<{ command: string; args: string[] }>;
  root: string;
  logsDir: string;
  current(): FakeProcess;
}

/** Short manager timings for tests; `opts.manager.timings` replaces them wholesale. */
export const FAST_TIMINGS: Partial<ManagerTimings> = {
  connectAttemptMs: 300,
  connectRetryMs: 20,
  backgroundRetryMs: 50,
  reconnectTimeoutMs: 300,
  quitTimeoutMs: 300,
  gracePeriodMs: 200,
  killTimeoutMs: 100,
  initTimeoutMs: 300,
  restartCooldownMs: 0,
};

const harnesses: Harness[] = [];

export function harness(
  opts: {
    editor?: FakeEditorOptions;
    manager?: Partial<EditorManagerOptions>;
    exitOn?: NodeJS.Signals[];
    /** Leave the process running when the editor is asked to quit. */
    ignoreQuit?: boolean;
    cpp?: boolean;
  } = {},
): Harness {
  const project = generateTempProject({ name: "TestProject", cpp: opts.cpp });
  const bus = new InMemoryBus();
  const processes: FakeProcess[] = [];
  const launches: Array<{ command: string; args: string[] }> = [];

  let h: Harness | null = null;
  const editor = new FakeEditor(bus, {
    pid: 4242,
    ...opts.editor,
    respond: (command) => {
      // Quitting exits the current process shortly after.
      if (command.command === QUIT && !opts.ignoreQuit) setTimeout(() => h?.current().exit(0), 10);
      return opts.editor?.respond?.(command) ?? null;
    },
  });

  const manager = new EditorProcessManager({
    uproject: project.uproject,
    autoRestart: false,
    timings: FAST_TIMINGS,
    launcher: (command, args) => {
      launches.push({ command, args });
      const proc = new FakeProcess(4242, opts.exitOn);
      processes.push(proc);
      return ok(proc);
    },
    createClient: (o) => new RemoteExecutionClient({ ...o, transportFactory: async () => bus.transport() }),
    allocatePort: async () => ok(6800),
    locateEditor: () => "/engines/UE_5.4/UnrealEditor",
    ...opts.manager,
  });

  h = {
    manager,
    editor,
    processes,
    launches,
    root: project.root,
    logsDir: project.logsDir,
    current: () => {
      const last = processes[processes.length - 1];
      if (!last) throw new Error("nothing launched");
      return last;
    },
  };
  harnesses.push(h);
  return h;
}

/** Stop every manager created by harness() and close its fake editor. */
export async function disposeHarnesses(): Promise<void> {
  for (const h of harnesses.splice(0)) {
    await h.manager.stop();
    await h.manager.settled();
    await h.editor.close();
  }
}

import {
  fail,
  ok,
  errorMessage,
  ConnectionLostError,
  DiscoveryTimeoutError,
  FramingError,
  IdentityMismatchError,
  NotConnectedError,
  TimeoutError,
  type Result,
} from "../errors.js";
import { CommandChannel, CommandListener } from "./command-channel.js";
import { DiscoveryListener, UdpMulticastTransport, type DiscoveryTransport } from "./discovery.js";
import {
  commandMessage,
  ExecTypes,
  makeCommandRequest,
  makeMessage,
  toCommandResponse,
  type CommandResponse,
  type ExecType,
  type NodeIdentity,
} from "./protocol.js";

export interface RemoteClientOptions {
  multicastGroup?: string;
  multicastPort?: number;
  multicastBindAddress?: string;
  /** Address the command listener binds and advertises. */
  commandHost?: string;
  projectName?: string;
  expectedNodeId?: string;
  expectedPid?: number;
  /** Defaults to a UDP multicast socket on the configured group. */
  transportFactory?: () => Promise<DiscoveryTransport>;
}

export type ConnectError = DiscoveryTimeoutError | IdentityMismatchError | ExecuteError;
export type ExecuteError = NotConnectedError | TimeoutError | ConnectionLostError | FramingError;

const PID_QUERY = "import os; print(os.getpid())";
const PID_QUERY_TIMEOUT_MS = 5000;

/**
 * Client for the editor's Python remote execution protocol: discovers a node
 * over multicast, opens the command channel to it and runs code there.
 */
export class RemoteExecutionClient {
  private discovery: DiscoveryListener | null = null;
  private listener: CommandListener | null = null;
  private channel: CommandChannel | null = null;
  private identity: NodeIdentity | null = null;
  private connecting: Promise<Result<NodeIdentity, ConnectError>> | null = null;

  constructor(private readonly options: RemoteClientOptions = {}) {}

  get expectedPid(): number | undefined {
    return this.options.expectedPid;
  }

  nodeIdentity(): NodeIdentity | null {
    return this.identity;
  }

  /** An open channel alone is not enough: the peer must have been identified. */
  isConnected(): boolean {
    return this.channel !== null && this.channel.isOpen() && this.identity !== null;
  }

  /** Discover, open the command channel and, when a pid is expected, verify it. */
  connect(timeoutMs = 5000): Promise<Result<NodeIdentity, ConnectError>> {
    if (this.isConnected() && this.identity) return Promise.resolve(ok(this.identity));
    // Concurrent callers share one attempt.
    if (!this.connecting) {
      this.connecting = this.connectOnce(timeoutMs)
        .catch(async (err: unknown) => {
          // Socket setup failures (bind, listen, send) surface as a lost connection.
          await this.disconnect();
          return fail(new ConnectionLostError(`Could not reach editor: ${errorMessage(err)}`));
        })
        .finally(() => {
          this.connecting = null;
        });
    }
    return this.connecting;
  }

  async execute(
    code: string,
    execType: ExecType = ExecTypes.ExecuteStatement,
    timeoutMs = 30_000,
  ): Promise<Result<CommandResponse, ExecuteError>> {
    const channel = this.channel;
    const identity = this.identity;
    if (!channel || !channel.isOpen() || !identity) return fail(new NotConnectedError());

    const reply = await channel.request(commandMessage(identity.nodeId, makeCommandRequest(code, execType)), timeoutMs);
    if (!reply.ok) {
      console.error(`[UERemote] Command failed: ${reply.error.message}`);
      return reply;
    }
    return ok(toCommandResponse(reply.value));
  }

  /**
   * Best-effort check that the connected editor runs as `expectedPid`.
   * Any failure to ask or to parse the answer counts as a mismatch.
   */
  async verifyPid(expectedPid: number): Promise<boolean> {
    const queried = await this.queryPid(PID_QUERY_TIMEOUT_MS);
    const actual = queried.ok ? queried.value : null;
    if (actual === null) {
      console.error("[UERemote] Failed to verify PID: no usable answer from editor");
      return false;
    }
    if (actual !== expectedPid) {
      console.error(`[UERemote] PID mismatch: expected ${expectedPid}, got ${actual}`);
      return false;
    }
    return true;
  }

  /** Close the channel and discovery socket. Safe to call repeatedly. */
  async disconnect(): Promise<void> {
    const { discovery, listener, channel, identity } = this;
    this.discovery = null;
    this.listener = null;
    this.channel = null;
    this.identity = null;

    if (discovery && identity) {
      try {
        await discovery.send(makeMessage("close_connection", { dest: identity.nodeId }));
      } catch (err) {
        console.error(`[UERemote] Could not send close_connection: ${errorMessage(err)}`);
      }
    }
    channel?.close();
    listener?.close();
    await discovery?.close();
    if (identity) console.error(`[UERemote] Disconnected from node ${identity.nodeId}`);
  }

  private async connectOnce(timeoutMs: number): Promise<Result<NodeIdentity, ConnectError>> {
    const deadline = Date.now() + timeoutMs;
    const remaining = () => Math.max(deadline - Date.now(), 1);
    const { expectedPid, expectedNodeId, projectName } = this.options;

    // A channel that dropped leaves stale state behind; start clean.
    await this.disconnect();

    const discovery = new DiscoveryListener(await this.openTransport(), { expectedNodeId, expectedPid, projectName });
    this.discovery = discovery;

    const found = await discovery.waitForNode(remaining());
    if (!found.ok) {
      await this.disconnect();
      return found;
    }
    const node = found.value;

    const listener = await CommandListener.listen(this.options.commandHost ?? "127.0.0.1");
    this.listener = listener;
    await discovery.send(
      makeMessage("open_connection", {
        dest: node.nodeId,
        data: { command_ip: listener.endpoint.address, command_port: listener.endpoint.port },
      }),
    );

    const accepted = await listener.accept(remaining());
    if (!accepted.ok) {
      await this.disconnect();
      return accepted;
    }
    this.listener = null;
    const channel = accepted.value;
    this.channel = channel;
    this.identity = node;
    channel.onClose((reason) => {
      if (this.channel === channel) {
        console.error(`[UERemote] Command channel to ${node.nodeId} closed: ${reason}`);
        this.channel = null;
      }
    });

    if (expectedPid !== undefined) {
      // A query that times out or loses the channel is that failure, not a mismatch.
      const queried = await this.queryPid(remaining());
      if (!queried.ok) {
        await this.disconnect();
        return queried;
      }
      const actual = queried.value;
      if (actual !== expectedPid) {
        await this.disconnect();
        return fail(
          new IdentityMismatchError({ pid: expectedPid, nodeId: expectedNodeId }, { pid: actual, nodeId: node.nodeId }),
        );
      }
      this.identity = { ...node, processId: actual };
    }

    console.error(
      `[UERemote] Connected to ${node.projectName || "Unknown"}${node.engineVersion ? ` (UE ${node.engineVersion})` : ""} [node: ${node.nodeId}]`,
    );
    return ok(this.identity ?? node);
  }

  /** The editor's pid, or null when it answered without a usable one. */
  private async queryPid(timeoutMs: number): Promise<Result<number | null, ExecuteError>> {
    const executed = await this.execute(PID_QUERY, ExecTypes.ExecuteStatement, timeoutMs);
    if (!executed.ok) return executed;
    if (!executed.value.success) return ok(null);

    for (const entry of executed.value.output) {
      const text = entry.output.trim();
      if (/^\d+$/.test(text)) return ok(Number.parseInt(text, 10));
    }
    return ok(null);
  }

  private openTransport(): Promise<DiscoveryTransport> {
    if (this.options.transportFactory) return this.options.transportFactory();
    return UdpMulticastTransport.open({
      group: this.options.multicastGroup,
      port: this.options.multicastPort,
      bindAddress: this.options.multicastBindAddress,
    });
  }
}

import * as dgram from "node:dgram";
import { fail, ok, DiscoveryTimeoutError, type Result } from "../errors.js";
import {
  BUFFER_SIZE,
  CLIENT_NODE_ID,
  DEFAULT_MULTICAST_BIND,
  DEFAULT_MULTICAST_GROUP,
  DEFAULT_MULTICAST_PORT,
  decodeMessage,
  encodeMessage,
  makeMessage,
  nodeIdentityFromPong,
  type NodeIdentity,
  type ProtocolMessage,
} from "./protocol.js";

// --- Transport ---

/** Datagram transport the listener talks through. */
export interface DiscoveryTransport {
  send(data: Buffer): Promise<void>;
  onMessage(handler: (data: Buffer) => void): void;
  close(): Promise<void>;
}

export interface MulticastOptions {
  group?: string;
  port?: number;
  bindAddress?: string;
}

export class UdpMulticastTransport implements DiscoveryTransport {
  private closed = false;

  private constructor(
    private readonly sock: dgram.Socket,
    private readonly group: string,
    private readonly port: number,
  ) {}

  static open(options: MulticastOptions = {}): Promise<UdpMulticastTransport> {
    const group = options.group ?? DEFAULT_MULTICAST_GROUP;
    const port = options.port ?? DEFAULT_MULTICAST_PORT;
    const bindAddress = options.bindAddress ?? DEFAULT_MULTICAST_BIND;

    return new Promise((resolve, reject) => {
      const sock = dgram.createSocket({ type: "udp4", reuseAddr: true, recvBufferSize: BUFFER_SIZE });
      const onError = (err: Error) => {
        sock.close();
        reject(err);
      };
      sock.once("error", onError);
      sock.bind(port, bindAddress, () => {
        sock.off("error", onError);
        try {
          // TTL 0 keeps discovery on this host; loopback lets us hear local editors.
          sock.setMulticastTTL(0);
          sock.setMulticastLoopback(true);
          sock.addMembership(group, bindAddress === "0.0.0.0" ? undefined : bindAddress);
        } catch (err) {
          sock.close();
          reject(err);
          return;
        }
        sock.on("error", (err) => console.error("[UERemote] Discovery socket error:", err.message));
        resolve(new UdpMulticastTransport(sock, group, port));
      });
    });
  }

  send(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sock.send(data, this.port, this.group, (err) => (err ? reject(err) : resolve()));
    });
  }

  onMessage(handler: (data: Buffer) => void): void {
    this.sock.on("message", (msg) => handler(msg));
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return new Promise((resolve) => this.sock.close(() => resolve()));
  }
}

// --- Listener ---

export interface DiscoveryFilter {
  /** Only accept this node id. */
  expectedNodeId?: string;
  /** Reject nodes that advertise a different process id. */
  expectedPid?: number;
  /** Only accept nodes serving this project. */
  projectName?: string;
}

export type NodeListener = (node: NodeIdentity) => void;

export class DiscoveryListener {
  private readonly known = new Map<string, NodeIdentity>();
  private readonly listeners = new Set<NodeListener>();
  private readonly pingers = new Set<ReturnType<typeof setInterval>>();
  private closed = false;

  constructor(
    private readonly transport: DiscoveryTransport,
    private readonly filter: DiscoveryFilter = {},
  ) {
    transport.onMessage((data) => this.handleDatagram(data));
  }

  static async open(filter: DiscoveryFilter = {}, multicast: MulticastOptions = {}): Promise<DiscoveryListener> {
    return new DiscoveryListener(await UdpMulticastTransport.open(multicast), filter);
  }

  /** Matching nodes seen so far, in discovery order. */
  nodes(): NodeIdentity[] {
    return [...this.known.values()];
  }

  /**
   * Hear every matching pong until the returned function is called. Editors
   * only answer pings, so pass `pingIntervalMs` to keep pinging meanwhile.
   */
  subscribe(listener: NodeListener, pingIntervalMs?: number): () => void {
    this.listeners.add(listener);
    let pinger: ReturnType<typeof setInterval> | undefined;
    if (pingIntervalMs !== undefined) {
      pinger = setInterval(() => this.sendPing(), pingIntervalMs);
      this.pingers.add(pinger);
      this.sendPing();
    }
    return () => {
      this.listeners.delete(listener);
      if (pinger !== undefined) {
        clearInterval(pinger);
        this.pingers.delete(pinger);
      }
    };
  }

  async send(message: ProtocolMessage): Promise<void> {
    if (this.closed) return;
    await this.transport.send(encodeMessage(message));
  }

  ping(): Promise<void> {
    return this.send(makeMessage("ping"));
  }

  /**
   * Resolve with the first matching node, pinging until one answers or the
   * timeout elapses.
   */
  waitForNode(timeoutMs: number, pingIntervalMs = 1000): Promise<Result<NodeIdentity, DiscoveryTimeoutError>> {
    const first = this.nodes()[0];
    if (first) return Promise.resolve(ok(first));

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (result: Result<NodeIdentity, DiscoveryTimeoutError>) => {
        clearTimeout(timer);
        unsubscribe();
        resolve(result);
      };
      timer = setTimeout(() => finish(fail(new DiscoveryTimeoutError(timeoutMs))), timeoutMs);
      const unsubscribe = this.subscribe((node) => {
        if (this.known.size > 1) {
          console.error(`[UERemote] ${this.known.size} editor instances discovered, selecting first match`);
        }
        finish(ok(this.nodes()[0] ?? node));
      }, pingIntervalMs);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.listeners.clear();
    for (const pinger of this.pingers) clearInterval(pinger);
    this.pingers.clear();
    await this.transport.close();
  }

  private sendPing(): void {
    this.ping().catch((err: unknown) => {
      console.error("[UERemote] Discovery ping failed:", err instanceof Error ? err.message : err);
    });
  }

  /** Decode one datagram; anything malformed or unrelated is dropped. */
  private handleDatagram(data: Buffer): void {
    if (this.closed) return;

    let raw: unknown;
    try {
      raw = JSON.parse(data.toString("utf-8"));
    } catch {
      return;
    }
    const message = decodeMessage(raw);
    if (!message || message.type !== "pong") return;
    if (message.source === CLIENT_NODE_ID) return;
    if (message.dest !== undefined && message.dest !== CLIENT_NODE_ID) return;

    const node = nodeIdentityFromPong(message);
    if (!this.accepts(node)) return;

    // Re-broadcasts replace the earlier entry but keep its position.
    this.known.set(node.nodeId, node);
    for (const listener of [...this.listeners]) listener(node);
  }

  private accepts(node: NodeIdentity): boolean {
    const { expectedNodeId, expectedPid, projectName } = this.filter;
    if (expectedNodeId && node.nodeId !== expectedNodeId) return false;
    if (expectedPid !== undefined && node.processId !== null && node.processId !== expectedPid) return false;
    if (projectName && node.projectName && node.projectName !== projectName) return false;
    return true;
  }
}

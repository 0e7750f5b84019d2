import * as net from "node:net";
import {
  fail,
  ok,
  ConnectionLostError,
  FramingError,
  NotConnectedError,
  TimeoutError,
  type Result,
} from "../errors.js";
import { JsonStreamDecoder } from "./json-stream.js";
import { BUFFER_SIZE, decodeMessage, encodeMessage, type Endpoint, type ProtocolMessage } from "./protocol.js";

export type ChannelError = NotConnectedError | TimeoutError | ConnectionLostError | FramingError;

interface PendingRequest {
  settle(result: Result<ProtocolMessage, ChannelError>): void;
}

/**
 * Command connection to one editor node. The editor dials in, so a channel is
 * obtained from {@link CommandListener.accept}.
 *
 * Only one request is in flight at a time; callers queue behind each other.
 */
export class CommandChannel {
  private readonly decoder = new JsonStreamDecoder();
  private pending: PendingRequest | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private open = true;
  private readonly closeHandlers = new Set<(reason: string) => void>();

  constructor(private readonly socket: net.Socket) {
    socket.on("data", (chunk: Buffer) => this.onData(chunk));
    socket.on("error", (err) => this.teardown(`socket error: ${err.message}`));
    socket.on("close", () => this.teardown("connection closed by editor"));
  }

  isOpen(): boolean {
    return this.open;
  }

  onClose(handler: (reason: string) => void): () => void {
    this.closeHandlers.add(handler);
    return () => {
      this.closeHandlers.delete(handler);
    };
  }

  /**
   * Send a message and wait for the `command_result` that answers it. On
   * timeout the channel is closed rather than left holding a half-read reply.
   */
  request(message: ProtocolMessage, timeoutMs: number): Promise<Result<ProtocolMessage, ChannelError>> {
    const run = this.queue.then(() => this.exchange(message, timeoutMs));
    this.queue = run;
    return run;
  }

  close(): void {
    this.teardown("closed by client");
  }

  private exchange(message: ProtocolMessage, timeoutMs: number): Promise<Result<ProtocolMessage, ChannelError>> {
    if (!this.open) return Promise.resolve(fail(new NotConnectedError("Command channel is closed")));

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        this.teardown(`no response within ${timeoutMs}ms`);
        resolve(fail(new TimeoutError("command result", timeoutMs)));
      }, timeoutMs);

      this.pending = {
        settle: (result) => {
          clearTimeout(timer);
          this.pending = null;
          resolve(result);
        },
      };

      this.socket.write(encodeMessage(message), (err) => {
        if (err) this.pending?.settle(fail(new ConnectionLostError(`Write failed: ${err.message}`)));
      });
    });
  }

  private onData(chunk: Buffer): void {
    const decoded = this.decoder.push(chunk);
    if (!decoded.ok) {
      const pending = this.pending;
      this.pending = null;
      this.teardown(decoded.error.message);
      pending?.settle(fail(decoded.error));
      return;
    }

    for (const raw of decoded.value) {
      const message = decodeMessage(raw);
      if (!message) {
        console.error("[UERemote] Ignoring non-protocol message on command channel");
        continue;
      }
      // The editor echoes our own command before answering it.
      if (message.type !== "command_result") continue;
      if (this.pending) this.pending.settle(ok(message));
      else console.error("[UERemote] Dropping unsolicited command_result");
    }
  }

  private teardown(reason: string): void {
    if (!this.open) return;
    this.open = false;
    this.decoder.reset();
    this.socket.destroy();

    const pending = this.pending;
    this.pending = null;
    pending?.settle(fail(new ConnectionLostError(`Command channel closed: ${reason}`)));

    for (const handler of [...this.closeHandlers]) handler(reason);
    this.closeHandlers.clear();
  }
}

/** Loopback server the editor connects back to after `open_connection`. */
export class CommandListener {
  private closed = false;
  private incoming: { socket: net.Socket; release: () => void } | null = null;
  private waiter: ((socket: net.Socket) => void) | null = null;

  private constructor(private readonly server: net.Server, readonly endpoint: Endpoint) {
    // The editor may dial in before accept() is called.
    server.on("connection", (socket: net.Socket) => {
      if (this.waiter) this.waiter(socket);
      else if (!this.incoming) this.park(socket);
      else socket.destroy();
    });
  }

  /** Hold an early connection until accept(); one that fails meanwhile is dropped. */
  private park(socket: net.Socket): void {
    const onError = (err: Error) => {
      console.error(`[UERemote] Command connection failed before it was accepted: ${err.message}`);
      drop();
    };
    const drop = () => {
      if (this.incoming?.socket === socket) this.incoming = null;
      socket.off("error", onError);
      socket.off("close", drop);
      socket.destroy();
    };
    socket.on("error", onError);
    socket.on("close", drop);
    this.incoming = {
      socket,
      release: () => {
        socket.off("error", onError);
        socket.off("close", drop);
      },
    };
  }

  static listen(host: string, port = 0): Promise<CommandListener> {
    const options = { highWaterMark: BUFFER_SIZE };
    const server = net.createServer(options);
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        const address = server.address();
        if (address === null || typeof address === "string") {
          server.close();
          reject(new Error(`Unexpected listen address for ${host}`));
          return;
        }
        resolve(new CommandListener(server, { address: host, port: address.port }));
      });
    });
  }

  /** Wait for the editor to dial in. The listener stops accepting afterwards. */
  accept(timeoutMs: number): Promise<Result<CommandChannel, TimeoutError>> {
    const early = this.incoming;
    if (early) {
      this.incoming = null;
      early.release();
      this.close();
      return Promise.resolve(ok(new CommandChannel(early.socket)));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(fail(new TimeoutError("editor to open the command connection", timeoutMs)));
      }, timeoutMs);
      this.waiter = (socket) => {
        clearTimeout(timer);
        this.waiter = null;
        this.close();
        resolve(ok(new CommandChannel(socket)));
      };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.incoming?.socket.destroy();
    this.incoming = null;
    this.server.close();
  }
}

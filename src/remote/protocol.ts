import { z } from "zod";

// Wire constants of the editor's Python remote execution protocol.
export const PROTOCOL_MAGIC = "ue_py";
export const PROTOCOL_VERSION = 1;
export const BUFFER_SIZE = 2_097_152;
export const CLIENT_NODE_ID = "ue_remote_mcp";

export const DEFAULT_MULTICAST_GROUP = "239.0.0.1";
export const DEFAULT_MULTICAST_PORT = 6766;
export const DEFAULT_MULTICAST_BIND = "0.0.0.0";

export const ExecTypes = {
  ExecuteFile: "ExecuteFile",
  ExecuteStatement: "ExecuteStatement",
  EvaluateStatement: "EvaluateStatement",
} as const;

export type ExecType = (typeof ExecTypes)[keyof typeof ExecTypes];

export const MESSAGE_TYPES = ["ping", "pong", "open_connection", "close_connection", "command", "command_result"] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export const protocolMessageSchema = z.object({
  version: z.number().int(),
  magic: z.literal(PROTOCOL_MAGIC),
  type: z.enum(MESSAGE_TYPES),
  source: z.string(),
  dest: z.string().optional(),
  data: z.record(z.unknown()).optional(),
});

export type ProtocolMessage = z.infer<typeof protocolMessageSchema>;

export const pongDataSchema = z
  .object({
    project_name: z.string().optional(),
    project_root: z.string().optional(),
    engine_version: z.string().optional(),
    user: z.string().optional(),
    machine: z.string().optional(),
    process_id: z.number().int().optional(),
    pid: z.number().int().optional(),
  })
  .passthrough();

export const outputEntrySchema = z.object({
  type: z.string(),
  output: z.string(),
});

export type OutputEntry = z.infer<typeof outputEntrySchema>;

export const commandResultDataSchema = z.object({
  success: z.boolean(),
  command: z.string().optional(),
  result: z.unknown().optional(),
  output: z.array(outputEntrySchema).default([]),
});

// --- Domain values ---

export interface Endpoint {
  address: string;
  port: number;
}

export interface NodeIdentity {
  nodeId: string;
  /** Only known when the node advertises it; otherwise confirmed with verifyPid. */
  processId: number | null;
  projectName: string;
  engineVersion?: string;
}

export interface CommandRequest {
  readonly execType: ExecType;
  readonly code: string;
  readonly unattended: boolean;
  readonly executionMode: string;
}

export interface CommandResponse {
  success: boolean;
  output: OutputEntry[];
  result: string | null;
  error?: string;
}

// --- Builders ---

export function makeMessage(type: MessageType, fields: { dest?: string; data?: Record<string, unknown> } = {}): ProtocolMessage {
  const message: ProtocolMessage = {
    version: PROTOCOL_VERSION,
    magic: PROTOCOL_MAGIC,
    type,
    source: CLIENT_NODE_ID,
  };
  if (fields.dest !== undefined) message.dest = fields.dest;
  if (fields.data !== undefined) message.data = fields.data;
  return message;
}

export function makeCommandRequest(code: string, execType: ExecType = ExecTypes.ExecuteStatement): CommandRequest {
  return Object.freeze({ execType, code, unattended: true, executionMode: execType });
}

export function commandMessage(dest: string, request: CommandRequest): ProtocolMessage {
  return makeMessage("command", {
    dest,
    data: {
      command: request.code,
      unattended: request.unattended,
      exec_mode: request.executionMode,
    },
  });
}

export function encodeMessage(message: ProtocolMessage): Buffer {
  return Buffer.from(JSON.stringify(message), "utf-8");
}

/** Parse an untrusted value into a protocol message, or null. */
export function decodeMessage(value: unknown): ProtocolMessage | null {
  const parsed = protocolMessageSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function nodeIdentityFromPong(message: ProtocolMessage): NodeIdentity {
  const parsed = pongDataSchema.safeParse(message.data ?? {});
  if (!parsed.success) return { nodeId: message.source, processId: null, projectName: "" };
  const data = parsed.data;
  return {
    nodeId: message.source,
    processId: data.process_id ?? data.pid ?? null,
    projectName: data.project_name ?? "",
    engineVersion: data.engine_version,
  };
}

/** Build a CommandResponse from a `command_result` message. */
export function toCommandResponse(message: ProtocolMessage): CommandResponse {
  const parsed = commandResultDataSchema.safeParse(message.data ?? {});
  if (!parsed.success) {
    return { success: false, output: [], result: null, error: "Malformed command_result payload" };
  }
  const { success, result, output } = parsed.data;
  const text = result === undefined || result === null ? null : typeof result === "string" ? result : JSON.stringify(result);
  const response: CommandResponse = { success, output, result: text };
  if (!success) {
    // The editor reports a raised exception through `result` (the traceback text).
    response.error = text || output.filter((o) => o.type === "Error").map((o) => o.output).join("") || "Remote execution failed";
  }
  return response;
}

/** Output entries as text, one entry per line. */
export function outputText(response: Pick<CommandResponse, "output">): string {
  return response.output.map((o) => o.output.replace(/\r?\n$/, "")).join("\n");
}

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LEVEL_MATCH_POLICIES } from "./editor/level-match.js";

const port = z.coerce.number().int().min(1).max(65535);

const envSchema = z
  .object({
    UE_PROJECT_PATH: z.string().min(1).optional(),
    UE_EDITOR_CMD: z.string().min(1).optional(),
    UE_MULTICAST_GROUP: z.string().ip({ version: "v4" }).default("239.0.0.1"),
    UE_MULTICAST_PORT: port.default(6766),
    UE_MULTICAST_BIND: z.string().ip({ version: "v4" }).default("0.0.0.0"),
    UE_PORT_RANGE_START: port.default(6767),
    UE_PORT_RANGE_END: port.default(6866),
    UE_COMMAND_HOST: z.string().min(1).default("127.0.0.1"),
    UE_LOG_DIR: z.string().min(1).optional(),
    UE_LEVEL_MATCH: z.enum(LEVEL_MATCH_POLICIES).default("heuristic"),
  })
  .refine((env) => env.UE_PORT_RANGE_START <= env.UE_PORT_RANGE_END, {
    message: "UE_PORT_RANGE_START must not exceed UE_PORT_RANGE_END",
    path: ["UE_PORT_RANGE_START"],
  });

export type Env = z.infer<typeof envSchema>;

export interface Config {
  projectPath: string | undefined;
  editorCmd: string | undefined;
  multicastGroup: string;
  multicastPort: number;
  multicastBindAddress: string;
  portRange: { start: number; end: number };
  commandHost: string;
  logDir: string | undefined;
  levelMatch: Env["UE_LEVEL_MATCH"];
}

/** Parse configuration from an environment map; throws ConfigError naming the bad key. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Blank values mean "unset" so the defaults apply.
  const present = Object.fromEntries(
    Object.entries(env).filter(([k, v]) => k.startsWith("UE_") && v !== undefined && v.trim() !== ""),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") || "environment";
    throw new ConfigError(`Invalid ${key}: ${issue?.message ?? "invalid value"}`);
  }
  const e = parsed.data;
  return {
    projectPath: e.UE_PROJECT_PATH,
    editorCmd: e.UE_EDITOR_CMD,
    multicastGroup: e.UE_MULTICAST_GROUP,
    multicastPort: e.UE_MULTICAST_PORT,
    multicastBindAddress: e.UE_MULTICAST_BIND,
    portRange: { start: e.UE_PORT_RANGE_START, end: e.UE_PORT_RANGE_END },
    commandHost: e.UE_COMMAND_HOST,
    logDir: e.UE_LOG_DIR,
    levelMatch: e.UE_LEVEL_MATCH,
  };
}

import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { loadLocalityTable, type LocalityTable } from "./locality/locality-table.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AgentConfig {
  readonly agreementId: string;
  /** Derived from agreementId, never read from the file. */
  readonly city: string;
  readonly serverUrl: string;
  readonly autostart: boolean;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly reconnectDelayMs: number;
  readonly handshakeTimeoutMs: number;
  /** How often the server is pinged; a missing pong by the next tick drops the connection. */
  readonly heartbeatIntervalMs: number;
  readonly maxConcurrentProbes: number;
  readonly traceHeaderLines: number;
}

export type AgentConfigFile = Omit<AgentConfig, "city">;

export const CONFIG_FILE_NAME = "netprobe.config.json";

const DEFAULTS: AgentConfigFile = {
  agreementId: "",
  serverUrl: "ws://localhost:8765",
  autostart: true,
  logLevel: "info",
  logFile: "logs.txt",
  reconnectDelayMs: 5000,
  handshakeTimeoutMs: 10000,
  heartbeatIntervalMs: 20000,
  maxConcurrentProbes: 4,
  traceHeaderLines: 3,
};

const configFileSchema = z
  .object({
    agreementId: z.string().trim(),
    serverUrl: z.string().regex(/^wss?:\/\//, "serverUrl must be a ws:// or wss:// URL"),
    autostart: z.boolean(),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    logFile: z.string().min(1).nullable(),
    reconnectDelayMs: z.number().int().min(0),
    handshakeTimeoutMs: z.number().int().min(1),
    heartbeatIntervalMs: z.number().int().min(1),
    maxConcurrentProbes: z.number().int().min(1),
    traceHeaderLines: z.number().int().min(0),
  })
  .partial();

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface LoadConfigOptions {
  readonly configPath?: string;
  readonly localities?: LocalityTable;
}

/**
 * Reads the agent configuration, writing a file with the defaults first when
 * none exists so operators have something to fill in.
 */
export function loadConfig(options: LoadConfigOptions = {}): AgentConfig {
  const filePath = options.configPath ?? resolve(process.cwd(), CONFIG_FILE_NAME);
  const localities = options.localities ?? loadLocalityTable();

  if (!existsSync(filePath)) {
    try {
      writeFileSync(filePath, `${JSON.stringify(DEFAULTS, null, 2)}\n`, "utf-8");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Failed to create config at ${filePath}: ${message}`, filePath);
    }
    return withCity({ ...DEFAULTS }, localities);
  }

  let userConfig: unknown;
  try {
    userConfig = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to load config from ${filePath}: ${message}`, filePath);
  }

  const parsed = configFileSchema.safeParse(userConfig);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid config";
    throw new ConfigError(`Invalid config in ${filePath}: ${detail}`, filePath);
  }

  return withCity({ ...DEFAULTS, ...parsed.data }, localities);
}

function withCity(config: AgentConfigFile, localities: LocalityTable): AgentConfig {
  return { ...config, city: localities.resolve(config.agreementId) };
}

import { readFileSync } from "fs";
import { z } from "zod";
import type { GatewayConfig, GatewaySettings } from "../types/interfaces.js";
import { ConfigError, errorMessage } from "./gateway-errors.js";

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace"]);

const ReconnectSchema = z.object({
  maxAttempts: z.number().int().min(0).default(5),
  initialDelayMs: z.number().int().positive().default(1000),
  maxDelayMs: z.number().int().positive().default(30000),
  backoffMultiplier: z.number().min(1).default(2),
});

const SettingsSchema = z.object({
  handshakeTimeoutMs: z.number().int().positive().default(30000),
  callTimeoutMs: z.number().int().positive().default(60000),
  shutdownGraceMs: z.number().int().min(0).default(5000),
  logLevel: LogLevelSchema.default("info"),
  reconnect: ReconnectSchema.default({}),
});

const ConfigFileSchema = z.object({
  mcpServers: z.record(z.string(), z.unknown()),
  settings: SettingsSchema.default({}),
});

/** Config file `type` values and the transport kind each one selects. */
const TYPE_ALIASES: Record<string, string> = {
  stdio: "process",
  process: "process",
  sse: "stream",
  stream: "stream",
};

export interface LoadedConfig {
  config: GatewayConfig;
  /** Raw server entries in file order, ready for the descriptor store. */
  servers: unknown[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Turn the `mcpServers` object into a descriptor list. Each key becomes the
 * server's name and `type` becomes `kind`; an unknown type is passed through
 * so the descriptor store reports it alongside every other violation.
 */
export function toServerEntries(mcpServers: Record<string, unknown>): unknown[] {
  return Object.entries(mcpServers).map(([name, entry]) => {
    if (!isRecord(entry)) {
      return entry;
    }
    const { type, ...rest } = entry;
    const kind = typeof type === "string" ? (TYPE_ALIASES[type] ?? type) : type;
    return { ...rest, name, kind };
  });
}

/**
 * Loads gateway configuration from a JSON file.
 *
 * @param configPath - Absolute path of the file to read
 * @throws ConfigError if the file is missing, is not JSON, or has invalid settings
 */
export function loadConfig(configPath: string): LoadedConfig {
  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") {
      throw new ConfigError([
        `configuration file not found at: ${configPath}. ` +
          `Create a config.json file, pass --config or set the CONFIG_PATH environment variable.`,
      ]);
    }
    throw new ConfigError([`cannot read ${configPath}: ${errorMessage(error)}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError([`${configPath} is not valid JSON: ${errorMessage(error)}`]);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      }),
    );
  }

  return {
    config: { configPath, settings: parsed.data.settings },
    servers: toServerEntries(parsed.data.mcpServers),
  };
}

function readPositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  violations: string[],
): number | undefined {
  const value = env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    violations.push(`${key} must be a positive integer (got "${value}")`);
    return undefined;
  }
  return parsed;
}

/**
 * Merges environment variables into the settings.
 * Environment variables take precedence over config file values.
 *
 * @throws ConfigError if a variable is set to something unusable
 */
export function mergeEnvConfig(
  config: GatewayConfig,
  env: NodeJS.ProcessEnv = process.env,
): GatewayConfig {
  const violations: string[] = [];
  const settings: GatewaySettings = { ...config.settings };

  settings.handshakeTimeoutMs =
    readPositiveInt(env, "GATEWAY_HANDSHAKE_TIMEOUT_MS", violations) ??
    settings.handshakeTimeoutMs;
  settings.callTimeoutMs =
    readPositiveInt(env, "GATEWAY_CALL_TIMEOUT_MS", violations) ??
    settings.callTimeoutMs;
  settings.shutdownGraceMs =
    readPositiveInt(env, "GATEWAY_SHUTDOWN_GRACE_MS", violations) ??
    settings.shutdownGraceMs;

  if (env.LOG_LEVEL) {
    const level = LogLevelSchema.safeParse(env.LOG_LEVEL);
    if (level.success) {
      settings.logLevel = level.data;
    } else {
      violations.push(
        `LOG_LEVEL must be one of ${LogLevelSchema.options.join(", ")} (got "${env.LOG_LEVEL}")`,
      );
    }
  }

  if (violations.length > 0) {
    throw new ConfigError(violations);
  }

  return { ...config, settings };
}

/**
 * Session configuration
 *
 * Loads toolpipe.yaml and applies TOOLPIPE_* environment overrides.
 */
import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import YAML from "yaml";
import { isPlainObject } from "@toolpipe/types";
import { ConfigError } from "../errors.js";
import type { LogLevel } from "../logging/logger.js";
import { createLogger, isLogLevel } from "../logging/logger.js";
import { DEFAULT_SHUTDOWN_GRACE_PERIOD_MS } from "../process/peer-process.js";
import { resolveRequestTimeoutMs } from "../rpc/request-timeout.js";
import type { AgentSessionOptions, HeartbeatSettings, MetricsSettings } from "../session/agent-session.js";
import { DEFAULT_CLIENT_INFO } from "../session/agent-session.js";
import type { ClientInfo } from "../session/handshake.js";
import { DEFAULT_HEARTBEAT_INTERVAL_MS, DEFAULT_HEARTBEAT_TIMEOUT_MS } from "../session/heartbeat.js";
import { DEFAULT_METRICS_INTERVAL_MS, DEFAULT_METRICS_NOTIFY_METHOD } from "../session/metrics.js";
import { DEFAULT_MAX_FRAME_BYTES } from "../transport/frame-codec.js";

/**
 * Default config file name
 */
export const CONFIG_FILE_NAME = "toolpipe.yaml";

export interface ServerConfig {
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface SessionConfig {
  server: ServerConfig;
  requestTimeoutMs?: number;
  initializeTimeoutMs?: number;
  maxFrameBytes?: number;
  shutdownGracePeriodMs?: number;
  heartbeat?: HeartbeatSettings;
  metrics?: MetricsSettings;
  logLevel?: LogLevel;
  clientInfo?: ClientInfo;
}

/**
 * Environment variable overrides
 */
export interface SessionConfigEnv {
  TOOLPIPE_REQUEST_TIMEOUT_MS?: string;
  TOOLPIPE_LOG_LEVEL?: string;
  TOOLPIPE_HEARTBEAT_INTERVAL_MS?: string;
  TOOLPIPE_METRICS_INTERVAL_MS?: string;
}

export interface LoadSessionConfigOptions {
  /** Override config file path (relative paths resolve against cwd) */
  configPath?: string;
  cwd?: string;
  env?: SessionConfigEnv;
}

type Fields = Record<string, unknown>;

function readOptionalInteger(fields: Fields, key: string, path: string, source: string): number | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`'${path}' must be a positive integer`, { source });
  }

  return value;
}

function readOptionalString(fields: Fields, key: string, path: string, source: string): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== "string") {
    throw new ConfigError(`'${path}' must be a string`, { source });
  }

  return value;
}

function readOptionalBoolean(fields: Fields, key: string, path: string, source: string): boolean | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== "boolean") {
    throw new ConfigError(`'${path}' must be a boolean`, { source });
  }

  return value;
}

function readOptionalSection(fields: Fields, key: string, source: string): Fields | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!isPlainObject(value)) {
    throw new ConfigError(`'${key}' must be a mapping`, { source });
  }

  return value;
}

function parseStringList(value: unknown, path: string, source: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (!Array.isArray(value)) {
    throw new ConfigError(`'${path}' must be a list`, { source });
  }

  return value.map((item, index) => {
    if (typeof item === "string") {
      return item;
    }
    if (typeof item === "number" || typeof item === "boolean") {
      return String(item);
    }
    throw new ConfigError(`'${path}[${index}]' must be a string`, { source });
  });
}

function parseStringMap(value: unknown, path: string, source: string): Record<string, string> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!isPlainObject(value)) {
    throw new ConfigError(`'${path}' must be a mapping`, { source });
  }

  const result: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === "string" || typeof item === "number" || typeof item === "boolean") {
      result[key] = String(item);
      continue;
    }
    throw new ConfigError(`'${path}.${key}' must be a scalar`, { source });
  }

  return result;
}

function parseServer(fields: Fields, source: string): ServerConfig {
  const server = readOptionalSection(fields, "server", source);
  if (server === undefined) {
    throw new ConfigError("'server' section is required", { source });
  }

  const command = readOptionalString(server, "command", "server.command", source);
  if (command === undefined || command.trim().length === 0) {
    throw new ConfigError("'server.command' is required", { source });
  }

  const result: ServerConfig = {
    command,
    args: parseStringList(server["args"], "server.args", source),
  };

  const env = parseStringMap(server["env"], "server.env", source);
  if (env !== undefined) {
    result.env = env;
  }

  const cwd = readOptionalString(server, "cwd", "server.cwd", source);
  if (cwd !== undefined) {
    result.cwd = cwd;
  }

  return result;
}

function parseHeartbeat(fields: Fields, source: string): HeartbeatSettings | undefined {
  const section = readOptionalSection(fields, "heartbeat", source);
  if (section === undefined) {
    return undefined;
  }

  return {
    enabled: readOptionalBoolean(section, "enabled", "heartbeat.enabled", source),
    intervalMs: readOptionalInteger(section, "intervalMs", "heartbeat.intervalMs", source),
    timeoutMs: readOptionalInteger(section, "timeoutMs", "heartbeat.timeoutMs", source),
  };
}

function parseMetrics(fields: Fields, source: string): MetricsSettings | undefined {
  const section = readOptionalSection(fields, "metrics", source);
  if (section === undefined) {
    return undefined;
  }

  const settings: MetricsSettings = {
    enabled: readOptionalBoolean(section, "enabled", "metrics.enabled", source),
    intervalMs: readOptionalInteger(section, "intervalMs", "metrics.intervalMs", source),
  };

  // An explicit null keeps metrics local; an absent key uses the default method.
  if ("notifyMethod" in section) {
    const notifyMethod = section["notifyMethod"];
    if (notifyMethod === null || typeof notifyMethod === "string") {
      settings.notifyMethod = notifyMethod;
    } else {
      throw new ConfigError("'metrics.notifyMethod' must be a string or null", { source });
    }
  }

  return settings;
}

function parseClientInfo(fields: Fields, source: string): ClientInfo | undefined {
  const section = readOptionalSection(fields, "clientInfo", source);
  if (section === undefined) {
    return undefined;
  }

  return {
    name: readOptionalString(section, "name", "clientInfo.name", source) ?? DEFAULT_CLIENT_INFO.name,
    version: readOptionalString(section, "version", "clientInfo.version", source) ?? DEFAULT_CLIENT_INFO.version,
  };
}

/**
 * Parse and validate config file content. Unknown keys are ignored.
 */
export function parseSessionConfig(content: string, source = "<inline>"): SessionConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid YAML: ${detail}`, { source, cause: error });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError("configuration must be a mapping", { source });
  }

  const config: SessionConfig = {
    server: parseServer(parsed, source),
  };

  const requestTimeoutMs = readOptionalInteger(parsed, "requestTimeoutMs", "requestTimeoutMs", source);
  if (requestTimeoutMs !== undefined) config.requestTimeoutMs = requestTimeoutMs;

  const initializeTimeoutMs = readOptionalInteger(parsed, "initializeTimeoutMs", "initializeTimeoutMs", source);
  if (initializeTimeoutMs !== undefined) config.initializeTimeoutMs = initializeTimeoutMs;

  const maxFrameBytes = readOptionalInteger(parsed, "maxFrameBytes", "maxFrameBytes", source);
  if (maxFrameBytes !== undefined) config.maxFrameBytes = maxFrameBytes;

  const shutdownGracePeriodMs = readOptionalInteger(parsed, "shutdownGracePeriodMs", "shutdownGracePeriodMs", source);
  if (shutdownGracePeriodMs !== undefined) config.shutdownGracePeriodMs = shutdownGracePeriodMs;

  const heartbeat = parseHeartbeat(parsed, source);
  if (heartbeat !== undefined) config.heartbeat = heartbeat;

  const metrics = parseMetrics(parsed, source);
  if (metrics !== undefined) config.metrics = metrics;

  const logLevel = parsed["logLevel"];
  if (logLevel !== undefined && logLevel !== null) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError("'logLevel' must be one of debug, info, warn, error", { source });
    }
    config.logLevel = logLevel;
  }

  const clientInfo = parseClientInfo(parsed, source);
  if (clientInfo !== undefined) config.clientInfo = clientInfo;

  return config;
}

function parseEnvInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer`, { source: "environment" });
  }

  return parsed;
}

/**
 * Apply environment variable overrides. Environment wins over the file.
 */
export function applyEnvOverrides(config: SessionConfig, env: SessionConfigEnv): SessionConfig {
  const result: SessionConfig = { ...config, server: { ...config.server } };
  if (config.heartbeat !== undefined) {
    result.heartbeat = { ...config.heartbeat };
  }
  if (config.metrics !== undefined) {
    result.metrics = { ...config.metrics };
  }

  const requestTimeoutMs = parseEnvInteger("TOOLPIPE_REQUEST_TIMEOUT_MS", env.TOOLPIPE_REQUEST_TIMEOUT_MS);
  if (requestTimeoutMs !== undefined) {
    result.requestTimeoutMs = requestTimeoutMs;
  }

  const heartbeatIntervalMs = parseEnvInteger("TOOLPIPE_HEARTBEAT_INTERVAL_MS", env.TOOLPIPE_HEARTBEAT_INTERVAL_MS);
  if (heartbeatIntervalMs !== undefined) {
    result.heartbeat = { ...result.heartbeat, intervalMs: heartbeatIntervalMs };
  }

  const metricsIntervalMs = parseEnvInteger("TOOLPIPE_METRICS_INTERVAL_MS", env.TOOLPIPE_METRICS_INTERVAL_MS);
  if (metricsIntervalMs !== undefined) {
    result.metrics = { ...result.metrics, intervalMs: metricsIntervalMs };
  }

  const logLevel = env.TOOLPIPE_LOG_LEVEL;
  if (logLevel !== undefined && logLevel.trim() !== "") {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError("TOOLPIPE_LOG_LEVEL must be one of debug, info, warn, error", {
        source: "environment",
      });
    }
    result.logLevel = logLevel;
  }

  return result;
}

/**
 * Load configuration
 *
 * Priority (highest to lowest):
 * 1. Environment variables (TOOLPIPE_*)
 * 2. Config file
 * 3. Defaults (filled in by toSessionOptions)
 */
export async function loadSessionConfig(options: LoadSessionConfigOptions = {}): Promise<SessionConfig> {
  const cwd = options.cwd ?? process.cwd();
  const filePath = resolve(cwd, options.configPath ?? CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (err !== null && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      throw new ConfigError("config file not found", {
        source: filePath,
        cause: err,
        suggestion: `Create ${CONFIG_FILE_NAME} or pass configPath.`,
      });
    }
    throw err;
  }

  const config = parseSessionConfig(content, filePath);
  const serverCwd = config.server.cwd;
  if (serverCwd !== undefined && !isAbsolute(serverCwd)) {
    config.server.cwd = resolve(dirname(filePath), serverCwd);
  }

  return applyEnvOverrides(config, options.env ?? {});
}

/**
 * Build AgentSession options with every default filled in.
 * `overrides` take precedence (spawner, sinks, timers, logger).
 */
export function toSessionOptions(
  config: SessionConfig,
  overrides: Partial<AgentSessionOptions> = {},
): AgentSessionOptions {
  const requestTimeoutMs = resolveRequestTimeoutMs(config.requestTimeoutMs);
  const heartbeat = config.heartbeat ?? {};
  const metrics = config.metrics ?? {};

  const base: AgentSessionOptions = {
    command: config.server.command,
    args: [...config.server.args],
    clientInfo: config.clientInfo ?? { ...DEFAULT_CLIENT_INFO },
    requestTimeoutMs,
    initializeTimeoutMs: resolveRequestTimeoutMs(config.initializeTimeoutMs, requestTimeoutMs),
    maxFrameBytes: config.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
    shutdownGracePeriodMs: config.shutdownGracePeriodMs ?? DEFAULT_SHUTDOWN_GRACE_PERIOD_MS,
    heartbeat: {
      enabled: heartbeat.enabled ?? true,
      intervalMs: heartbeat.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
      timeoutMs: heartbeat.timeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS,
    },
    metrics: {
      enabled: metrics.enabled ?? true,
      intervalMs: metrics.intervalMs ?? DEFAULT_METRICS_INTERVAL_MS,
      notifyMethod: metrics.notifyMethod === undefined ? DEFAULT_METRICS_NOTIFY_METHOD : metrics.notifyMethod,
    },
    logger: createLogger({ level: config.logLevel ?? "info" }),
  };

  if (config.server.env !== undefined) {
    base.env = { ...config.server.env };
  }
  if (config.server.cwd !== undefined) {
    base.cwd = config.server.cwd;
  }

  return { ...base, ...overrides };
}

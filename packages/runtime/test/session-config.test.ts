import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError } from "../src/errors.js";
import {
  applyEnvOverrides,
  CONFIG_FILE_NAME,
  loadSessionConfig,
  parseSessionConfig,
  toSessionOptions,
} from "../src/config/session-config.js";
import { FakePeerSpawner } from "./helpers.js";

const tempDirs: string[] = [];

async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "toolpipe-config-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("parseSessionConfig", () => {
  it("parses a full configuration", () => {
    const config = parseSessionConfig(`
server:
  command: node
  args: [server.js, --port, 0]
  env:
    API_KEY: test-secret
    VERBOSE: true
  cwd: /srv/tools
requestTimeoutMs: 15000
initializeTimeoutMs: 5000
maxFrameBytes: 65536
shutdownGracePeriodMs: 500
heartbeat:
  enabled: false
metrics:
  intervalMs: 30000
  notifyMethod: null
logLevel: debug
clientInfo:
  name: my-agent
`);

    expect(config).toEqual({
      server: {
        command: "node",
        args: ["server.js", "--port", "0"],
        env: { API_KEY: "test-secret", VERBOSE: "true" },
        cwd: "/srv/tools",
      },
      requestTimeoutMs: 15_000,
      initializeTimeoutMs: 5_000,
      maxFrameBytes: 65_536,
      shutdownGracePeriodMs: 500,
      heartbeat: { enabled: false, intervalMs: undefined, timeoutMs: undefined },
      metrics: { enabled: undefined, intervalMs: 30_000, notifyMethod: null },
      logLevel: "debug",
      clientInfo: { name: "my-agent", version: "0.1.0" },
    });
  });

  it("keeps the default notify method when the key is absent", () => {
    const config = parseSessionConfig("server:\n  command: tool-server\nmetrics:\n  enabled: true\n");

    expect(config.metrics).toEqual({ enabled: true, intervalMs: undefined });
    expect(config.server).toEqual({ command: "tool-server", args: [] });
  });

  it("reports invalid YAML as ConfigError", () => {
    expect(() => parseSessionConfig("server: [unclosed", "broken.yaml")).toThrow(ConfigError);
    expect(() => parseSessionConfig("server: [unclosed", "broken.yaml")).toThrow(/^invalid YAML: /);
  });

  it.each([
    ["- just\n- a list\n", "configuration must be a mapping (<inline>)"],
    ["requestTimeoutMs: 10\n", "'server' section is required (<inline>)"],
    ["server:\n  args: []\n", "'server.command' is required (<inline>)"],
    ["server:\n  command: x\nrequestTimeoutMs: -5\n", "'requestTimeoutMs' must be a positive integer (<inline>)"],
    ["server:\n  command: x\n  args: nope\n", "'server.args' must be a list (<inline>)"],
    ["server:\n  command: x\nheartbeat:\n  enabled: yes please\n", "'heartbeat.enabled' must be a boolean (<inline>)"],
    ["server:\n  command: x\nmetrics:\n  notifyMethod: 5\n", "'metrics.notifyMethod' must be a string or null (<inline>)"],
    ["server:\n  command: x\nlogLevel: verbose\n", "'logLevel' must be one of debug, info, warn, error (<inline>)"],
  ])("rejects %j", (content, message) => {
    expect(() => parseSessionConfig(content)).toThrow(message);
  });
});

describe("applyEnvOverrides", () => {
  it("환경 변수가 파일 설정보다 우선한다", () => {
    const base = parseSessionConfig("server:\n  command: x\nrequestTimeoutMs: 1000\nlogLevel: info\n");

    const result = applyEnvOverrides(base, {
      TOOLPIPE_REQUEST_TIMEOUT_MS: "2500",
      TOOLPIPE_LOG_LEVEL: "warn",
      TOOLPIPE_HEARTBEAT_INTERVAL_MS: "750",
      TOOLPIPE_METRICS_INTERVAL_MS: "",
    });

    expect(result.requestTimeoutMs).toBe(2_500);
    expect(result.logLevel).toBe("warn");
    expect(result.heartbeat).toEqual({ intervalMs: 750 });
    expect(result.metrics).toBeUndefined();
    expect(base.requestTimeoutMs).toBe(1_000);
  });

  it("rejects malformed values", () => {
    const base = parseSessionConfig("server:\n  command: x\n");

    expect(() => applyEnvOverrides(base, { TOOLPIPE_REQUEST_TIMEOUT_MS: "soon" })).toThrow(
      "TOOLPIPE_REQUEST_TIMEOUT_MS must be a positive integer (environment)",
    );
    expect(() => applyEnvOverrides(base, { TOOLPIPE_LOG_LEVEL: "loud" })).toThrow(
      "TOOLPIPE_LOG_LEVEL must be one of debug, info, warn, error (environment)",
    );
  });
});

describe("loadSessionConfig", () => {
  it("reads the config file and resolves a relative server cwd against it", async () => {
    const dir = await createTempDir();
    await writeFile(
      path.join(dir, CONFIG_FILE_NAME),
      "server:\n  command: ./bin/server\n  cwd: tools\nrequestTimeoutMs: 3000\n",
      "utf-8",
    );

    const config = await loadSessionConfig({ cwd: dir, env: { TOOLPIPE_LOG_LEVEL: "error" } });

    expect(config.server.cwd).toBe(path.join(dir, "tools"));
    expect(config.requestTimeoutMs).toBe(3_000);
    expect(config.logLevel).toBe("error");
  });

  it("reports a missing file with its path", async () => {
    const dir = await createTempDir();
    const expectedPath = path.join(dir, "custom.yaml");

    const error = await loadSessionConfig({ cwd: dir, configPath: "custom.yaml" }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.message).toBe(`config file not found (${expectedPath})`);
      expect(error.source).toBe(expectedPath);
    }
  });
});

describe("toSessionOptions", () => {
  it("fills every default", () => {
    const options = toSessionOptions(parseSessionConfig("server:\n  command: tool-server\n"));

    expect(options).toMatchObject({
      command: "tool-server",
      args: [],
      clientInfo: { name: "toolpipe", version: "0.1.0" },
      requestTimeoutMs: 60_000,
      initializeTimeoutMs: 60_000,
      maxFrameBytes: 4 * 1024 * 1024,
      shutdownGracePeriodMs: 2_000,
      heartbeat: { enabled: true, intervalMs: 5_000, timeoutMs: 5_000 },
      metrics: { enabled: true, intervalMs: 10_000, notifyMethod: "notifications/metrics" },
    });
    expect(options.env).toBeUndefined();
    expect(options.logger?.level).toBe("info");
  });

  it("carries file values and lets overrides win", () => {
    const spawner = new FakePeerSpawner();
    const config = parseSessionConfig(
      "server:\n  command: tool-server\n  env:\n    MODE: test\nrequestTimeoutMs: 8000\nmetrics:\n  notifyMethod: null\nlogLevel: debug\n",
    );

    const options = toSessionOptions(config, { spawner, shutdownGracePeriodMs: 10 });

    expect(options.env).toEqual({ MODE: "test" });
    expect(options.initializeTimeoutMs).toBe(8_000);
    expect(options.metrics?.notifyMethod).toBeNull();
    expect(options.logger?.level).toBe("debug");
    expect(options.spawner).toBe(spawner);
    expect(options.shutdownGracePeriodMs).toBe(10);
  });
});

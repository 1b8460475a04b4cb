import type { JsonObject, JsonRpcParams, JsonValue, ToolDescriptor } from "@toolpipe/types";
import { isJsonObject, isPlainObject, parseToolListPage } from "@toolpipe/types";
import { InitializationError, unknownToErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import type { RequestOptions } from "../rpc/request-multiplexer.js";

export const PROTOCOL_VERSION = "2024-11-05";

export const INITIALIZED_NOTIFICATION = "notifications/initialized";

/** Upper bound on `tools/list` pages followed during one discovery */
export const MAX_TOOL_PAGES = 100;

export interface ClientInfo {
  name: string;
  version: string;
}

/**
 * The part of the multiplexer the handshake needs.
 */
export interface RpcChannel {
  send(method: string, params?: JsonRpcParams, options?: RequestOptions): Promise<JsonValue>;
  notify(method: string, params?: JsonRpcParams): Promise<void>;
}

export interface HandshakeResult {
  protocolVersion?: string;
  serverInfo?: JsonObject;
  capabilities?: JsonObject;
  tools: ToolDescriptor[];
}

export interface HandshakeOptions {
  channel: RpcChannel;
  clientInfo: ClientInfo;
  initializeTimeoutMs?: number;
  requestTimeoutMs?: number;
  logger?: Logger;
}

export interface DiscoverToolsOptions {
  timeoutMs?: number;
  maxPages?: number;
}

/**
 * Collects the peer's tool catalog, following `nextCursor` until the last page.
 * Order is preserved across pages.
 */
export async function discoverTools(channel: RpcChannel, options: DiscoverToolsOptions = {}): Promise<ToolDescriptor[]> {
  const maxPages = options.maxPages ?? MAX_TOOL_PAGES;
  const tools: ToolDescriptor[] = [];
  const seenCursors = new Set<string>();
  let cursor: string | undefined;

  for (let pageIndex = 0; pageIndex < maxPages; pageIndex += 1) {
    const params: JsonObject | undefined = cursor === undefined ? undefined : { cursor };
    const result = await channel.send("tools/list", params, { timeoutMs: options.timeoutMs });
    const page = parseToolListPage(result);
    if (page === undefined) {
      throw new Error("tools/list result has no 'tools' array");
    }

    tools.push(...page.tools);

    if (page.nextCursor === undefined) {
      return tools;
    }

    if (seenCursors.has(page.nextCursor)) {
      throw new Error(`tools/list repeated cursor '${page.nextCursor}'`);
    }
    seenCursors.add(page.nextCursor);
    cursor = page.nextCursor;
  }

  throw new Error(`tools/list did not finish within ${maxPages} pages`);
}

/**
 * initialize -> notifications/initialized -> tools/list.
 * Every failure is reported as InitializationError with the original error as cause.
 */
export class HandshakeCoordinator {
  private readonly channel: RpcChannel;
  private readonly clientInfo: ClientInfo;
  private readonly initializeTimeoutMs?: number;
  private readonly requestTimeoutMs?: number;
  private readonly logger: Logger;

  constructor(options: HandshakeOptions) {
    this.channel = options.channel;
    this.clientInfo = options.clientInfo;
    this.initializeTimeoutMs = options.initializeTimeoutMs ?? options.requestTimeoutMs;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.logger = options.logger ?? createSilentLogger();
  }

  async run(): Promise<HandshakeResult> {
    const initResult = await this.step("initialize", () =>
      this.channel.send(
        "initialize",
        {
          protocolVersion: PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: {
            name: this.clientInfo.name,
            version: this.clientInfo.version,
          },
        },
        { timeoutMs: this.initializeTimeoutMs },
      ),
    );

    if (!isPlainObject(initResult)) {
      throw new InitializationError("initialize result is not an object", {
        suggestion: "Check that the command starts a JSON-RPC tool server on stdio.",
      });
    }

    await this.step(INITIALIZED_NOTIFICATION, () => this.channel.notify(INITIALIZED_NOTIFICATION));

    const tools = await this.step("tools/list", () =>
      discoverTools(this.channel, { timeoutMs: this.requestTimeoutMs }),
    );

    const result: HandshakeResult = { tools };

    const protocolVersion = initResult["protocolVersion"];
    if (typeof protocolVersion === "string") {
      result.protocolVersion = protocolVersion;
      if (protocolVersion !== PROTOCOL_VERSION) {
        this.logger.info(`peer negotiated protocol version ${protocolVersion}`);
      }
    }

    const serverInfo = initResult["serverInfo"];
    if (isJsonObject(serverInfo)) {
      result.serverInfo = serverInfo;
    }

    const capabilities = initResult["capabilities"];
    if (isJsonObject(capabilities)) {
      result.capabilities = capabilities;
    }

    this.logger.debug("handshake completed", { toolCount: tools.length });
    return result;
  }

  private async step<T>(label: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw new InitializationError(`handshake step '${label}' failed: ${unknownToErrorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

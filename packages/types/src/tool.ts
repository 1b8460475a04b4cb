import type { JsonObject, JsonValue } from "./json.js";
import { isJsonObject, isPlainObject } from "./json.js";

/**
 * A tool advertised by the peer. `inputSchema` is passed through untouched.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JsonObject;
}

export type ToolCatalog = readonly ToolDescriptor[];

/** `tools/call` params; a type literal so it fits `JsonRpcParams` */
export type ToolCallParams = {
  name: string;
  arguments: JsonObject;
};

export interface ToolListPage {
  readonly tools: ToolDescriptor[];
  readonly nextCursor?: string;
}

const DEFAULT_INPUT_SCHEMA: JsonObject = { type: "object" };

export function parseToolDescriptor(value: unknown): ToolDescriptor | undefined {
  if (!isPlainObject(value)) {
    return undefined;
  }

  const nameValue = value["name"];
  if (typeof nameValue !== "string" || nameValue.length === 0) {
    return undefined;
  }

  const descriptionValue = value["description"];
  const schemaValue = value["inputSchema"];

  return {
    name: nameValue,
    description: typeof descriptionValue === "string" ? descriptionValue : "",
    inputSchema: isJsonObject(schemaValue) ? schemaValue : { ...DEFAULT_INPUT_SCHEMA },
  };
}

/**
 * Reads one `tools/list` result page. Entries without a usable name are skipped.
 */
export function parseToolListPage(result: JsonValue): ToolListPage | undefined {
  if (!isPlainObject(result)) {
    return undefined;
  }

  const toolsValue = result["tools"];
  if (!Array.isArray(toolsValue)) {
    return undefined;
  }

  const tools: ToolDescriptor[] = [];
  for (const item of toolsValue) {
    const descriptor = parseToolDescriptor(item);
    if (descriptor !== undefined) {
      tools.push(descriptor);
    }
  }

  const cursorValue = result["nextCursor"];
  if (typeof cursorValue === "string" && cursorValue.length > 0) {
    return { tools, nextCursor: cursorValue };
  }

  return { tools };
}

import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { PROTOCOL_VERSION, SERVER_NAME, SERVER_TITLE, SERVER_VERSION } from "./config";
import {
  MissingParameterError,
  MissingRequiredFieldError,
  UnknownMethodError,
  UnknownToolError,
  ValidationError,
  toError,
} from "./errors";
import { describeTools, JsonObject, ParameterMap, ToolDefinition, toolCallHandlers } from "./tools";
import { CommandRunner } from "./utils/talosctl";

export const NOTIFICATION_PREFIX = "notifications/";

export type RpcResult = Record<string, unknown>;

export type DispatchOutcome =
  | { kind: "notify" }
  | { kind: "reply"; result: RpcResult }
  | { kind: "fail"; error: Error };

type ProtocolHandler = (params: ParameterMap) => Promise<RpcResult>;

const INITIALIZE_FIELDS = ["capabilities", "clientInfo", "protocolVersion"];

export function toParameterMap(params: unknown): ParameterMap {
  if (params === null || typeof params !== "object" || Array.isArray(params)) {
    return {};
  }
  return { ...params };
}

/**
 * Resolves a JSON-RPC method to a result. Handshake verbs are tried first, then
 * notifications, then the tool handlers; a tool name can be called directly or
 * through `tools/call`.
 */
export class Dispatcher {
  private readonly protocolHandlers: Map<string, ProtocolHandler>;

  constructor(
    private readonly talosctl: CommandRunner,
    private readonly tools: Map<string, ToolDefinition> = toolCallHandlers,
  ) {
    this.protocolHandlers = new Map<string, ProtocolHandler>([
      ["initialize", async (params) => this.initialize(params)],
      ["ping", async () => ({})],
      ["tools/list", async () => ({ tools: describeTools() })],
      ["tools/call", (params) => this.callTool(params)],
    ]);
  }

  async dispatch(method: string, params: unknown): Promise<DispatchOutcome> {
    const paramsMap = toParameterMap(params);
    try {
      const protocolHandler = this.protocolHandlers.get(method);
      if (protocolHandler) {
        return { kind: "reply", result: await protocolHandler(paramsMap) };
      }

      if (method.startsWith(NOTIFICATION_PREFIX)) {
        return { kind: "notify" };
      }

      const tool = this.tools.get(method);
      if (!tool) {
        throw new UnknownMethodError(method);
      }
      return { kind: "reply", result: await this.invoke(tool, paramsMap) };
    } catch (err) {
      return { kind: "fail", error: toError(err) };
    }
  }

  async callTool(params: ParameterMap): Promise<CallToolResult> {
    const name = params.name;
    if (name === undefined) {
      throw new MissingParameterError("name");
    }
    if (typeof name !== "string") {
      throw new ValidationError("Invalid name param: expected a string", { field: "name" });
    }

    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }

    const result = await this.invoke(tool, toParameterMap(params.arguments));
    return {
      content: [{
        type: "text",
        text: JSON.stringify(result, null, 2),
      }],
    };
  }

  private async invoke(tool: ToolDefinition, args: ParameterMap): Promise<JsonObject> {
    try {
      return await tool.invoke(args, this.talosctl);
    } catch (err) {
      const error = toError(err);
      console.warn(`tool ${tool.name} failed: ${error.message}`);
      throw error;
    }
  }

  private initialize(params: ParameterMap): JsonObject {
    const missing = INITIALIZE_FIELDS.filter((field) => params[field] === undefined);
    if (missing.length > 0) {
      throw new MissingRequiredFieldError(
        missing,
        "Missing required initialize parameters: capabilities, clientInfo, and protocolVersion are required",
      );
    }

    return {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {
        tools: {
          listChanged: true,
        },
      },
      serverInfo: {
        name: SERVER_NAME,
        title: SERVER_TITLE,
        version: SERVER_VERSION,
      },
    };
  }
}

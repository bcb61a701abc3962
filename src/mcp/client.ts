import { ProtocolError, PROTOCOL_CODES } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { failureToError } from "./failures.js";
import {
  ListToolsResultSchema,
  MCP_PROTOCOL_VERSION,
  type CallOptions,
  type InvocationStyle,
  type JsonRpcParams,
  type McpClient,
  type McpTool,
  type RpcResponse,
  type RpcTransport,
} from "./types.js";

export const CLIENT_INFO = { name: "mcp-graphql-ask", version: "0.1.0" } as const;

// Servers that keep returning a cursor should not keep us paging forever
const MAX_TOOL_PAGES = 20;

export type McpClientOptions = {
  invocationStyle?: InvocationStyle;
  logger?: Logger;
};

/**
 * MCP operations on top of any JSON-RPC transport. Transport failures stay
 * values for `callTool`; `listTools` is a startup call and throws instead.
 */
export class JsonRpcMcpClient implements McpClient {
  private readonly style: InvocationStyle;
  private readonly log: Logger;

  constructor(
    private readonly transport: RpcTransport,
    options: McpClientOptions = {},
  ) {
    this.style = options.invocationStyle ?? "direct";
    this.log = options.logger ?? createLogger("mcp-client");
  }

  /** The handshake: `initialize`, then `notifications/initialized` once the server has answered. */
  async initialize(options?: CallOptions): Promise<RpcResponse> {
    const res = await this.transport.call(
      "initialize",
      {
        protocolVersion: MCP_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { ...CLIENT_INFO },
      },
      options,
    );
    if (!res.ok || !this.transport.notify) return res;

    const ack = await this.transport.notify("notifications/initialized", {}, options);
    if (!ack.ok) this.log.warn(`notifications/initialized was not accepted: ${ack.message}`);
    return res;
  }

  async listTools(options?: CallOptions): Promise<McpTool[]> {
    const tools: McpTool[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < MAX_TOOL_PAGES; page++) {
      const res = await this.transport.call("tools/list", cursor ? { cursor } : {}, options);
      if (!res.ok) throw failureToError(res);

      const parsed = ListToolsResultSchema.safeParse(res.result);
      if (!parsed.success) {
        throw new ProtocolError(
          `tools/list returned an unexpected payload: ${parsed.error.issues[0]?.message ?? "invalid"}`,
          PROTOCOL_CODES.UNEXPECTED_RESULT,
        );
      }

      tools.push(...parsed.data.tools);
      this.log.debug(`tools/list page ${page + 1}: ${parsed.data.tools.length} tool(s)`);

      const next = parsed.data.nextCursor ?? undefined;
      if (!next) return tools;
      cursor = next;
    }

    this.log.warn(`tools/list still paging after ${MAX_TOOL_PAGES} pages; using what was received`);
    return tools;
  }

  async callTool(name: string, args: JsonRpcParams, options?: CallOptions): Promise<RpcResponse> {
    if (this.style === "tools-call") {
      return this.transport.call("tools/call", { name, arguments: args }, options);
    }
    return this.transport.call(name, args, options);
  }
}

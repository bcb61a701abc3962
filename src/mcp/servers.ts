import type { McpServerConfig } from "../env.js";
import { ConfigError, RoutingError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { ToolRegistry } from "../tools/registry.js";
import { JsonRpcMcpClient } from "./client.js";
import { HttpRpcTransport } from "./httpTransport.js";
import type { CallOptions, InvocationStyle, JsonRpcParams, McpClient, RpcResponse } from "./types.js";

/** One configured MCP server and the client that talks to it. */
export type McpServerBinding = {
  readonly name: string;
  readonly description: string;
  readonly client: McpClient;
};

export type ConnectOptions = {
  timeoutMs?: number;
  invocationStyle?: InvocationStyle;
  fetch?: typeof fetch;
};

/** Builds a transport and client per server; nothing is sent yet. */
export function connectServers(configs: readonly McpServerConfig[], options: ConnectOptions = {}): McpServerBinding[] {
  return configs.map((server) => {
    const transport = new HttpRpcTransport({
      url: server.url,
      authToken: server.authToken,
      headers: server.headers,
      timeoutMs: options.timeoutMs,
      fetch: options.fetch,
      logger: createLogger(`mcp-http:${server.name}`),
    });
    const client = new JsonRpcMcpClient(transport, {
      invocationStyle: options.invocationStyle,
      logger: createLogger(`mcp-client:${server.name}`),
    });
    return { name: server.name, description: server.description, client };
  });
}

/**
 * Sends each tool call to the server that owns the tool. Tools without a
 * server belong to the first one configured.
 */
export class McpServerPool implements Pick<McpClient, "callTool"> {
  private readonly clients: ReadonlyMap<string, McpClient>;
  private readonly owners: ReadonlyMap<string, string>;
  private readonly log: Logger;

  constructor(bindings: readonly McpServerBinding[], registry: ToolRegistry, logger?: Logger) {
    const first = bindings[0];
    if (!first) throw new ConfigError("No MCP server configured");

    const clients = new Map<string, McpClient>();
    for (const b of bindings) {
      if (clients.has(b.name)) throw new ConfigError(`MCP server configured twice: ${b.name}`);
      clients.set(b.name, b.client);
    }

    const owners = new Map<string, string>();
    for (const tool of registry.listTools()) {
      const server = tool.server ?? first.name;
      if (!clients.has(server)) {
        throw new ConfigError(`Tool ${tool.name} belongs to unknown MCP server "${server}"`);
      }
      owners.set(tool.name, server);
    }

    this.clients = clients;
    this.owners = owners;
    this.log = logger ?? createLogger("mcp-pool");
  }

  serverFor(toolName: string): string | undefined {
    return this.owners.get(toolName);
  }

  async callTool(name: string, args: JsonRpcParams, options?: CallOptions): Promise<RpcResponse> {
    const server = this.owners.get(name);
    const client = server === undefined ? undefined : this.clients.get(server);
    if (!client) throw new RoutingError(`Unknown tool: ${name}`, "UNKNOWN_TOOL", { tool: name });

    this.log.debug(`${name} -> ${server}`);
    return client.callTool(name, args, options);
  }
}

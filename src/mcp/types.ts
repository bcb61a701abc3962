import { z } from "zod";

export const JSONRPC_VERSION = "2.0";
export const MCP_PROTOCOL_VERSION = "2025-06-18";

export type RequestId = number | string;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonRpcParams = Record<string, unknown>;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id: RequestId;
  method: string;
  params: JsonRpcParams;
};

export type RpcSuccess = {
  ok: true;
  id: RequestId;
  result: unknown;
};

export type RpcFailureKind = "transport" | "protocol" | "application";

export type RpcFailure = {
  ok: false;
  id: RequestId;
  kind: RpcFailureKind;
  code: number;
  message: string;
  data?: unknown;
  /** HTTP status, when the failure came from a non-2xx reply */
  status?: number;
};

export type RpcResponse = RpcSuccess | RpcFailure;

/** Outcome of a notification, which has no id to correlate */
export type NotifyResponse = { ok: true } | Omit<RpcFailure, "id">;

export type CallOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

/** Anything that can put a JSON-RPC request on the wire and hand back a correlated response. */
export interface RpcTransport {
  call(method: string, params?: JsonRpcParams, options?: CallOptions): Promise<RpcResponse>;
  notify?(method: string, params?: JsonRpcParams, options?: CallOptions): Promise<NotifyResponse>;
}

const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcEnvelopeSchema = z
  .object({
    jsonrpc: z.string(),
    id: z.union([z.number(), z.string(), z.null()]),
    result: z.unknown().optional(),
    error: JsonRpcErrorSchema.optional(),
  })
  .refine((e) => "result" in e || e.error !== undefined, {
    message: "response carries neither result nor error",
  });

export type JsonRpcEnvelope = z.infer<typeof JsonRpcEnvelopeSchema>;

// ---- MCP payloads ----

export const McpToolSchema = z.object({
  name: z.string().min(1),
  title: z.string().nullish(),
  description: z.string().nullish(),
  inputSchema: z.record(z.unknown()).default({}),
});

export type McpTool = z.infer<typeof McpToolSchema>;

export const ListToolsResultSchema = z.object({
  tools: z.array(McpToolSchema).default([]),
  nextCursor: z.string().nullish(),
});

const McpContentSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const CallToolResultSchema = z.object({
  content: z.array(McpContentSchema).default([]),
  structuredContent: z.unknown().optional(),
  isError: z.boolean().nullish(),
});

export type CallToolResult = z.infer<typeof CallToolResultSchema>;

export type InvocationStyle = "direct" | "tools-call";

export interface McpClient {
  initialize(options?: CallOptions): Promise<RpcResponse>;
  listTools(options?: CallOptions): Promise<McpTool[]>;
  callTool(name: string, args: JsonRpcParams, options?: CallOptions): Promise<RpcResponse>;
}

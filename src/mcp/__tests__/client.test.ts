import { describe, expect, it, vi } from "vitest";

import { ApplicationError, PROTOCOL_CODES, ProtocolError } from "../../errors.js";
import { silentLogger } from "../../__tests__/fakes.js";
import { CLIENT_INFO, JsonRpcMcpClient } from "../client.js";
import { HttpRpcTransport } from "../httpTransport.js";
import { createIdGenerator } from "../ids.js";
import { MCP_PROTOCOL_VERSION, type RpcResponse, type RpcTransport } from "../types.js";

type Call = Parameters<RpcTransport["call"]>;

function fakeTransport(reply: (method: string, params: Record<string, unknown>) => RpcResponse) {
  const calls: Call[] = [];
  const transport: RpcTransport = {
    call: vi.fn(async (...args: Call) => {
      calls.push(args);
      return reply(args[0], args[1] ?? {});
    }),
  };
  return { transport, calls };
}

describe("JsonRpcMcpClient", () => {
  it("initializes with the protocol version and client info", async () => {
    const { transport, calls } = fakeTransport(() => ({ ok: true, id: 1, result: {} }));

    await new JsonRpcMcpClient(transport, { logger: silentLogger }).initialize();

    expect(calls[0][0]).toBe("initialize");
    expect(calls[0][1]).toEqual({
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: CLIENT_INFO.name, version: CLIENT_INFO.version },
    });
  });

  it("completes the handshake against a session-keeping HTTP server", async () => {
    const seen: Array<{ method: string; session: string | null; accept: string | null }> = [];
    const fetchImpl = vi.fn<typeof fetch>(async (_input, init) => {
      const headers = new Headers(init?.headers);
      const msg: { id?: number; method: string } = JSON.parse(String(init?.body));
      const session = headers.get("mcp-session-id");
      seen.push({ method: msg.method, session, accept: headers.get("accept") });

      if (msg.method === "initialize") {
        const result = { protocolVersion: MCP_PROTOCOL_VERSION, capabilities: {}, serverInfo: { name: "fake" } };
        return new Response(JSON.stringify({ jsonrpc: "2.0", id: msg.id, result }), {
          headers: { "content-type": "application/json", "mcp-session-id": "s-1" },
        });
      }
      if (session !== "s-1") return new Response("Bad Request: missing session", { status: 400 });
      if (msg.id === undefined) return new Response(null, { status: 202 });
      const result = { tools: [{ name: "list_alphas", inputSchema: {} }] };
      return new Response(JSON.stringify({ jsonrpc: "2.0", id: msg.id, result }), {
        headers: { "content-type": "application/json" },
      });
    });
    const transport = new HttpRpcTransport({
      url: "http://mcp.test/mcp",
      fetch: fetchImpl,
      nextId: createIdGenerator(1),
      logger: silentLogger,
    });
    const client = new JsonRpcMcpClient(transport, { logger: silentLogger });

    const init = await client.initialize();
    const tools = await client.listTools();

    expect(init.ok).toBe(true);
    expect(tools.map((t) => t.name)).toEqual(["list_alphas"]);
    expect(seen).toEqual([
      { method: "initialize", session: null, accept: "application/json, text/event-stream" },
      { method: "notifications/initialized", session: "s-1", accept: "application/json, text/event-stream" },
      { method: "tools/list", session: "s-1", accept: "application/json, text/event-stream" },
    ]);
  });

  it("skips the initialized notification when initialize fails", async () => {
    const notify = vi.fn(async () => ({ ok: true as const }));
    const transport: RpcTransport = {
      call: async () => ({ ok: false, id: 1, kind: "application", code: -32602, message: "bad version" }),
      notify,
    };

    const res = await new JsonRpcMcpClient(transport, { logger: silentLogger }).initialize();

    expect(res.ok).toBe(false);
    expect(notify).not.toHaveBeenCalled();
  });

  it("follows nextCursor until the server stops paging", async () => {
    const { transport, calls } = fakeTransport((_method, params) =>
      params.cursor === "p2"
        ? { ok: true, id: 2, result: { tools: [{ name: "get_weather", inputSchema: {} }] } }
        : { ok: true, id: 1, result: { tools: [{ name: "list_alphas", description: "List alphas" }], nextCursor: "p2" } },
    );

    const tools = await new JsonRpcMcpClient(transport, { logger: silentLogger }).listTools();

    expect(tools.map((t) => t.name)).toEqual(["list_alphas", "get_weather"]);
    expect(tools[0].inputSchema).toEqual({});
    expect(calls.map((c) => c[1])).toEqual([{}, { cursor: "p2" }]);
  });

  it("stops after a bounded number of pages", async () => {
    const { transport, calls } = fakeTransport(() => ({
      ok: true,
      id: 1,
      result: { tools: [{ name: "t" }], nextCursor: "again" },
    }));

    const tools = await new JsonRpcMcpClient(transport, { logger: silentLogger }).listTools();

    expect(calls).toHaveLength(20);
    expect(tools).toHaveLength(20);
  });

  it("throws the lifted failure when tools/list fails", async () => {
    const { transport } = fakeTransport(() => ({
      ok: false,
      id: 1,
      kind: "application",
      code: -32601,
      message: "Method not found",
    }));

    await expect(new JsonRpcMcpClient(transport, { logger: silentLogger }).listTools()).rejects.toBeInstanceOf(
      ApplicationError,
    );
  });

  it("throws a protocol error on an unexpected tools/list payload", async () => {
    const { transport } = fakeTransport(() => ({ ok: true, id: 1, result: { tools: "nope" } }));

    const err = await new JsonRpcMcpClient(transport, { logger: silentLogger }).listTools().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProtocolError);
    expect(err).toMatchObject({ code: PROTOCOL_CODES.UNEXPECTED_RESULT });
  });

  it("calls a tool directly by default", async () => {
    const { transport, calls } = fakeTransport(() => ({ ok: true, id: 1, result: ["alpha1"] }));

    const res = await new JsonRpcMcpClient(transport, { logger: silentLogger }).callTool("list_alphas", { owner: "me" });

    expect(res).toEqual({ ok: true, id: 1, result: ["alpha1"] });
    expect(calls[0].slice(0, 2)).toEqual(["list_alphas", { owner: "me" }]);
  });

  it("wraps the call in tools/call when configured", async () => {
    const { transport, calls } = fakeTransport(() => ({ ok: true, id: 1, result: { content: [] } }));
    const client = new JsonRpcMcpClient(transport, { invocationStyle: "tools-call", logger: silentLogger });

    await client.callTool("list_alphas", { owner: "me" }, { timeoutMs: 5 });

    expect(calls[0]).toEqual(["tools/call", { name: "list_alphas", arguments: { owner: "me" } }, { timeoutMs: 5 }]);
  });
});

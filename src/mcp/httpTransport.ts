// src/mcp/httpTransport.ts
import { PROTOCOL_CODES, TRANSPORT_CODES, errorMessage } from "../errors.js";
import { createLogger, redactHeaders, type Logger } from "../logger.js";
import { nextRequestId, type IdGenerator } from "./ids.js";
import {
  JSONRPC_VERSION,
  JsonRpcEnvelopeSchema,
  type CallOptions,
  type JsonRpcParams,
  type JsonRpcRequest,
  type NotifyResponse,
  type RequestId,
  type RpcFailure,
  type RpcFailureKind,
  type RpcResponse,
  type RpcTransport,
} from "./types.js";

type HeaderSource = Record<string, string> | (() => Promise<Record<string, string>>);

export type HttpTransportOptions = {
  url: string;
  authToken?: string;
  headers?: HeaderSource;
  /** Default per-call timeout; a call may pass its own */
  timeoutMs?: number;
  fetch?: typeof fetch;
  nextId?: IdGenerator;
  logger?: Logger;
};

const DEFAULT_TIMEOUT_MS = 15000;

// Streamable HTTP: the server may answer with JSON or an event stream
const ACCEPT = "application/json, text/event-stream";
export const SESSION_HEADER = "mcp-session-id";

// What came back from one POST, or why nothing did
type Exchange =
  | { delivered: true; status: number; ok: boolean; text: string; contentType: string }
  | { delivered: false; code: number; message: string };

function failure(
  id: RequestId,
  kind: RpcFailureKind,
  code: number,
  message: string,
  extra: { data?: unknown; status?: number } = {},
): RpcFailure {
  return { ok: false, id, kind, code, message, ...extra };
}

function asCurl(url: string, headers: Record<string, string>, body: string) {
  const h = Object.entries(headers)
    .map(([k, v]) => `-H "${k}: ${String(v).replace(/"/g, '\\"')}"`)
    .join(" ");
  const b = body.replace(/'/g, `'\\''`);
  return `curl -sS "${url}" ${h} -d '${b}'`;
}

/**
 * JSON-RPC 2.0 over HTTP POST.
 *
 * `call` never rejects: network trouble, timeouts, bad envelopes and server
 * errors all come back as an {@link RpcFailure}. Retrying is the caller's job.
 * A session id handed out by the server is sent back on every later request.
 */
export class HttpRpcTransport implements RpcTransport {
  private readonly url: string;
  private readonly authToken?: string;
  private readonly headerSource?: HeaderSource;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly nextId: IdGenerator;
  private readonly log: Logger;
  private sessionId?: string;

  constructor(options: HttpTransportOptions) {
    this.url = options.url;
    this.authToken = options.authToken;
    this.headerSource = options.headers;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.nextId = options.nextId ?? nextRequestId;
    this.log = options.logger ?? createLogger("mcp");
  }

  get session(): string | undefined {
    return this.sessionId;
  }

  private async headers(): Promise<Record<string, string>> {
    const extra =
      typeof this.headerSource === "function" ? await this.headerSource() : this.headerSource ?? {};

    return {
      "content-type": "application/json",
      accept: ACCEPT,
      ...(this.authToken ? { authorization: `Bearer ${this.authToken}` } : {}),
      ...(this.sessionId ? { [SESSION_HEADER]: this.sessionId } : {}),
      ...extra,
    };
  }

  async call(method: string, params: JsonRpcParams = {}, options: CallOptions = {}): Promise<RpcResponse> {
    const id = this.nextId();

    if (typeof method !== "string" || !method.trim()) {
      return failure(id, "protocol", PROTOCOL_CODES.INVALID_REQUEST, "method must be a non-empty string");
    }

    const req: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, id, method, params };
    let body: string;
    try {
      body = JSON.stringify(req);
    } catch (e) {
      return failure(id, "protocol", PROTOCOL_CODES.INVALID_REQUEST, `params are not JSON-serializable: ${errorMessage(e)}`);
    }

    const exchange = await this.post(`${method} id=${id}`, body, options);
    if (!exchange.delivered) return failure(id, "transport", exchange.code, exchange.message);

    const text = exchange.contentType.includes("text/event-stream")
      ? eventStreamMessage(exchange.text, id)
      : exchange.text;
    return interpretReply(id, exchange.status, exchange.ok, text);
  }

  /** Sends a notification: no id, and nothing to read back but the status. */
  async notify(method: string, params: JsonRpcParams = {}, options: CallOptions = {}): Promise<NotifyResponse> {
    let body: string;
    try {
      body = JSON.stringify({ jsonrpc: JSONRPC_VERSION, method, params });
    } catch (e) {
      return { ok: false, kind: "protocol", code: PROTOCOL_CODES.INVALID_REQUEST, message: errorMessage(e) };
    }

    const exchange = await this.post(method, body, options);
    if (!exchange.delivered) return { ok: false, kind: "transport", code: exchange.code, message: exchange.message };
    if (!exchange.ok) {
      return {
        ok: false,
        kind: "transport",
        code: TRANSPORT_CODES.HTTP_STATUS,
        message: `HTTP ${exchange.status}: ${exchange.text.slice(0, 300)}`.trim(),
        status: exchange.status,
      };
    }
    return { ok: true };
  }

  private async post(label: string, body: string, options: CallOptions): Promise<Exchange> {
    if (options.signal?.aborted) {
      return { delivered: false, code: TRANSPORT_CODES.ABORTED, message: "request cancelled before it was sent" };
    }

    let headers: Record<string, string>;
    try {
      headers = await this.headers();
    } catch (e) {
      return {
        delivered: false,
        code: TRANSPORT_CODES.NETWORK,
        message: `could not build request headers: ${errorMessage(e)}`,
      };
    }

    if (this.log.isDebug()) {
      this.log.debug(`[MCP->] ${label}`, { url: this.url, headers: redactHeaders(headers) });
      this.log.debug("[MCP CURL] " + asCurl(this.url, redactHeaders(headers), body));
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });
    // Cancelled while the headers were being built
    if (options.signal?.aborted) controller.abort();

    try {
      const res = await this.fetchImpl(this.url, {
        method: "POST",
        headers,
        body,
        signal: controller.signal,
      });
      const session = res.headers.get(SESSION_HEADER);
      if (session && session !== this.sessionId) {
        this.sessionId = session;
        this.log.debug(`[MCP] session ${session}`);
      }
      const text = await res.text();
      this.log.debug(`[MCP<-] ${label} status=${res.status}`, { body: text.slice(0, 2000) });
      return {
        delivered: true,
        status: res.status,
        ok: res.ok,
        text,
        contentType: res.headers.get("content-type") ?? "",
      };
    } catch (e) {
      if (timedOut) {
        this.log.warn(`[MCP] ${label} timed out after ${timeoutMs}ms`);
        return { delivered: false, code: TRANSPORT_CODES.TIMEOUT, message: `no response within ${timeoutMs}ms` };
      }
      if (options.signal?.aborted) {
        return { delivered: false, code: TRANSPORT_CODES.ABORTED, message: "request cancelled" };
      }
      this.log.warn(`[MCP] ${label} network failure`, e);
      return { delivered: false, code: TRANSPORT_CODES.NETWORK, message: errorMessage(e) };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}

function hasId(text: string, id: RequestId): boolean {
  try {
    const parsed = JsonRpcEnvelopeSchema.safeParse(JSON.parse(text));
    return parsed.success && parsed.data.id === id;
  } catch {
    return false;
  }
}

/**
 * Picks the reply to request `id` out of a `text/event-stream` body: the
 * `data:` lines of each event joined, the event carrying that id preferred,
 * else the last one.
 */
export function eventStreamMessage(text: string, id: RequestId): string {
  const messages: string[] = [];
  for (const event of text.split(/\r?\n\r?\n/)) {
    const data = event
      .split(/\r?\n/)
      .filter((line) => line.startsWith("data:"))
      .map((line) => line.slice(5).replace(/^ /, ""))
      .join("\n");
    if (data) messages.push(data);
  }
  return messages.find((m) => hasId(m, id)) ?? messages[messages.length - 1] ?? text;
}

/** Turns an HTTP reply into a correlated RpcResponse for request `id`. */
export function interpretReply(id: RequestId, status: number, ok: boolean, text: string): RpcResponse {
  const httpFailure = () =>
    failure(id, "transport", TRANSPORT_CODES.HTTP_STATUS, `HTTP ${status}: ${text.slice(0, 300)}`.trim(), { status });

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    if (!ok) return httpFailure();
    return failure(id, "transport", TRANSPORT_CODES.MALFORMED_ENVELOPE, `non-JSON response: ${text.slice(0, 300)}`);
  }

  const parsed = JsonRpcEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    if (!ok) return httpFailure();
    return failure(id, "transport", TRANSPORT_CODES.MALFORMED_ENVELOPE, "response is not a JSON-RPC 2.0 envelope");
  }

  const envelope = parsed.data;
  if (envelope.jsonrpc !== JSONRPC_VERSION) {
    return failure(id, "protocol", PROTOCOL_CODES.UNSUPPORTED_VERSION, `unsupported jsonrpc version "${envelope.jsonrpc}"`);
  }

  // A server that could not read the request id answers errors with id null.
  const idMatches = envelope.id === id || (envelope.error !== undefined && envelope.id === null);
  if (!idMatches) {
    return failure(
      id,
      "protocol",
      PROTOCOL_CODES.MISMATCHED_ID,
      `response id ${JSON.stringify(envelope.id)} does not match request id ${JSON.stringify(id)}`,
    );
  }

  if (envelope.error) {
    return failure(id, "application", envelope.error.code, envelope.error.message, {
      data: envelope.error.data,
      ...(ok ? {} : { status }),
    });
  }

  if (!ok) return httpFailure();

  return { ok: true, id, result: envelope.result };
}

import { createServer, type IncomingHttpHeaders, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Buffer } from "node:buffer";
import type { GraphQLSchema } from "graphql";

import type { AskService } from "./ask/askService.js";
import { errorMessage } from "./errors.js";
import { executeRequest, GraphQLRequestSchema, type GraphQLRequest } from "./graphql/execute.js";
import { DEFAULT_MAX_BODY_BYTES, HttpRequestError, readJsonBody } from "./http/body.js";
import { createLogger, type Logger } from "./logger.js";
import type { CallerContext } from "./router/types.js";
import type { ToolRegistry } from "./tools/registry.js";

export type ServerDeps = {
  schema: GraphQLSchema;
  askService: Pick<AskService, "ask">;
  registry: Pick<ToolRegistry, "size">;
  maxBodyBytes?: number;
  logger?: Logger;
};

export type IncomingRequest = {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: AsyncIterable<Buffer | string>;
  signal?: AbortSignal;
};

export type HttpReply = {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
};

export const GRAPHQL_PATH = "/graphql";
export const HEALTH_PATH = "/healthz";

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const raw = headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Caller identity forwarded by whatever sits in front of the server. */
export function callerFromHeaders(headers: IncomingHttpHeaders): CallerContext | undefined {
  const caller: CallerContext = {
    id: header(headers, "x-user-id"),
    username: header(headers, "x-user-name"),
    email: header(headers, "x-user-email"),
  };
  return caller.id || caller.username || caller.email ? caller : undefined;
}

function requestError(status: number, message: string, headers?: Record<string, string>): HttpReply {
  return { status, body: { errors: [{ message }] }, headers };
}

function parseVariables(raw: string | null): Record<string, unknown> | undefined {
  if (!raw) return undefined;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new HttpRequestError(400, "variables must be a JSON object");
  }
  const parsed = GraphQLRequestSchema.shape.variables.safeParse(value);
  if (!parsed.success) throw new HttpRequestError(400, "variables must be a JSON object");
  return parsed.data ?? undefined;
}

async function readGraphQLRequest(req: IncomingRequest, url: URL, maxBytes: number): Promise<GraphQLRequest> {
  const candidate =
    req.method === "GET"
      ? {
          query: url.searchParams.get("query") ?? "",
          variables: parseVariables(url.searchParams.get("variables")),
          operationName: url.searchParams.get("operationName") ?? undefined,
        }
      : await readJsonBody(req.body, maxBytes);

  const parsed = GraphQLRequestSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "body";
    throw new HttpRequestError(400, `Invalid GraphQL request: ${where}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

/**
 * Routing for the HTTP surface, independent of node:http so it can be driven
 * directly. `POST|GET /graphql` runs a query, `GET /healthz` reports liveness.
 */
export function createDispatcher(deps: ServerDeps): (req: IncomingRequest) => Promise<HttpReply> {
  const maxBytes = deps.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  return async (req) => {
    const url = new URL(req.url, "http://localhost");

    if (url.pathname === HEALTH_PATH) {
      if (req.method !== "GET") return requestError(405, "Method Not Allowed", { allow: "GET" });
      return { status: 200, body: { status: "ok", tools: deps.registry.size } };
    }

    if (url.pathname !== GRAPHQL_PATH) return requestError(404, "Not Found");
    if (req.method !== "GET" && req.method !== "POST") {
      return requestError(405, "Method Not Allowed", { allow: "GET, POST" });
    }

    let request: GraphQLRequest;
    try {
      request = await readGraphQLRequest(req, url, maxBytes);
    } catch (e) {
      if (e instanceof HttpRequestError) return requestError(e.status, e.message);
      throw e;
    }

    const result = await executeRequest(deps.schema, request, {
      askService: deps.askService,
      signal: req.signal,
      caller: callerFromHeaders(req.headers),
    });
    return { status: result.status, body: result.body };
  };
}

export function createGraphQLServer(deps: ServerDeps): Server {
  const log = deps.logger ?? createLogger("http");
  const dispatch = createDispatcher(deps);

  return createServer((req, res) => {
    const started = Date.now();
    const method = req.method ?? "GET";
    const path = req.url ?? "/";

    // Client went away before we answered: stop the ask in flight.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const send = (reply: HttpReply) => {
      if (res.destroyed) return;
      res.writeHead(reply.status, {
        "content-type": "application/json; charset=utf-8",
        ...reply.headers,
      });
      res.end(JSON.stringify(reply.body));
      log.info(`${method} ${path} -> ${reply.status}`, { ms: Date.now() - started });
    };

    dispatch({ method, url: path, headers: req.headers, body: req, signal: controller.signal })
      .then(send)
      .catch((e: unknown) => {
        log.error(`${method} ${path} failed: ${errorMessage(e)}`, e);
        if (!res.headersSent) send(requestError(500, "Internal Server Error"));
        else res.end();
      });
  });
}

export function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address && typeof address === "object") resolve(address);
      else reject(new Error("Server is not bound to a TCP address"));
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

import { printSchema } from "graphql";
import { describe, expect, it, vi } from "vitest";

import type { AskOptions } from "../ask/askService.js";
import { buildSchema } from "../graphql/schema.js";
import { HttpRequestError, readJsonBody } from "../http/body.js";
import { callerFromHeaders, createDispatcher, type HttpReply, type IncomingRequest } from "../server.js";
import { silentLogger } from "./fakes.js";

async function* chunks(...parts: string[]) {
  yield* parts;
}

function setup(answer: (prompt: string, options?: AskOptions) => Promise<string> = async (p) => `echo:${p}`) {
  const ask = vi.fn(answer);
  const dispatch = createDispatcher({
    schema: buildSchema(),
    askService: { ask },
    registry: { size: 2 },
    maxBodyBytes: 256,
    logger: silentLogger,
  });
  return { ask, dispatch };
}

function request(partial: Partial<IncomingRequest>): IncomingRequest {
  return { method: "POST", url: "/graphql", headers: {}, body: chunks(), ...partial };
}

function post(payload: unknown, headers: IncomingRequest["headers"] = {}): IncomingRequest {
  return request({ headers, body: chunks(JSON.stringify(payload)) });
}

// What the client would read off the wire
function wire(reply: HttpReply): unknown {
  return JSON.parse(JSON.stringify(reply.body));
}

describe("GraphQL schema", () => {
  it("exposes exactly the ask query", () => {
    const schema = buildSchema();

    expect(Object.keys(schema.getQueryType()?.getFields() ?? {})).toEqual(["ask"]);
    expect(schema.getMutationType()).toBeUndefined();
    expect(printSchema(schema)).toContain("  ask(prompt: String!): String!");
  });
});

describe("createDispatcher", () => {
  it("answers a POSTed ask query", async () => {
    const { dispatch, ask } = setup();

    const reply = await dispatch(post({ query: '{ ask(prompt: "hi") }' }));

    expect(reply.status).toBe(200);
    expect(wire(reply)).toEqual({ data: { ask: "echo:hi" } });
    expect(ask).toHaveBeenCalledTimes(1);
    expect(ask.mock.calls[0][0]).toBe("hi");
  });

  it("passes variables and the named operation", async () => {
    const { dispatch } = setup();

    const reply = await dispatch(
      post({
        query: "query A { ask(prompt: \"a\") } query B($p: String!) { ask(prompt: $p) }",
        variables: { p: "hello" },
        operationName: "B",
      }),
    );

    expect(wire(reply)).toEqual({ data: { ask: "echo:hello" } });
  });

  it("accepts GET with the query in the URL", async () => {
    const { dispatch } = setup();
    const query = encodeURIComponent("query($p: String!) { ask(prompt: $p) }");
    const variables = encodeURIComponent(JSON.stringify({ p: "via get" }));

    const reply = await dispatch(request({ method: "GET", url: `/graphql?query=${query}&variables=${variables}` }));

    expect(reply.status).toBe(200);
    expect(wire(reply)).toEqual({ data: { ask: "echo:via get" } });
  });

  it("forwards caller headers and the abort signal", async () => {
    const { dispatch, ask } = setup();
    const controller = new AbortController();

    await dispatch({
      ...post({ query: '{ ask(prompt: "hi") }' }, { "x-user-id": "u-1", "x-user-email": "ada@example.test" }),
      signal: controller.signal,
    });

    const options = ask.mock.calls[0][1];
    expect(options?.caller).toEqual({ id: "u-1", username: undefined, email: "ada@example.test" });
    expect(options?.signal).toBe(controller.signal);
  });

  it("rejects a body that is not JSON", async () => {
    const { dispatch, ask } = setup();

    const reply = await dispatch(request({ body: chunks("{not json") }));

    expect(reply).toEqual({ status: 400, body: { errors: [{ message: "Request body is not valid JSON" }] } });
    expect(ask).not.toHaveBeenCalled();
  });

  it("rejects an oversized body with 413", async () => {
    const { dispatch } = setup();

    const reply = await dispatch(request({ body: chunks("x".repeat(200), "x".repeat(100)) }));

    expect(reply.status).toBe(413);
  });

  it("rejects a request without a query", async () => {
    const { dispatch } = setup();

    const reply = await dispatch(post({ variables: {} }));

    expect(reply).toEqual({
      status: 400,
      body: { errors: [{ message: "Invalid GraphQL request: query: Required" }] },
    });
  });

  it("rejects GET variables that are not a JSON object", async () => {
    const { dispatch } = setup();

    const reply = await dispatch(request({ method: "GET", url: "/graphql?query=%7Bask(prompt%3A%22x%22)%7D&variables=%5B1%5D" }));

    expect(reply).toEqual({ status: 400, body: { errors: [{ message: "variables must be a JSON object" }] } });
  });

  it("reports syntax and validation errors with 400", async () => {
    const { dispatch } = setup();

    const syntax = await dispatch(post({ query: "{ ask(" }));
    const unknownField = await dispatch(post({ query: "{ nope }" }));
    const missingArg = await dispatch(post({ query: "{ ask }" }));

    expect(syntax.status).toBe(400);
    expect(wire(syntax)).toMatchObject({ errors: [{ message: expect.stringMatching(/^Syntax Error/) }] });
    expect(unknownField.status).toBe(400);
    expect(wire(unknownField)).toMatchObject({ errors: [{ message: 'Cannot query field "nope" on type "Query".' }] });
    expect(missingArg.status).toBe(400);
  });

  it("reports a resolver failure as a GraphQL error", async () => {
    const { dispatch } = setup(async () => {
      throw new Error("boom");
    });

    const reply = await dispatch(post({ query: '{ ask(prompt: "hi") }' }));

    expect(reply.status).toBe(200);
    expect(wire(reply)).toMatchObject({ data: null, errors: [{ message: "boom", path: ["ask"] }] });
  });

  it("serves the health check", async () => {
    const { dispatch } = setup();

    expect(await dispatch(request({ method: "GET", url: "/healthz" }))).toEqual({
      status: 200,
      body: { status: "ok", tools: 2 },
    });
    expect((await dispatch(request({ method: "POST", url: "/healthz" }))).status).toBe(405);
  });

  it("answers 404 and 405 for other routes and methods", async () => {
    const { dispatch } = setup();

    expect((await dispatch(request({ url: "/nope" }))).status).toBe(404);
    const put = await dispatch(request({ method: "PUT" }));
    expect(put.status).toBe(405);
    expect(put.headers).toEqual({ allow: "GET, POST" });
  });
});

describe("callerFromHeaders", () => {
  it("reads the first value of each identity header", () => {
    expect(callerFromHeaders({ "x-user-name": ["ada", "bob"], "x-user-id": "  " })).toEqual({
      id: undefined,
      username: "ada",
      email: undefined,
    });
  });

  it("is undefined for anonymous requests", () => {
    expect(callerFromHeaders({ accept: "application/json" })).toBeUndefined();
  });
});

describe("readJsonBody", () => {
  it("joins chunks before parsing", async () => {
    expect(await readJsonBody(chunks('{"query":', '"{ ask }"}'))).toEqual({ query: "{ ask }" });
  });

  it("throws 400 for an empty body and 413 past the limit", async () => {
    await expect(readJsonBody(chunks(""))).rejects.toMatchObject({ status: 400 });
    await expect(readJsonBody(chunks("12345"), 4)).rejects.toBeInstanceOf(HttpRequestError);
    await expect(readJsonBody(chunks("12345"), 4)).rejects.toMatchObject({ status: 413 });
  });
});

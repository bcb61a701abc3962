// src/runtime/startServer.ts
import type { Server } from "node:http";

import { AskService } from "../ask/askService.js";
import { isDebug, loadEnv, mcpServers, type AppEnv } from "../env.js";
import { buildSchema } from "../graphql/schema.js";
import { createLogger, setLogLevel } from "../logger.js";
import { failureToError } from "../mcp/failures.js";
import { McpServerPool, connectServers } from "../mcp/servers.js";
import { KeywordScorer } from "../router/keywordScorer.js";
import { createOllamaScorer } from "../router/llmScorer.js";
import { PromptRouter } from "../router/promptRouter.js";
import type { Scorer } from "../router/types.js";
import { closeServer, createGraphQLServer, listen } from "../server.js";
import { loadToolRegistry } from "../tools/catalog.js";

const log = createLogger("startup");

function buildScorer(env: AppEnv): Scorer {
  if (env.ROUTER_SCORER === "llm") {
    log.info(`Using LLM scorer: ${env.OLLAMA_MODEL} @ ${env.OLLAMA_URL}`);
    return createOllamaScorer({
      baseUrl: env.OLLAMA_URL,
      model: env.OLLAMA_MODEL,
      logger: createLogger("llm-scorer"),
    });
  }
  return new KeywordScorer();
}

export async function startServer(env: AppEnv = loadEnv()): Promise<Server> {
  setLogLevel(isDebug(env) ? "debug" : env.LOG_LEVEL);

  const bindings = connectServers(mcpServers(env), {
    timeoutMs: env.MCP_TIMEOUT_MS,
    invocationStyle: env.MCP_INVOCATION_STYLE,
  });

  // Discovery needs a live session; a static catalog does not.
  if (!env.TOOL_CATALOG_PATH) {
    for (const binding of bindings) {
      const init = await binding.client.initialize();
      if (!init.ok) throw failureToError(init);
      log.info(`MCP session initialized: ${binding.name}`);
    }
  }

  const registry = await loadToolRegistry({ catalogPath: env.TOOL_CATALOG_PATH, servers: bindings });
  const pool = new McpServerPool(bindings, registry, createLogger("mcp-pool"));

  const router = new PromptRouter({
    scorer: buildScorer(env),
    minConfidence: env.ROUTER_MIN_CONFIDENCE,
    tieBreak: env.ROUTER_TIE_BREAK,
  });

  const askService = new AskService({
    registry,
    router,
    client: pool,
    timeoutMs: env.ASK_TIMEOUT_MS,
    callTimeoutMs: env.MCP_TIMEOUT_MS,
    retries: env.MCP_RETRIES,
  });

  const server = createGraphQLServer({ schema: buildSchema(), askService, registry });
  const address = await listen(server, env.PORT, env.HOST);
  log.info(`GraphQL server listening on http://${address.address}:${address.port}/graphql`);

  let closing = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    log.info(`${signal} received, shutting down`);
    closeServer(server).then(
      () => process.exit(0),
      (e: unknown) => {
        log.error("Server did not close cleanly", e);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return server;
}

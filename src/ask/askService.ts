// src/ask/askService.ts
import { TransportError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { failureToError } from "../mcp/failures.js";
import { normalizeToolResult } from "../mcp/parseContent.js";
import type { McpClient, RpcSuccess } from "../mcp/types.js";
import type { PromptRouter } from "../router/promptRouter.js";
import type { CallerContext, RoutingDecision } from "../router/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import { formatResult } from "./format.js";
import { MESSAGES, describeError, type AskIntent } from "./messages.js";

export type AskServiceOptions = {
  registry: ToolRegistry;
  router: PromptRouter;
  client: Pick<McpClient, "callTool">;
  /** Budget for routing plus every call attempt */
  timeoutMs?: number;
  /** Upper bound for a single call attempt */
  callTimeoutMs?: number;
  /** Extra attempts after a transient transport failure (0 or 1) */
  retries?: number;
  logger?: Logger;
};

export type AskOptions = {
  signal?: AbortSignal;
  caller?: CallerContext;
};

export type AskMetadata = {
  intent: AskIntent;
  tool?: string;
  confidence?: number;
  attempts: number;
  elapsedMs: number;
};

export type AskOutcome = {
  content: string;
  metadata: AskMetadata;
};

type PendingMetadata = Omit<AskMetadata, "elapsedMs">;

const DEFAULT_TIMEOUT_MS = 20000;
const DEFAULT_CALL_TIMEOUT_MS = 15000;

/**
 * The `ask` pipeline: route, call, format. `ask` always resolves to a
 * string; failures become the message for their category.
 */
export class AskService {
  private readonly registry: ToolRegistry;
  private readonly router: PromptRouter;
  private readonly client: Pick<McpClient, "callTool">;
  private readonly timeoutMs: number;
  private readonly callTimeoutMs: number;
  private readonly retries: number;
  private readonly log: Logger;

  constructor(options: AskServiceOptions) {
    this.registry = options.registry;
    this.router = options.router;
    this.client = options.client;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.retries = Math.min(1, Math.max(0, Math.trunc(options.retries ?? 1)));
    this.log = options.logger ?? createLogger("ask");
  }

  async ask(prompt: string, options: AskOptions = {}): Promise<string> {
    const outcome = await this.run(prompt, options);
    return outcome.content;
  }

  async run(prompt: string, options: AskOptions = {}): Promise<AskOutcome> {
    const started = Date.now();
    const finish = (content: string, meta: PendingMetadata): AskOutcome => {
      const outcome = { content, metadata: { ...meta, elapsedMs: Date.now() - started } };
      this.log.info(`ask finished: intent=${meta.intent}`, outcome.metadata);
      return outcome;
    };

    this.log.info(`ask received: prompt_length=${prompt.length}`);
    this.log.debug("ask prompt", { prompt });

    if (options.signal?.aborted) {
      return finish(MESSAGES.cancelled, { intent: "cancelled", attempts: 0 });
    }

    const controller = new AbortController();
    let settle: (v: "timeout" | "cancelled") => void = () => {};
    const interrupted = new Promise<"timeout" | "cancelled">((resolve) => {
      settle = resolve;
    });

    const timer = setTimeout(() => {
      controller.abort();
      settle("timeout");
    }, this.timeoutMs);
    const onCallerAbort = () => {
      controller.abort();
      settle("cancelled");
    };
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const deadline = started + this.timeoutMs;
      const result = await Promise.race([
        this.execute(prompt, options.caller, controller.signal, deadline),
        interrupted,
      ]);

      if (result === "timeout") return finish(MESSAGES.timeout, { intent: "timeout", attempts: 0 });
      if (result === "cancelled") return finish(MESSAGES.cancelled, { intent: "cancelled", attempts: 0 });
      return finish(result.content, result.meta);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  // Never rejects: it may still be running when run() has given up on it.
  private async execute(
    prompt: string,
    caller: CallerContext | undefined,
    signal: AbortSignal,
    deadline: number,
  ): Promise<{ content: string; meta: PendingMetadata }> {
    let decision: RoutingDecision;
    try {
      decision = await this.router.route(prompt, this.registry, caller);
    } catch (e) {
      const d = describeError(e);
      if (d.intent === "internal_error") this.log.error("routing failed unexpectedly", e);
      else this.log.info(`routing failed: ${errorMessage(e)}`);
      return { content: d.content, meta: { intent: d.intent, attempts: 0 } };
    }

    const meta = (intent: AskIntent, attempts: number): PendingMetadata => ({
      intent,
      tool: decision.toolName,
      confidence: decision.confidence,
      attempts,
    });

    const maxAttempts = 1 + this.retries;
    let attempts = 0;

    try {
      for (;;) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) return { content: MESSAGES.timeout, meta: meta("timeout", attempts) };

        attempts++;
        const response = await this.client.callTool(decision.toolName, decision.arguments, {
          signal,
          timeoutMs: Math.min(remaining, this.callTimeoutMs),
        });
        if (response.ok) return this.answer(decision.toolName, response, meta, attempts);

        const err = failureToError(response);
        if (err instanceof TransportError && err.transient && attempts < maxAttempts && !signal.aborted) {
          this.log.warn(`call to ${decision.toolName} failed (${err.message}); retrying once`);
          continue;
        }

        const d = describeError(err, decision.toolName);
        this.log.warn(`call to ${decision.toolName} failed: ${err.name} ${err.code} ${err.message}`);
        return { content: d.content, meta: meta(d.intent, attempts) };
      }
    } catch (e) {
      this.log.error(`call to ${decision.toolName} threw`, e);
      return { content: MESSAGES.internal, meta: meta("internal_error", attempts) };
    }
  }

  private answer(
    toolName: string,
    response: RpcSuccess,
    meta: (intent: AskIntent, attempts: number) => PendingMetadata,
    attempts: number,
  ): { content: string; meta: PendingMetadata } {
    const normalized = normalizeToolResult(response.result);
    if (normalized.isError) {
      return { content: MESSAGES.toolError(toolName, normalized.message), meta: meta("tool_error", attempts) };
    }
    return { content: formatResult(normalized.value), meta: meta("answered", attempts) };
  }
}

// src/router/promptRouter.ts
import { RoutingError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { ToolRegistry } from "../tools/registry.js";
import { extractArguments } from "./extract.js";
import type {
  ArgumentExtractor,
  CallerContext,
  RoutingDecision,
  ScoredTool,
  Scorer,
  TieBreak,
} from "./types.js";

export const DEFAULT_MIN_CONFIDENCE = 0.3;

// Scores closer than this are a tie
const SCORE_EPSILON = 1e-9;

export type PromptRouterOptions = {
  scorer: Scorer;
  minConfidence?: number;
  /**
   * What to do when several tools share the top score: take the one
   * registered first, or refuse with AMBIGUOUS_MATCH.
   */
  tieBreak?: TieBreak;
  extractor?: ArgumentExtractor;
  logger?: Logger;
};

function clamp01(n: number) {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

/**
 * Maps a prompt to one registered tool plus its arguments. The router only
 * composes: scoring comes from the injected {@link Scorer}, arguments from the
 * extractor, and the selection policy lives here.
 */
export class PromptRouter {
  private readonly scorer: Scorer;
  private readonly minConfidence: number;
  private readonly tieBreak: TieBreak;
  private readonly extractor: ArgumentExtractor;
  private readonly log: Logger;

  constructor(options: PromptRouterOptions) {
    this.scorer = options.scorer;
    this.minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    this.tieBreak = options.tieBreak ?? "declaration-order";
    this.extractor =
      options.extractor ?? ((prompt, tool, caller, suggested) => extractArguments(prompt, tool, caller, { suggested }));
    this.log = options.logger ?? createLogger("router");
  }

  /** Every tool with its score, in registry order. */
  async rank(prompt: string, registry: ToolRegistry): Promise<ScoredTool[]> {
    const tools = registry.listTools();
    if (this.scorer.assessAll) {
      const assessments = await this.scorer.assessAll(prompt, tools);
      return tools.map((tool, i) => {
        const a = assessments[i];
        return {
          tool,
          score: clamp01(a?.score ?? 0),
          ...(a?.arguments ? { suggestedArguments: a.arguments } : {}),
        };
      });
    }

    const scores = this.scorer.scoreAll
      ? await this.scorer.scoreAll(prompt, tools)
      : await Promise.all(tools.map((t) => this.scorer.score(prompt, t)));

    return tools.map((tool, i) => ({ tool, score: clamp01(scores[i] ?? 0) }));
  }

  async route(prompt: string, registry: ToolRegistry, caller?: CallerContext): Promise<RoutingDecision> {
    const normalized = prompt.trim();
    if (!normalized) throw new RoutingError("Prompt must not be empty", "EMPTY_PROMPT");

    const ranked = await this.rank(normalized, registry);
    this.log.debug(`scored ${ranked.length} tool(s) with ${this.scorer.name}`, {
      scores: Object.fromEntries(ranked.map((r) => [r.tool.name, Number(r.score.toFixed(4))])),
    });

    const best = ranked.reduce((max, r) => Math.max(max, r.score), 0);
    if (ranked.length === 0 || best < this.minConfidence || best === 0) {
      throw new RoutingError(
        `No tool scored at least ${this.minConfidence} (best ${best.toFixed(2)})`,
        "NO_MATCHING_TOOL",
      );
    }

    const top = ranked.filter((r) => best - r.score <= SCORE_EPSILON);
    if (top.length > 1 && this.tieBreak === "reject") {
      const candidates = top.map((r) => r.tool.name);
      throw new RoutingError(`Tools tied at ${best.toFixed(2)}: ${candidates.join(", ")}`, "AMBIGUOUS_MATCH", {
        candidates,
      });
    }

    // ranked keeps registry order, so top[0] is the first-declared of the tied tools
    const chosen = top[0].tool;
    const suggested = top[0].suggestedArguments;
    if (top.length > 1) {
      this.log.debug(`tie between ${top.map((r) => r.tool.name).join(", ")}; taking ${chosen.name}`);
    }

    const tool = registry.requireTool(chosen.name);
    const { arguments: args, missing } = this.extractor(normalized, tool, caller, suggested);
    if (missing.length) {
      throw new RoutingError(`Missing required arguments for ${tool.name}: ${missing.join(", ")}`, "INCOMPLETE_ARGUMENTS", {
        tool: tool.name,
        missing,
      });
    }

    this.log.info(`routed to ${tool.name} (confidence=${best.toFixed(2)})`);
    return { toolName: tool.name, arguments: args, confidence: best };
  }
}

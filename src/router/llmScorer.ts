// src/router/llmScorer.ts
import { ChatOllama } from "@langchain/ollama";
import { HumanMessage, SystemMessage, type BaseMessage } from "@langchain/core/messages";
import { z } from "zod";

import { createLogger, type Logger } from "../logger.js";
import type { ToolDescriptor } from "../tools/types.js";
import type { Scorer, ToolAssessment } from "./types.js";

/** The slice of a LangChain chat model this scorer needs. */
export interface ChatModel {
  invoke(messages: BaseMessage[]): Promise<{ content: unknown }>;
}

const AssessmentSchema = z.object({
  scores: z.record(z.coerce.number()),
  // a malformed arguments block is dropped; the scores still count
  arguments: z.record(z.record(z.unknown())).optional().catch(undefined),
});

export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end < 0 || end <= start) return null;
  return text.slice(start, end + 1);
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function clamp01(n: number) {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

export function scorerSystemPrompt() {
  return [
    "You are a tool routing classifier.",
    "Given a user request and a list of tools, rate how well EACH tool can satisfy the request,",
    "and read the values the request states for the parameters of the tools that fit.",
    "",
    "You MUST output ONLY one valid JSON object. No markdown. No commentary.",
    "Shape: {\"scores\":{\"tool_name\":0.0},\"arguments\":{\"tool_name\":{\"parameter\":\"value\"}}}",
    "",
    "Rules:",
    "- Include every listed tool name exactly once.",
    "- Scores are numbers between 0 and 1.",
    "- Use 0 for tools that cannot help at all.",
    "- Do not invent tool names.",
    "- Only give arguments the request actually states; leave the others out.",
    "- Use \"me\" when the request refers to the user themselves.",
  ].join("\n");
}

function describeTools(tools: readonly ToolDescriptor[]) {
  return tools.map((t) => ({
    name: t.name,
    description: t.description,
    parameters: Object.fromEntries(
      Object.entries(t.parameterSchema).map(([k, p]) => [k, `${p.type}${p.required ? " (required)" : ""}`]),
    ),
  }));
}

/**
 * Delegates scoring to a chat model: one call per prompt rates the whole
 * catalog and proposes arguments for the tools that fit. Output that cannot
 * be read as `{scores}` rates every tool 0.
 */
export class LlmScorer implements Scorer {
  readonly name = "llm";
  private readonly log: Logger;

  constructor(
    private readonly llm: ChatModel,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger("llm-scorer");
  }

  async assessAll(prompt: string, tools: readonly ToolDescriptor[]): Promise<readonly ToolAssessment[]> {
    const human = [
      `User request: "${prompt}"`,
      "",
      "Available tools:",
      JSON.stringify(describeTools(tools), null, 2),
    ].join("\n");

    const res = await this.llm.invoke([new SystemMessage(scorerSystemPrompt()), new HumanMessage(human)]);
    const text = typeof res.content === "string" ? res.content : JSON.stringify(res.content);

    const jsonText = extractJsonObject(text);
    const parsed = AssessmentSchema.safeParse(jsonText ? safeJsonParse(jsonText) : null);
    if (!parsed.success) {
      this.log.warn("classifier returned unreadable scores", { head: text.slice(0, 200) });
      return tools.map(() => ({ score: 0 }));
    }

    const { scores, arguments: suggested = {} } = parsed.data;
    this.log.debug("classifier scores", { scores, arguments: suggested });
    return tools.map((t) => {
      const score = clamp01(scores[t.name] ?? 0);
      const args = suggested[t.name];
      return args ? { score, arguments: args } : { score };
    });
  }

  async scoreAll(prompt: string, tools: readonly ToolDescriptor[]): Promise<readonly number[]> {
    const assessments = await this.assessAll(prompt, tools);
    return assessments.map((a) => a.score);
  }

  async score(prompt: string, tool: ToolDescriptor): Promise<number> {
    const [s] = await this.scoreAll(prompt, [tool]);
    return s ?? 0;
  }
}

export function createOllamaScorer(opts: { baseUrl: string; model: string; logger?: Logger }) {
  const llm = new ChatOllama({ baseUrl: opts.baseUrl, model: opts.model, temperature: 0 });
  return new LlmScorer(llm, opts.logger);
}

import type { ToolDescriptor } from "../tools/types.js";

export type RoutingDecision = {
  toolName: string;
  arguments: Record<string, unknown>;
  /** Score of the chosen tool, in [0, 1] */
  confidence: number;
};

export type CallerContext = {
  id?: string;
  username?: string;
  email?: string;
};

export type ToolAssessment = {
  score: number;
  /** Argument values the scorer read off the prompt for this tool */
  arguments?: Record<string, unknown>;
};

/**
 * Scores how well a tool fits a prompt, 0 (unrelated) to 1 (certain).
 * Scorers that need one round trip for the whole catalog implement `scoreAll`;
 * those that also propose arguments implement `assessAll`.
 */
export interface Scorer {
  readonly name: string;
  score(prompt: string, tool: ToolDescriptor): number | Promise<number>;
  scoreAll?(prompt: string, tools: readonly ToolDescriptor[]): Promise<readonly number[]>;
  assessAll?(prompt: string, tools: readonly ToolDescriptor[]): Promise<readonly ToolAssessment[]>;
}

export type ScoredTool = {
  tool: ToolDescriptor;
  score: number;
  suggestedArguments?: Record<string, unknown>;
};

export type ExtractionResult = {
  arguments: Record<string, unknown>;
  missing: string[];
};

export type ArgumentExtractor = (
  prompt: string,
  tool: ToolDescriptor,
  caller?: CallerContext,
  suggested?: Record<string, unknown>,
) => ExtractionResult;

export type TieBreak = "declaration-order" | "reject";

import {
  ApplicationError,
  ProtocolError,
  RoutingError,
  TRANSPORT_CODES,
  TransportError,
} from "../errors.js";

export const MESSAGES = {
  noTool: "Could not determine which tool to use for this request.",
  ambiguous: "The request matches several tools equally well; please be more specific.",
  emptyPrompt: "Please provide a prompt.",
  protocol: "The tool server returned an invalid response.",
  transport: "The tool server could not be reached. Please try again later.",
  timeout: "The request timed out. Please try again.",
  cancelled: "The request was cancelled.",
  internal: "Something went wrong while handling the request.",
  incomplete: (missing: readonly string[]) => `Missing required information: ${missing.join(", ")}.`,
  toolError: (tool: string, message: string) => `The tool "${tool}" reported an error: ${message}`,
} as const;

export type AskIntent =
  | "answered"
  | "tool_error"
  | "protocol_error"
  | "routing_failed"
  | "transport_failed"
  | "timeout"
  | "cancelled"
  | "invalid_prompt"
  | "internal_error";

export type Described = { content: string; intent: AskIntent };

/** Every failure the ask pipeline can hit, as the text the caller sees. */
export function describeError(e: unknown, toolName?: string): Described {
  if (e instanceof RoutingError) {
    switch (e.code) {
      case "EMPTY_PROMPT":
        return { content: MESSAGES.emptyPrompt, intent: "invalid_prompt" };
      case "AMBIGUOUS_MATCH":
        return { content: MESSAGES.ambiguous, intent: "routing_failed" };
      case "INCOMPLETE_ARGUMENTS":
        return { content: MESSAGES.incomplete(e.details.missing ?? []), intent: "routing_failed" };
      default:
        return { content: MESSAGES.noTool, intent: "routing_failed" };
    }
  }

  if (e instanceof ApplicationError) {
    return { content: MESSAGES.toolError(toolName ?? "unknown", e.message), intent: "tool_error" };
  }

  if (e instanceof ProtocolError) {
    return { content: MESSAGES.protocol, intent: "protocol_error" };
  }

  if (e instanceof TransportError) {
    if (e.code === TRANSPORT_CODES.TIMEOUT) return { content: MESSAGES.timeout, intent: "timeout" };
    if (e.code === TRANSPORT_CODES.ABORTED) return { content: MESSAGES.cancelled, intent: "cancelled" };
    return { content: MESSAGES.transport, intent: "transport_failed" };
  }

  return { content: MESSAGES.internal, intent: "internal_error" };
}

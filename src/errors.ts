/**
 * Error taxonomy shared by the transport, router and ask service.
 *
 * Transport and protocol codes live below the JSON-RPC reserved range
 * (-32768..-32000) so they never collide with codes a server may return.
 */

export type ErrorKind = "transport" | "protocol" | "application" | "routing" | "config";

export const TRANSPORT_CODES = {
  NETWORK: -33001,
  TIMEOUT: -33002,
  HTTP_STATUS: -33003,
  MALFORMED_ENVELOPE: -33004,
  ABORTED: -33005,
} as const;

export const PROTOCOL_CODES = {
  INVALID_REQUEST: -32600,
  MISMATCHED_ID: -33101,
  UNSUPPORTED_VERSION: -33102,
  UNEXPECTED_RESULT: -33103,
} as const;

export type TransportCode = (typeof TRANSPORT_CODES)[keyof typeof TRANSPORT_CODES];
export type ProtocolCode = (typeof PROTOCOL_CODES)[keyof typeof PROTOCOL_CODES];

export type RoutingErrorCode =
  | "EMPTY_PROMPT"
  | "NO_MATCHING_TOOL"
  | "AMBIGUOUS_MATCH"
  | "INCOMPLETE_ARGUMENTS"
  | "UNKNOWN_TOOL";

export abstract class AgentError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: number | string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransportError extends AgentError {
  readonly kind = "transport";

  constructor(
    message: string,
    readonly code: TransportCode,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /** Timeouts, dropped connections and gateway-ish statuses may succeed on a second try. */
  get transient(): boolean {
    if (this.code === TRANSPORT_CODES.TIMEOUT || this.code === TRANSPORT_CODES.NETWORK) return true;
    if (this.code === TRANSPORT_CODES.HTTP_STATUS && this.status !== undefined) {
      return isRetryableStatus(this.status);
    }
    return false;
  }
}

export class ProtocolError extends AgentError {
  readonly kind = "protocol";

  constructor(
    message: string,
    readonly code: ProtocolCode,
  ) {
    super(message);
  }
}

export class ApplicationError extends AgentError {
  readonly kind = "application";

  constructor(
    message: string,
    readonly code: number,
    readonly data?: unknown,
  ) {
    super(message);
  }
}

export class RoutingError extends AgentError {
  readonly kind = "routing";

  constructor(
    message: string,
    readonly code: RoutingErrorCode,
    readonly details: { candidates?: string[]; missing?: string[]; tool?: string } = {},
  ) {
    super(message);
  }
}

export class ConfigError extends AgentError {
  readonly kind = "config";
  readonly code = "CONFIG";

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export function isRetryableStatus(status: number) {
  return status === 408 || status === 429 || status === 502 || status === 503 || status === 504;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

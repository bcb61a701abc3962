import {
  AgentError,
  ApplicationError,
  PROTOCOL_CODES,
  ProtocolError,
  TRANSPORT_CODES,
  TransportError,
  type ProtocolCode,
  type TransportCode,
} from "../errors.js";
import type { RpcFailure } from "./types.js";

const transportCodes: readonly number[] = Object.values(TRANSPORT_CODES);
const protocolCodes: readonly number[] = Object.values(PROTOCOL_CODES);

function isTransportCode(code: number): code is TransportCode {
  return transportCodes.includes(code);
}

function isProtocolCode(code: number): code is ProtocolCode {
  return protocolCodes.includes(code);
}

/** Lifts an RpcFailure value into the matching error class. */
export function failureToError(f: RpcFailure): AgentError {
  if (f.kind === "transport" && isTransportCode(f.code)) {
    return new TransportError(f.message, f.code, f.status);
  }
  if (f.kind === "protocol" && isProtocolCode(f.code)) {
    return new ProtocolError(f.message, f.code);
  }
  if (f.kind === "application") {
    return new ApplicationError(f.message, f.code, f.data);
  }
  // A failure whose code does not fit its kind is itself a protocol problem
  return new ProtocolError(f.message, PROTOCOL_CODES.UNEXPECTED_RESULT);
}

import { Buffer } from "node:buffer";

export const DEFAULT_MAX_BODY_BYTES = 1 << 20;

/** A request the server refuses before it reaches GraphQL. */
export class HttpRequestError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestError";
  }
}

/**
 * Reads a JSON body, refusing more than `maxBytes` with a 413 and anything
 * that does not parse with a 400.
 */
export async function readJsonBody(
  body: AsyncIterable<Buffer | string>,
  maxBytes = DEFAULT_MAX_BODY_BYTES,
): Promise<unknown> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of body) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    totalBytes += buffer.length;
    if (totalBytes > maxBytes) throw new HttpRequestError(413, "Payload Too Large");
    buffers.push(buffer);
  }

  const raw = Buffer.concat(buffers).toString("utf8");
  if (!raw.trim()) throw new HttpRequestError(400, "Request body is empty");
  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpRequestError(400, "Request body is not valid JSON");
  }
}

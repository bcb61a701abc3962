// Correlation ids for JSON-RPC requests. One counter per process unless a
// transport is handed its own (tests do, to get predictable ids).

export type IdGenerator = () => number;

export function createIdGenerator(start = 1): IdGenerator {
  let next = start;
  return () => next++;
}

export const nextRequestId: IdGenerator = createIdGenerator();

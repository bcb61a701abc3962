import {
  GraphQLError,
  execute,
  getOperationAST,
  parse,
  validate,
  type DocumentNode,
  type ExecutionResult,
  type GraphQLSchema,
} from "graphql";
import { z } from "zod";

import type { GraphQLContext } from "./schema.js";

export const GraphQLRequestSchema = z.object({
  query: z.string().min(1, "query must not be empty"),
  variables: z.record(z.unknown()).nullish(),
  operationName: z.string().nullish(),
});

export type GraphQLRequest = z.infer<typeof GraphQLRequestSchema>;

export type GraphQLResponse = {
  status: number;
  body: ExecutionResult;
};

function errorResult(status: number, errors: readonly GraphQLError[]): GraphQLResponse {
  return { status, body: { errors } };
}

/**
 * Parse, validate and run one GraphQL request. Request-level problems
 * (syntax, validation, non-query operations) answer 4xx; anything that got
 * as far as execution answers 200 with the usual `data`/`errors` pair.
 */
export async function executeRequest(
  schema: GraphQLSchema,
  request: GraphQLRequest,
  context: GraphQLContext,
): Promise<GraphQLResponse> {
  let document: DocumentNode;
  try {
    document = parse(request.query);
  } catch (e) {
    const error = e instanceof GraphQLError ? e : new GraphQLError(String(e));
    return errorResult(400, [error]);
  }

  const validationErrors = validate(schema, document);
  if (validationErrors.length) return errorResult(400, validationErrors);

  const operation = getOperationAST(document, request.operationName ?? undefined);
  if (!operation) {
    return errorResult(400, [new GraphQLError("Could not determine which operation to run")]);
  }
  if (operation.operation !== "query") {
    return errorResult(405, [new GraphQLError(`Only queries are supported, got ${operation.operation}`)]);
  }

  const result = await execute({
    schema,
    document,
    contextValue: context,
    variableValues: request.variables ?? undefined,
    operationName: request.operationName ?? undefined,
  });
  return { status: 200, body: result };
}

import { GraphQLNonNull, GraphQLObjectType, GraphQLSchema, GraphQLString } from "graphql";

import type { AskService } from "../ask/askService.js";
import type { CallerContext } from "../router/types.js";

export type GraphQLContext = {
  askService: Pick<AskService, "ask">;
  /** Aborted when the HTTP client goes away */
  signal?: AbortSignal;
  caller?: CallerContext;
};

type AskArgs = { prompt: string };

export function buildSchema(): GraphQLSchema {
  const Query = new GraphQLObjectType<unknown, GraphQLContext>({
    name: "Query",
    fields: {
      ask: {
        type: new GraphQLNonNull(GraphQLString),
        description: "Route a natural-language prompt to a tool and return its answer as text.",
        args: {
          prompt: { type: new GraphQLNonNull(GraphQLString) },
        },
        resolve: (_root: unknown, args: AskArgs, ctx: GraphQLContext) =>
          ctx.askService.ask(args.prompt, { signal: ctx.signal, caller: ctx.caller }),
      },
    },
  });

  return new GraphQLSchema({ query: Query });
}

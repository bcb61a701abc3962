import { z } from "zod";

import { ConfigError } from "./errors.js";

// setTimeout fires at once for anything longer
export const MAX_TIMER_MS = 2_147_483_647;

const optionalString = z
  .string()
  .optional()
  .transform((v) => {
    const t = (v ?? "").trim();
    return t ? t : undefined;
  });

// JSON carried in one variable; blank means unset, unparseable text fails the schema
function jsonText(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const t = v.trim();
  if (!t) return undefined;
  try {
    return JSON.parse(t);
  } catch {
    return v;
  }
}

const HeadersSchema = z.record(z.string());

export const McpServerEntrySchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url(),
  description: z.string().default(""),
  authToken: z.string().optional(),
  headers: HeadersSchema.optional(),
});

export type McpServerConfig = z.infer<typeof McpServerEntrySchema>;

export const DEFAULT_SERVER_NAME = "default";

export const EnvSchema = z
  .object({
    // MCP transport: one server through MCP_URL, or several through MCP_SERVERS
    MCP_URL: z.string().url().optional(),
    MCP_AUTH_TOKEN: optionalString,
    MCP_HEADERS: z.preprocess(jsonText, HeadersSchema.optional()),
    MCP_SERVERS: z.preprocess(
      jsonText,
      z
        .array(McpServerEntrySchema)
        .min(1)
        .refine((list) => new Set(list.map((s) => s.name)).size === list.length, {
          message: "server names must be unique",
        })
        .optional(),
    ),
    MCP_INVOCATION_STYLE: z.enum(["direct", "tools-call"]).default("direct"),
    MCP_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(15000),
    // Only one retry is ever allowed on transient failures
    MCP_RETRIES: z.coerce.number().int().min(0).max(1).default(1),

    // Ask service
    ASK_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(20000),

    // Tool catalog: static file, or MCP discovery when unset
    TOOL_CATALOG_PATH: optionalString,

    // Routing
    ROUTER_SCORER: z.enum(["keyword", "llm"]).default("keyword"),
    ROUTER_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.3),
    ROUTER_TIE_BREAK: z.enum(["declaration-order", "reject"]).default("declaration-order"),

    // Ollama (llm scorer only)
    OLLAMA_URL: z.string().default("http://localhost:11434"),
    OLLAMA_MODEL: z.string().default("qwen2.5:7b-instruct"),

    // HTTP server
    HOST: z.string().default("0.0.0.0"),
    PORT: z.coerce.number().int().min(0).max(65535).default(4000),

    // Logging
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    MCP_DEBUG: optionalString,
  })
  .superRefine((env, ctx) => {
    if (!env.MCP_URL && !env.MCP_SERVERS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MCP_URL"],
        message: "Set MCP_URL or MCP_SERVERS",
      });
    }
  });

export type AppEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): AppEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues);
  }
  return parsed.data;
}

/** The MCP servers to talk to, in the order their tools are registered. */
export function mcpServers(
  env: Pick<AppEnv, "MCP_URL" | "MCP_AUTH_TOKEN" | "MCP_HEADERS" | "MCP_SERVERS">,
): McpServerConfig[] {
  if (env.MCP_SERVERS) return env.MCP_SERVERS;
  if (!env.MCP_URL) throw new ConfigError("Set MCP_URL or MCP_SERVERS");
  return [
    {
      name: DEFAULT_SERVER_NAME,
      url: env.MCP_URL,
      description: "",
      authToken: env.MCP_AUTH_TOKEN,
      headers: env.MCP_HEADERS,
    },
  ];
}

export function isDebug(env: Pick<AppEnv, "MCP_DEBUG" | "LOG_LEVEL">): boolean {
  return env.MCP_DEBUG === "1" || env.LOG_LEVEL === "debug";
}

// src/mcp/discovery.ts
import { z } from "zod";

import { ParameterTypeSchema, type ParameterSpec, type ParameterType, type ToolDescriptor } from "../tools/types.js";
import type { McpClient, McpTool } from "./types.js";

// Tolerant view of a JSON Schema property; servers put all sorts of things here.
const PropertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    enum: z.array(z.unknown()).optional(),
    default: z.unknown().optional(),
  })
  .passthrough();

const InputSchema = z
  .object({
    properties: z.record(z.unknown()).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

function isKnownType(t: string): t is ParameterType {
  return ParameterTypeSchema.safeParse(t).success;
}

function mapType(raw: string | string[] | undefined): ParameterType {
  const candidates = Array.isArray(raw) ? raw : raw ? [raw] : [];
  // ["integer", "null"] style unions: first non-null known type wins
  const t = candidates.find((c) => c !== "null" && isKnownType(c));
  return t && isKnownType(t) ? t : "string";
}

function scalarEnum(values: unknown[] | undefined): Array<string | number | boolean> | undefined {
  if (!values) return undefined;
  const out = values.filter(
    (v): v is string | number | boolean =>
      typeof v === "string" || typeof v === "number" || typeof v === "boolean",
  );
  return out.length ? out : undefined;
}

/** Converts an MCP tool definition (JSON Schema input) into a ToolDescriptor. */
export function toolFromMcp(tool: McpTool): ToolDescriptor {
  const input = InputSchema.safeParse(tool.inputSchema);
  const properties = input.success ? input.data.properties ?? {} : {};
  const required = new Set(input.success ? input.data.required ?? [] : []);

  const parameterSchema: Record<string, ParameterSpec> = {};
  for (const [name, rawProp] of Object.entries(properties)) {
    const prop = PropertySchema.safeParse(rawProp);
    const p: z.infer<typeof PropertySchema> = prop.success ? prop.data : {};
    const spec: ParameterSpec = {
      type: mapType(p.type),
      required: required.has(name),
      description: p.description ?? "",
    };
    const values = scalarEnum(p.enum);
    if (values) spec.enum = values;
    if (p.default !== undefined) spec.default = p.default;
    parameterSchema[name] = spec;
  }

  return {
    name: tool.name,
    description: (tool.description ?? tool.title ?? "").trim(),
    parameterSchema,
  };
}

/**
 * One-time introspection of the server's tools, in the order the server lists
 * them. With a server name, every tool is tagged with it.
 */
export async function discoverTools(client: McpClient, server?: string): Promise<ToolDescriptor[]> {
  const tools = await client.listTools();
  return tools.map((t) => (server ? { ...toolFromMcp(t), server } : toolFromMcp(t)));
}

import { z } from "zod";

export const ParameterTypeSchema = z.enum(["string", "number", "integer", "boolean", "array"]);
export type ParameterType = z.infer<typeof ParameterTypeSchema>;

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);
export type Scalar = z.infer<typeof ScalarSchema>;

export const ParameterSpecSchema = z.object({
  type: ParameterTypeSchema.default("string"),
  required: z.boolean().default(false),
  description: z.string().default(""),
  enum: z.array(ScalarSchema).optional(),
  default: z.unknown().optional(),
});

export type ParameterSpec = z.infer<typeof ParameterSpecSchema>;

export type ParameterDescriptor = Readonly<Omit<ParameterSpec, "enum">> & {
  readonly enum?: readonly Scalar[];
};

export const ToolDescriptorSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(""),
  parameterSchema: z.record(ParameterSpecSchema).default({}),
  server: z.string().trim().min(1).optional(),
});

export type ToolDescriptor = {
  readonly name: string;
  readonly description: string;
  readonly parameterSchema: Readonly<Record<string, ParameterDescriptor>>;
  /** MCP server that serves the tool; the first configured one when absent */
  readonly server?: string;
};

export const ToolCatalogSchema = z.object({
  tools: z.array(ToolDescriptorSchema),
});

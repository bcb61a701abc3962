import { RoutingError } from "../errors.js";
import type { ParameterDescriptor, ToolDescriptor } from "./types.js";

function freezeDescriptor(tool: ToolDescriptor): ToolDescriptor {
  const params: Record<string, ParameterDescriptor> = {};
  for (const [name, spec] of Object.entries(tool.parameterSchema)) {
    params[name] = Object.freeze({
      ...spec,
      ...(spec.enum ? { enum: Object.freeze([...spec.enum]) } : {}),
    });
  }
  return Object.freeze({
    name: tool.name,
    description: tool.description,
    parameterSchema: Object.freeze(params),
    ...(tool.server ? { server: tool.server } : {}),
  });
}

/**
 * Read-only tool catalog. Built once at startup and shared by every request;
 * iteration order is declaration order, which the router relies on for ties.
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDescriptor>;
  private readonly ordered: readonly ToolDescriptor[];

  private constructor(tools: ToolDescriptor[]) {
    const map = new Map<string, ToolDescriptor>();
    for (const t of tools) {
      if (!t.name.trim()) throw new Error("Tool name must not be empty");
      if (map.has(t.name)) throw new Error(`Tool already registered: ${t.name}`);
      map.set(t.name, freezeDescriptor(t));
    }
    this.tools = map;
    this.ordered = Object.freeze([...map.values()]);
  }

  static fromDescriptors(tools: readonly ToolDescriptor[]) {
    return new ToolRegistry([...tools]);
  }

  get size() {
    return this.ordered.length;
  }

  listTools(): readonly ToolDescriptor[] {
    return this.ordered;
  }

  getTool(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  has(name: string) {
    return this.tools.has(name);
  }

  requireTool(name: string): ToolDescriptor {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new RoutingError(`Unknown tool: ${name}`, "UNKNOWN_TOOL", { tool: name });
    }
    return tool;
  }
}

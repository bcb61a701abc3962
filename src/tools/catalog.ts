import { readFile } from "node:fs/promises";
import path from "node:path";

import { ConfigError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { discoverTools } from "../mcp/discovery.js";
import type { McpServerBinding } from "../mcp/servers.js";
import { ToolRegistry } from "./registry.js";
import { ToolCatalogSchema, type ToolDescriptor } from "./types.js";

const log = createLogger("catalog");

/** Validates a static catalog document: `{ "tools": [ToolDescriptor, ...] }`. */
export function parseCatalog(raw: unknown): ToolDescriptor[] {
  const parsed = ToolCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid tool catalog:\n  ${issues.join("\n  ")}`, issues);
  }
  return parsed.data.tools;
}

export async function loadCatalogFile(file: string): Promise<ToolDescriptor[]> {
  const fullPath = path.resolve(process.cwd(), file);
  let text: string;
  try {
    text = await readFile(fullPath, "utf8");
  } catch (e) {
    throw new ConfigError(`Failed to read tool catalog at ${fullPath}: ${errorMessage(e)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Tool catalog at ${fullPath} is not valid JSON: ${errorMessage(e)}`);
  }
  return parseCatalog(json);
}

export type RegistrySource = {
  catalogPath?: string;
  /** Asked in order when there is no catalog; earlier servers' tools come first */
  servers: readonly Pick<McpServerBinding, "name" | "client">[];
};

async function discoverAll(servers: RegistrySource["servers"]): Promise<ToolDescriptor[]> {
  const all: ToolDescriptor[] = [];
  for (const server of servers) {
    const tools = await discoverTools(server.client, server.name);
    log.info(`MCP server ${server.name} advertised ${tools.length} tool(s)`);
    all.push(...tools);
  }
  return all;
}

/**
 * Builds the registry once: from the static catalog when one is configured,
 * otherwise by asking the MCP servers. An empty catalog is a startup error,
 * and so is a tool name two servers both advertise.
 */
export async function loadToolRegistry(source: RegistrySource): Promise<ToolRegistry> {
  const descriptors = source.catalogPath
    ? await loadCatalogFile(source.catalogPath)
    : await discoverAll(source.servers);

  if (!descriptors.length) {
    throw new ConfigError(
      source.catalogPath ? `Tool catalog ${source.catalogPath} lists no tools` : "MCP server advertised no tools",
    );
  }

  const registry = ToolRegistry.fromDescriptors(descriptors);
  log.info(`Loaded ${registry.size} tool(s) from ${source.catalogPath ? "catalog" : "discovery"}`, {
    tools: registry.listTools().map((t) => t.name),
  });
  return registry;
}

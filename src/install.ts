import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ValidationError } from './errors.js';

export const SERVER_NAME = 'hl';

const McpJsonSchema = z
  .object({
    mcpServers: z.record(z.unknown()).optional()
  })
  .passthrough();

type McpJson = z.infer<typeof McpJsonSchema>;

export function mcpJsonPath(cwd: string = process.cwd()): string {
  return join(cwd, '.mcp.json');
}

function loadMcpJson(path: string): McpJson {
  if (!existsSync(path)) {
    return {};
  }
  const result = McpJsonSchema.safeParse(JSON.parse(readFileSync(path, 'utf8')));
  if (!result.success) {
    throw new ValidationError(`${path} is not a valid MCP configuration`);
  }
  return result.data;
}

function saveMcpJson(path: string, config: McpJson): void {
  writeFileSync(path, `${JSON.stringify(config, null, 2)}\n`);
}

/** Registers `hl-mcp serve` under `mcpServers.hl` in the project's .mcp.json. */
export function installServer(cwd?: string, args: string[] = ['serve']): string {
  const path = mcpJsonPath(cwd);
  const config = loadMcpJson(path);
  config.mcpServers = {
    ...config.mcpServers,
    [SERVER_NAME]: { command: 'hl-mcp', args }
  };
  saveMcpJson(path, config);
  return path;
}

/** Returns false when nothing was registered. */
export function uninstallServer(cwd?: string): boolean {
  const path = mcpJsonPath(cwd);
  const config = loadMcpJson(path);
  const servers = config.mcpServers;
  if (!servers || !(SERVER_NAME in servers)) {
    return false;
  }

  const { [SERVER_NAME]: _removed, ...rest } = servers;
  if (Object.keys(rest).length === 0) {
    delete config.mcpServers;
  } else {
    config.mcpServers = rest;
  }
  saveMcpJson(path, config);
  return true;
}

/**
 * Reads and patches the IDE's MCP configuration file (Cursor's
 * `~/.cursor/mcp.json`). Servers we don't own are left untouched.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { z } from 'zod';

export const DEFAULT_SERVER_NAME = 'web-eval-agent';

export interface McpServerEntry {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

const McpConfigSchema = z
  .object({
    mcpServers: z.record(z.unknown()).default({}),
  })
  .passthrough();

export type McpConfig = z.infer<typeof McpConfigSchema>;

export class McpConfigError extends Error {
  constructor(
    readonly path: string,
    message: string,
  ) {
    super(`${path}: ${message}`);
    this.name = 'McpConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getDefaultMcpConfigPath(): string {
  return join(homedir(), '.cursor', 'mcp.json');
}

export function backupPathFor(path: string): string {
  return `${path}.bak`;
}

export function readMcpConfig(path: string): McpConfig {
  if (!existsSync(path)) {
    return { mcpServers: {} };
  }

  const raw = readFileSync(path, 'utf8');
  if (raw.trim() === '') {
    return { mcpServers: {} };
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new McpConfigError(path, `not valid JSON (${err instanceof Error ? err.message : err})`);
  }

  const parsed = McpConfigSchema.safeParse(data);
  if (!parsed.success || !isRecord(data)) {
    throw new McpConfigError(path, 'expected an object with an "mcpServers" object');
  }
  // keys stay in the file's order
  return { ...data, mcpServers: parsed.data.mcpServers };
}

function writeMcpConfig(path: string, config: McpConfig): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(config, null, 2)}\n`);
}

/**
 * Add or replace one server entry. The first time an existing file is
 * modified, its original content is kept at `<path>.bak`.
 *
 * Returns true when an entry with that name was replaced.
 */
export function upsertMcpServer(path: string, name: string, entry: McpServerEntry): boolean {
  const config = readMcpConfig(path);
  const replaced = Object.prototype.hasOwnProperty.call(config.mcpServers, name);

  const backup = backupPathFor(path);
  if (existsSync(path) && !existsSync(backup)) {
    copyFileSync(path, backup);
  }

  config.mcpServers[name] = entry;
  writeMcpConfig(path, config);
  return replaced;
}

/**
 * Returns false when there was nothing to remove.
 */
export function removeMcpServer(path: string, name: string): boolean {
  if (!existsSync(path)) {
    return false;
  }

  const config = readMcpConfig(path);
  if (!Object.prototype.hasOwnProperty.call(config.mcpServers, name)) {
    return false;
  }

  delete config.mcpServers[name];
  writeMcpConfig(path, config);
  return true;
}

/**
 * Put the backed-up file back in place. Returns false when there is no
 * backup.
 */
export function restoreMcpConfig(path: string): boolean {
  const backup = backupPathFor(path);
  if (!existsSync(backup)) {
    return false;
  }
  renameSync(backup, path);
  return true;
}

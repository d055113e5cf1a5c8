#!/usr/bin/env npx tsx

/**
 * Put back the MCP configuration as it was before web-eval-setup first
 * touched it.
 *
 * Usage:
 *   npx tsx scripts/restore.ts [path/to/mcp.json]
 */

import chalk from 'chalk';
import { backupPathFor, getDefaultMcpConfigPath, restoreMcpConfig } from '../src/ide-config.js';

const configPath = process.argv[2] ?? getDefaultMcpConfigPath();

try {
  if (restoreMcpConfig(configPath)) {
    console.log(`[restore] ${chalk.green(`Restored ${configPath}`)}`);
  } else {
    console.log(`[restore] No backup found at ${backupPathFor(configPath)}`);
  }
  console.log('[restore] Restore complete!');
} catch (err) {
  console.error(chalk.red(`[restore] ${err instanceof Error ? err.message : err}`));
  process.exit(1);
}

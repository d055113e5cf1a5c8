#!/usr/bin/env npx tsx

/**
 * Undo what web-eval-setup did, so the installer can be exercised again
 * from a clean state.
 *
 * Usage:
 *   npx tsx scripts/cleanup.ts [path/to/mcp.json]
 */

import chalk from 'chalk';
import {
  DEFAULT_SERVER_NAME,
  getDefaultMcpConfigPath,
  removeMcpServer,
} from '../src/ide-config.js';

function log(msg: string) {
  console.log(`[cleanup] ${msg}`);
}

const configPath = process.argv[2] ?? getDefaultMcpConfigPath();

try {
  if (removeMcpServer(configPath, DEFAULT_SERVER_NAME)) {
    log(chalk.green(`Removed "${DEFAULT_SERVER_NAME}" from ${configPath}`));
  } else {
    log(`No "${DEFAULT_SERVER_NAME}" entry in ${configPath}`);
  }

  if (process.env.OPERATIVE_API_KEY) {
    log(chalk.yellow('OPERATIVE_API_KEY is set in this shell; run `unset OPERATIVE_API_KEY` to test the key prompt.'));
  }
  log('Cleanup complete! Now run: npm run setup');
} catch (err) {
  console.error(chalk.red(`[cleanup] ${err instanceof Error ? err.message : err}`));
  process.exit(1);
}

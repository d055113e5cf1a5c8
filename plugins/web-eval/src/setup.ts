#!/usr/bin/env node

/**
 * Installer for the web_eval_agent MCP server.
 *
 * Validates an operative.sh API key (re-prompting on failure) and registers
 * this server in the IDE's MCP configuration.
 *
 * Usage:
 *   web-eval-setup
 *   web-eval-setup --api-key <key> --config ~/.cursor/mcp.json --attempts 3
 */

import { join } from 'path';
import chalk from 'chalk';
import dotenv from 'dotenv';
import inquirer from 'inquirer';
import { PLUGIN_ROOT } from './config.js';
import { runSetup } from './installer.js';
import { validateApiKey } from './operative.js';
import { createSetupCommand } from './setup-command.js';

async function promptForKey(message: string): Promise<string> {
  const { apiKey } = await inquirer.prompt([
    { type: 'password', name: 'apiKey', message, mask: '*' },
  ]);
  return typeof apiKey === 'string' ? apiKey : '';
}

dotenv.config({ path: join(PLUGIN_ROOT, '.env') });

const program = createSetupCommand(async (options) => {
  console.log(chalk.bold('web-eval-agent setup'));
  const result = await runSetup(options, {
    prompt: promptForKey,
    validate: (apiKey) => validateApiKey(apiKey),
    print: (line) => console.log(line),
  });
  process.exitCode = result.ok ? 0 : 1;
});

program.parseAsync(process.argv).catch((err) => {
  console.error(chalk.red(`[setup] ${err instanceof Error ? err.message : err}`));
  process.exit(1);
});

/**
 * Interactive key validation and IDE registration, shared by the setup CLI
 * and its tests.
 */

import chalk from 'chalk';
import { upsertMcpServer, type McpServerEntry } from './ide-config.js';
import type { ApiKeyValidation } from './operative.js';

export interface SetupOptions {
  apiKey?: string;
  configPath: string;
  serverName: string;
  attempts: number;
  server: Omit<McpServerEntry, 'env'>;
}

export interface SetupIO {
  prompt(question: string): Promise<string>;
  validate(apiKey: string): Promise<ApiKeyValidation>;
  print(line: string): void;
}

export interface SetupResult {
  ok: boolean;
  attemptsUsed: number;
  replaced?: boolean;
}

export async function runSetup(options: SetupOptions, io: SetupIO): Promise<SetupResult> {
  let candidate = options.apiKey?.trim();

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    if (!candidate) {
      candidate = (await io.prompt('Enter your operative.sh API key')).trim();
    }

    if (!candidate) {
      io.print(chalk.yellow('No API key entered.'));
    } else {
      io.print(chalk.dim('Validating API key...'));
      try {
        const { valid, message } = await io.validate(candidate);
        if (valid) {
          io.print(chalk.green('✓ API key is valid'));
          const replaced = upsertMcpServer(options.configPath, options.serverName, {
            ...options.server,
            env: { OPERATIVE_API_KEY: candidate },
          });
          io.print(
            chalk.green(
              `✓ ${replaced ? 'Updated' : 'Added'} "${options.serverName}" in ${options.configPath}`,
            ),
          );
          io.print('Restart your IDE (or reload its MCP servers) to pick up the change.');
          return { ok: true, attemptsUsed: attempt, replaced };
        }
        io.print(chalk.red(`✗ ${message}`));
      } catch (err) {
        io.print(
          chalk.red(`✗ Could not validate API key: ${err instanceof Error ? err.message : err}`),
        );
      }
    }

    candidate = undefined;
    if (attempt < options.attempts) {
      io.print(`Please try again (${options.attempts - attempt} attempt(s) left).`);
    }
  }

  io.print(chalk.red('Setup failed: no valid API key. Get one at https://www.operative.sh'));
  return { ok: false, attemptsUsed: options.attempts };
}

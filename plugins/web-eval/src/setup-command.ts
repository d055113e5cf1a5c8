/**
 * Command-line surface of `web-eval-setup`.
 */

import { Command, InvalidArgumentError } from 'commander';
import { MCP_SERVER_ENTRY } from './config.js';
import { DEFAULT_SERVER_NAME, getDefaultMcpConfigPath } from './ide-config.js';
import type { SetupOptions } from './installer.js';

interface CliOptions {
  apiKey?: string;
  config: string;
  attempts: number;
  name: string;
}

function parseAttempts(value: string): number {
  const attempts = Number(value);
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return attempts;
}

export function createSetupCommand(
  run: (options: SetupOptions) => Promise<void>,
  env: NodeJS.ProcessEnv = process.env,
): Command {
  return new Command()
    .name('web-eval-setup')
    .description('Validate an operative.sh API key and register web-eval-agent with your IDE')
    .version('0.1.0')
    .option('--api-key <key>', 'operative.sh API key (default: $OPERATIVE_API_KEY, else prompt)')
    .option('--config <path>', 'MCP configuration file to patch', getDefaultMcpConfigPath())
    .option('--attempts <n>', 'validation attempts before giving up', parseAttempts, 3)
    .option('--name <name>', 'server name in the MCP configuration', DEFAULT_SERVER_NAME)
    .action(async (opts: CliOptions) => {
      await run({
        apiKey: opts.apiKey ?? env.OPERATIVE_API_KEY,
        configPath: opts.config,
        serverName: opts.name,
        attempts: opts.attempts,
        server: { command: process.execPath, args: [MCP_SERVER_ENTRY] },
      });
    });
}

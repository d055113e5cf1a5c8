import { describe, expect, it, vi } from 'vitest';
import { MCP_SERVER_ENTRY } from './config.js';
import { getDefaultMcpConfigPath } from './ide-config.js';
import type { SetupOptions } from './installer.js';
import { createSetupCommand } from './setup-command.js';

const server = { command: process.execPath, args: [MCP_SERVER_ENTRY] };

describe('createSetupCommand', () => {
  it('maps flags to setup options', async () => {
    const run = vi.fn(async (_options: SetupOptions) => {});

    await createSetupCommand(run, {}).parseAsync(
      ['--api-key', 'test-key', '--config', '/tmp/ide/mcp.json', '--attempts', '2', '--name', 'ux-eval'],
      { from: 'user' },
    );

    expect(run).toHaveBeenCalledWith({
      apiKey: 'test-key',
      configPath: '/tmp/ide/mcp.json',
      serverName: 'ux-eval',
      attempts: 2,
      server,
    });
  });

  it('falls back to the environment and defaults', async () => {
    const run = vi.fn(async (_options: SetupOptions) => {});

    await createSetupCommand(run, { OPERATIVE_API_KEY: 'env-key' }).parseAsync([], { from: 'user' });

    expect(run).toHaveBeenCalledWith({
      apiKey: 'env-key',
      configPath: getDefaultMcpConfigPath(),
      serverName: 'web-eval-agent',
      attempts: 3,
      server,
    });
  });

  it('rejects a non-positive attempt count', async () => {
    const run = vi.fn(async (_options: SetupOptions) => {});
    const command = createSetupCommand(run, {})
      .exitOverride()
      .configureOutput({ writeErr: () => {} });

    await expect(command.parseAsync(['--attempts', '0'], { from: 'user' })).rejects.toThrow(
      /Must be a positive integer/,
    );
    expect(run).not.toHaveBeenCalled();
  });
});

import { describe, expect, it, vi } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import type { BrowserLogCollector } from './browser-logs.js';
import {
  runBrowserTask,
  type BrowserSession,
  type BrowserTaskDeps,
  type BrowserTaskOptions,
  type LaunchOptions,
} from './browser-task.js';
import type { ModelClient, ModelTurn } from './eval-agent.js';
import type { LogType } from './log-server.js';
import type { BrowserActions, PageState } from './page-actions.js';

const HOME: PageState = { url: 'http://localhost:3000/', title: 'Home', elements: [] };

const options: BrowserTaskOptions = {
  apiKey: 'test-key',
  toolCallId: 'call-1',
  headless: true,
  model: 'claude-test',
  maxSteps: 5,
  backendUrl: 'https://backend.test',
};

const EMPTY_SUMMARY = [
  'Console messages (last 10):',
  '  (none)',
  'Network requests (last 10):',
  '  (none)',
].join('\n');

function toolUse(id: string, name: string, input: unknown): Anthropic.ToolUseBlock {
  return { type: 'tool_use', id, name, input };
}

function scriptedClient(turns: ModelTurn[]): ModelClient {
  return {
    messages: {
      create: async () => {
        const next = turns.shift();
        if (!next) throw new Error('no scripted turn left');
        return next;
      },
    },
  };
}

function fakeActions(): BrowserActions {
  return {
    navigate: vi.fn(async () => HOME),
    click: vi.fn(async () => HOME),
    type: vi.fn(async () => HOME),
    press: vi.fn(async () => HOME),
    scroll: vi.fn(async () => HOME),
    back: vi.fn(async () => HOME),
    wait: vi.fn(async () => HOME),
    state: vi.fn(async () => HOME),
    screenshot: vi.fn(async () => Buffer.from('png-bytes')),
    currentUrl: () => 'http://localhost:3000/',
  };
}

function harness(turns: ModelTurn[], actions: BrowserActions = fakeActions()) {
  const logged: Array<[string, string, LogType]> = [];
  const session: BrowserSession = { actions, close: vi.fn(async () => {}) };
  const launch = vi.fn(async (_options: LaunchOptions, _collector: BrowserLogCollector) => session);
  const createClient = vi.fn((_opts: Parameters<BrowserTaskDeps['createClient']>[0]) =>
    scriptedClient(turns),
  );
  const deps: Partial<BrowserTaskDeps> = {
    log: (message, emoji, type) => {
      logged.push([message, emoji, type]);
    },
    launch,
    createClient,
  };
  return { deps, logged, session, launch, createClient };
}

describe('runBrowserTask', () => {
  it('runs the agent in a launched browser and reports each step', async () => {
    const h = harness([
      {
        content: [
          { type: 'text', text: 'Opening the app.' },
          toolUse('t1', 'go_to_url', { url: 'http://localhost:3000' }),
        ],
        stop_reason: 'tool_use',
      },
      { content: [toolUse('t2', 'done', { text: 'Signup works.', success: true })], stop_reason: 'tool_use' },
    ]);

    const result = await runBrowserTask('check signup', options, h.deps);

    expect(result).toEqual({
      result: 'Signup works.',
      success: true,
      toolCallId: 'call-1',
      consoleLogs: [],
      networkRequests: [],
      summary: EMPTY_SUMMARY,
    });
    expect(h.launch).toHaveBeenCalledWith({ headless: true, chromePath: undefined }, expect.anything());
    expect(h.createClient).toHaveBeenCalledWith({
      apiKey: 'test-key',
      toolCallId: 'call-1',
      model: 'claude-test',
      baseUrl: 'https://backend.test',
    });
    expect(h.session.close).toHaveBeenCalledTimes(1);
    expect(h.logged.map(([message]) => message)).toEqual([
      'Launching browser...',
      'Log listeners attached.',
      'LLM (claude-test) configured.',
      'Agent starting task: check signup',
      'Step 1',
      'URL: http://localhost:3000/',
      'Agent Output: Opening the app.',
      'Step 2',
      'URL: http://localhost:3000/',
      'Agent Output: done({"text":"Signup works.","success":true})',
      'Agent run finished after 2 steps.',
      'Browser resources cleaned up.',
    ]);
    expect(h.logged[4]).toEqual(['Step 1', '📍', 'agent']);
  });

  it('appends action errors to the report', async () => {
    const actions = fakeActions();
    vi.mocked(actions.click).mockRejectedValueOnce(new Error('element not found'));
    const h = harness(
      [
        { content: [toolUse('t1', 'click_element', { selector: '#signup' })], stop_reason: 'tool_use' },
        {
          content: [toolUse('t2', 'done', { text: 'Could not sign up.', success: false })],
          stop_reason: 'tool_use',
        },
      ],
      actions,
    );

    const result = await runBrowserTask('check signup', options, h.deps);

    expect(result.success).toBe(false);
    expect(result.result).toBe(
      'Could not sign up.\n\nAction errors during the run:\n- click_element: element not found',
    );
  });

  it('generates a tool call id when none is given', async () => {
    const h = harness([{ content: [{ type: 'text', text: 'Done.' }], stop_reason: 'end_turn' }]);

    const result = await runBrowserTask('check', { ...options, toolCallId: undefined }, h.deps);

    expect(result.toolCallId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(h.logged[0]).toEqual([`Generated tool_call_id: ${result.toolCallId}`, '🆔', 'status']);
    expect(h.createClient).toHaveBeenCalledWith(expect.objectContaining({ toolCallId: result.toolCallId }));
  });

  it('adds an install hint when the browser executable is missing', async () => {
    const h = harness([]);
    h.launch.mockRejectedValueOnce(
      new Error(
        "browserType.launch: Failed to launch chromium because executable doesn't exist at /nonexistent/chrome",
      ),
    );

    const result = await runBrowserTask('check', { ...options, chromePath: '/nonexistent/chrome' }, h.deps);

    expect(result.success).toBe(false);
    expect(result.result.startsWith('Error in run_browser_task: Error: browserType.launch:')).toBe(true);
    expect(result.result.endsWith("or run 'npx playwright install chromium' and try again.")).toBe(true);
    expect(result.result).toContain('Possible cause: no Chromium executable was found.');
    expect(h.logged.map(([message]) => message)).toEqual([
      'Launching browser...',
      'Browser executable missing. Check logs.',
    ]);
    expect(h.session.close).not.toHaveBeenCalled();
  });

  it('reports agent failures and still closes the browser', async () => {
    const h = harness([]);
    h.createClient.mockReturnValueOnce({
      messages: {
        create: async () => {
          throw new Error('backend unavailable');
        },
      },
    });

    const result = await runBrowserTask('check', options, h.deps);

    expect(result.success).toBe(false);
    expect(result.result.startsWith('Error in run_browser_task: Error: backend unavailable')).toBe(true);
    expect(result.result).not.toContain('Possible cause');
    expect(h.session.close).toHaveBeenCalledTimes(1);
    const last = h.logged.slice(-2);
    expect(last[0][1]).toBe('❌');
    expect(last[0][0].startsWith('Error in run_browser_task: Error: backend unavailable')).toBe(true);
    expect(last[1]).toEqual(['Browser resources cleaned up.', '🧹', 'status']);
  });

  it('keeps the logs of concurrent runs apart', async () => {
    const first = harness([{ content: [{ type: 'text', text: 'A' }], stop_reason: 'end_turn' }]);
    first.launch.mockImplementationOnce(async (_options, collector) => {
      collector.handleConsole({
        type: () => 'error',
        text: () => 'Failed to load user',
        location: () => ({ url: '', lineNumber: 0, columnNumber: 0 }),
      });
      return first.session;
    });
    const second = harness([{ content: [{ type: 'text', text: 'B' }], stop_reason: 'end_turn' }]);

    const [a, b] = await Promise.all([
      runBrowserTask('check', options, first.deps),
      runBrowserTask('check', options, second.deps),
    ]);

    expect(a.consoleLogs.map((entry) => entry.text)).toEqual(['Failed to load user']);
    expect(b.consoleLogs).toEqual([]);
    expect(first.launch.mock.calls[0][1]).not.toBe(second.launch.mock.calls[0][1]);
  });
});

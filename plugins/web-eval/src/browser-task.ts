/**
 * One evaluation run: launch a browser, let the backend-driven agent work
 * through the task, and hand back its report with the captured logs.
 *
 * The browser lives only for the duration of the run.
 */

import { chromium } from 'playwright-core';
import { v4 as uuidv4 } from 'uuid';
import { findLocalChrome } from './browser-utils.js';
import {
  BrowserLogCollector,
  type ConsoleLogEntry,
  type NetworkRequestEntry,
} from './browser-logs.js';
import { runEvalAgent, type ModelClient } from './eval-agent.js';
import { sendLog, type LogSink } from './log-server.js';
import { createBackendClient } from './operative.js';
import { PlaywrightActions, type BrowserActions } from './page-actions.js';

export interface BrowserTaskOptions {
  apiKey: string;
  toolCallId?: string;
  headless: boolean;
  model: string;
  maxSteps: number;
  backendUrl?: string;
  chromePath?: string;
}

export interface BrowserTaskResult {
  result: string;
  success: boolean;
  toolCallId: string;
  consoleLogs: ConsoleLogEntry[];
  networkRequests: NetworkRequestEntry[];
  summary: string;
}

/**
 * A launched browser with one open page, ready for the agent.
 */
export interface BrowserSession {
  actions: BrowserActions;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  chromePath?: string;
}

export interface BrowserTaskDeps {
  log: LogSink;
  /** A fresh collector is created per run when none is given. */
  collector: BrowserLogCollector;
  launch: (options: LaunchOptions, collector: BrowserLogCollector) => Promise<BrowserSession>;
  createClient: (opts: { apiKey: string; toolCallId: string; model: string; baseUrl?: string }) => ModelClient;
}

const MISSING_BROWSER_HINT =
  '\n\nPossible cause: no Chromium executable was found. Install Google Chrome, set CHROME_PATH, ' +
  "or run 'npx playwright install chromium' and try again.";

const MISSING_EXECUTABLE = /executable doesn't exist/i;

export async function launchPlaywrightSession(
  { headless, chromePath }: LaunchOptions,
  collector: BrowserLogCollector,
): Promise<BrowserSession> {
  const executablePath = chromePath ?? findLocalChrome();
  const browser = await chromium.launch({
    headless,
    ...(executablePath ? { executablePath } : {}),
  });

  try {
    const context = await browser.newContext({ viewport: { width: 1280, height: 720 } });
    collector.attach(context);
    const page = await context.newPage();
    return {
      actions: new PlaywrightActions(page),
      close: async () => {
        await context.close().catch((err: unknown) => {
          console.error('[web-eval] Failed to close browser context:', err);
        });
        await browser.close();
      },
    };
  } catch (err) {
    await browser.close().catch((closeErr: unknown) => {
      console.error('[web-eval] Failed to close browser:', closeErr);
    });
    throw err;
  }
}

export async function runBrowserTask(
  task: string,
  options: BrowserTaskOptions,
  deps: Partial<BrowserTaskDeps> = {},
): Promise<BrowserTaskResult> {
  const log = deps.log ?? sendLog;
  const collector = deps.collector ?? new BrowserLogCollector(log);
  const launch = deps.launch ?? launchPlaywrightSession;
  const createClient = deps.createClient ?? createBackendClient;
  const toolCallId = options.toolCallId ?? uuidv4();
  if (!options.toolCallId) {
    log(`Generated tool_call_id: ${toolCallId}`, '🆔', 'status');
  }

  collector.clear();

  let session: BrowserSession | null = null;
  let result: string;
  let success = false;

  try {
    log('Launching browser...', '🛠️', 'status');
    session = await launch({ headless: options.headless, chromePath: options.chromePath }, collector);
    log('Log listeners attached.', '👂', 'status');

    const client = createClient({
      apiKey: options.apiKey,
      toolCallId,
      model: options.model,
      baseUrl: options.backendUrl,
    });
    log(`LLM (${options.model}) configured.`, '🤖', 'status');

    log(`Agent starting task: ${task}`, '🏃', 'agent');
    const outcome = await runEvalAgent({
      task,
      browser: session.actions,
      client,
      model: options.model,
      maxSteps: options.maxSteps,
      onStep: (step, url, output) => {
        log(`Step ${step}`, '📍', 'agent');
        log(`URL: ${url}`, '🔗', 'agent');
        log(`Agent Output: ${output}`, '💬', 'agent');
      },
    });
    log(`Agent run finished after ${outcome.steps} steps.`, '🏁', 'agent');

    success = outcome.success;
    result = outcome.finalResult;
    if (outcome.errors.length > 0) {
      result += `\n\nAction errors during the run:\n${outcome.errors.map((e) => `- ${e}`).join('\n')}`;
    }
  } catch (err) {
    const message = err instanceof Error ? (err.stack ?? err.message) : String(err);
    result = `Error in run_browser_task: ${message}`;
    if (MISSING_EXECUTABLE.test(message)) {
      result += MISSING_BROWSER_HINT;
      log('Browser executable missing. Check logs.', '❌', 'status');
    } else {
      log(result, '❌', 'status');
    }
  } finally {
    if (session) {
      await session.close().catch((err: unknown) => {
        console.error('[web-eval] Failed to close browser:', err);
      });
      log('Browser resources cleaned up.', '🧹', 'status');
    }
  }

  return {
    result,
    success,
    toolCallId,
    consoleLogs: collector.consoleLogs,
    networkRequests: collector.networkRequests,
    summary: collector.summarize(),
  };
}

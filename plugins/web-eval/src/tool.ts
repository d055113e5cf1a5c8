/**
 * The web_eval_agent MCP tool: input schema, handler and result shaping.
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { Config } from './config.js';
import { runBrowserTask, type BrowserTaskOptions, type BrowserTaskResult } from './browser-task.js';
import { openInBrowser, sendLog, startLogServer, type DashboardHandle } from './log-server.js';
import { ensureApiKey } from './operative.js';
import { buildEvaluationTask } from './prompts.js';

export const WEB_EVAL_TOOL_NAME = 'web_eval_agent';

export const WEB_EVAL_TOOL_DESCRIPTION =
  'Evaluate the user experience of a running web application. Opens the URL in a browser, ' +
  'carries out the task as a user would and returns a UX report along with the console ' +
  'messages and network requests captured during the run. Live logs stream to the local ' +
  'Control Center dashboard.';

export const webEvalInputSchema = {
  url: z
    .string()
    .url()
    .describe('URL of the running app to evaluate, e.g. http://localhost:3000'),
  task: z
    .string()
    .min(1)
    .describe('What to evaluate, e.g. "sign up with a new account and create a project"'),
  headless: z
    .boolean()
    .optional()
    .describe('Run the browser without a window (default from WEB_EVAL_HEADLESS)'),
};

export type WebEvalArgs = z.infer<z.ZodObject<typeof webEvalInputSchema>>;

export function text(body: string, isError = false) {
  return {
    content: [{ type: 'text' as const, text: body }],
    ...(isError ? { isError: true } : {}),
  };
}

export async function safeTool(fn: () => Promise<string>) {
  try {
    return text(await fn());
  } catch (err) {
    return text(`Error: ${err instanceof Error ? err.message : String(err)}`, true);
  }
}

export interface WebEvalDeps {
  ensureApiKey: (apiKey: string | undefined, baseUrl?: string) => Promise<string>;
  startDashboard: (port: number) => Promise<DashboardHandle | null>;
  openDashboard: (url: string) => void;
  runTask: (task: string, options: BrowserTaskOptions) => Promise<BrowserTaskResult>;
  newToolCallId: () => string;
}

const defaultDeps: WebEvalDeps = {
  ensureApiKey,
  startDashboard: startLogServer,
  openDashboard: openInBrowser,
  runTask: (task, options) => runBrowserTask(task, options),
  newToolCallId: () => uuidv4(),
};

export function formatEvaluation(url: string, outcome: BrowserTaskResult, dashboardUrl: string | null): string {
  const lines = [
    `Web evaluation of ${url} ${outcome.success ? 'completed' : 'did not complete'}.`,
    '',
    'Agent report:',
    outcome.result,
    '',
    outcome.summary,
  ];
  if (dashboardUrl) {
    lines.push('', `Full logs: ${dashboardUrl}`);
  }
  return lines.join('\n');
}

export async function runWebEval(
  args: WebEvalArgs,
  config: Config,
  deps: WebEvalDeps = defaultDeps,
): Promise<string> {
  const apiKey = await deps.ensureApiKey(config.apiKey, config.backendUrl);

  const dashboard = await deps.startDashboard(config.logPort);
  if (dashboard?.started && config.openDashboard) {
    deps.openDashboard(dashboard.url);
  }

  const toolCallId = deps.newToolCallId();
  sendLog(`web_eval_agent called for ${args.url}`, '🚀', 'status');

  const outcome = await deps.runTask(buildEvaluationTask(args.url, args.task), {
    apiKey,
    toolCallId,
    headless: args.headless ?? config.headless,
    model: config.model,
    maxSteps: config.maxSteps,
    backendUrl: config.backendUrl,
    chromePath: config.chromePath,
  });

  return formatEvaluation(args.url, outcome, dashboard?.url ?? null);
}

/**
 * Tool-use loop that lets the backend model drive the evaluation browser.
 */

import type Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { formatPageState, type BrowserActions } from './page-actions.js';
import { SYSTEM_PROMPT } from './prompts.js';

export type ModelTurn = Pick<Anthropic.Message, 'content' | 'stop_reason'>;

/**
 * The part of the Anthropic client the loop needs.
 */
export interface ModelClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<ModelTurn>;
  };
}

export interface EvalAgentOptions {
  task: string;
  browser: BrowserActions;
  client: ModelClient;
  model: string;
  maxSteps: number;
  onStep?: (step: number, url: string, output: string) => void;
}

export interface EvalAgentResult {
  success: boolean;
  finalResult: string;
  steps: number;
  errors: string[];
}

type ToolOutput = string | Array<Anthropic.TextBlockParam | Anthropic.ImageBlockParam>;

export const AGENT_TOOLS: Anthropic.Tool[] = [
  {
    name: 'go_to_url',
    description: 'Navigate the current tab to a URL.',
    input_schema: {
      type: 'object',
      properties: { url: { type: 'string', description: 'Absolute URL to open' } },
      required: ['url'],
    },
  },
  {
    name: 'click_element',
    description: 'Click an element by the CSS selector shown in the page state.',
    input_schema: {
      type: 'object',
      properties: { selector: { type: 'string', description: 'CSS selector of the element' } },
      required: ['selector'],
    },
  },
  {
    name: 'input_text',
    description: 'Clear an input field and type text into it.',
    input_schema: {
      type: 'object',
      properties: {
        selector: { type: 'string', description: 'CSS selector of the input' },
        text: { type: 'string', description: 'Text to type' },
      },
      required: ['selector', 'text'],
    },
  },
  {
    name: 'send_keys',
    description: 'Press a key or chord on the focused element, e.g. "Enter", "Escape", "Control+A".',
    input_schema: {
      type: 'object',
      properties: { keys: { type: 'string', description: 'Key to press' } },
      required: ['keys'],
    },
  },
  {
    name: 'scroll',
    description: 'Scroll the page.',
    input_schema: {
      type: 'object',
      properties: {
        direction: { type: 'string', enum: ['up', 'down', 'left', 'right'] },
        amount: { type: 'number', description: 'Pixels to scroll (default: 500)' },
      },
      required: ['direction'],
    },
  },
  {
    name: 'go_back',
    description: 'Go back in the browser history.',
    input_schema: { type: 'object', properties: {} },
  },
  {
    name: 'wait',
    description: 'Wait for the page to settle.',
    input_schema: {
      type: 'object',
      properties: { seconds: { type: 'number', description: 'Seconds to wait (max 10, default: 2)' } },
    },
  },
  {
    name: 'get_page_state',
    description: 'Get the current URL, title and interactive elements.',
    input_schema: { type: 'object', properties: {} },
  },
  {
    name: 'screenshot',
    description: 'Capture what is currently visible in the viewport.',
    input_schema: { type: 'object', properties: {} },
  },
  {
    name: 'done',
    description: 'Finish the evaluation with the final report.',
    input_schema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'The final UX report' },
        success: { type: 'boolean', description: 'Whether the task could be completed' },
      },
      required: ['text', 'success'],
    },
  },
];

const ToolInputs = {
  go_to_url: z.object({ url: z.string().min(1) }),
  click_element: z.object({ selector: z.string().min(1) }),
  input_text: z.object({ selector: z.string().min(1), text: z.string() }),
  send_keys: z.object({ keys: z.string().min(1) }),
  scroll: z.object({
    direction: z.enum(['up', 'down', 'left', 'right']),
    amount: z.number().positive().optional(),
  }),
  go_back: z.object({}),
  wait: z.object({ seconds: z.number().min(0).max(10).optional() }),
  get_page_state: z.object({}),
  screenshot: z.object({}),
  done: z.object({ text: z.string(), success: z.boolean() }),
};

async function executeTool(
  browser: BrowserActions,
  name: string,
  input: unknown,
): Promise<ToolOutput> {
  switch (name) {
    case 'go_to_url': {
      const { url } = ToolInputs.go_to_url.parse(input);
      return formatPageState(await browser.navigate(url));
    }
    case 'click_element': {
      const { selector } = ToolInputs.click_element.parse(input);
      return formatPageState(await browser.click(selector));
    }
    case 'input_text': {
      const { selector, text } = ToolInputs.input_text.parse(input);
      return formatPageState(await browser.type(selector, text));
    }
    case 'send_keys': {
      const { keys } = ToolInputs.send_keys.parse(input);
      return formatPageState(await browser.press(keys));
    }
    case 'scroll': {
      const { direction, amount } = ToolInputs.scroll.parse(input);
      return formatPageState(await browser.scroll(direction, amount ?? 500));
    }
    case 'go_back':
      return formatPageState(await browser.back());
    case 'wait': {
      const { seconds } = ToolInputs.wait.parse(input);
      return formatPageState(await browser.wait((seconds ?? 2) * 1000));
    }
    case 'get_page_state':
      return formatPageState(await browser.state());
    case 'screenshot': {
      const png = await browser.screenshot();
      return [
        {
          type: 'image',
          source: { type: 'base64', media_type: 'image/png', data: png.toString('base64') },
        },
      ];
    }
    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

function describeCall(call: Anthropic.ToolUseBlock): string {
  return `${call.name}(${JSON.stringify(call.input)})`;
}

export async function runEvalAgent({
  task,
  browser,
  client,
  model,
  maxSteps,
  onStep,
}: EvalAgentOptions): Promise<EvalAgentResult> {
  const messages: Anthropic.MessageParam[] = [{ role: 'user', content: task }];
  const errors: string[] = [];
  let lastText = '';

  for (let step = 1; step <= maxSteps; step++) {
    const response = await client.messages.create({
      model,
      max_tokens: 4096,
      system: SYSTEM_PROMPT,
      tools: AGENT_TOOLS,
      messages,
    });

    const text = response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('\n')
      .trim();
    const toolCalls = response.content.filter(
      (block): block is Anthropic.ToolUseBlock => block.type === 'tool_use',
    );
    if (text) lastText = text;

    onStep?.(step, browser.currentUrl(), text || toolCalls.map(describeCall).join(', '));
    messages.push({ role: 'assistant', content: response.content });

    if (toolCalls.length === 0) {
      return {
        success: true,
        finalResult: text || 'The agent finished without a report.',
        steps: step,
        errors,
      };
    }

    const results: Anthropic.ToolResultBlockParam[] = [];
    for (const call of toolCalls) {
      if (call.name === 'done') {
        const done = ToolInputs.done.safeParse(call.input);
        if (done.success) {
          return { success: done.data.success, finalResult: done.data.text, steps: step, errors };
        }
        results.push({
          type: 'tool_result',
          tool_use_id: call.id,
          content: 'Error: done needs "text" (string) and "success" (boolean)',
          is_error: true,
        });
        continue;
      }

      try {
        const content = await executeTool(browser, call.name, call.input);
        results.push({ type: 'tool_result', tool_use_id: call.id, content });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        errors.push(`${call.name}: ${message}`);
        results.push({
          type: 'tool_result',
          tool_use_id: call.id,
          content: `Error: ${message}`,
          is_error: true,
        });
      }
    }

    messages.push({ role: 'user', content: results });
  }

  return {
    success: false,
    finalResult: lastText
      ? `Stopped after ${maxSteps} steps without a final report. Last output: ${lastText}`
      : `Stopped after ${maxSteps} steps without a final report.`,
    steps: maxSteps,
    errors,
  };
}

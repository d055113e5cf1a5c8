/**
 * The browser actions the evaluation agent may take, backed by a
 * Playwright page. The agent only sees the BrowserActions interface.
 */

import type { Page } from 'playwright-core';
import {
  captureScreenshot,
  describeElements,
  extractInteractiveElements,
  type InteractiveElement,
} from './browser-utils.js';

export type ScrollDirection = 'up' | 'down' | 'left' | 'right';

export interface PageState {
  url: string;
  title: string;
  elements: InteractiveElement[];
}

export interface BrowserActions {
  navigate(url: string): Promise<PageState>;
  click(selector: string): Promise<PageState>;
  type(selector: string, text: string): Promise<PageState>;
  press(key: string): Promise<PageState>;
  scroll(direction: ScrollDirection, amount: number): Promise<PageState>;
  back(): Promise<PageState>;
  wait(ms: number): Promise<PageState>;
  state(): Promise<PageState>;
  screenshot(): Promise<Buffer>;
  currentUrl(): string;
}

export function formatPageState(state: PageState): string {
  return [
    `URL: ${state.url}`,
    `Title: ${state.title || '(untitled)'}`,
    'Interactive elements:',
    describeElements(state.elements),
  ].join('\n');
}

export class PlaywrightActions implements BrowserActions {
  constructor(private readonly page: Page) {}

  async navigate(url: string): Promise<PageState> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: 30_000 });
    await this.page.waitForTimeout(1000);
    return this.state();
  }

  async click(selector: string): Promise<PageState> {
    await this.page.click(selector, { timeout: 10_000 });
    await this.page.waitForTimeout(500);
    return this.state();
  }

  async type(selector: string, text: string): Promise<PageState> {
    await this.page.click(selector, { timeout: 10_000 });
    await this.page.fill(selector, text);
    await this.page.waitForTimeout(300);
    return this.state();
  }

  async press(key: string): Promise<PageState> {
    await this.page.keyboard.press(key);
    await this.page.waitForTimeout(300);
    return this.state();
  }

  async scroll(direction: ScrollDirection, amount: number): Promise<PageState> {
    const deltaX = direction === 'left' ? -amount : direction === 'right' ? amount : 0;
    const deltaY = direction === 'up' ? -amount : direction === 'down' ? amount : 0;
    await this.page.mouse.wheel(deltaX, deltaY);
    await this.page.waitForTimeout(500);
    return this.state();
  }

  async back(): Promise<PageState> {
    await this.page.goBack({ waitUntil: 'domcontentloaded' });
    return this.state();
  }

  async wait(ms: number): Promise<PageState> {
    await this.page.waitForTimeout(ms);
    return this.state();
  }

  async state(): Promise<PageState> {
    const elements = await extractInteractiveElements(this.page);
    return { url: this.page.url(), title: await this.page.title(), elements };
  }

  screenshot(): Promise<Buffer> {
    return captureScreenshot(this.page);
  }

  currentUrl(): string {
    return this.page.url();
  }
}

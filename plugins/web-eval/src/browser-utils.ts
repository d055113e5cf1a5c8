import { existsSync } from 'fs';
import { platform } from 'os';
import type { Page } from 'playwright-core';

/**
 * Finds the local Chrome installation path based on the operating system.
 */
export function findLocalChrome(): string | undefined {
  const systemPlatform = platform();
  const chromePaths: string[] = [];

  if (systemPlatform === 'darwin') {
    chromePaths.push(
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      `${process.env.HOME}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
    );
  } else if (systemPlatform === 'win32') {
    chromePaths.push(
      'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
      `${process.env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`,
    );
  } else {
    chromePaths.push(
      '/usr/bin/google-chrome',
      '/usr/bin/google-chrome-stable',
      '/usr/bin/chromium',
      '/usr/bin/chromium-browser',
      '/snap/bin/chromium',
    );
  }

  return chromePaths.find((p) => existsSync(p));
}

const MAX_SCREENSHOT_SIDE = 2000;

/**
 * PNG of the viewport, downscaled to fit 2000x2000 so it can be sent to
 * the model as-is.
 */
export async function captureScreenshot(page: Page): Promise<Buffer> {
  const rawBuffer = await page.screenshot({ type: 'png' });

  const sharp = (await import('sharp')).default;
  const { width, height } = await sharp(rawBuffer).metadata();

  if (width && height && (width > MAX_SCREENSHOT_SIDE || height > MAX_SCREENSHOT_SIDE)) {
    return sharp(rawBuffer)
      .resize(MAX_SCREENSHOT_SIDE, MAX_SCREENSHOT_SIDE, {
        fit: 'inside',
        withoutEnlargement: true,
      })
      .png()
      .toBuffer();
  }

  return rawBuffer;
}

export interface InteractiveElement {
  index: number;
  tag: string;
  selector: string;
  text: string;
  type: string;
  role: string;
  ariaLabel: string;
  href: string;
  placeholder: string;
  value: string;
  disabled: boolean;
  checked: boolean;
}

/**
 * Visible interactive elements with a CSS selector for each. This is how
 * the agent "reads" a page before deciding what to click or type.
 */
export async function extractInteractiveElements(page: Page): Promise<InteractiveElement[]> {
  return page.evaluate(() => {
    const query = [
      'a', 'button', 'input', 'select', 'textarea', 'summary',
      '[role="button"]', '[role="link"]', '[role="tab"]',
      '[role="menuitem"]', '[role="checkbox"]', '[role="radio"]',
      '[role="switch"]', '[role="combobox"]',
      '[onclick]', '[tabindex]:not([tabindex="-1"])',
    ].join(', ');

    const visible = Array.from(document.querySelectorAll(query)).filter((el) => {
      const style = window.getComputedStyle(el);
      if (style.display === 'none' || style.visibility === 'hidden') return false;
      const rect = el.getBoundingClientRect();
      return rect.width > 0 || rect.height > 0;
    });

    function cssPath(el: Element): string {
      const parts: string[] = [];
      let node: Element | null = el;
      while (node && node !== document.body && parts.length < 5) {
        const current: Element = node;
        const tag = current.tagName.toLowerCase();
        if (current.id) {
          parts.unshift(`#${CSS.escape(current.id)}`);
          break;
        }
        const parent = current.parentElement;
        const siblings = parent
          ? Array.from(parent.children).filter((c) => c.tagName === current.tagName)
          : [];
        parts.unshift(
          siblings.length > 1 ? `${tag}:nth-of-type(${siblings.indexOf(current) + 1})` : tag,
        );
        node = parent;
      }
      return parts.join(' > ');
    }

    return visible.map((el, index) => {
      const tag = el.tagName.toLowerCase();
      const name = el.getAttribute('name') || '';
      const ariaLabel = el.getAttribute('aria-label') || '';
      const testId = el.getAttribute('data-testid');

      let selector: string;
      if (el.id) {
        selector = `#${CSS.escape(el.id)}`;
      } else if (testId) {
        selector = `[data-testid="${CSS.escape(testId)}"]`;
      } else if (name && (tag === 'input' || tag === 'select' || tag === 'textarea')) {
        selector = `${tag}[name="${CSS.escape(name)}"]`;
      } else if (ariaLabel) {
        selector = `${tag}[aria-label="${CSS.escape(ariaLabel)}"]`;
      } else {
        selector = cssPath(el);
      }

      const input = el instanceof HTMLInputElement ? el : null;
      const field = input ?? (el instanceof HTMLTextAreaElement ? el : null);

      return {
        index,
        tag,
        selector,
        text: (el.textContent || '').trim().replace(/\s+/g, ' ').slice(0, 100),
        type: el.getAttribute('type') || '',
        role: el.getAttribute('role') || '',
        ariaLabel,
        href: el.getAttribute('href') || '',
        placeholder: el.getAttribute('placeholder') || '',
        value: field?.value ?? '',
        disabled: el.hasAttribute('disabled'),
        checked: input?.checked ?? false,
      };
    });
  });
}

/**
 * One line per element, e.g. `[3] button "Sign in" (#login)`.
 */
export function describeElements(elements: InteractiveElement[], limit = 80): string {
  if (elements.length === 0) {
    return '(no interactive elements)';
  }

  const lines = elements.slice(0, limit).map((el) => {
    const parts = [`[${el.index}]`, el.role || el.tag];
    if (el.type) parts.push(`type=${el.type}`);
    const label = el.text || el.ariaLabel || el.placeholder;
    if (label) parts.push(`"${label}"`);
    if (el.value) parts.push(`value="${el.value}"`);
    if (el.href) parts.push(`href=${el.href}`);
    if (el.disabled) parts.push('disabled');
    if (el.checked) parts.push('checked');
    parts.push(`(${el.selector})`);
    return parts.join(' ');
  });

  if (elements.length > limit) {
    lines.push(`... ${elements.length - limit} more`);
  }
  return lines.join('\n');
}

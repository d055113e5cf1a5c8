/**
 * Captures the evaluation browser's console output and network traffic.
 *
 * Only the most recent entries are kept; everything is also relayed to the
 * dashboard as it happens.
 */

import type { BrowserContext, ConsoleMessage, Request } from 'playwright-core';
import type { LogSink } from './log-server.js';

export const MAX_LOG_ENTRIES = 10;

const STATIC_ASSET_EXTENSIONS = [
  '.js', '.css', '.woff', '.woff2', '.ttf', '.eot', '.svg',
  '.png', '.jpg', '.jpeg', '.gif', '.ico', '.map',
];

/**
 * Static assets and dependency bundles are noise for a UX report; API
 * calls and page loads are what we want to see.
 */
export function shouldLogNetworkRequest(url: string): boolean {
  if (url.includes('/node_modules/')) return false;
  for (const ext of STATIC_ASSET_EXTENSIONS) {
    if (url.endsWith(ext) || url.includes(`${ext}?`)) return false;
  }
  return true;
}

export type ConsoleMessageLike = Pick<ConsoleMessage, 'type' | 'text' | 'location'>;

export type RequestLike = Pick<
  Request,
  'url' | 'method' | 'allHeaders' | 'postDataBuffer' | 'resourceType' | 'isNavigationRequest'
>;

export interface ResponseLike {
  url(): string;
  status(): number;
  allHeaders(): Promise<Record<string, string>>;
  body(): Promise<Buffer>;
  request(): RequestLike;
}

export interface ConsoleLogEntry {
  type: string;
  text: string;
  location: { url: string; lineNumber: number; columnNumber: number };
  timestamp: number;
}

export interface NetworkRequestEntry {
  url: string;
  method: string;
  headers: Record<string, string>;
  postData: string | null;
  timestamp: number;
  resourceType: string;
  isNavigation: boolean;
  responseStatus?: number;
  responseHeaders?: Record<string, string>;
  responseBodySize?: number;
  responseTimestamp?: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class BrowserLogCollector {
  private readonly consoleEntries: ConsoleLogEntry[] = [];
  private readonly networkEntries: NetworkRequestEntry[] = [];
  private pending = new WeakMap<RequestLike, NetworkRequestEntry>();

  constructor(
    private readonly log: LogSink,
    private readonly maxEntries = MAX_LOG_ENTRIES,
  ) {}

  get consoleLogs(): ConsoleLogEntry[] {
    return [...this.consoleEntries];
  }

  get networkRequests(): NetworkRequestEntry[] {
    return [...this.networkEntries];
  }

  clear(): void {
    this.consoleEntries.length = 0;
    this.networkEntries.length = 0;
    this.pending = new WeakMap();
  }

  attach(context: BrowserContext): void {
    context.on('console', (message) => this.handleConsole(message));
    context.on('request', (request) => {
      void this.handleRequest(request);
    });
    context.on('response', (response) => {
      void this.handleResponse(response);
    });
  }

  handleConsole(message: ConsoleMessageLike): void {
    try {
      const entry: ConsoleLogEntry = {
        type: message.type(),
        text: message.text(),
        location: message.location(),
        timestamp: Date.now(),
      };
      this.push(this.consoleEntries, entry);
      this.log(`CONSOLE [${entry.type}]: ${entry.text}`, '🖥️', 'console');
    } catch (err) {
      this.log(`Error handling console message: ${errorMessage(err)}`, '❌', 'status');
    }
  }

  async handleRequest(request: RequestLike): Promise<void> {
    let url = 'Unknown URL';
    try {
      url = request.url();
      if (!shouldLogNetworkRequest(url)) return;

      let headers: Record<string, string>;
      try {
        headers = await request.allHeaders();
      } catch (err) {
        headers = { error: `Req Header Error: ${errorMessage(err)}` };
      }

      let postData: string | null;
      try {
        const buffer = request.postDataBuffer();
        postData = buffer === null ? null : buffer.toString('utf-8');
      } catch (err) {
        postData = `Post Data Error: ${errorMessage(err)}`;
      }

      const entry: NetworkRequestEntry = {
        url,
        method: request.method(),
        headers,
        postData,
        timestamp: Date.now(),
        resourceType: request.resourceType(),
        isNavigation: request.isNavigationRequest(),
      };
      this.push(this.networkEntries, entry);
      this.pending.set(request, entry);
      this.log(`NET REQ [${entry.method}]: ${entry.url}`, '➡️', 'network');
    } catch (err) {
      this.log(`Error handling request event for ${url}: ${errorMessage(err)}`, '❌', 'status');
    }
  }

  async handleResponse(response: ResponseLike): Promise<void> {
    const url = response.url();
    if (!shouldLogNetworkRequest(url)) return;

    try {
      let headers: Record<string, string>;
      try {
        headers = await response.allHeaders();
      } catch (err) {
        headers = { error: `Resp Header Error: ${errorMessage(err)}` };
      }

      const status = response.status();
      let bodySize = -1;
      try {
        bodySize = (await response.body()).length;
      } catch (err) {
        // redirects and aborted requests have no body
        console.error(`[web-eval] Could not read response body for ${url}: ${errorMessage(err)}`);
      }

      const entry = this.pending.get(response.request());
      if (entry && entry.responseStatus === undefined && this.networkEntries.includes(entry)) {
        entry.responseStatus = status;
        entry.responseHeaders = headers;
        entry.responseBodySize = bodySize;
        entry.responseTimestamp = Date.now();
        this.log(`NET RESP [${status}]: ${url}`, '⬅️', 'network');
      } else {
        this.log(`NET RESP* [${status}]: ${url} (req not matched/updated)`, '⬅️', 'network');
      }
    } catch (err) {
      this.log(`Error handling response event for ${url}: ${errorMessage(err)}`, '❌', 'status');
    }
  }

  /**
   * Plain-text digest of what was captured, for the tool result.
   */
  summarize(): string {
    const lines: string[] = [];

    lines.push(`Console messages (last ${this.maxEntries}):`);
    if (this.consoleEntries.length === 0) {
      lines.push('  (none)');
    }
    for (const entry of this.consoleEntries) {
      const where = entry.location.url
        ? ` (${entry.location.url}:${entry.location.lineNumber})`
        : '';
      lines.push(`  [${entry.type}] ${entry.text}${where}`);
    }

    lines.push(`Network requests (last ${this.maxEntries}):`);
    if (this.networkEntries.length === 0) {
      lines.push('  (none)');
    }
    for (const entry of this.networkEntries) {
      const status = entry.responseStatus ?? 'pending';
      lines.push(`  ${entry.method} ${entry.url} -> ${status}`);
    }

    return lines.join('\n');
  }

  private push<T>(target: T[], entry: T): void {
    target.push(entry);
    if (target.length > this.maxEntries) {
      target.splice(0, target.length - this.maxEntries);
    }
  }
}

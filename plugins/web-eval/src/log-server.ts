/**
 * Log relay for the Control Center dashboard.
 *
 * Serves the static dashboard page and pushes every log line to connected
 * browsers over a WebSocket at /ws. New clients first receive the recent
 * history so a dashboard opened mid-run still shows the whole run.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { readFile } from 'fs/promises';
import { spawn } from 'child_process';
import { WebSocketServer, WebSocket } from 'ws';
import { DASHBOARD_HTML_PATH } from './config.js';

export type LogType = 'agent' | 'console' | 'network' | 'status';

export interface LogMessage {
  id: number;
  type: LogType;
  message: string;
  emoji: string;
  timestamp: string;
}

export type ServerEvent =
  | { kind: 'history'; logs: LogMessage[] }
  | { kind: 'log'; log: LogMessage }
  | { kind: 'clear' };

export type LogSink = (message: string, emoji: string, type: LogType) => void;

const MAX_HISTORY = 1000;

export class LogServer {
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private starting: Promise<string> | null = null;
  private readonly clients = new Set<WebSocket>();
  private readonly history: LogMessage[] = [];
  private nextId = 1;

  constructor(
    private readonly maxHistory = MAX_HISTORY,
    private readonly dashboardPath = DASHBOARD_HTML_PATH,
  ) {}

  get running(): boolean {
    return this.server !== null;
  }

  /**
   * Base URL of the dashboard, e.g. `http://127.0.0.1:5009`.
   */
  get url(): string {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Log server is not listening');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  /**
   * Concurrent calls share one listen attempt.
   */
  async start(port: number): Promise<string> {
    if (this.server) {
      return this.url;
    }
    if (!this.starting) {
      this.starting = this.listen(port).finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async listen(port: number): Promise<string> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err) => {
        console.error('[log-server] Request failed:', err);
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'text/plain' });
        }
        res.end('Internal error');
      });
    });

    await new Promise<void>((resolveListen, reject) => {
      server.once('error', reject);
      server.listen(port, '127.0.0.1', () => {
        server.off('error', reject);
        resolveListen();
      });
    });

    const wss = new WebSocketServer({ server, path: '/ws' });
    wss.on('connection', (ws) => this.handleConnection(ws));
    wss.on('error', (err) => {
      console.error('[log-server] WebSocket error:', err);
    });

    this.server = server;
    this.wss = wss;
    console.error(`[log-server] Dashboard available at ${this.url}`);
    return this.url;
  }

  async stop(): Promise<void> {
    for (const client of this.clients) {
      client.terminate();
    }
    this.clients.clear();

    const wss = this.wss;
    const server = this.server;
    this.wss = null;
    this.server = null;

    if (wss) {
      await new Promise<void>((done) => wss.close(() => done()));
    }
    if (server) {
      await new Promise<void>((done, reject) =>
        server.close((err) => (err ? reject(err) : done())),
      );
    }
  }

  /**
   * Record a log line and push it to every open dashboard.
   */
  send(message: string, emoji: string, type: LogType): LogMessage {
    const log: LogMessage = {
      id: this.nextId++,
      type,
      message,
      emoji,
      timestamp: new Date().toISOString(),
    };

    this.history.push(log);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }

    this.broadcast({ kind: 'log', log });
    return log;
  }

  clear(): void {
    this.history.length = 0;
    this.broadcast({ kind: 'clear' });
  }

  getHistory(): LogMessage[] {
    return [...this.history];
  }

  private broadcast(event: ServerEvent): void {
    const payload = JSON.stringify(event);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  private handleConnection(ws: WebSocket): void {
    this.clients.add(ws);
    ws.send(JSON.stringify({ kind: 'history', logs: this.getHistory() } satisfies ServerEvent));

    ws.on('close', () => {
      this.clients.delete(ws);
    });
    ws.on('error', (err) => {
      console.error('[log-server] Client error:', err.message);
      this.clients.delete(ws);
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = new URL(req.url ?? '/', 'http://127.0.0.1').pathname;

    if (req.method !== 'GET') {
      res.writeHead(405, { Allow: 'GET' });
      res.end();
      return;
    }

    if (pathname === '/' || pathname === '/index.html') {
      const html = await readFile(this.dashboardPath, 'utf-8');
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(html);
      return;
    }

    if (pathname === '/api/logs') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ logs: this.getHistory() }));
      return;
    }

    res.writeHead(404, { 'Content-Type': 'text/plain' });
    res.end('Not found');
  }
}

// ---------- Process-wide relay ----------

let _logServer: LogServer | null = null;
let _pendingStart: Promise<DashboardHandle | null> | null = null;

export function getLogServer(): LogServer {
  if (!_logServer) {
    _logServer = new LogServer();
  }
  return _logServer;
}

export const sendLog: LogSink = (message, emoji, type) => {
  getLogServer().send(message, emoji, type);
};

export interface DashboardHandle {
  url: string;
  /** True only for the call that actually started the relay. */
  started: boolean;
}

/**
 * Start the shared relay if it isn't running. Returns null when the port is
 * taken (another server instance already owns the dashboard); log lines are
 * still kept in history in that case.
 */
export async function startLogServer(port: number): Promise<DashboardHandle | null> {
  const server = getLogServer();
  if (server.running) {
    return { url: server.url, started: false };
  }

  if (_pendingStart) {
    const handle = await _pendingStart;
    return handle && { url: handle.url, started: false };
  }

  _pendingStart = launchLogServer(server, port).finally(() => {
    _pendingStart = null;
  });
  return _pendingStart;
}

async function launchLogServer(server: LogServer, port: number): Promise<DashboardHandle | null> {
  try {
    return { url: await server.start(port), started: true };
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
      console.error(`[log-server] Port ${port} is already in use, dashboard not started`);
      return null;
    }
    throw err;
  }
}

/**
 * Open a URL with the platform's default handler.
 */
export function openInBrowser(url: string): void {
  const [command, args]: [string, string[]] =
    process.platform === 'darwin'
      ? ['open', [url]]
      : process.platform === 'win32'
        ? ['cmd', ['/c', 'start', '', url]]
        : ['xdg-open', [url]];

  const child = spawn(command, args, { stdio: 'ignore', detached: true });
  child.on('error', (err) => {
    console.error(`[log-server] Could not open ${url}: ${err.message}`);
  });
  child.unref();
}

import http, { type IncomingMessage } from 'node:http';
import type { Logger } from '@pinebridge/shared';
import { DEFAULT_HOST, DEFAULT_PORT } from './app.ts';

export interface FetchApp {
  fetch(request: Request): Response | Promise<Response>;
}

export interface ServerOptions {
  port?: number;
  host?: string;
  logger?: Logger;
}

function toHeaders(req: IncomingMessage): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    for (const item of Array.isArray(value) ? value : [value]) headers.append(name, item);
  }
  return headers;
}

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/** Bridges node:http to a fetch-style app and resolves once listening. */
export async function startServer(app: FetchApp, options: ServerOptions = {}): Promise<http.Server> {
  const port = options.port ?? DEFAULT_PORT;
  const host = options.host ?? DEFAULT_HOST;
  const logger = options.logger;

  const server = http.createServer((req, res) => {
    const respond = async (): Promise<void> => {
      const hasBody = req.method !== 'GET' && req.method !== 'HEAD';
      const response = await app.fetch(
        new Request(`http://${req.headers.host ?? `${host}:${port}`}${req.url ?? '/'}`, {
          method: req.method,
          headers: toHeaders(req),
          body: hasBody ? await readBody(req) : undefined,
        }),
      );
      res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
      if (response.body) {
        const reader = response.body.getReader();
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;
          res.write(value);
        }
      }
      res.end();
    };
    respond().catch((err: unknown) => {
      logger?.error({ err, url: req.url }, 'failed to serve request');
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  logger?.info({ host, port: addressPort(server) ?? port }, 'PINE HTTP API listening');
  return server;
}

export function addressPort(server: http.Server): number | undefined {
  const info = server.address();
  return typeof info === 'object' && info !== null ? info.port : undefined;
}

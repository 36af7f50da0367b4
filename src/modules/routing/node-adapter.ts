/**
 * node:http bridge for the fetch-style router
 */

import http from 'node:http';
import type { Logger } from '../monitoring';
import type { Router } from './router';

/**
 * Buffer a Node request into a web Request
 */
export async function toWebRequest(req: http.IncomingMessage, baseUrl: string): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }

  const method = (req.method ?? 'GET').toUpperCase();
  let body: Buffer | undefined;
  if (method !== 'GET' && method !== 'HEAD') {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    body = Buffer.concat(chunks);
  }

  return new Request(new URL(req.url ?? '/', baseUrl), { method, headers, body });
}

async function writeWebResponse(response: Response, res: http.ServerResponse): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });
  res.writeHead(response.status, headers);
  res.end(Buffer.from(await response.arrayBuffer()));
}

/**
 * Serve the router on the given port; resolves once listening
 */
export function startHttpServer(router: Router, port: number, logger: Logger): Promise<http.Server> {
  const baseUrl = `http://localhost:${port}`;
  const server = http.createServer((req, res) => {
    toWebRequest(req, baseUrl)
      .then(request => router.handle(request))
      .then(response => writeWebResponse(response, res))
      .catch((error: unknown) => {
        logger.error('Failed to serve request', { method: req.method, url: req.url }, error);
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
        }
        res.end(JSON.stringify({ error: { message: 'Internal server error', type: 'internal_error' } }));
      });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      logger.info('HTTP server listening', { port });
      resolve(server);
    });
  });
}

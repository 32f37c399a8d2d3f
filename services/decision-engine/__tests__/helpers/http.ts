/**
 * In-process HTTP helpers for API tests. Servers listen on an ephemeral
 * port on 127.0.0.1.
 */

import http from 'http';
import type { Express } from 'express';

export interface TestResponse {
  statusCode: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export function startServer(app: Express): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => resolve(server));
    server.on('error', reject);
  });
}

export function stopServer(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

function portOf(server: http.Server): number {
  const addr = server.address();
  if (!addr || typeof addr === 'string') {
    throw new Error('Server not listening on a port');
  }
  return addr.port;
}

/**
 * Make an HTTP request to a running server. A `json` body is serialized and
 * sent with a JSON content type; `raw` is sent as-is.
 */
export function makeRequest(
  server: http.Server,
  options: {
    method?: string;
    path?: string;
    headers?: Record<string, string>;
    json?: unknown;
    raw?: string;
  } = {}
): Promise<TestResponse> {
  const { method = 'GET', path = '/', headers = {} } = options;
  const payload = options.json !== undefined ? JSON.stringify(options.json) : options.raw;
  const requestHeaders: Record<string, string> = { ...headers };
  if (payload !== undefined) {
    requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
    requestHeaders['Content-Length'] = Buffer.byteLength(payload).toString();
  }

  return new Promise((resolve, reject) => {
    const req = http.request(
      { hostname: '127.0.0.1', port: portOf(server), path, method, headers: requestHeaders },
      res => {
        let body = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => (body += chunk));
        res.on('end', () => resolve({ statusCode: res.statusCode ?? 0, headers: res.headers, body }));
      }
    );
    req.on('error', reject);
    if (payload !== undefined) {
      req.write(payload);
    }
    req.end();
  });
}

/**
 * Open a server-sent event stream, call `onConnected` once the greeting
 * arrives, and resolve with everything read up to `marker`.
 */
export function readStreamUntil(
  server: http.Server,
  path: string,
  marker: string,
  onConnected: () => Promise<unknown>
): Promise<{ headers: http.IncomingHttpHeaders; text: string }> {
  return new Promise((resolve, reject) => {
    const req = http.get({ hostname: '127.0.0.1', port: portOf(server), path }, res => {
      let text = '';
      let connected = false;
      res.setEncoding('utf8');
      res.on('data', (chunk: string) => {
        text += chunk;
        if (!connected && text.includes(': connected')) {
          connected = true;
          onConnected().catch(reject);
        }
        if (text.includes(marker)) {
          req.destroy();
          resolve({ headers: res.headers, text });
        }
      });
    });
    req.on('error', reject);
  });
}

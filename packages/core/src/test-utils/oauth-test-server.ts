/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import http from 'node:http';

export interface RecordedRequest {
  method: string;
  path: string;
  form: URLSearchParams;
}

export interface CannedReply {
  status: number;
  /** Objects are sent as JSON, strings verbatim */
  body: unknown;
}

export interface OAuthTestServer {
  readonly url: string;
  readonly requests: RecordedRequest[];
  /**
   * Queues replies for a path. The last reply repeats once the queue is
   * down to one entry.
   */
  reply(path: string, ...replies: CannedReply[]): void;
  close(): Promise<void>;
}

/**
 * In-process stand-in for a provider's token endpoints, bound to an
 * ephemeral port on 127.0.0.1.
 */
export async function startOAuthTestServer(): Promise<OAuthTestServer> {
  const queues = new Map<string, CannedReply[]>();
  const requests: RecordedRequest[] = [];

  const server = http.createServer((request, response) => {
    const chunks: Buffer[] = [];
    request.on('data', (chunk: Buffer) => chunks.push(chunk));
    request.on('end', () => {
      const path = new URL(request.url ?? '/', 'http://127.0.0.1').pathname;
      requests.push({
        method: request.method ?? 'GET',
        path,
        form: new URLSearchParams(Buffer.concat(chunks).toString('utf8')),
      });

      const queue = queues.get(path);
      const next =
        queue === undefined || queue.length === 0
          ? undefined
          : queue.length === 1
            ? queue[0]
            : queue.shift();
      if (next === undefined) {
        response.statusCode = 404;
        response.end();
        return;
      }
      const isText = typeof next.body === 'string';
      response.statusCode = next.status;
      response.setHeader(
        'Content-Type',
        isText ? 'text/plain' : 'application/json',
      );
      response.end(isText ? String(next.body) : JSON.stringify(next.body));
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      server.removeListener('error', reject);
      resolve();
    });
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('OAuth test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    reply(path: string, ...replies: CannedReply[]) {
      queues.set(path, [...replies]);
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

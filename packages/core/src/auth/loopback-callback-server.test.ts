/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, afterEach } from 'vitest';
import http from 'node:http';
import net from 'node:net';
import {
  LoopbackCallbackServer,
  type LoopbackCallbackServerOptions,
} from './loopback-callback-server.js';
import {
  CancelledError,
  DeniedError,
  MissingParameterError,
  NetworkError,
  TimeoutError,
} from './oauth-errors.js';

const AUTHORIZE_URL = 'https://auth.example.test/authorize';

interface SimpleResponse {
  status: number;
  location: string | undefined;
  body: string;
}

function request(url: string, method = 'GET'): Promise<SimpleResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(url, { method, agent: false }, (response) => {
      const chunks: Buffer[] = [];
      response.on('data', (chunk: Buffer) => chunks.push(chunk));
      response.on('end', () =>
        resolve({
          status: response.statusCode ?? 0,
          location: response.headers.location,
          body: Buffer.concat(chunks).toString('utf8'),
        }),
      );
    });
    req.on('error', reject);
    req.end();
  });
}

/** Sends raw bytes, for request lines an HTTP client refuses to build */
function rawRequest(url: string, head: string): Promise<string> {
  const { port, hostname } = new URL(url);
  return new Promise((resolve, reject) => {
    const socket = net.connect(Number(port), hostname, () => {
      socket.write(head);
    });
    const chunks: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    socket.on('error', reject);
  });
}

describe('LoopbackCallbackServer', () => {
  const servers: LoopbackCallbackServer[] = [];

  function createServer(
    options: Partial<LoopbackCallbackServerOptions> = {},
  ): LoopbackCallbackServer {
    const server = new LoopbackCallbackServer({
      nonce: 'nonce-123',
      timeoutMs: 5000,
      ...options,
    });
    servers.push(server);
    return server;
  }

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.stop()));
  });

  it('captures the authorization code and releases the port', async () => {
    const server = createServer();
    const started = await server.start(
      (redirectUri) =>
        `${AUTHORIZE_URL}?redirect_uri=${encodeURIComponent(redirectUri)}`,
    );

    expect(started.redirectUri).toMatch(
      /^http:\/\/127\.0\.0\.1:\d+\/callback$/,
    );
    expect(server.state).toBe('waiting');

    const response = await request(
      `${started.redirectUri}?code=auth-code&state=nonce-123`,
    );

    expect(response.status).toBe(200);
    expect(response.body).toContain('Authentication Complete');
    await expect(started.result).resolves.toBe('auth-code');
    expect(server.state).not.toBe('waiting');

    await server.stop();
    expect(server.state).toBe('closed');
    await expect(request(started.redirectUri)).rejects.toThrow(/ECONNREFUSED/);
  });

  it('keeps waiting after a callback with a foreign state', async () => {
    const server = createServer();
    const started = await server.start(() => AUTHORIZE_URL);

    const forged = await request(
      `${started.redirectUri}?code=evil&state=someone-else`,
    );

    expect(forged.status).toBe(400);
    expect(server.state).toBe('waiting');

    const genuine = await request(
      `${started.redirectUri}?code=auth-code&state=nonce-123`,
    );

    expect(genuine.status).toBe(200);
    await expect(started.result).resolves.toBe('auth-code');
  });

  it('rejects a callback without a code', async () => {
    const server = createServer();
    const started = await server.start(() => AUTHORIZE_URL);
    const outcome = started.result.catch((error: unknown) => error);

    const response = await request(`${started.redirectUri}?state=nonce-123`);

    expect(response.status).toBe(400);
    const error = await outcome;
    expect(error).toBeInstanceOf(MissingParameterError);
    expect(error).toMatchObject({ parameters: ['code'] });
    expect(server.state).not.toBe('waiting');
  });

  it('names every missing parameter', async () => {
    const server = createServer();
    const started = await server.start(() => AUTHORIZE_URL);
    const outcome = started.result.catch((error: unknown) => error);

    const response = await request(started.redirectUri);

    expect(response.status).toBe(400);
    expect(await outcome).toMatchObject({
      message:
        'OAuth callback missing required parameter(s): code, state',
    });
  });

  it('reports an authorization error from the provider', async () => {
    const server = createServer();
    const started = await server.start(() => AUTHORIZE_URL);
    const outcome = started.result.catch((error: unknown) => error);

    const response = await request(
      `${started.redirectUri}?error=access_denied&state=nonce-123`,
    );

    expect(response.status).toBe(400);
    const error = await outcome;
    expect(error).toBeInstanceOf(DeniedError);
    expect(error).toMatchObject({ message: 'access_denied' });
  });

  it('answers 400 to a malformed request target', async () => {
    const server = createServer();
    const started = await server.start(() => AUTHORIZE_URL);

    const reply = await rawRequest(
      started.redirectUri,
      'GET http://[ HTTP/1.1\r\nHost: 127.0.0.1\r\n\r\n',
    );

    expect(reply.split('\r\n')[0]).toBe('HTTP/1.1 400 Bad Request');
    expect(server.state).toBe('waiting');
    const genuine = await request(
      `${started.redirectUri}?code=auth-code&state=nonce-123`,
    );
    expect(genuine.status).toBe(200);
    await expect(started.result).resolves.toBe('auth-code');
  });

  it('redirects the sign-in path to the authorization URL', async () => {
    const server = createServer();
    const started = await server.start(
      (redirectUri) =>
        `${AUTHORIZE_URL}?redirect_uri=${encodeURIComponent(redirectUri)}`,
    );

    const response = await request(started.signInUri);

    expect(started.signInUri).toBe(
      started.redirectUri.replace(/\/callback$/, '/signin'),
    );
    expect(response.status).toBe(302);
    expect(response.location).toBe(
      `${AUTHORIZE_URL}?redirect_uri=${encodeURIComponent(started.redirectUri)}`,
    );
    expect(server.state).toBe('waiting');
  });

  it('answers 404 for unknown paths and 405 for other methods', async () => {
    const server = createServer();
    const started = await server.start(() => AUTHORIZE_URL);
    const origin = new URL(started.redirectUri).origin;

    expect((await request(`${origin}/favicon.ico`)).status).toBe(404);
    expect(
      (await request(`${started.redirectUri}?code=a&state=nonce-123`, 'POST'))
        .status,
    ).toBe(405);
    expect(server.state).toBe('waiting');
  });

  it('times out and releases the port', async () => {
    const server = createServer({ timeoutMs: 50 });
    const started = await server.start(() => AUTHORIZE_URL);

    await expect(started.result).rejects.toThrow(
      new TimeoutError('Loopback callback', 50),
    );
    await server.stop();
    expect(server.state).toBe('closed');
    await expect(request(started.redirectUri)).rejects.toThrow(/ECONNREFUSED/);
  });

  it('is cancelled through its abort signal', async () => {
    const controller = new AbortController();
    const server = createServer({ signal: controller.signal });
    const started = await server.start(() => AUTHORIZE_URL);
    const outcome = started.result.catch((error: unknown) => error);

    controller.abort();

    expect(await outcome).toBeInstanceOf(CancelledError);
    await server.stop();
    expect(server.state).toBe('closed');
  });

  it('releases the port when aborted while binding', async () => {
    const controller = new AbortController();
    const server = createServer({ signal: controller.signal });

    const starting = server.start(() => AUTHORIZE_URL);
    controller.abort();

    await expect(starting).rejects.toBeInstanceOf(CancelledError);
    expect(server.state).toBe('closed');
  });

  it('cancels a waiting flow when stopped', async () => {
    const server = createServer();
    const started = await server.start(() => AUTHORIZE_URL);
    const outcome = started.result.catch((error: unknown) => error);

    await server.stop();

    expect(await outcome).toBeInstanceOf(CancelledError);
    expect(server.state).toBe('closed');
  });

  it('surfaces a bind failure from start', async () => {
    const first = createServer();
    const started = await first.start(() => AUTHORIZE_URL);
    const port = Number(new URL(started.redirectUri).port);

    const second = createServer({ port });

    await expect(second.start(() => AUTHORIZE_URL)).rejects.toBeInstanceOf(
      NetworkError,
    );
    expect(second.state).toBe('closed');
  });
});

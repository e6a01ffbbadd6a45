import express from 'express';
import { Server } from 'http';

export interface TestResponse {
  status: number;
  headers: Headers;
  body: Buffer;
  text: string;
}

export interface RequestOptions {
  body?: string | Buffer;
  headers?: Record<string, string>;
}

/** Serve `app` on an ephemeral loopback port for a single request. */
export async function request(
  app: express.Application,
  method: string,
  path: string,
  options: RequestOptions = {},
): Promise<TestResponse> {
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  try {
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not bound to a port');
    const res = await fetch(`http://127.0.0.1:${address.port}${path}`, {
      method,
      headers: options.headers,
      body: options.body,
    });
    const body = Buffer.from(await res.arrayBuffer());
    return { status: res.status, headers: res.headers, body, text: body.toString('utf8') };
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

export function json(res: TestResponse): unknown {
  return JSON.parse(res.text);
}

// @vitest-environment node

import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createHttpApp, type HttpAppOptions } from './create-http-app.js';

let server: Server | null = null;

const listen = async (options: HttpAppOptions): Promise<string> =>
  new Promise<string>((resolve) => {
    const listening = createHttpApp(options).listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = listening.address();
      resolve(typeof address === 'object' && address ? `http://127.0.0.1:${address.port}` : '');
    });
    server = listening;
  });

afterEach(async () => {
  const active = server;
  server = null;
  if (!active) {
    return;
  }
  await new Promise<void>((resolve) => {
    active.close(() => resolve());
  });
});

describe('http app', () => {
  it('runs the request hook before reporting health', async () => {
    let drawn = 0;
    const onRequest = vi.fn(() => {
      drawn = 2;
    });
    const baseUrl = await listen({
      publicDir: '/nonexistent-public',
      instructionsPath: '/nonexistent-instructions.docx',
      drawnCount: () => drawn,
      onRequest,
    });

    const response = await fetch(`${baseUrl}/healthz`);

    expect(await response.json()).toEqual({ ok: true, drawn: 2 });
    expect(onRequest).toHaveBeenCalledTimes(1);
  });

  it('runs the request hook for routes that fail too', async () => {
    const onRequest = vi.fn();
    const baseUrl = await listen({
      publicDir: '/nonexistent-public',
      instructionsPath: '/nonexistent-instructions.docx',
      drawnCount: () => 0,
      onRequest,
    });

    const response = await fetch(`${baseUrl}/instructions`);

    expect(response.status).toBe(404);
    expect(onRequest).toHaveBeenCalledTimes(1);
  });
});

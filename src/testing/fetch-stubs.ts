/**
 * Fetch stubs for transport-level tests.
 */

import { vi } from 'vitest';
import type { HttpRequestInit } from '../album/http';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * fetch stub answering each call with the next response in the list.
 */
export function queuedFetch(...responses: Response[]) {
  const queue = [...responses];
  return vi.fn(async (_url: string, _init: HttpRequestInit): Promise<Response> => {
    const next = queue.shift();
    if (!next) {
      throw new Error('Unexpected request');
    }
    return next;
  });
}

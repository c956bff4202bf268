/**
 * Scripted fetch for adapter tests
 */

import { vi } from 'vitest';
import type { FetchLike } from '../../src/lib/http-client.js';

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

type Reply = Response | Error | ((request: RecordedRequest) => Response);

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers }
  });
}

function headersToRecord(headers: HeadersInit | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

/**
 * Fetch stub answering requests with the queued replies, in order
 */
export function createFetchStub(...replies: Reply[]) {
  const queue = [...replies];
  const requests: RecordedRequest[] = [];

  const fetchFn = vi.fn<FetchLike>(async (input, init) => {
    const request: RecordedRequest = {
      url: input,
      method: init?.method ?? 'GET',
      headers: headersToRecord(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
    };
    requests.push(request);

    const reply = queue.shift();
    if (reply === undefined) {
      throw new Error(`Unexpected request: ${request.method} ${request.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(request) : reply;
  });

  return {
    fetch: fetchFn,
    requests,
    /** Queue more replies */
    reply(...more: Reply[]) {
      queue.push(...more);
    }
  };
}

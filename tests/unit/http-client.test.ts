import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { requestJson, trimTrailingSlash } from '../../src/lib/http-client.js';
import { createFetchStub, jsonResponse } from '../helpers/fetch-stub.js';

const Schema = z.object({ value: z.number() });

function request(body?: unknown) {
  return {
    service: 'Test service',
    method: 'POST' as const,
    url: 'https://api.example.test/things',
    headers: { 'Api-Key': 'test-secret' },
    body,
    schema: Schema,
    timeoutMs: 1000
  };
}

describe('requestJson', () => {
  it('should send a JSON body and return the validated response', async () => {
    const stub = createFetchStub(jsonResponse(200, { value: 7, extra: true }));

    const result = await requestJson(stub.fetch, request({ name: 'x' }));

    expect(result._unsafeUnwrap()).toEqual({ value: 7 });
    expect(stub.requests[0]).toEqual({
      url: 'https://api.example.test/things',
      method: 'POST',
      headers: {
        accept: 'application/json',
        'content-type': 'application/json',
        'api-key': 'test-secret'
      },
      body: { name: 'x' }
    });
  });

  it('should parse an empty success body as an empty object', async () => {
    const stub = createFetchStub(new Response('', { status: 200 }));

    const result = await requestJson(stub.fetch, { ...request(), schema: z.object({}).passthrough() });

    expect(result._unsafeUnwrap()).toEqual({});
  });

  it('should map error statuses onto provider errors', async () => {
    const stub = createFetchStub(jsonResponse(503, { message: 'overloaded' }));

    const error = (await requestJson(stub.fetch, request()))._unsafeUnwrapErr();

    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.message).toBe('Test service responded with HTTP 503: {"message":"overloaded"}');
  });

  it('should reject bodies that are not JSON', async () => {
    const stub = createFetchStub(new Response('<html>', { status: 200 }));

    const error = (await requestJson(stub.fetch, request()))._unsafeUnwrapErr();

    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.message).toBe('Test service returned a body that is not JSON');
  });

  it('should reject responses that do not match the schema', async () => {
    const stub = createFetchStub(jsonResponse(200, { value: 'seven' }));

    const error = (await requestJson(stub.fetch, request()))._unsafeUnwrapErr();

    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.message).toBe('Test service returned an unexpected response: value Expected number, received string');
  });

  it('should map network failures to retryable errors', async () => {
    const stub = createFetchStub(new TypeError('fetch failed'));

    const error = (await requestJson(stub.fetch, request()))._unsafeUnwrapErr();

    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.retryable).toBe(true);
  });
});

describe('trimTrailingSlash', () => {
  it('should strip trailing slashes only', () => {
    expect(trimTrailingSlash('https://api.example.test//')).toBe('https://api.example.test');
    expect(trimTrailingSlash('https://api.example.test/v1')).toBe('https://api.example.test/v1');
  });
});

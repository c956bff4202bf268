/**
 * Unit tests for the MCP server over an in-process transport
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { err, type Result } from 'neverthrow';
import { OperationCancelledError, type ProviderError } from '../../src/lib/errors/ProviderErrors.js';
import type { EmbeddingVector, MetadataFilter, SearchMatch } from '../../src/models/document.js';
import { MCPServer } from '../../src/services/mcp-server.js';
import type { IndexCallOptions } from '../../src/services/vector-index/index-interface.js';
import { createSilentLogger } from '../../src/lib/logger.js';
import { InMemoryIndex } from '../helpers/in-memory-index.js';
import { createTestServices, DOC1_TEXT, type TestServices } from '../helpers/test-services.js';

/** Holds queries until released */
class GatedIndex extends InMemoryIndex {
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  open(): void {
    this.release();
  }

  override async query(
    namespace: string,
    vector: EmbeddingVector,
    topK: number,
    filter?: MetadataFilter
  ): Promise<Result<SearchMatch[], ProviderError>> {
    await this.gate;
    return super.query(namespace, vector, topK, filter);
  }
}

/** Once stalled, holds id listings until the caller cancels */
class StallingListIndex extends InMemoryIndex {
  stall = false;
  listSignal: AbortSignal | undefined;
  sawAbort = false;

  override async listIds(
    namespace: string,
    prefix: string,
    options: IndexCallOptions = {}
  ): Promise<Result<string[], ProviderError>> {
    if (!this.stall) {
      return super.listIds(namespace, prefix);
    }

    const { signal } = options;
    this.listSignal = signal;
    if (signal) {
      await new Promise<void>((resolve) => {
        if (signal.aborted) {
          resolve();
          return;
        }
        signal.addEventListener('abort', () => resolve(), { once: true });
      });
    }
    this.sawAbort = signal?.aborted ?? false;
    return err(new OperationCancelledError('Request was cancelled'));
  }
}

interface Harness {
  server: MCPServer;
  client: Client;
  services: TestServices;
}

const clients: Client[] = [];

async function connect(
  authToken: string | null = null,
  index?: InMemoryIndex
): Promise<Harness> {
  const services = createTestServices({ authToken }, { index });
  const server = new MCPServer({
    dispatcher: services.dispatcher,
    retrieval: services.retrieval,
    logger: createSilentLogger(),
    authToken
  });
  const client = new Client({ name: 'test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  await server.connect(serverTransport);
  await client.connect(clientTransport);
  clients.push(client);

  return { server, client, services };
}

function firstText(result: unknown): string {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  return first?.type === 'text' ? first.text : '';
}

describe('MCPServer', () => {
  afterEach(async () => {
    for (const client of clients.splice(0)) {
      await client.close();
    }
  });

  it('should list the tools', async () => {
    const { client } = await connect();

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'store-document',
      'search',
      'delete-document',
      'read-document',
      'list-documents',
      'index-stats'
    ]);
  });

  it('should store and search through tool calls', async () => {
    const { client } = await connect();

    await client.callTool({ name: 'store-document', arguments: { id: 'doc1', text: DOC1_TEXT } });
    const result = await client.callTool({ name: 'search', arguments: { query: 'What are mammals?', top_k: 1 } });

    expect(firstText(result)).toBe(
      'Retrieved Contexts:\n\nResult 1 | Similarity: 0.667 | Document ID: doc1:0\nCats are mammals.\n----------\n\n'
    );
  });

  it('should return tool failures as error results', async () => {
    const { client } = await connect();

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: 'search', arguments: { query: '   ' } })
    );

    expect(result.isError).toBe(true);
    expect(JSON.parse(firstText(result))).toEqual({
      error: { code: 'INVALID_ARGUMENT', message: 'query: Query must not be empty' }
    });
  });

  it('should reject unknown tools at the protocol level', async () => {
    const { client } = await connect();

    await expect(client.callTool({ name: 'nope', arguments: {} })).rejects.toMatchObject({ code: -32601 });
  });

  it('should enforce the auth token when configured', async () => {
    const { client } = await connect('test-secret');

    await expect(client.callTool({ name: 'index-stats', arguments: {} })).rejects.toMatchObject({ code: -32001 });
    await expect(
      client.callTool({ name: 'index-stats', arguments: {}, _meta: { authToken: 'wrong' } })
    ).rejects.toMatchObject({ code: -32001 });

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: 'index-stats', arguments: {}, _meta: { authToken: 'test-secret' } })
    );
    expect(result.isError).toBeUndefined();
  });

  it('should serve the semantic-search prompt', async () => {
    const { client } = await connect();
    await client.callTool({ name: 'store-document', arguments: { id: 'doc1', text: DOC1_TEXT } });

    const { prompts } = await client.listPrompts();
    const prompt = await client.getPrompt({ name: 'semantic-search', arguments: { query: 'What are mammals?' } });

    expect(prompts.map((entry) => entry.name)).toEqual(['semantic-search']);
    expect(prompt.messages.map((message) => message.content)).toEqual([
      { type: 'text', text: 'Context (document doc1, similarity 0.667):\nCats are mammals.' },
      { type: 'text', text: 'Context (document doc1, similarity 0.667):\nDogs are mammals' },
      { type: 'text', text: 'Context (document doc1, similarity 0.000):\ntoo.' }
    ]);
  });

  it('should answer the prompt with a notice when nothing matches', async () => {
    const { client } = await connect();

    const prompt = await client.getPrompt({ name: 'semantic-search', arguments: { query: 'anything' } });

    expect(prompt.messages).toEqual([
      { role: 'user', content: { type: 'text', text: 'No matching documents found.' } }
    ]);
  });

  it('should reject unknown prompts', async () => {
    const { client } = await connect();

    await expect(client.getPrompt({ name: 'other', arguments: {} })).rejects.toMatchObject({ code: -32602 });
  });

  it('should drain in-flight requests before closing', async () => {
    const index = new GatedIndex();
    const { server, client } = await connect(null, index);

    const pending = client.callTool({ name: 'search', arguments: { query: 'cats' } });
    await vi.waitFor(() => expect(server.inFlightCount).toBe(1));

    const stopping = server.shutdown();
    await expect(client.listTools()).rejects.toMatchObject({ code: -32603 });

    index.open();
    expect(firstText(await pending)).toBe('No matching documents found.');
    await stopping;
    expect(server.inFlightCount).toBe(0);
  });

  it('should make every shutdown call wait for the same drain', async () => {
    const index = new GatedIndex();
    const { server, client } = await connect(null, index);

    const pending = client.callTool({ name: 'search', arguments: { query: 'cats' } });
    await vi.waitFor(() => expect(server.inFlightCount).toBe(1));

    const first = server.shutdown();
    let secondDone = false;
    const second = server.shutdown().then(() => {
      secondDone = true;
    });

    expect(server.shutdown()).toBe(first);
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(secondDone).toBe(false);
    expect(server.inFlightCount).toBe(1);

    index.open();
    await pending;
    await second;
    expect(secondDone).toBe(true);
    expect(server.inFlightCount).toBe(0);
  });

  it('should abort provider calls when the client cancels', async () => {
    const index = new StallingListIndex();
    const { server, client } = await connect(null, index);
    await client.callTool({ name: 'store-document', arguments: { id: 'doc1', text: DOC1_TEXT } });
    index.stall = true;

    const controller = new AbortController();
    const pending = client
      .callTool(
        { name: 'store-document', arguments: { id: 'doc1', text: 'Short.' } },
        CallToolResultSchema,
        { signal: controller.signal }
      )
      .then(() => 'resolved', () => 'rejected');
    await vi.waitFor(() => expect(index.listSignal).toBeDefined());

    controller.abort();

    expect(await pending).toBe('rejected');
    await vi.waitFor(() => expect(index.sawAbort).toBe(true));
    await vi.waitFor(() => expect(server.inFlightCount).toBe(0));
    expect(index.callCounts.upsert).toBe(1);
    expect(index.callCounts.delete).toBe(0);
    expect(index.ids('')).toEqual(['doc1:0', 'doc1:1', 'doc1:2']);
  });
});

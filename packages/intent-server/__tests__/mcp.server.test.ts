import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createIntentMcpServer, toCallToolResult } from '../src/mcp/mcp.server';
import { ToolsRegistry, type ToolCallContext } from '../src/tools/tools.registry';
import { createClient, createEngine, createMockBackend, type MockBackend } from './helpers/fixtures';

const callResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  structuredContent: z.record(z.string(), z.unknown()),
  isError: z.boolean(),
});

const summarySchema = z.object({ id: z.string(), state: z.string() });

describe('MCP server', () => {
  let backend: MockBackend;
  let registry: ToolsRegistry;
  let server: Server | undefined;
  let client: Client | undefined;

  beforeEach(() => {
    backend = createMockBackend();
    registry = new ToolsRegistry(createEngine(createClient(backend.fetchImpl)).engine);
  });

  afterEach(async () => {
    await client?.close();
    await server?.close();
    await backend.app.close();
  });

  async function connect(ctx: ToolCallContext): Promise<Client> {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    server = createIntentMcpServer(registry, ctx);
    client = new Client({ name: 'intent-test-client', version: '0.0.1' });
    await server.connect(serverTransport);
    await client.connect(clientTransport);
    return client;
  }

  it('identifies itself and lists the toolset', async () => {
    const mcp = await connect({ authorization: 'Bearer test-caller' });
    expect(mcp.getServerVersion()).toEqual({ name: 'netintent', version: '1.0.0' });

    const { tools } = await mcp.listTools();
    expect(tools.map((t) => t.name)).toEqual(registry.names());
    const submit = tools.find((t) => t.name === 'submit_intent');
    expect(submit?.inputSchema).toMatchObject({ type: 'object', required: ['id'] });
  });

  it('returns tool envelopes as text and structured content', async () => {
    const mcp = await connect({ authorization: 'Bearer test-caller' });
    const raw = await mcp.callTool({
      name: 'create_intent',
      arguments: { name: 'Concert', specification: { participants: 200 } },
    });
    const result = callResultSchema.parse(raw);

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.content[0].text)).toEqual(result.structuredContent);
    expect(result.structuredContent).toMatchObject({ ok: true, tool: 'create_intent' });
    const created = summarySchema.parse(result.structuredContent.result);
    expect(created.state).toBe('Draft');

    const submitted = callResultSchema.parse(await mcp.callTool({ name: 'submit_intent', arguments: { id: created.id } }));
    expect(summarySchema.parse(submitted.structuredContent.result).state).toBe('Active');
  });

  it('marks refused calls as errors', async () => {
    const mcp = await connect({});
    const result = callResultSchema.parse(await mcp.callTool({ name: 'list_intents', arguments: {} }));

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toEqual({
      ok: false,
      tool: 'list_intents',
      error: { code: 'Unauthorized', message: 'Bearer credential required' },
    });
  });
});

describe('toCallToolResult', () => {
  it('flags failures', () => {
    const envelope = { ok: false as const, tool: 'get_intent', error: { code: 'NotFound' as const, message: 'Intent x not found' } };
    expect(toCallToolResult(envelope)).toEqual({
      content: [{ type: 'text', text: JSON.stringify(envelope) }],
      structuredContent: envelope,
      isError: true,
    });
  });
});

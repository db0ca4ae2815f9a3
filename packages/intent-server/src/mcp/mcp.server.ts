import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { SERVICE_NAME, TOOLSET_VERSION } from '../core/constants';
import type { ToolCallContext, ToolEnvelope, ToolsRegistry } from '../tools/tools.registry';

export function toCallToolResult(envelope: ToolEnvelope): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(envelope) }],
    structuredContent: envelope,
    isError: !envelope.ok,
  };
}

/**
 * MCP server bound to one caller context. Stateless transports build a fresh server
 * per request, so the caller's credential never leaks across calls.
 */
export function createIntentMcpServer(registry: ToolsRegistry, ctx: ToolCallContext): Server {
  const server = new Server({ name: SERVICE_NAME, version: TOOLSET_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: registry.definitions() }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const envelope = await registry.call(request.params.name, request.params.arguments ?? {}, ctx);
    return toCallToolResult(envelope);
  });

  return server;
}

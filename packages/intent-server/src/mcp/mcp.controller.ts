import { Controller, Delete, Get, HttpException, HttpStatus, Inject, Logger, Post, Req, Res } from '@nestjs/common';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ToolsRegistry } from '../tools/tools.registry';
import { createIntentMcpServer } from './mcp.server';

const METHOD_NOT_ALLOWED = {
  jsonrpc: '2.0',
  error: { code: -32000, message: 'Method not allowed.' },
  id: null,
};

// Stateless streamable HTTP: one server and transport per POST, JSON responses only.
@Controller('mcp')
export class McpController {
  private readonly logger = new Logger(McpController.name);

  constructor(@Inject(ToolsRegistry) private readonly registry: ToolsRegistry) {}

  @Post()
  async handle(@Req() req: FastifyRequest, @Res() reply: FastifyReply): Promise<void> {
    const server = createIntentMcpServer(this.registry, { authorization: req.headers.authorization });
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined, enableJsonResponse: true });

    reply.raw.on('close', () => {
      transport.close().catch((err: unknown) => {
        this.logger.warn(`MCP transport close failed ${JSON.stringify({ error: String(err) })}`);
      });
      server.close().catch((err: unknown) => {
        this.logger.warn(`MCP server close failed ${JSON.stringify({ error: String(err) })}`);
      });
    });

    await server.connect(transport);
    reply.hijack();
    await transport.handleRequest(req.raw, reply.raw, req.body);
  }

  @Get()
  rejectGet(): never {
    throw new HttpException(METHOD_NOT_ALLOWED, HttpStatus.METHOD_NOT_ALLOWED);
  }

  @Delete()
  rejectDelete(): never {
    throw new HttpException(METHOD_NOT_ALLOWED, HttpStatus.METHOD_NOT_ALLOWED);
  }
}

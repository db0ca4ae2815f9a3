import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { MockConfig } from './config';
import { MOCK_LIFECYCLE_STATUSES, MockIntentRegistry } from './registry';

const createIntentSchema = z
  .object({
    name: z.string().min(1, 'name is required'),
    description: z.string().optional(),
    '@type': z.string().optional(),
    externalId: z.string().optional(),
    deliveryExpectations: z.array(z.record(z.string(), z.unknown())).optional(),
    propertyExpectations: z.array(z.record(z.string(), z.unknown())).optional(),
    characteristic: z.array(z.object({ name: z.string(), value: z.unknown() })).optional(),
  })
  .passthrough();

const tokenRequestSchema = z.object({
  grant_type: z.string().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  scope: z.string().optional(),
});

const faultSchema = z.object({
  method: z.string().min(1),
  path: z.string().min(1).optional(),
  status: z.number().int().min(100).max(599),
  times: z.number().int().positive().default(1),
});

const statusSchema = z.object({ status: z.enum(MOCK_LIFECYCLE_STATUSES) });

const idParamsSchema = z.object({ id: z.string().min(1) });

const authExemptPrefixes = ['/auth/', '/health', '/__admin/'];

type ErrorResponseDetails = {
  status: number;
  code: string;
  message: string;
};

const sendError = (request: FastifyRequest, reply: FastifyReply, details: ErrorResponseDetails) => {
  request.log.warn(
    { method: request.method, url: request.url, status: details.status, errorCode: details.code },
    'tmf921-mock request refused',
  );
  return reply.status(details.status).send({ error: details.code, message: details.message });
};

const parse = <T>(schema: z.ZodType<T>, value: unknown, request: FastifyRequest, reply: FastifyReply): T | undefined => {
  const result = schema.safeParse(value);
  if (!result.success) {
    void sendError(request, reply, {
      status: 400,
      code: 'invalid_request',
      message: result.error.issues[0]?.message ?? 'Invalid payload',
    });
    return undefined;
  }
  return result.data;
};

const requestPath = (request: FastifyRequest): string => (request.raw.url ?? request.url ?? '').split('?')[0];

const readBearer = (request: FastifyRequest): string | undefined => {
  const header = request.headers.authorization;
  if (typeof header !== 'string') return undefined;
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match ? match[1] : undefined;
};

const readHeader = (request: FastifyRequest, name: string): string | undefined => {
  const value = request.headers[name];
  if (Array.isArray(value)) return value[0];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
};

/**
 * Simplified TMF921 Intent Management API used for development and tests.
 * Pass a registry to drive faults and status changes from the outside.
 */
export function createMockTmf921App(config: MockConfig, registry = new MockIntentRegistry()): FastifyInstance {
  const app = Fastify({ logger: { level: config.logLevel } });

  app.addContentTypeParser('application/x-www-form-urlencoded', { parseAs: 'string' }, (_request, body, done) => {
    done(null, Object.fromEntries(new URLSearchParams(String(body))));
  });

  app.addHook('preHandler', async (request, reply) => {
    const path = requestPath(request);
    if (path.startsWith('/__admin/')) return;

    const faultStatus = registry.takeFault(request.method, path);
    if (faultStatus !== undefined) {
      return sendError(request, reply, { status: faultStatus, code: 'injected_fault', message: `Injected fault (HTTP ${faultStatus})` });
    }

    if (authExemptPrefixes.some((prefix) => path.startsWith(prefix))) return;
    const token = readBearer(request);
    const authorized = !!token && (token === config.staticToken || registry.isTokenValid(token));
    if (!authorized) {
      return sendError(request, reply, { status: 401, code: 'unauthorized', message: 'Valid bearer token required' });
    }
  });

  app.post('/auth/token', async (request, reply) => {
    const body = parse(tokenRequestSchema, request.body ?? {}, request, reply);
    if (!body) return;
    if (body.grant_type !== 'password') {
      return reply.status(400).send({ error: 'unsupported_grant_type', error_description: 'Only the password grant is supported' });
    }
    if (!body.client_id || !body.username || !body.password) {
      return reply.status(400).send({ error: 'invalid_request', error_description: 'client_id, username and password are required' });
    }
    if (
      (config.clientId && body.client_id !== config.clientId) ||
      (config.clientSecret && body.client_secret !== config.clientSecret)
    ) {
      return reply.status(401).send({ error: 'invalid_client', error_description: 'Unknown client' });
    }
    if ((config.username && body.username !== config.username) || (config.password && body.password !== config.password)) {
      return reply.status(400).send({ error: 'invalid_grant', error_description: 'Invalid user credentials' });
    }
    const accessToken = registry.issueToken(config.tokenTtlSeconds);
    return reply.send({ access_token: accessToken, token_type: 'Bearer', expires_in: config.tokenTtlSeconds });
  });

  app.get('/health', async (_, reply) => {
    return reply.send({ status: 'ok', intents: registry.list().length });
  });

  app.get('/intents', async (_, reply) => {
    return reply.send(registry.list());
  });

  app.post('/intents', async (request, reply) => {
    const body = parse(createIntentSchema, request.body, request, reply);
    if (!body) return;
    const { entity, replayed } = registry.create(body, readHeader(request, 'idempotency-key'));
    request.log.info({ intentId: entity.id, replayed }, 'tmf921-mock intent created');
    if (replayed) return reply.status(200).send(entity);
    return reply.status(201).header('location', entity.href).send(entity);
  });

  app.get('/intents/:id', async (request, reply) => {
    const params = parse(idParamsSchema, request.params, request, reply);
    if (!params) return;
    const entity = registry.read(params.id);
    if (!entity) return sendError(request, reply, { status: 404, code: 'not_found', message: `Intent ${params.id} not found` });
    return reply.send(entity);
  });

  app.delete('/intents/:id', async (request, reply) => {
    const params = parse(idParamsSchema, request.params, request, reply);
    if (!params) return;
    if (!registry.cancel(params.id)) {
      return sendError(request, reply, { status: 404, code: 'not_found', message: `Intent ${params.id} not found` });
    }
    return reply.status(204).send();
  });

  app.get('/__admin/intents', async (_, reply) => {
    return reply.send(registry.snapshot());
  });

  app.delete('/__admin/intents', async (_, reply) => {
    registry.reset();
    return reply.status(204).send();
  });

  app.post('/__admin/faults', async (request, reply) => {
    const body = parse(faultSchema, request.body, request, reply);
    if (!body) return;
    registry.injectFault(body);
    return reply.status(204).send();
  });

  app.put('/__admin/intents/:id/status', async (request, reply) => {
    const params = parse(idParamsSchema, request.params, request, reply);
    if (!params) return;
    const body = parse(statusSchema, request.body, request, reply);
    if (!body) return;
    if (!registry.setStatus(params.id, body.status)) {
      return sendError(request, reply, { status: 404, code: 'not_found', message: `Intent ${params.id} not found` });
    }
    return reply.status(204).send();
  });

  return app;
}

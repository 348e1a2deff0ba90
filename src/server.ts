import Fastify, { type FastifyInstance, type HTTPMethods } from 'fastify';
import cors from '@fastify/cors';
import type { GatewayConfig } from './config.js';
import type { DispatchEngine } from './dispatchEngine.js';
import { registry } from './metrics.js';
import { decodePath, requestPath, type ProxyForwarder } from './proxy.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** Set by an earlier hook when the request's destination is already decided. */
    forwardTo: string | null;
  }
}

const PROXIED_METHODS: HTTPMethods[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

export interface ServerOptions {
  config: Pick<GatewayConfig, 'errorPath'>;
  engine: DispatchEngine<ProxyForwarder>;
  version?: string;
}

export async function buildServer({ config, engine, version = '1.0.0' }: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });

  // Bodies are relayed as-is.
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_req, body, done) => {
    done(null, body);
  });

  fastify.decorateRequest('forwardTo', null);

  // Gateway endpoints. CORS is answered here only; proxied paths leave it to the upstream.
  await fastify.register(
    async (api) => {
      await api.register(cors);

      // Health check
      api.get('/health', async () => ({
        status: 'ok',
        version,
        routes: engine.table().size,
        generation: engine.generation(),
        stale: engine.isStale(),
        uptime: process.uptime(),
      }));

      // Routes of the published table generation
      api.get('/routes', async () => ({
        generation: engine.generation(),
        stale: engine.isStale(),
        routes: engine
          .table()
          .list()
          .map(({ route }) => ({
            id: route.id,
            fullPath: route.fullPath,
            location: route.location,
            retryable: route.retryable,
            sensitiveHeaders: [...route.sensitiveHeaders],
          })),
      }));

      // Route source changed; rebuild on the next dispatched request
      api.post('/routes/refresh', async (_req, reply) => {
        engine.invalidate();
        reply.status(202);
        return { stale: true };
      });
    },
    { prefix: '/api' }
  );

  // Metrics endpoint
  fastify.get('/metrics', async (_req, reply) => {
    reply.header('Content-Type', registry.contentType);
    return registry.metrics();
  });

  fastify.get(config.errorPath, async (_req, reply) => {
    reply.status(500);
    return { error: 'Gateway error' };
  });

  // HEAD is exposed from GET.
  fastify.route({
    method: PROXIED_METHODS,
    url: '/*',
    handler: async (req, reply) => {
      const path = decodePath(requestPath(req.url));
      if (path === undefined) {
        reply.status(400).send({ error: 'Bad request' });
        return reply;
      }
      const decision = await engine.decide(path, {
        hasForwardMarker: req.forwardTo !== null,
        isErrorPath: path === config.errorPath,
      });
      if (decision.kind === 'no-handler') {
        reply.callNotFound();
        return reply;
      }
      await decision.handler.forward(req, reply, decision.route, path);
      return reply;
    },
  });

  return fastify;
}

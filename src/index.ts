import { Redis } from 'ioredis';
import { loadConfig } from './config.js';
import { DispatchEngine } from './dispatchEngine.js';
import { createLogger } from './logger.js';
import { ProxyForwarder, StaticServiceResolver } from './proxy.js';
import { RedisRouteSource, subscribeRouteChanges } from './redisRouteSource.js';
import type { RouteSource } from './routeSource.js';
import { buildServer } from './server.js';
import { StaticRouteSource } from './staticRouteSource.js';

const logger = createLogger('gateway');
const config = loadConfig();

const sourceOptions = {
  prefix: config.prefix,
  stripPrefix: config.stripPrefix,
  retryable: config.retryable,
  sensitiveHeaders: config.sensitiveHeaders,
};

let source: RouteSource;
let subscriber: Redis | undefined;
const connections: Redis[] = [];

if (config.routeSource === 'redis') {
  // Discovery reads give up quickly while Redis is down.
  const redis = new Redis(config.redisUrl, {
    maxRetriesPerRequest: 1,
    commandTimeout: config.redis.commandTimeoutMs,
  });
  subscriber = redis.duplicate();
  connections.push(redis, subscriber);

  redis.on('connect', () => logger.info('Redis connected', { url: config.redisUrl }));
  redis.on('error', (err) => logger.error('Redis error', { error: String(err) }));
  subscriber.on('error', (err) => logger.error('Redis subscriber error', { error: String(err) }));

  source = new RedisRouteSource(redis, {
    ...sourceOptions,
    routesKey: config.redis.routesKey,
    ignoredKey: config.redis.ignoredKey,
  });
} else {
  source = new StaticRouteSource({
    ...sourceOptions,
    routes: config.routes,
    ignoredPatterns: config.ignoredPatterns,
  });
}

const forwarder = new ProxyForwarder({
  source,
  resolver: new StaticServiceResolver(config.services),
  timeoutMs: config.upstreamTimeoutMs,
});
const engine = new DispatchEngine(source, forwarder);

if (subscriber !== undefined) {
  await subscribeRouteChanges(subscriber, config.redis.channel, () => engine.invalidate());
}

// Warm the first table generation before taking traffic.
await engine.ensureFresh();

const fastify = await buildServer({ config, engine });

const shutdown = async (signal: string) => {
  logger.info('Shutting down', { signal });
  await fastify.close();
  await Promise.all(connections.map((connection) => connection.quit()));
  process.exit(0);
};
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err) => {
      logger.error('Shutdown failed', { error: String(err) });
      process.exit(1);
    });
  });
}

// Start server
await fastify.listen({ port: config.port, host: '0.0.0.0' });
logger.info(`Gateway running on port ${config.port}`, {
  routeSource: config.routeSource,
  routes: engine.table().size,
});

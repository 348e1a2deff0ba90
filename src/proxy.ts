import type { FastifyReply, FastifyRequest } from 'fastify';
import { createLogger } from './logger.js';
import { requestDuration, requestsTotal } from './metrics.js';
import { isUrlLocation, type Route } from './route.js';
import type { RouteSource } from './routeSource.js';

const logger = createLogger('proxy');

const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
]);

/** Maps a logical service id to a base URL. Instance selection lives behind this. */
export interface ServiceResolver {
  resolve(serviceId: string): string | undefined;
}

export class StaticServiceResolver implements ServiceResolver {
  private readonly services: ReadonlyMap<string, string>;

  constructor(services: Record<string, string>) {
    this.services = new Map(Object.entries(services));
  }

  resolve(serviceId: string): string | undefined {
    return this.services.get(serviceId);
  }
}

export interface ForwarderOptions {
  source: RouteSource;
  resolver: ServiceResolver;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export function requestPath(url: string): string {
  const query = url.indexOf('?');
  return query === -1 ? url : url.slice(0, query);
}

/** Percent-decodes each path segment; undefined when the encoding is malformed. */
export function decodePath(rawPath: string): string | undefined {
  try {
    return rawPath
      .split('/')
      .map((segment) => decodeURIComponent(segment))
      .join('/');
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
}

function encodePath(path: string): string {
  return path
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

function upstreamHeaders(req: FastifyRequest, sensitive: ReadonlySet<string>, prefix: string, upstream: string): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    const name = key.toLowerCase();
    if (value === undefined || HOP_BY_HOP.has(name) || sensitive.has(name)) continue;
    headers.set(name, Array.isArray(value) ? value.join(', ') : value);
  }
  headers.set('host', new URL(upstream).host);
  if (prefix !== '') headers.set('x-forwarded-prefix', prefix);
  return headers;
}

/**
 * The generic proxy handler every route table entry points at. Location and
 * header policy come from the dispatched route; the route source supplies the
 * forwarded path with prefixes stripped.
 */
export class ProxyForwarder {
  private readonly source: RouteSource;
  private readonly resolver: ServiceResolver;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ForwarderOptions) {
    this.source = options.source;
    this.resolver = options.resolver;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** `path` is the decoded request path the route was dispatched on. */
  async forward(req: FastifyRequest, reply: FastifyReply, route: Route, path: string): Promise<void> {
    const start = Date.now();
    const target = this.source.matchingRoute(path);
    if (target === undefined) {
      // The source changed between dispatch and forwarding.
      logger.warn('Route vanished before forwarding', { route: route.id, path });
      reply.callNotFound();
      return;
    }

    const upstream = isUrlLocation(route.location) ? route.location : this.resolver.resolve(route.location);
    if (upstream === undefined) {
      requestsTotal.inc({ route: route.id, status: '503', method: req.method });
      logger.error('No upstream for service', { route: route.id, service: route.location });
      reply.status(503).send({ error: 'Service unavailable', service: route.location });
      return;
    }

    const query = req.url.slice(requestPath(req.url).length);
    const url = `${upstream.replace(/\/+$/, '')}${encodePath(target.path) || '/'}${query}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const body = Buffer.isBuffer(req.body) && req.body.length > 0 ? req.body : undefined;
      const response = await this.fetchImpl(url, {
        method: req.method,
        headers: upstreamHeaders(req, route.sensitiveHeaders, target.prefix, upstream),
        body: ['GET', 'HEAD'].includes(req.method) ? undefined : body,
        signal: controller.signal,
      });

      reply.status(response.status);
      response.headers.forEach((value, key) => {
        if (!HOP_BY_HOP.has(key.toLowerCase())) {
          reply.header(key, value);
        }
      });

      const payload = await response.arrayBuffer();
      requestsTotal.inc({ route: route.id, status: String(response.status), method: req.method });
      reply.send(Buffer.from(payload));
    } catch (err) {
      requestsTotal.inc({ route: route.id, status: '502', method: req.method });
      logger.error('Proxy error', { route: route.id, url, error: String(err) });
      reply.status(502).send({ error: 'Bad gateway' });
    } finally {
      clearTimeout(timeout);
      requestDuration.observe({ route: route.id }, (Date.now() - start) / 1000);
    }
  }
}

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_SENSITIVE_HEADERS } from './route.js';

export const RouteDefinitionSchema = z
  .object({
    id: z.string().min(1),
    path: z.string().min(1),         // e.g. "/orders/**"
    serviceId: z.string().min(1).optional(),
    url: z.string().url().optional(), // e.g. "http://localhost:3013"
    stripPrefix: z.boolean().optional(),
    retryable: z.boolean().optional(),
    sensitiveHeaders: z.array(z.string()).optional(),
  })
  .refine((def) => def.serviceId === undefined || def.url === undefined, {
    message: 'a route takes either serviceId or url, not both',
  });

export type RouteDefinition = z.infer<typeof RouteDefinitionSchema>;

const RoutesFileSchema = z.object({
  routes: z.array(RouteDefinitionSchema).optional(),
  services: z.record(z.string().url()).optional(),
  ignoredPatterns: z.array(z.string()).optional(),
});

export const GatewayConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  routeSource: z.enum(['static', 'redis']),
  redisUrl: z.string().min(1),
  redis: z.object({
    routesKey: z.string().min(1),
    ignoredKey: z.string().min(1),
    channel: z.string().min(1),
    commandTimeoutMs: z.number().int().positive(),
  }),
  prefix: z
    .string()
    .refine((p) => p === '' || (p.startsWith('/') && !p.endsWith('/')), {
      message: 'prefix must be empty, or start with "/" and not end with "/"',
    }),
  stripPrefix: z.boolean(),
  retryable: z.boolean(),
  errorPath: z.string().startsWith('/'),
  ignoredPatterns: z.array(z.string()),
  sensitiveHeaders: z.array(z.string()),
  upstreamTimeoutMs: z.number().int().positive(),
  routes: z.array(RouteDefinitionSchema),
  services: z.record(z.string().url()),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

function list(value: string | undefined, fallback: readonly string[]): string[] {
  if (value === undefined) return [...fallback];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function int(value: string | undefined, fallback: number): number {
  return value === undefined || value.trim() === '' ? fallback : Number(value);
}

type RoutesFile = z.infer<typeof RoutesFileSchema>;

function readRoutesFile(file: string): RoutesFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError([`GATEWAY_ROUTES_FILE ${file}: ${String(err)}`]);
  }
  const parsed = RoutesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${file}: ${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data;
}

/**
 * Gateway configuration from the environment. Routes, services and ignored
 * patterns come from GATEWAY_ROUTES_FILE when it is set; otherwise the
 * built-in routes below are used against UPSTREAM_HOST.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  // UPSTREAM_HOST supports Docker (host.docker.internal) vs direct (localhost)
  const upstreamHost = env.UPSTREAM_HOST || 'localhost';

  const defaultRoutes: RouteDefinition[] = [
    { id: 'orders', path: '/orders/**', serviceId: 'order-service' },
    { id: 'users', path: '/users/**', serviceId: 'user-service', sensitiveHeaders: ['cookie', 'set-cookie'] },
    { id: 'catalog', path: '/catalog/**', url: `http://${upstreamHost}:3013`, retryable: true },
  ];
  const defaultServices: Record<string, string> = {
    'order-service': `http://${upstreamHost}:3001`,
    'user-service': `http://${upstreamHost}:3012`,
  };

  const file: RoutesFile = env.GATEWAY_ROUTES_FILE ? readRoutesFile(env.GATEWAY_ROUTES_FILE) : {};

  const candidate = {
    port: int(env.PORT, 3016),
    routeSource: env.ROUTE_SOURCE || 'static',
    redisUrl: env.REDIS_URL || 'redis://localhost:6380',
    redis: {
      routesKey: env.GATEWAY_REDIS_ROUTES_KEY || 'gateway:routes',
      ignoredKey: env.GATEWAY_REDIS_IGNORED_KEY || 'gateway:ignored',
      channel: env.GATEWAY_REDIS_CHANNEL || 'gateway:routes:changed',
      commandTimeoutMs: int(env.GATEWAY_REDIS_COMMAND_TIMEOUT_MS, 2000),
    },
    prefix: env.GATEWAY_PREFIX ?? '',
    stripPrefix: flag(env.GATEWAY_STRIP_PREFIX, true),
    retryable: flag(env.GATEWAY_RETRYABLE, false),
    errorPath: env.GATEWAY_ERROR_PATH || '/error',
    ignoredPatterns: file.ignoredPatterns ?? list(env.GATEWAY_IGNORED_PATTERNS, []),
    sensitiveHeaders: list(env.GATEWAY_SENSITIVE_HEADERS, DEFAULT_SENSITIVE_HEADERS),
    upstreamTimeoutMs: int(env.UPSTREAM_TIMEOUT_MS, 10000),
    routes: file.routes ?? defaultRoutes,
    services: file.services ?? defaultServices,
  };

  const parsed = GatewayConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  return parsed.data;
}

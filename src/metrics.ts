import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export const registry = new Registry();

export const requestsTotal = new Counter({
  name: 'gateway_requests_total',
  help: 'Total requests forwarded through the gateway',
  labelNames: ['route', 'status', 'method'],
  registers: [registry],
});

export const requestDuration = new Histogram({
  name: 'gateway_request_duration_seconds',
  help: 'Forwarded request duration in seconds',
  labelNames: ['route'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

export const dispatchDecisions = new Counter({
  name: 'gateway_dispatch_decisions_total',
  help: 'Dispatch decisions by outcome (handler, error-path, ignored, forwarded, unmatched)',
  labelNames: ['outcome'],
  registers: [registry],
});

export const tableRebuilds = new Counter({
  name: 'gateway_route_table_rebuilds_total',
  help: 'Route table rebuild attempts by outcome (success, failure)',
  labelNames: ['outcome'],
  registers: [registry],
});

export const tableRoutes = new Gauge({
  name: 'gateway_route_table_routes',
  help: 'Routes registered in the published route table generation',
  registers: [registry],
});

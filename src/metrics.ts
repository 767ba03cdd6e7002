import type { FastifyInstance, FastifyRequest } from 'fastify';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import type { PolicyRejectionReason } from './address/policy.js';
import type { UpstreamConnectErrorKind } from './errors.js';
import type { PoolMetricsSink, PoolStats } from './pool/connectionPool.js';

/**
 * What the proxy core reports. Kept separate from prom-client so the core can run (and be tested)
 * without a registry.
 */
export interface ProxyMetricsSink extends PoolMetricsSink {
  requestCompleted(outcome: string, statusCode: number): void;
  policyRejected(reason: PolicyRejectionReason): void;
  sessionOpened(): void;
  sessionClosed(): void;
}

export type ProxyMetrics = Readonly<{
  requestsTotal: Counter<'outcome' | 'status_code'>;
  policyRejectionsTotal: Counter<'reason'>;
  upstreamConnectsTotal: Counter<'result'>;
  poolReusedTotal: Counter<string>;
  activeSessions: Gauge<string>;
  poolConnections: Gauge<'state'>;
}>;

export type MetricsBundle = Readonly<{
  registry: Registry;
  proxy: ProxyMetrics;
  sink: ProxyMetricsSink;
  /** Sets where the pool gauge reads its counts from on each scrape. */
  observePool: (stats: () => PoolStats) => void;
}>;

export function setupMetrics(app: FastifyInstance): MetricsBundle {
  // Per-server registry: several instances can coexist in one process (tests).
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  const httpRequestsTotal = new Counter({
    name: 'http_requests_total',
    help: 'Total number of admin HTTP requests',
    labelNames: ['method', 'route', 'status_code'] as const,
    registers: [registry],
  });

  const httpRequestDurationSeconds = new Histogram({
    name: 'http_request_duration_seconds',
    help: 'Admin HTTP request latency in seconds',
    labelNames: ['method', 'route', 'status_code'] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [registry],
  });

  const requestsTotal = new Counter({
    name: 'proxy_requests_total',
    help: 'Total number of proxied requests by outcome and status code',
    labelNames: ['outcome', 'status_code'] as const,
    registers: [registry],
  });

  const policyRejectionsTotal = new Counter({
    name: 'proxy_policy_rejections_total',
    help: 'Total number of requests rejected by the destination policy',
    labelNames: ['reason'] as const,
    registers: [registry],
  });

  const upstreamConnectsTotal = new Counter({
    name: 'proxy_upstream_connects_total',
    help: 'Total number of upstream connection attempts by result',
    labelNames: ['result'] as const,
    registers: [registry],
  });

  const poolReusedTotal = new Counter({
    name: 'proxy_pool_reused_total',
    help: 'Total number of requests served over a pooled upstream connection',
    registers: [registry],
  });

  const activeSessions = new Gauge({
    name: 'proxy_active_sessions',
    help: 'Number of client connections currently open',
    registers: [registry],
  });

  let poolStats: (() => PoolStats) | null = null;
  const poolConnections = new Gauge({
    name: 'proxy_pool_connections',
    help: 'Number of upstream connections held by the pool, by state',
    labelNames: ['state'] as const,
    registers: [registry],
    collect() {
      if (!poolStats) return;
      const stats = poolStats();
      this.set({ state: 'idle' }, stats.idle);
      this.set({ state: 'busy' }, stats.busy);
    },
  });

  const startTimes = new WeakMap<FastifyRequest, bigint>();

  app.addHook('onRequest', async (request) => {
    startTimes.set(request, process.hrtime.bigint());
  });

  app.addHook('onResponse', async (request, reply) => {
    const start = startTimes.get(request);
    if (start === undefined) return;

    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    const route = request.routeOptions?.url ?? 'unknown';
    const labels = {
      method: request.method,
      route,
      status_code: String(reply.statusCode),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDurationSeconds.observe(labels, durationSeconds);
  });

  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', registry.contentType);
    return registry.metrics();
  });

  const sink: ProxyMetricsSink = {
    requestCompleted: (outcome, statusCode) => requestsTotal.inc({ outcome, status_code: String(statusCode) }),
    policyRejected: (reason) => policyRejectionsTotal.inc({ reason }),
    connectResult: (result: 'ok' | UpstreamConnectErrorKind) => upstreamConnectsTotal.inc({ result }),
    reused: () => poolReusedTotal.inc(),
    sessionOpened: () => activeSessions.inc(),
    sessionClosed: () => activeSessions.dec(),
  };

  return {
    registry,
    proxy: { requestsTotal, policyRejectionsTotal, upstreamConnectsTotal, poolReusedTotal, activeSessions, poolConnections },
    sink,
    observePool: (stats) => {
      poolStats = stats;
    },
  };
}

import fastify, { type FastifyInstance } from 'fastify';
import { randomUUID } from 'node:crypto';

import { policyFromConfig, type Config } from './config.js';
import { dispatcherSettingsFromConfig } from './dispatcher.js';
import { setupMetrics, type MetricsBundle } from './metrics.js';
import { ConnectionPool, type CreateConnection } from './pool/connectionPool.js';
import { ProxyServer } from './proxyServer.js';

type ServerBundle = {
  /** Admin surface: health, readiness and metrics. */
  app: FastifyInstance;
  proxy: ProxyServer;
  pool: ConnectionPool;
  metrics: MetricsBundle;
  markShuttingDown: () => void;
};

export type BuildServerOptions = Readonly<{
  createConnection?: CreateConnection;
}>;

export function buildServer(config: Config, opts: BuildServerOptions = {}): ServerBundle {
  let shuttingDown = false;

  const app = fastify({
    logger: { level: config.LOG_LEVEL },
    requestIdHeader: 'x-request-id',
    genReqId: (req) => {
      const header = req.headers['x-request-id'];
      if (typeof header === 'string' && header.length > 0) return header;
      if (Array.isArray(header) && header.length > 0 && header[0]) return header[0];
      return randomUUID();
    },
  });

  const metrics = setupMetrics(app);

  const pool = new ConnectionPool({
    connectTimeoutMs: config.CONNECT_TIMEOUT_MS,
    idleTimeoutMs: config.POOL_IDLE_TIMEOUT_MS,
    maxIdlePerDestination: config.POOL_MAX_IDLE_PER_DESTINATION,
    createConnection: opts.createConnection,
    metrics: metrics.sink,
  });
  metrics.observePool(() => pool.stats());

  const proxy = new ProxyServer({
    settings: dispatcherSettingsFromConfig(config),
    policy: policyFromConfig(config),
    pool,
    logger: app.log.child({ component: 'proxy' }),
    metrics: metrics.sink,
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async (_request, reply) => {
    if (shuttingDown) return reply.code(503).send({ ok: false });
    return { ok: true };
  });

  app.addHook('onClose', async () => {
    shuttingDown = true;
    await proxy.close();
  });

  return {
    app,
    proxy,
    pool,
    metrics,
    markShuttingDown: () => {
      shuttingDown = true;
    },
  };
}

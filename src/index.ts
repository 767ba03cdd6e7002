import { loadConfig, type Config } from "./config.js";
import { formatError } from "./logger.js";
import { buildServer } from "./server.js";

function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (err) {
    process.stderr.write(`${formatError(err).message}\n`);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit();

  const { app, proxy, markShuttingDown } = buildServer(config);

  let forceExitTimer: NodeJS.Timeout | null = null;
  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    markShuttingDown();
    app.log.info({ signal }, "Shutdown requested");

    forceExitTimer = setTimeout(() => {
      app.log.error({ graceMs: config.SHUTDOWN_GRACE_MS }, "Graceful shutdown timed out; forcing exit");
      proxy.closeNow();
      process.exit(1);
    }, config.SHUTDOWN_GRACE_MS);
    forceExitTimer.unref();

    try {
      // The onClose hook drains the proxy listener before the pool goes away.
      await app.close();
      process.exit(0);
    } catch (err) {
      app.log.error({ err: formatError(err) }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.once("SIGTERM", () => void shutdown("SIGTERM"));
  process.once("SIGINT", () => void shutdown("SIGINT"));

  try {
    await proxy.listen(config.HOST, config.PORT);
    await app.listen({ host: config.ADMIN_HOST, port: config.ADMIN_PORT });
  } catch (err) {
    app.log.fatal({ err: formatError(err) }, "Failed to bind listeners");
    proxy.closeNow();
    process.exit(1);
  }

  app.log.info(
    {
      host: config.HOST,
      port: config.PORT,
      adminHost: config.ADMIN_HOST,
      adminPort: config.ADMIN_PORT,
      domainSuffix: config.DOMAIN_SUFFIX,
      upstreamHostSuffix: config.UPSTREAM_HOST_SUFFIX || undefined,
    },
    "nip-gateway listening",
  );

  process.once("exit", () => {
    if (forceExitTimer) clearTimeout(forceExitTimer);
  });
}

void main();

import net from "node:net";

import type { ProxyPolicy } from "./address/policy.js";
import { RequestDispatcher, type DispatcherSettings } from "./dispatcher.js";
import { formatError, type LoggerLike } from "./logger.js";
import type { ProxyMetricsSink } from "./metrics.js";
import type { ConnectionPool } from "./pool/connectionPool.js";
import { destroyBestEffort } from "./socketSafe.js";

export type ProxyServerOptions = Readonly<{
  settings: DispatcherSettings;
  policy: ProxyPolicy;
  pool: ConnectionPool;
  logger: LoggerLike;
  metrics?: ProxyMetricsSink;
}>;

/**
 * Accepts client connections on a TCP server and runs one {@link RequestDispatcher} per
 * connection.
 */
export class ProxyServer {
  private readonly opts: ProxyServerOptions;
  private readonly sockets = new Set<net.Socket>();
  private readonly sessions = new Map<RequestDispatcher, Promise<void>>();
  private readonly servers = new Set<net.Server>();
  private closing = false;

  constructor(opts: ProxyServerOptions) {
    this.opts = opts;
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  attach(server: net.Server): void {
    this.servers.add(server);
    server.on("connection", (socket: net.Socket) => this.handleConnection(socket));
    server.on("error", (err) => {
      this.opts.logger.error({ err: formatError(err) }, "Proxy listener error");
    });
  }

  /**
   * Creates a server, attaches to it, and resolves once it is bound.
   *
   * Client sockets are half-open: a client that shuts down its write side after sending a request
   * still receives the response.
   */
  async listen(host: string, port: number): Promise<net.Server> {
    const server = net.createServer({ pauseOnConnect: true, allowHalfOpen: true });
    this.attach(server);
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        server.off("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        server.off("error", onError);
        resolve();
      };
      server.once("error", onError);
      server.once("listening", onListening);
      server.listen({ host, port });
    });
    return server;
  }

  handleConnection(socket: net.Socket): void {
    if (this.closing) {
      destroyBestEffort(socket);
      return;
    }

    this.sockets.add(socket);
    socket.once("close", () => this.sockets.delete(socket));

    const dispatcher = new RequestDispatcher(socket, {
      settings: this.opts.settings,
      policy: this.opts.policy,
      pool: this.opts.pool,
      logger: this.opts.logger,
      metrics: this.opts.metrics,
    });
    const session = dispatcher
      .run()
      .catch((err: unknown) => {
        this.opts.logger.error({ err: formatError(err) }, "Client session crashed");
        destroyBestEffort(socket);
      })
      .finally(() => {
        this.sessions.delete(dispatcher);
      });
    this.sessions.set(dispatcher, session);
  }

  /**
   * Stops accepting, closes idle client connections, waits for in-flight exchanges, then closes
   * the pool.
   */
  async close(): Promise<void> {
    this.closing = true;
    const serversClosed = [...this.servers].map(
      (server) =>
        new Promise<void>((resolve) => {
          if (!server.listening) {
            resolve();
            return;
          }
          server.close(() => resolve());
        }),
    );

    for (const dispatcher of this.sessions.keys()) dispatcher.beginShutdown();
    await Promise.all([...this.sessions.values()]);
    await Promise.all(serversClosed);
    this.opts.pool.close();
  }

  /** Tears down every client connection immediately. */
  closeNow(): void {
    this.closing = true;
    for (const socket of this.sockets) destroyBestEffort(socket);
    this.sockets.clear();
    for (const server of this.servers) {
      if (server.listening) server.close();
    }
    this.opts.pool.close();
  }
}

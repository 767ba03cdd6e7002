import net from "node:net";

import { UpstreamConnectError, classifyConnectError, type UpstreamConnectErrorKind } from "../errors.js";
import { destroyBestEffort, isDestroyed, pauseBestEffort, resumeBestEffort } from "../socketSafe.js";
import { formatOneLineError } from "../util/text.js";

export type CreateConnection = (opts: net.NetConnectOpts) => net.Socket;

export interface PoolDestination {
  host: string;
  port: number;
}

/**
 * An upstream socket plus the bookkeeping the pool needs. While `busy` it belongs to exactly one
 * borrower; the pool does not touch it until it is released.
 */
export interface PooledConnection {
  readonly id: number;
  readonly key: string;
  readonly socket: net.Socket;
  lastUsedMs: number;
  busy: boolean;
  /** How many times this connection has been handed out. */
  uses: number;
  /** Set once the socket has reported an error; such a connection is never reused. */
  failed: boolean;
}

export interface PoolMetricsSink {
  connectResult(result: "ok" | UpstreamConnectErrorKind): void;
  reused(): void;
}

export interface ConnectionPoolOptions {
  connectTimeoutMs: number;
  idleTimeoutMs: number;
  maxIdlePerDestination: number;
  createConnection?: CreateConnection;
  nowMs?: () => number;
  sweepIntervalMs?: number;
  metrics?: PoolMetricsSink;
}

export interface PoolStats {
  idle: number;
  busy: number;
  destinations: number;
}

export function destinationKey(dest: PoolDestination): string {
  return net.isIP(dest.host) === 6 ? `[${dest.host}]:${dest.port}` : `${dest.host}:${dest.port}`;
}

export class ConnectionPool {
  private readonly connectTimeoutMs: number;
  private readonly idleTimeoutMs: number;
  private readonly maxIdlePerDestination: number;
  private readonly createConnection: CreateConnection;
  private readonly nowMs: () => number;
  private readonly sweepIntervalMs: number;
  private readonly metrics: PoolMetricsSink | undefined;

  private readonly idle = new Map<string, PooledConnection[]>();
  private readonly busy = new Set<PooledConnection>();
  private readonly idleWatchers = new Map<PooledConnection, () => void>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private nextId = 0;
  private closed = false;

  constructor(opts: ConnectionPoolOptions) {
    this.connectTimeoutMs = opts.connectTimeoutMs;
    this.idleTimeoutMs = opts.idleTimeoutMs;
    this.maxIdlePerDestination = opts.maxIdlePerDestination;
    this.createConnection = opts.createConnection ?? net.createConnection;
    this.nowMs = opts.nowMs ?? Date.now;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? Math.max(100, Math.min(opts.idleTimeoutMs, 5_000));
    this.metrics = opts.metrics;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Hands out the most recently released live connection to `dest`, or dials a new one.
   *
   * A new connection gets a single attempt bounded by the connect timeout.
   */
  async acquire(dest: PoolDestination): Promise<PooledConnection> {
    if (this.closed) throw new UpstreamConnectError("error", "Connection pool is closed");

    const key = destinationKey(dest);
    const reused = this.takeIdle(key);
    if (reused) {
      reused.busy = true;
      reused.uses += 1;
      this.busy.add(reused);
      this.metrics?.reused();
      return reused;
    }

    const socket = await this.connect(dest, key);
    if (this.closed) {
      destroyBestEffort(socket);
      throw new UpstreamConnectError("error", "Connection pool is closed");
    }

    this.nextId += 1;
    const conn: PooledConnection = {
      id: this.nextId,
      key,
      socket,
      lastUsedMs: this.nowMs(),
      busy: true,
      uses: 1,
      failed: false,
    };
    // Keeps an error between borrowers from going unhandled and marks the connection unusable.
    socket.on("error", () => {
      conn.failed = true;
    });
    this.busy.add(conn);
    return conn;
  }

  /**
   * Returns a borrowed connection. Non-reusable connections are destroyed; releasing the same
   * connection twice is a no-op.
   */
  release(conn: PooledConnection, reusable: boolean): void {
    if (!this.busy.delete(conn)) return;
    conn.busy = false;
    conn.lastUsedMs = this.nowMs();

    const socket = conn.socket;
    const usable =
      reusable &&
      !this.closed &&
      !conn.failed &&
      !isDestroyed(socket) &&
      socket.writable &&
      !socket.readableEnded &&
      socket.readableLength === 0;
    if (!usable) {
      destroyBestEffort(socket);
      return;
    }

    const stack = this.idle.get(conn.key) ?? [];
    if (stack.length >= this.maxIdlePerDestination) {
      destroyBestEffort(socket);
      return;
    }

    this.watchIdle(conn);
    stack.push(conn);
    this.idle.set(conn.key, stack);
    this.ensureSweep();
  }

  stats(): PoolStats {
    let idle = 0;
    for (const stack of this.idle.values()) idle += stack.length;
    return { idle, busy: this.busy.size, destinations: this.idle.size };
  }

  /**
   * Closes idle connections and refuses further acquires. Borrowed connections are destroyed as
   * they are released.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const stack of this.idle.values()) {
      for (const conn of stack) this.discardIdle(conn);
    }
    this.idle.clear();
  }

  /** Destroys idle connections whose idle time has run out. */
  sweep(): void {
    const now = this.nowMs();
    for (const [key, stack] of this.idle) {
      const live = stack.filter((conn) => {
        if (!this.isExpired(conn, now) && !isDestroyed(conn.socket)) return true;
        this.discardIdle(conn);
        return false;
      });
      if (live.length === 0) this.idle.delete(key);
      else this.idle.set(key, live);
    }
    if (this.idle.size === 0 && this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private isExpired(conn: PooledConnection, now: number): boolean {
    return now - conn.lastUsedMs >= this.idleTimeoutMs;
  }

  private takeIdle(key: string): PooledConnection | null {
    const stack = this.idle.get(key);
    if (!stack) return null;

    const now = this.nowMs();
    let found: PooledConnection | null = null;
    while (stack.length > 0) {
      const candidate = stack.pop();
      if (!candidate) break;
      if (this.isExpired(candidate, now) || isDestroyed(candidate.socket) || candidate.failed) {
        this.discardIdle(candidate);
        continue;
      }
      this.unwatchIdle(candidate);
      pauseBestEffort(candidate.socket);
      found = candidate;
      break;
    }
    if (stack.length === 0) this.idle.delete(key);
    return found;
  }

  private watchIdle(conn: PooledConnection): void {
    const socket = conn.socket;
    // An idle upstream has nothing legitimate to say; any event means it is no longer reusable.
    const evict = () => this.evictIdle(conn);
    socket.on("data", evict);
    socket.on("end", evict);
    socket.on("close", evict);
    socket.on("error", evict);
    this.idleWatchers.set(conn, () => {
      socket.off("data", evict);
      socket.off("end", evict);
      socket.off("close", evict);
      socket.off("error", evict);
    });
    resumeBestEffort(socket);
  }

  private unwatchIdle(conn: PooledConnection): void {
    const unwatch = this.idleWatchers.get(conn);
    if (!unwatch) return;
    this.idleWatchers.delete(conn);
    unwatch();
  }

  private evictIdle(conn: PooledConnection): void {
    const stack = this.idle.get(conn.key);
    if (stack) {
      const idx = stack.indexOf(conn);
      if (idx !== -1) stack.splice(idx, 1);
      if (stack.length === 0) this.idle.delete(conn.key);
    }
    this.discardIdle(conn);
  }

  private discardIdle(conn: PooledConnection): void {
    this.unwatchIdle(conn);
    destroyBestEffort(conn.socket);
  }

  private ensureSweep(): void {
    if (this.sweepTimer || this.closed) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  private connect(dest: PoolDestination, label: string): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const fail = (kind: UpstreamConnectErrorKind, message: string, cause?: unknown) => {
        this.metrics?.connectResult(kind);
        reject(new UpstreamConnectError(kind, message, cause === undefined ? undefined : { cause }));
      };

      let socket: net.Socket;
      try {
        socket = this.createConnection({ host: dest.host, port: dest.port });
      } catch (err) {
        fail(classifyConnectError(err), `Failed to connect to ${label}: ${formatOneLineError(err, 256)}`, err);
        return;
      }

      let settled = false;
      const settle = (error: { kind: UpstreamConnectErrorKind; message: string; cause?: unknown } | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.off("connect", onConnect);
        socket.off("error", onError);
        socket.off("close", onClose);
        if (error) {
          destroyBestEffort(socket);
          fail(error.kind, error.message, error.cause);
          return;
        }
        this.metrics?.connectResult("ok");
        socket.setNoDelay(true);
        resolve(socket);
      };

      const onConnect = () => settle(null);
      const onError = (err: Error) =>
        settle({
          kind: classifyConnectError(err),
          message: `Failed to connect to ${label}: ${formatOneLineError(err, 256)}`,
          cause: err,
        });
      const onClose = () => settle({ kind: "reset", message: `Connection to ${label} closed while connecting` });

      const timer = setTimeout(() => {
        settle({ kind: "timeout", message: `Timed out connecting to ${label} after ${this.connectTimeoutMs}ms` });
      }, this.connectTimeoutMs);
      timer.unref();

      socket.once("connect", onConnect);
      socket.once("error", onError);
      socket.once("close", onClose);
    });
  }
}

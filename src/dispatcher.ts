import type net from "node:net";

import { decodeHostname } from "./address/codec.js";
import type { ProxyPolicy } from "./address/policy.js";
import type { Config } from "./config.js";
import { AddressError, ClientProtocolError, ProxyError, RelayTimeoutError, UpstreamProtocolError } from "./errors.js";
import { determineRequestFraming, type BodyFraming } from "./http/framing.js";
import {
  HeadAccumulator,
  getSingleHeader,
  isPersistent,
  isUpgradeRequest,
  parseRequestHead,
  serializeRequestHead,
  type RequestHead,
} from "./http/head.js";
import { httpStatusText, respondErrorAndClose } from "./http/response.js";
import { rewriteRequestHead } from "./http/rewrite.js";
import { formatError, type LoggerLike } from "./logger.js";
import type { ProxyMetricsSink } from "./metrics.js";
import type { ConnectionPool, PooledConnection } from "./pool/connectionPool.js";
import { relay, type RelayResult } from "./relay/streamRelay.js";
import { destroyBestEffort, endThenDestroyQuietly, isDestroyed, pauseBestEffort, resumeBestEffort } from "./socketSafe.js";
import { formatOneLineUtf8 } from "./util/text.js";

export type DispatcherSettings = Readonly<{
  domainSuffix: string;
  upstreamHostSuffix: string;
  forwardedHeaders: boolean;
  idleTimeoutMs: number;
  requestHeadTimeoutMs: number;
  maxHeadBytes: number;
}>;

export type DispatcherDeps = Readonly<{
  settings: DispatcherSettings;
  policy: ProxyPolicy;
  pool: Pick<ConnectionPool, "acquire" | "release">;
  logger: LoggerLike;
  metrics?: ProxyMetricsSink;
}>;

export function dispatcherSettingsFromConfig(config: Config): DispatcherSettings {
  return {
    domainSuffix: config.DOMAIN_SUFFIX,
    upstreamHostSuffix: config.UPSTREAM_HOST_SUFFIX,
    forwardedHeaders: config.FORWARDED_HEADERS,
    idleTimeoutMs: config.IDLE_TIMEOUT_MS,
    requestHeadTimeoutMs: config.REQUEST_HEAD_TIMEOUT_MS,
    maxHeadBytes: config.MAX_HEAD_BYTES,
  };
}

type HeadRead = { head: Buffer; rest: Buffer };

const EMPTY = Buffer.alloc(0);

function stripLeadingEmptyLines(buf: Buffer): Buffer {
  let i = 0;
  while (i + 1 < buf.length && buf[i] === 0x0d && buf[i + 1] === 0x0a) i += 2;
  return i === 0 ? buf : buf.subarray(i);
}

function failureStatus(result: RelayResult): ProxyError {
  if (result.error instanceof ProxyError) return result.error;
  if (result.outcome === "timeout") return new RelayTimeoutError("Upstream did not respond in time");
  return new UpstreamProtocolError("Upstream connection failed before a complete response");
}

/**
 * Drives one accepted client connection: reads a request head, resolves its destination, relays
 * the exchange, and repeats while the connection stays persistent.
 */
export class RequestDispatcher {
  private readonly client: net.Socket;
  private readonly settings: DispatcherSettings;
  private readonly deps: DispatcherDeps;
  private readonly logger: LoggerLike;

  private closing = false;
  private pendingHeadBytes = 0;
  private cancelHeadWait: (() => void) | null = null;

  constructor(client: net.Socket, deps: DispatcherDeps) {
    this.client = client;
    this.deps = deps;
    this.settings = deps.settings;
    this.logger = deps.logger;
  }

  /** Waiting for the next request with no bytes of it received yet. */
  get isIdle(): boolean {
    return this.cancelHeadWait !== null && this.pendingHeadBytes === 0;
  }

  /**
   * Stops after the exchange in progress. An idle connection is closed right away.
   */
  beginShutdown(): void {
    this.closing = true;
    if (this.isIdle) this.cancelHeadWait?.();
  }

  async run(): Promise<void> {
    this.deps.metrics?.sessionOpened();
    this.client.setNoDelay(true);
    this.client.on("error", (err) => {
      this.logger.debug({ err: formatError(err) }, "Client connection error");
    });

    let buffered: Buffer = EMPTY;
    try {
      while (!this.closing) {
        let read: HeadRead | null;
        try {
          read = await this.readRequestHead(buffered);
        } catch (err) {
          this.respondError(err, "client-error");
          return;
        }
        if (!read) return;

        const next = await this.handleRequest(read);
        if (!next) return;
        buffered = next.leftover;
      }
    } catch (err) {
      this.logger.error({ err: formatError(err) }, "Unexpected failure while dispatching");
      destroyBestEffort(this.client);
    } finally {
      if (!isDestroyed(this.client) && !this.client.writableEnded) endThenDestroyQuietly(this.client);
      this.deps.metrics?.sessionClosed();
    }
  }

  private readRequestHead(initial: Buffer): Promise<HeadRead | null> {
    const acc = new HeadAccumulator(
      this.settings.maxHeadBytes,
      () => new ClientProtocolError("ERR_HEAD_TOO_LARGE", "Request head is too large"),
    );
    const push = (chunk: Buffer): HeadRead | null => {
      const data = acc.bufferedBytes === 0 ? stripLeadingEmptyLines(chunk) : chunk;
      if (data.length === 0) return null;
      const done = acc.push(data);
      this.pendingHeadBytes = acc.bufferedBytes;
      return done;
    };

    this.pendingHeadBytes = 0;
    const immediate = push(initial);
    if (immediate) return Promise.resolve(immediate);
    if (isDestroyed(this.client) || this.client.readableEnded) return Promise.resolve(null);

    const client = this.client;
    return new Promise<HeadRead | null>((resolve, reject) => {
      const cleanup = () => {
        this.cancelHeadWait = null;
        clearTimeout(timer);
        client.off("data", onData);
        client.off("end", onEnd);
        client.off("close", onEnd);
        pauseBestEffort(client);
      };
      const onData = (chunk: Buffer) => {
        let done: HeadRead | null;
        try {
          done = push(chunk);
        } catch (err) {
          cleanup();
          reject(err);
          return;
        }
        if (!done) return;
        cleanup();
        resolve(done);
      };
      // A partial head followed by EOF is not worth an answer nobody reads.
      const onEnd = () => {
        cleanup();
        resolve(null);
      };
      const timer = setTimeout(() => {
        cleanup();
        if (acc.bufferedBytes > 0) reject(new ClientProtocolError("ERR_HEAD_TIMEOUT", "Timed out reading the request head"));
        else resolve(null);
      }, this.settings.requestHeadTimeoutMs);
      timer.unref();

      this.cancelHeadWait = onEnd;
      client.on("data", onData);
      client.once("end", onEnd);
      client.once("close", onEnd);
      resumeBestEffort(client);
    });
  }

  private async handleRequest(read: HeadRead): Promise<{ leftover: Buffer } | null> {
    let head: RequestHead;
    let framing: BodyFraming;
    try {
      head = parseRequestHead(read.head);
      framing = determineRequestFraming(head);
    } catch (err) {
      this.respondError(err, "client-error");
      return null;
    }

    const hostHeader = getSingleHeader(head.headers, "host");
    if (hostHeader === undefined || hostHeader === null) {
      const problem = hostHeader === null ? "Multiple Host headers" : "Missing Host header";
      this.respondError(new ClientProtocolError("ERR_INVALID_HOST_HEADER", problem), "client-error");
      return null;
    }

    const decoded = decodeHostname(hostHeader, { domainSuffix: this.settings.domainSuffix }, this.deps.policy);
    if (!decoded.ok) {
      if (decoded.reason) this.deps.metrics?.policyRejected(decoded.reason);
      this.respondError(new AddressError(decoded.code, decoded.message), decoded.code === "POLICY_REJECTED" ? "policy-rejected" : "client-error");
      return null;
    }
    const destination = decoded.value;
    const log = { method: head.method, host: formatOneLineUtf8(hostHeader, 256), destination: `${destination.host}:${destination.port}` };

    let conn: PooledConnection;
    try {
      conn = await this.deps.pool.acquire(destination);
    } catch (err) {
      this.respondError(err, "connect-error");
      return null;
    }

    const upstreamHead = rewriteRequestHead(head, {
      destination,
      originalHost: hostHeader,
      clientAddress: this.client.remoteAddress,
      forwardedHeaders: this.settings.forwardedHeaders,
      upstreamHostSuffix: this.settings.upstreamHostSuffix,
    });

    let result: RelayResult;
    try {
      result = await relay({
        client: this.client,
        upstream: conn.socket,
        request: head,
        upstreamRequestHead: serializeRequestHead(upstreamHead),
        requestFraming: framing,
        clientBuffered: read.rest,
        clientKeepAlive: isPersistent(head.version, head.headers),
        upgradeRequested: isUpgradeRequest(head),
        idleTimeoutMs: this.settings.idleTimeoutMs,
        maxHeadBytes: this.settings.maxHeadBytes,
      });
    } catch (err) {
      this.deps.pool.release(conn, false);
      throw err;
    }
    this.deps.pool.release(conn, result.upstreamReusable);

    if (result.outcome === "success") {
      this.deps.metrics?.requestCompleted(result.upgraded ? "upgraded" : "success", result.statusCode ?? 0);
      this.logger.debug({ ...log, status: result.statusCode, reused: conn.uses > 1 }, "Request relayed");
      if (result.upgraded || !result.clientKeepAlive) return null;
      return { leftover: result.leftover };
    }

    this.logger.info({ ...log, outcome: result.outcome, err: result.error ? formatError(result.error) : undefined }, "Relay failed");
    if (result.responseCommitted || (result.outcome === "client-abort" && !(result.error instanceof ClientProtocolError))) {
      this.deps.metrics?.requestCompleted(result.outcome, result.statusCode ?? 0);
      destroyBestEffort(this.client);
      return null;
    }
    this.respondError(failureStatus(result), result.outcome);
    return null;
  }

  private respondError(err: unknown, outcome: string): void {
    const status = err instanceof ProxyError ? err.statusCode : 502;
    const message = err instanceof ProxyError ? err.message : httpStatusText(status);
    this.deps.metrics?.requestCompleted(outcome, status);
    if (status >= 500) this.logger.warn({ status, outcome, err: formatError(err) }, "Request failed");
    else this.logger.debug({ status, outcome, err: formatError(err) }, "Request rejected");
    respondErrorAndClose(this.client, status, message);
  }
}

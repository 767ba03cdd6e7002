import type { Duplex } from "node:stream";

import { ClientProtocolError, RelayTimeoutError, UpstreamProtocolError } from "../errors.js";
import { BodyTracker, determineResponseFraming, type BodyFraming } from "../http/framing.js";
import { HeadAccumulator, connectionTokens, isPersistent, parseResponseHead, type RequestHead, type ResponseHead } from "../http/head.js";
import { destroyBestEffort, isDestroyed, pauseBestEffort, resumeBestEffort, writeCaptureErrorBestEffort } from "../socketSafe.js";

export type RelayOutcome = "success" | "client-abort" | "upstream-abort" | "timeout";

export interface RelayResult {
  outcome: RelayOutcome;
  /** Whether any response bytes have reached the client. */
  responseCommitted: boolean;
  upstreamReusable: boolean;
  clientKeepAlive: boolean;
  /** Client bytes read past the end of this request (the start of a pipelined request). */
  leftover: Buffer;
  statusCode?: number;
  upgraded: boolean;
  error?: Error;
}

export interface RelayOptions {
  client: Duplex;
  upstream: Duplex;
  request: RequestHead;
  /** Serialized head to send upstream (already rewritten). */
  upstreamRequestHead: Buffer;
  requestFraming: BodyFraming;
  /** Client bytes that arrived together with the request head. */
  clientBuffered: Buffer;
  clientKeepAlive: boolean;
  upgradeRequested: boolean;
  idleTimeoutMs: number;
  maxHeadBytes: number;
}

type Phase = "response-head" | "response-body" | "upgraded";

function asBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk), "latin1");
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Moves one request/response exchange between an accepted client socket and an upstream socket.
 *
 * Bodies are streamed chunk by chunk: a write that reports back-pressure pauses the opposite
 * socket until the destination drains. Both sockets are paused again and every listener this class
 * added is removed before the result is reported, so the caller can hand them on.
 */
export class StreamRelay {
  private readonly opts: RelayOptions;
  private readonly client: Duplex;
  private readonly upstream: Duplex;
  private readonly requestBody: BodyTracker;
  private readonly responseHead: HeadAccumulator;

  private phase: Phase = "response-head";
  private response: ResponseHead | null = null;
  private responseBody: BodyTracker | null = null;
  private responseDone = false;
  private committed = false;
  private upstreamSurplus = false;
  private clientEnded = false;

  private readonly leftover: Buffer[] = [];
  private clientHeld = false;
  private clientPausedForUpstream = false;
  private upstreamPausedForClient = false;

  private idleTimer: NodeJS.Timeout | null = null;
  private finished = false;
  private resolve: ((result: RelayResult) => void) | null = null;
  private readonly detachers: Array<() => void> = [];

  constructor(opts: RelayOptions) {
    this.opts = opts;
    this.client = opts.client;
    this.upstream = opts.upstream;
    this.requestBody = new BodyTracker(opts.requestFraming, (message) => new ClientProtocolError("ERR_INVALID_FRAMING", message));
    this.responseHead = new HeadAccumulator(
      opts.maxHeadBytes,
      () => new UpstreamProtocolError("Upstream response head is too large"),
    );
  }

  run(): Promise<RelayResult> {
    return new Promise<RelayResult>((resolve) => {
      this.resolve = resolve;
      this.start();
    });
  }

  private start(): void {
    this.listen(this.client, "data", (chunk) => this.guard(() => this.onClientData(asBuffer(chunk))));
    this.listen(this.client, "end", () => this.guard(() => this.onClientEnd()));
    this.listen(this.client, "close", () => this.onClientClose());
    this.listen(this.client, "error", (err) => this.finish("client-abort", toError(err)));
    this.listen(this.client, "drain", () => this.onClientDrain());

    this.listen(this.upstream, "data", (chunk) => this.guard(() => this.onUpstreamData(asBuffer(chunk))));
    this.listen(this.upstream, "end", () => this.guard(() => this.onUpstreamEnd()));
    this.listen(this.upstream, "close", () => this.onUpstreamClose());
    this.listen(this.upstream, "error", (err) => this.finish("upstream-abort", toError(err)));
    this.listen(this.upstream, "drain", () => this.onUpstreamDrain());

    this.idleTimer = setTimeout(() => {
      this.finish("timeout", new RelayTimeoutError(`No activity for ${this.opts.idleTimeoutMs}ms`));
    }, this.opts.idleTimeoutMs);
    this.idleTimer.unref();

    if (isDestroyed(this.client)) {
      this.finish("client-abort", new Error("Client connection closed"));
      return;
    }
    if (isDestroyed(this.upstream)) {
      this.finish("upstream-abort", new UpstreamProtocolError("Upstream connection closed"));
      return;
    }

    if (!this.writeUpstream(this.opts.upstreamRequestHead)) return;
    if (this.opts.clientBuffered.length > 0) {
      this.guard(() => this.onClientData(this.opts.clientBuffered));
    }
    if (this.finished) return;

    this.resumeClient();
    resumeBestEffort(this.upstream);
  }

  private listen(stream: Duplex, event: string, handler: (arg: unknown) => void): void {
    const listener = (arg: unknown) => {
      if (this.finished) return;
      handler(arg);
    };
    stream.on(event, listener);
    this.detachers.push(() => stream.off(event, listener));
  }

  private guard(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      if (err instanceof ClientProtocolError) this.finish("client-abort", err);
      else this.finish("upstream-abort", toError(err));
    }
  }

  private touch(): void {
    this.idleTimer?.refresh();
  }

  private onClientData(chunk: Buffer): void {
    this.touch();
    if (this.phase === "upgraded") {
      this.writeUpstream(chunk);
      return;
    }

    let rest = chunk;
    if (!this.requestBody.done) {
      const progress = this.requestBody.push(chunk);
      if (progress.body.length > 0 && !this.writeUpstream(progress.body)) return;
      rest = progress.rest;
      if (progress.done) this.maybeComplete();
      if (this.finished) {
        if (rest.length > 0) this.leftover.push(rest);
        return;
      }
    }

    if (rest.length > 0) {
      // Bytes of the next request (or of the upgraded stream) wait until this exchange is over.
      this.leftover.push(rest);
      this.clientHeld = true;
      pauseBestEffort(this.client);
    }
  }

  private onClientClose(): void {
    if (this.phase === "upgraded") this.finish("success");
    else this.finish("client-abort", new Error("Client connection closed"));
  }

  private onClientEnd(): void {
    this.clientEnded = true;
    if (this.phase === "upgraded") {
      this.upstream.end();
      return;
    }
    if (!this.requestBody.done) {
      this.finish("client-abort", new Error("Client closed the connection before the request body was complete"));
    }
  }

  private onUpstreamData(chunk: Buffer): void {
    this.touch();
    let rest: Buffer = chunk;
    while (rest.length > 0 && !this.finished) {
      switch (this.phase) {
        case "upgraded":
          this.writeClient(rest);
          return;
        case "response-head": {
          const parsed = this.responseHead.push(rest);
          if (!parsed) return;
          rest = parsed.rest;
          this.onResponseHead(parsed.head);
          if (this.phase === "response-body" && this.responseBody?.done) {
            // No body follows this response; anything else the upstream sent is unaccounted for.
            if (rest.length > 0) this.upstreamSurplus = true;
            this.responseDone = true;
            this.maybeComplete();
            return;
          }
          break;
        }
        case "response-body": {
          const tracker = this.responseBody;
          if (!tracker) return;
          const progress = tracker.push(rest);
          if (progress.body.length > 0 && !this.writeClient(progress.body)) return;
          if (progress.done) {
            if (progress.rest.length > 0) this.upstreamSurplus = true;
            this.responseDone = true;
            this.maybeComplete();
          }
          return;
        }
      }
    }
  }

  private onResponseHead(raw: Buffer): void {
    const head = parseResponseHead(raw);

    if (head.statusCode === 101) {
      if (!this.opts.upgradeRequested) throw new UpstreamProtocolError("Upstream switched protocols without an upgrade request");
      this.response = head;
      if (!this.writeClient(raw)) return;
      this.phase = "upgraded";
      const pending = Buffer.concat(this.leftover);
      this.leftover.length = 0;
      this.clientHeld = false;
      if (pending.length > 0 && !this.writeUpstream(pending)) return;
      this.resumeClient();
      return;
    }

    if (head.statusCode < 200) {
      // Interim responses go straight through; the final one follows.
      this.writeClient(raw);
      return;
    }

    this.response = head;
    const framing = determineResponseFraming(this.opts.request.method, head);
    this.responseBody = new BodyTracker(framing, (message) => new UpstreamProtocolError(`Invalid upstream response body: ${message}`));
    if (!this.writeClient(raw)) return;
    this.phase = "response-body";
  }

  private onUpstreamEnd(): void {
    if (this.phase === "upgraded") {
      this.client.end();
      return;
    }
    if (this.phase === "response-body" && this.responseBody?.framing.kind === "close-delimited") {
      this.responseDone = true;
      this.finish("success");
      return;
    }
    this.finish("upstream-abort", new UpstreamProtocolError("Upstream closed the connection before the response was complete"));
  }

  private onUpstreamClose(): void {
    if (this.phase === "upgraded") {
      this.finish("success");
      return;
    }
    this.guard(() => this.onUpstreamEnd());
  }

  /**
   * The exchange is over once the response is complete. A request body still in flight at that
   * point is abandoned and the connections are not reused.
   */
  private maybeComplete(): void {
    if (this.responseDone) this.finish("success");
  }

  private writeClient(chunk: Buffer): boolean {
    this.committed = true;
    const res = writeCaptureErrorBestEffort(this.client, chunk);
    if (res.err) {
      this.finish("client-abort", toError(res.err));
      return false;
    }
    if (!res.ok && !this.upstreamPausedForClient) {
      this.upstreamPausedForClient = true;
      pauseBestEffort(this.upstream);
    }
    return true;
  }

  private writeUpstream(chunk: Buffer): boolean {
    const res = writeCaptureErrorBestEffort(this.upstream, chunk);
    if (res.err) {
      this.finish("upstream-abort", toError(res.err));
      return false;
    }
    if (!res.ok && !this.clientPausedForUpstream) {
      this.clientPausedForUpstream = true;
      pauseBestEffort(this.client);
    }
    return true;
  }

  private onClientDrain(): void {
    if (!this.upstreamPausedForClient) return;
    this.upstreamPausedForClient = false;
    resumeBestEffort(this.upstream);
  }

  private onUpstreamDrain(): void {
    if (!this.clientPausedForUpstream) return;
    this.clientPausedForUpstream = false;
    this.resumeClient();
  }

  private resumeClient(): void {
    if (this.clientHeld || this.clientPausedForUpstream) return;
    resumeBestEffort(this.client);
  }

  private finish(outcome: RelayOutcome, error?: Error): void {
    if (this.finished) return;
    this.finished = true;
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }

    // Sockets must stop flowing before their data listeners go, or bytes would be dropped.
    pauseBestEffort(this.client);
    pauseBestEffort(this.upstream);
    for (const detach of this.detachers) detach();
    this.detachers.length = 0;

    const upgraded = this.phase === "upgraded";
    const success = outcome === "success";
    const response = this.response;
    const framing = this.responseBody?.framing.kind;

    const upstreamReusable =
      success &&
      !upgraded &&
      this.responseDone &&
      this.requestBody.done &&
      !this.upstreamSurplus &&
      framing !== "close-delimited" &&
      response !== null &&
      isPersistent(response.version, response.headers);

    const clientKeepAlive =
      success &&
      !upgraded &&
      this.opts.clientKeepAlive &&
      this.requestBody.done &&
      !this.clientEnded &&
      framing !== "close-delimited" &&
      response !== null &&
      !connectionTokens(response.headers).has("close");

    if (!success && this.committed) {
      // A partially relayed response must never look complete to the client.
      destroyBestEffort(this.client);
    }

    const result: RelayResult = {
      outcome,
      responseCommitted: this.committed,
      upstreamReusable,
      clientKeepAlive,
      leftover: Buffer.concat(this.leftover),
      upgraded,
    };
    if (response) result.statusCode = response.statusCode;
    if (error) result.error = error;

    const resolve = this.resolve;
    this.resolve = null;
    resolve?.(result);
  }
}

export function relay(opts: RelayOptions): Promise<RelayResult> {
  return new StreamRelay(opts).run();
}

import type { Duplex } from "node:stream";

/**
 * Socket helpers that never throw.
 *
 * Teardown paths run from event handlers where a throw would surface as an uncaught exception and
 * take the whole process down with it.
 */

export function destroyBestEffort(stream: Duplex | null | undefined): void {
  if (!stream) return;
  try {
    stream.destroy();
  } catch {
    // ignore
  }
}

export function pauseBestEffort(stream: Duplex): void {
  try {
    stream.pause();
  } catch {
    // ignore
  }
}

export function resumeBestEffort(stream: Duplex): void {
  try {
    stream.resume();
  } catch {
    // ignore
  }
}

export function isDestroyed(stream: Duplex): boolean {
  try {
    return stream.destroyed === true;
  } catch {
    return true;
  }
}

/**
 * Writes `chunk` and reports both the back-pressure signal and any synchronous error.
 */
export function writeCaptureErrorBestEffort(stream: Duplex, chunk: Uint8Array | string): { ok: boolean; err: unknown } {
  try {
    return { ok: stream.write(chunk), err: null };
  } catch (err) {
    return { ok: false, err: err ?? new Error("write failed") };
  }
}

/**
 * Ends the stream (optionally with a final chunk) and destroys it if the peer has not finished
 * reading within `timeoutMs`.
 */
export function endThenDestroyQuietly(
  stream: Duplex,
  data?: string | Uint8Array,
  opts: Readonly<{ timeoutMs?: number }> = {},
): void {
  if (isDestroyed(stream)) return;
  const timer = setTimeout(() => destroyBestEffort(stream), opts.timeoutMs ?? 2_000);
  timer.unref();
  stream.once("close", () => clearTimeout(timer));
  try {
    if (data === undefined) stream.end();
    else stream.end(data);
  } catch {
    clearTimeout(timer);
    destroyBestEffort(stream);
  }
}

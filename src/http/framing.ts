import { ClientProtocolError, UpstreamProtocolError } from "../errors.js";
import { getHeaderValues, type HeaderField, type RequestHead, type ResponseHead } from "./head.js";

export type BodyFraming =
  | { kind: "none" }
  | { kind: "content-length"; length: number }
  | { kind: "chunked" }
  | { kind: "close-delimited" };

export interface BodyProgress {
  /** Bytes that belong to the current message body, framing bytes included. */
  body: Buffer;
  /** Bytes past the end of the message. */
  rest: Buffer;
  done: boolean;
}

const EMPTY = Buffer.alloc(0);
const MAX_CHUNK_LINE_BYTES = 4 * 1024;
const MAX_TRAILER_BYTES = 64 * 1024;

type ContentLength = { kind: "absent" } | { kind: "valid"; length: number } | { kind: "invalid" };

/**
 * Content-Length may be repeated (or comma-joined) only when every copy carries the same value.
 */
export function parseContentLength(headers: readonly HeaderField[]): ContentLength {
  const raw = getHeaderValues(headers, "content-length");
  if (raw.length === 0) return { kind: "absent" };

  let length: number | null = null;
  for (const value of raw) {
    for (const part of value.split(",")) {
      const trimmed = part.trim();
      if (!/^\d{1,15}$/.test(trimmed)) return { kind: "invalid" };
      const n = Number(trimmed);
      if (length !== null && n !== length) return { kind: "invalid" };
      length = n;
    }
  }
  return length === null ? { kind: "invalid" } : { kind: "valid", length };
}

function transferCodings(headers: readonly HeaderField[]): string[] | null {
  const raw = getHeaderValues(headers, "transfer-encoding");
  if (raw.length === 0) return null;
  return raw
    .flatMap((value) => value.split(","))
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);
}

export function determineRequestFraming(head: RequestHead): BodyFraming {
  const fail = (message: string) => new ClientProtocolError("ERR_INVALID_FRAMING", message);
  const codings = transferCodings(head.headers);
  const contentLength = parseContentLength(head.headers);

  if (codings !== null) {
    if (contentLength.kind !== "absent") throw fail("Both Transfer-Encoding and Content-Length are present");
    if (codings[codings.length - 1] !== "chunked") throw fail("Request Transfer-Encoding must end with chunked");
    return { kind: "chunked" };
  }

  switch (contentLength.kind) {
    case "absent":
      return { kind: "none" };
    case "invalid":
      throw fail("Invalid Content-Length");
    case "valid":
      return contentLength.length === 0 ? { kind: "none" } : { kind: "content-length", length: contentLength.length };
  }
}

export function responseHasNoBody(requestMethod: string, statusCode: number): boolean {
  return requestMethod === "HEAD" || (statusCode >= 100 && statusCode < 200) || statusCode === 204 || statusCode === 304;
}

export function determineResponseFraming(requestMethod: string, head: ResponseHead): BodyFraming {
  if (responseHasNoBody(requestMethod, head.statusCode)) return { kind: "none" };

  const codings = transferCodings(head.headers);
  if (codings !== null) {
    return codings[codings.length - 1] === "chunked" ? { kind: "chunked" } : { kind: "close-delimited" };
  }

  const contentLength = parseContentLength(head.headers);
  switch (contentLength.kind) {
    case "absent":
      return { kind: "close-delimited" };
    case "invalid":
      throw new UpstreamProtocolError("Upstream sent an invalid Content-Length");
    case "valid":
      return contentLength.length === 0 ? { kind: "none" } : { kind: "content-length", length: contentLength.length };
  }
}

type ChunkState = "size-line" | "data" | "data-cr" | "data-lf" | "trailer-line";

/**
 * Incrementally walks a message body as bytes arrive, splitting each chunk into the part that
 * belongs to the body and whatever follows it.
 *
 * Chunked bodies are validated but never re-encoded: `body` is the exact wire bytes including
 * chunk-size lines, extensions and trailers.
 */
export class BodyTracker {
  readonly framing: BodyFraming;
  private readonly fail: (message: string) => Error;
  private finished: boolean;
  private remaining: number;

  private chunkState: ChunkState = "size-line";
  private chunkRemaining = 0;
  private line = "";
  private trailerBytes = 0;

  constructor(framing: BodyFraming, fail: (message: string) => Error) {
    this.framing = framing;
    this.fail = fail;
    this.remaining = framing.kind === "content-length" ? framing.length : 0;
    this.finished = framing.kind === "none" || (framing.kind === "content-length" && framing.length === 0);
  }

  get done(): boolean {
    return this.finished;
  }

  push(chunk: Buffer): BodyProgress {
    if (this.finished) return { body: EMPTY, rest: chunk, done: true };

    switch (this.framing.kind) {
      case "none":
        return { body: EMPTY, rest: chunk, done: true };
      case "close-delimited":
        return { body: chunk, rest: EMPTY, done: false };
      case "content-length": {
        const take = Math.min(this.remaining, chunk.length);
        this.remaining -= take;
        if (this.remaining === 0) this.finished = true;
        return { body: chunk.subarray(0, take), rest: chunk.subarray(take), done: this.finished };
      }
      case "chunked":
        return this.pushChunked(chunk);
    }
  }

  private pushChunked(chunk: Buffer): BodyProgress {
    let i = 0;
    while (i < chunk.length && !this.finished) {
      switch (this.chunkState) {
        case "size-line":
        case "trailer-line": {
          const lf = chunk.indexOf(0x0a, i);
          const end = lf === -1 ? chunk.length : lf + 1;
          this.appendLine(chunk.subarray(i, end));
          i = end;
          if (lf !== -1) this.completeLine();
          break;
        }
        case "data": {
          const take = Math.min(this.chunkRemaining, chunk.length - i);
          this.chunkRemaining -= take;
          i += take;
          if (this.chunkRemaining === 0) this.chunkState = "data-cr";
          break;
        }
        case "data-cr":
          if (chunk[i] !== 0x0d) throw this.fail("Missing CRLF after chunk data");
          i += 1;
          this.chunkState = "data-lf";
          break;
        case "data-lf":
          if (chunk[i] !== 0x0a) throw this.fail("Missing CRLF after chunk data");
          i += 1;
          this.chunkState = "size-line";
          break;
      }
    }
    return { body: chunk.subarray(0, i), rest: chunk.subarray(i), done: this.finished };
  }

  private appendLine(bytes: Buffer): void {
    this.line += bytes.toString("latin1");
    if (this.chunkState === "size-line" && this.line.length > MAX_CHUNK_LINE_BYTES) {
      throw this.fail("Chunk size line too long");
    }
    if (this.chunkState === "trailer-line" && this.trailerBytes + this.line.length > MAX_TRAILER_BYTES) {
      throw this.fail("Chunked trailer section too large");
    }
  }

  private completeLine(): void {
    const line = this.line;
    this.line = "";
    if (!line.endsWith("\r\n")) throw this.fail("Bare LF in chunked framing");
    const content = line.slice(0, -2);
    if (content.includes("\r")) throw this.fail("Bare CR in chunked framing");

    if (this.chunkState === "trailer-line") {
      this.trailerBytes += line.length;
      if (content === "") {
        this.finished = true;
        return;
      }
      if (content.indexOf(":") <= 0) throw this.fail("Malformed chunked trailer");
      return;
    }

    const size = parseChunkSize(content);
    if (size === null) throw this.fail("Invalid chunk size");
    if (size === 0) {
      this.chunkState = "trailer-line";
      return;
    }
    this.chunkRemaining = size;
    this.chunkState = "data";
  }
}

/**
 * chunk-size [ BWS ";" chunk-ext ]. Extensions are passed through untouched.
 */
export function parseChunkSize(line: string): number | null {
  const semi = line.indexOf(";");
  const sizeText = (semi === -1 ? line : line.slice(0, semi)).replace(/[ \t]+$/, "");
  if (!/^[0-9a-fA-F]{1,12}$/.test(sizeText)) return null;
  return Number.parseInt(sizeText, 16);
}

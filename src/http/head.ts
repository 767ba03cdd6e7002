import { ClientProtocolError, UpstreamProtocolError } from "../errors.js";
import { isValidFieldValue, isValidHttpToken, isValidRequestTarget } from "./tokens.js";

export type HttpVersion = "HTTP/1.0" | "HTTP/1.1";

/**
 * A header field as it appeared on the wire. `name` keeps its original case so forwarded heads
 * stay byte-compatible with what the peer sent.
 */
export interface HeaderField {
  name: string;
  value: string;
}

export interface RequestHead {
  method: string;
  target: string;
  version: HttpVersion;
  headers: HeaderField[];
}

export interface ResponseHead {
  version: HttpVersion;
  statusCode: number;
  reason: string;
  headers: HeaderField[];
}

const CRLF = "\r\n";
const HEAD_TERMINATOR = Buffer.from("\r\n\r\n", "latin1");

/**
 * Accumulates bytes until a complete message head (terminated by an empty line) is available.
 *
 * Only the bytes of the head are retained; anything after the terminator is handed back as
 * `rest` so body bytes never sit in this buffer.
 */
export class HeadAccumulator {
  private readonly maxBytes: number;
  private readonly onTooLarge: () => Error;
  private chunks: Buffer[] = [];
  private length = 0;

  constructor(maxBytes: number, onTooLarge: () => Error) {
    this.maxBytes = maxBytes;
    this.onTooLarge = onTooLarge;
  }

  get bufferedBytes(): number {
    return this.length;
  }

  push(chunk: Buffer): { head: Buffer; rest: Buffer } | null {
    // Only the tail of the previous data can complete a terminator that straddles the boundary.
    const searchFrom = Math.max(0, this.length - (HEAD_TERMINATOR.length - 1));
    this.chunks.push(chunk);
    this.length += chunk.length;
    const buf = this.chunks.length === 1 ? chunk : Buffer.concat(this.chunks, this.length);
    this.chunks = [buf];

    const idx = buf.indexOf(HEAD_TERMINATOR, searchFrom);
    if (idx === -1) {
      if (this.length > this.maxBytes) throw this.onTooLarge();
      return null;
    }

    const end = idx + HEAD_TERMINATOR.length;
    if (end > this.maxBytes) throw this.onTooLarge();
    this.chunks = [];
    this.length = 0;
    return { head: buf.subarray(0, end), rest: buf.subarray(end) };
  }
}

function splitHeadLines(head: Buffer): string[] {
  const text = head.toString("latin1");
  const lines = text.split(CRLF);
  // The terminator leaves two trailing empty strings.
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function parseFields(lines: readonly string[], fail: (message: string) => Error): HeaderField[] {
  const headers: HeaderField[] = [];
  for (const line of lines) {
    if (line.includes("\n") || line.includes("\r")) throw fail("Bare CR or LF in header section");
    const first = line.charCodeAt(0);
    if (first === 0x20 || first === 0x09) throw fail("Obsolete header line folding is not supported");

    const colon = line.indexOf(":");
    if (colon <= 0) throw fail("Malformed header line");
    const name = line.slice(0, colon);
    if (!isValidHttpToken(name)) throw fail("Invalid header name");

    const value = line.slice(colon + 1).replace(/^[ \t]+|[ \t]+$/g, "");
    if (!isValidFieldValue(value)) throw fail("Invalid header value");
    headers.push({ name, value });
  }
  return headers;
}

function parseVersion(raw: string): HttpVersion | "unsupported" | null {
  if (raw === "HTTP/1.1" || raw === "HTTP/1.0") return raw;
  if (/^HTTP\/\d\.\d$/.test(raw)) return "unsupported";
  return null;
}

export function parseRequestHead(head: Buffer): RequestHead {
  const fail = (message: string) => new ClientProtocolError("ERR_HEAD_MALFORMED", message);
  const lines = splitHeadLines(head);
  const requestLine = lines[0];
  if (requestLine === undefined) throw fail("Empty request");

  const [method, target, rawVersion, ...extra] = requestLine.split(" ");
  if (method === undefined || target === undefined || rawVersion === undefined || extra.length > 0) {
    throw fail("Malformed request line");
  }
  if (!isValidHttpToken(method)) throw fail("Invalid request method");
  if (!isValidRequestTarget(target)) throw fail("Invalid request target");

  const version = parseVersion(rawVersion);
  if (version === null) throw fail("Malformed HTTP version");
  if (version === "unsupported") {
    throw new ClientProtocolError("ERR_UNSUPPORTED_VERSION", "HTTP version not supported");
  }

  return { method, target, version, headers: parseFields(lines.slice(1), fail) };
}

export function parseResponseHead(head: Buffer): ResponseHead {
  const fail = (message: string) => new UpstreamProtocolError(`Upstream sent an invalid response: ${message}`);
  const lines = splitHeadLines(head);
  const statusLine = lines[0];
  if (statusLine === undefined) throw fail("empty response");

  const firstSpace = statusLine.indexOf(" ");
  if (firstSpace === -1) throw fail("malformed status line");
  const version = parseVersion(statusLine.slice(0, firstSpace));
  if (version === null || version === "unsupported") throw fail("unsupported HTTP version");

  const afterVersion = statusLine.slice(firstSpace + 1);
  const secondSpace = afterVersion.indexOf(" ");
  const codeRaw = secondSpace === -1 ? afterVersion : afterVersion.slice(0, secondSpace);
  if (!/^\d{3}$/.test(codeRaw)) throw fail("malformed status code");
  const statusCode = Number(codeRaw);
  if (statusCode < 100) throw fail("malformed status code");
  const reason = secondSpace === -1 ? "" : afterVersion.slice(secondSpace + 1);
  if (!isValidFieldValue(reason)) throw fail("malformed reason phrase");

  return { version, statusCode, reason, headers: parseFields(lines.slice(1), fail) };
}

function serializeFields(headers: readonly HeaderField[]): string {
  let out = "";
  for (const h of headers) out += `${h.name}: ${h.value}${CRLF}`;
  return out;
}

export function serializeRequestHead(head: RequestHead): Buffer {
  return Buffer.from(`${head.method} ${head.target} ${head.version}${CRLF}${serializeFields(head.headers)}${CRLF}`, "latin1");
}

export function getHeaderValues(headers: readonly HeaderField[], nameLower: string): string[] {
  const out: string[] = [];
  for (const h of headers) {
    if (h.name.toLowerCase() === nameLower) out.push(h.value);
  }
  return out;
}

/**
 * Returns:
 * - `undefined` if the header is absent
 * - the value if it is present exactly once
 * - `null` if it is repeated
 */
export function getSingleHeader(headers: readonly HeaderField[], nameLower: string): string | undefined | null {
  const values = getHeaderValues(headers, nameLower);
  if (values.length === 0) return undefined;
  if (values.length > 1) return null;
  return values[0];
}

export function hasHeader(headers: readonly HeaderField[], nameLower: string): boolean {
  return headers.some((h) => h.name.toLowerCase() === nameLower);
}

export function removeHeader(headers: readonly HeaderField[], nameLower: string): HeaderField[] {
  return headers.filter((h) => h.name.toLowerCase() !== nameLower);
}

/**
 * Comma-separated list tokens of every `Connection` header, lowercased.
 */
export function connectionTokens(headers: readonly HeaderField[]): Set<string> {
  const tokens = new Set<string>();
  for (const value of getHeaderValues(headers, "connection")) {
    for (const part of value.split(",")) {
      const token = part.trim().toLowerCase();
      if (token) tokens.add(token);
    }
  }
  return tokens;
}

/**
 * HTTP/1.1 is persistent unless `Connection: close`; HTTP/1.0 only with `Connection: keep-alive`.
 */
export function isPersistent(version: HttpVersion, headers: readonly HeaderField[]): boolean {
  const tokens = connectionTokens(headers);
  if (tokens.has("close")) return false;
  if (version === "HTTP/1.1") return true;
  return tokens.has("keep-alive");
}

export function isUpgradeRequest(head: RequestHead): boolean {
  return connectionTokens(head.headers).has("upgrade") && hasHeader(head.headers, "upgrade");
}

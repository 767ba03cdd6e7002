import type { DestinationAddress } from "../address/codec.js";
import { getHeaderValues, removeHeader, type HeaderField, type RequestHead } from "./head.js";

export interface RewriteOptions {
  destination: DestinationAddress;
  /** Host header value the client sent. */
  originalHost: string;
  clientAddress: string | undefined;
  forwardedHeaders: boolean;
  /** When non-empty, the upstream sees `Host: <prefix>.<upstreamHostSuffix>`. */
  upstreamHostSuffix: string;
}

function setHeader(headers: HeaderField[], name: string, value: string): HeaderField[] {
  const lower = name.toLowerCase();
  const idx = headers.findIndex((h) => h.name.toLowerCase() === lower);
  if (idx === -1) return [...headers, { name, value }];
  // Keep the first occurrence's position and spelling.
  const existing = headers[idx];
  const out = removeHeader(headers, lower);
  out.splice(idx, 0, { name: existing?.name ?? name, value });
  return out;
}

export function upstreamHostValue(destination: DestinationAddress, upstreamHostSuffix: string): string {
  return destination.prefix ? `${destination.prefix}.${upstreamHostSuffix}` : upstreamHostSuffix;
}

/**
 * Produces the head sent upstream. Apart from the edits below, header names, values and order are
 * left exactly as the client sent them.
 */
export function rewriteRequestHead(head: RequestHead, opts: RewriteOptions): RequestHead {
  let headers = removeHeader(head.headers, "proxy-connection");

  if (opts.upstreamHostSuffix) {
    headers = setHeader(headers, "Host", upstreamHostValue(opts.destination, opts.upstreamHostSuffix));
  }

  if (opts.forwardedHeaders) {
    if (opts.clientAddress) {
      const chain = [...getHeaderValues(headers, "x-forwarded-for"), opts.clientAddress].join(", ");
      headers = setHeader(headers, "X-Forwarded-For", chain);
    }
    headers = setHeader(headers, "X-Forwarded-Host", opts.originalHost);
    headers = setHeader(headers, "X-Forwarded-Proto", "http");
  }

  return { ...head, headers };
}

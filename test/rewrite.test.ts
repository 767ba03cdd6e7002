import assert from "node:assert/strict";
import test from "node:test";

import type { DestinationAddress } from "../src/address/codec.js";
import type { RequestHead } from "../src/http/head.js";
import { rewriteRequestHead, upstreamHostValue } from "../src/http/rewrite.js";

const destination: DestinationAddress = { host: "10.0.0.5", family: 4, port: 8080, portExplicit: true, prefix: "api" };

const head: RequestHead = {
  method: "GET",
  target: "/status",
  version: "HTTP/1.1",
  headers: [
    { name: "host", value: "api.10-0-0-5-8080.test" },
    { name: "Proxy-Connection", value: "keep-alive" },
    { name: "X-Forwarded-For", value: "198.51.100.7" },
    { name: "Accept", value: "*/*" },
  ],
};

test("rewriteRequestHead drops hop-by-hop proxy headers and leaves the rest untouched", () => {
  const out = rewriteRequestHead(head, {
    destination,
    originalHost: "api.10-0-0-5-8080.test",
    clientAddress: "127.0.0.1",
    forwardedHeaders: false,
    upstreamHostSuffix: "",
  });
  assert.deepEqual(out.headers, [
    { name: "host", value: "api.10-0-0-5-8080.test" },
    { name: "X-Forwarded-For", value: "198.51.100.7" },
    { name: "Accept", value: "*/*" },
  ]);
  assert.equal(out.target, "/status");
});

test("rewriteRequestHead appends forwarding headers", () => {
  const out = rewriteRequestHead(head, {
    destination,
    originalHost: "api.10-0-0-5-8080.test",
    clientAddress: "127.0.0.1",
    forwardedHeaders: true,
    upstreamHostSuffix: "",
  });
  assert.deepEqual(out.headers, [
    { name: "host", value: "api.10-0-0-5-8080.test" },
    { name: "X-Forwarded-For", value: "198.51.100.7, 127.0.0.1" },
    { name: "Accept", value: "*/*" },
    { name: "X-Forwarded-Host", value: "api.10-0-0-5-8080.test" },
    { name: "X-Forwarded-Proto", value: "http" },
  ]);
});

test("rewriteRequestHead rewrites Host in place when an upstream suffix is set", () => {
  const out = rewriteRequestHead(head, {
    destination,
    originalHost: "api.10-0-0-5-8080.test",
    clientAddress: undefined,
    forwardedHeaders: false,
    upstreamHostSuffix: "internal.svc",
  });
  assert.deepEqual(out.headers[0], { name: "host", value: "api.internal.svc" });
  assert.equal(out.headers.length, 3);
});

test("upstreamHostValue falls back to the bare suffix without a prefix", () => {
  assert.equal(upstreamHostValue({ ...destination, prefix: "" }, "internal.svc"), "internal.svc");
  assert.equal(upstreamHostValue({ ...destination, prefix: "a.b" }, "internal.svc"), "a.b.internal.svc");
});

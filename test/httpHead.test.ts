import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ClientProtocolError, UpstreamProtocolError } from "../src/errors.js";
import {
  HeadAccumulator,
  connectionTokens,
  getSingleHeader,
  isPersistent,
  isUpgradeRequest,
  parseRequestHead,
  parseResponseHead,
  serializeRequestHead,
} from "../src/http/head.js";

function bytes(text: string): Buffer {
  return Buffer.from(text, "latin1");
}

function assertClientError(fn: () => unknown, code: string): void {
  assert.throws(fn, (err: unknown) => err instanceof ClientProtocolError && err.code === code);
}

describe("HeadAccumulator", () => {
  const tooLarge = () => new ClientProtocolError("ERR_HEAD_TOO_LARGE", "too large");

  it("returns the head and whatever follows it", () => {
    const acc = new HeadAccumulator(1024, tooLarge);
    const res = acc.push(bytes("GET / HTTP/1.1\r\nHost: a\r\n\r\nBODY"));
    assert.ok(res);
    assert.equal(res.head.toString("latin1"), "GET / HTTP/1.1\r\nHost: a\r\n\r\n");
    assert.equal(res.rest.toString("latin1"), "BODY");
    assert.equal(acc.bufferedBytes, 0);
  });

  it("finds a terminator split across chunks", () => {
    const acc = new HeadAccumulator(1024, tooLarge);
    assert.equal(acc.push(bytes("GET / HTTP/1.1\r\nHost: a\r")), null);
    assert.equal(acc.push(bytes("\n\r")), null);
    assert.equal(acc.bufferedBytes, 26);
    const res = acc.push(bytes("\nnext"));
    assert.ok(res);
    assert.equal(res.head.toString("latin1"), "GET / HTTP/1.1\r\nHost: a\r\n\r\n");
    assert.equal(res.rest.toString("latin1"), "next");
  });

  it("throws once the head exceeds the limit", () => {
    const acc = new HeadAccumulator(32, tooLarge);
    assert.equal(acc.push(bytes("GET / HTTP/1.1\r\n")), null);
    assert.throws(() => acc.push(bytes(`X-Long: ${"a".repeat(32)}\r\n`)), /too large/);
  });

  it("rejects a complete head that is over the limit", () => {
    const acc = new HeadAccumulator(20, tooLarge);
    assert.throws(() => acc.push(bytes("GET / HTTP/1.1\r\nHost: a\r\n\r\n")), /too large/);
  });
});

describe("parseRequestHead", () => {
  it("parses the request line and preserves header case and order", () => {
    const head = parseRequestHead(bytes("POST /a?b=1 HTTP/1.1\r\nHost: x.test\r\nX-Custom:  v  \r\ncontent-length: 3\r\n\r\n"));
    assert.deepEqual(head, {
      method: "POST",
      target: "/a?b=1",
      version: "HTTP/1.1",
      headers: [
        { name: "Host", value: "x.test" },
        { name: "X-Custom", value: "v" },
        { name: "content-length", value: "3" },
      ],
    });
  });

  it("rejects malformed request lines", () => {
    for (const text of [
      "GET /\r\n\r\n",
      "GET  / HTTP/1.1\r\n\r\n",
      "GET / HTTP/1.1 extra\r\n\r\n",
      "G(T / HTTP/1.1\r\n\r\n",
      "GET / HTTP/one\r\n\r\n",
    ]) {
      assertClientError(() => parseRequestHead(bytes(text)), "ERR_HEAD_MALFORMED");
    }
  });

  it("answers unknown HTTP versions with a version error", () => {
    assertClientError(() => parseRequestHead(bytes("GET / HTTP/2.0\r\n\r\n")), "ERR_UNSUPPORTED_VERSION");
  });

  it("rejects obsolete line folding, bad names and bare CR", () => {
    assertClientError(() => parseRequestHead(bytes("GET / HTTP/1.1\r\nA: b\r\n c\r\n\r\n")), "ERR_HEAD_MALFORMED");
    assertClientError(() => parseRequestHead(bytes("GET / HTTP/1.1\r\nBad Name: b\r\n\r\n")), "ERR_HEAD_MALFORMED");
    assertClientError(() => parseRequestHead(bytes("GET / HTTP/1.1\r\nA: b\rc\r\n\r\n")), "ERR_HEAD_MALFORMED");
    assertClientError(() => parseRequestHead(bytes("GET / HTTP/1.1\r\nNoColon\r\n\r\n")), "ERR_HEAD_MALFORMED");
  });
});

describe("parseResponseHead", () => {
  it("parses status lines with and without a reason phrase", () => {
    const head = parseResponseHead(bytes("HTTP/1.1 404 Not Found\r\nContent-Length: 0\r\n\r\n"));
    assert.equal(head.statusCode, 404);
    assert.equal(head.reason, "Not Found");
    assert.deepEqual(head.headers, [{ name: "Content-Length", value: "0" }]);

    const bare = parseResponseHead(bytes("HTTP/1.0 200\r\n\r\n"));
    assert.equal(bare.version, "HTTP/1.0");
    assert.equal(bare.statusCode, 200);
    assert.equal(bare.reason, "");
  });

  it("reports upstream protocol errors", () => {
    for (const text of ["HTTP/1.1 20 OK\r\n\r\n", "HTTP/2 200 OK\r\n\r\n", "garbage\r\n\r\n", "HTTP/1.1 099 Low\r\n\r\n"]) {
      assert.throws(() => parseResponseHead(bytes(text)), UpstreamProtocolError, text);
    }
  });
});

describe("serialization", () => {
  it("writes request heads back byte for byte", () => {
    const raw = "GET /x HTTP/1.1\r\nHost: a.test\r\nX-A: 1\r\n\r\n";
    assert.equal(serializeRequestHead(parseRequestHead(bytes(raw))).toString("latin1"), raw);
  });
});

describe("header helpers", () => {
  const headers = [
    { name: "Host", value: "a.test" },
    { name: "Connection", value: "Keep-Alive, Upgrade" },
    { name: "upgrade", value: "websocket" },
    { name: "X-Dup", value: "1" },
    { name: "x-dup", value: "2" },
  ];

  it("getSingleHeader distinguishes absent, single and repeated", () => {
    assert.equal(getSingleHeader(headers, "host"), "a.test");
    assert.equal(getSingleHeader(headers, "x-dup"), null);
    assert.equal(getSingleHeader(headers, "x-missing"), undefined);
  });

  it("connectionTokens lowercases every token", () => {
    assert.deepEqual([...connectionTokens(headers)], ["keep-alive", "upgrade"]);
  });

  it("isPersistent follows the HTTP version defaults", () => {
    assert.equal(isPersistent("HTTP/1.1", []), true);
    assert.equal(isPersistent("HTTP/1.1", [{ name: "Connection", value: "close" }]), false);
    assert.equal(isPersistent("HTTP/1.0", []), false);
    assert.equal(isPersistent("HTTP/1.0", [{ name: "Connection", value: "keep-alive" }]), true);
  });

  it("isUpgradeRequest needs both the Connection token and the Upgrade header", () => {
    assert.equal(isUpgradeRequest({ method: "GET", target: "/", version: "HTTP/1.1", headers }), true);
    assert.equal(
      isUpgradeRequest({ method: "GET", target: "/", version: "HTTP/1.1", headers: [{ name: "Upgrade", value: "h2c" }] }),
      false,
    );
  });
});

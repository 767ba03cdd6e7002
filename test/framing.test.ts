import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ClientProtocolError, UpstreamProtocolError } from "../src/errors.js";
import {
  BodyTracker,
  determineRequestFraming,
  determineResponseFraming,
  parseChunkSize,
  parseContentLength,
  responseHasNoBody,
} from "../src/http/framing.js";
import type { HeaderField, RequestHead, ResponseHead } from "../src/http/head.js";

function request(headers: HeaderField[]): RequestHead {
  return { method: "POST", target: "/", version: "HTTP/1.1", headers };
}

function response(statusCode: number, headers: HeaderField[]): ResponseHead {
  return { version: "HTTP/1.1", statusCode, reason: "", headers };
}

function bytes(text: string): Buffer {
  return Buffer.from(text, "latin1");
}

const fail = (message: string) => new Error(message);

describe("parseContentLength", () => {
  it("accepts repeated copies of the same value", () => {
    assert.deepEqual(parseContentLength([{ name: "Content-Length", value: "5" }]), { kind: "valid", length: 5 });
    assert.deepEqual(parseContentLength([{ name: "Content-Length", value: "5, 5" }]), { kind: "valid", length: 5 });
    assert.deepEqual(
      parseContentLength([
        { name: "Content-Length", value: "5" },
        { name: "content-length", value: "5" },
      ]),
      { kind: "valid", length: 5 },
    );
    assert.deepEqual(parseContentLength([]), { kind: "absent" });
  });

  it("rejects conflicting or non-numeric values", () => {
    assert.deepEqual(parseContentLength([{ name: "Content-Length", value: "5, 6" }]), { kind: "invalid" });
    assert.deepEqual(parseContentLength([{ name: "Content-Length", value: "-1" }]), { kind: "invalid" });
    assert.deepEqual(parseContentLength([{ name: "Content-Length", value: "0x10" }]), { kind: "invalid" });
    assert.deepEqual(parseContentLength([{ name: "Content-Length", value: "" }]), { kind: "invalid" });
  });
});

describe("determineRequestFraming", () => {
  it("chooses the request body framing", () => {
    assert.deepEqual(determineRequestFraming(request([])), { kind: "none" });
    assert.deepEqual(determineRequestFraming(request([{ name: "Content-Length", value: "0" }])), { kind: "none" });
    assert.deepEqual(determineRequestFraming(request([{ name: "Content-Length", value: "12" }])), {
      kind: "content-length",
      length: 12,
    });
    assert.deepEqual(determineRequestFraming(request([{ name: "Transfer-Encoding", value: "gzip, chunked" }])), {
      kind: "chunked",
    });
  });

  it("rejects ambiguous request framing", () => {
    const cases: HeaderField[][] = [
      [
        { name: "Transfer-Encoding", value: "chunked" },
        { name: "Content-Length", value: "3" },
      ],
      [{ name: "Transfer-Encoding", value: "chunked, gzip" }],
      [{ name: "Content-Length", value: "3, 4" }],
    ];
    for (const headers of cases) {
      assert.throws(
        () => determineRequestFraming(request(headers)),
        (err: unknown) => err instanceof ClientProtocolError && err.code === "ERR_INVALID_FRAMING" && err.statusCode === 400,
      );
    }
  });
});

describe("determineResponseFraming", () => {
  it("knows which responses have no body", () => {
    assert.equal(responseHasNoBody("HEAD", 200), true);
    assert.equal(responseHasNoBody("GET", 204), true);
    assert.equal(responseHasNoBody("GET", 304), true);
    assert.equal(responseHasNoBody("GET", 100), true);
    assert.equal(responseHasNoBody("GET", 200), false);
    assert.deepEqual(determineResponseFraming("HEAD", response(200, [{ name: "Content-Length", value: "10" }])), {
      kind: "none",
    });
  });

  it("falls back to close-delimited bodies", () => {
    assert.deepEqual(determineResponseFraming("GET", response(200, [])), { kind: "close-delimited" });
    assert.deepEqual(determineResponseFraming("GET", response(200, [{ name: "Transfer-Encoding", value: "gzip" }])), {
      kind: "close-delimited",
    });
    assert.deepEqual(determineResponseFraming("GET", response(200, [{ name: "Transfer-Encoding", value: "chunked" }])), {
      kind: "chunked",
    });
    assert.deepEqual(determineResponseFraming("GET", response(200, [{ name: "Content-Length", value: "2" }])), {
      kind: "content-length",
      length: 2,
    });
  });

  it("reports an invalid upstream Content-Length", () => {
    assert.throws(
      () => determineResponseFraming("GET", response(200, [{ name: "Content-Length", value: "abc" }])),
      UpstreamProtocolError,
    );
  });
});

describe("parseChunkSize", () => {
  it("parses hex sizes and ignores extensions", () => {
    assert.equal(parseChunkSize("1a"), 26);
    assert.equal(parseChunkSize("FF;name=value"), 255);
    assert.equal(parseChunkSize("0 ;x"), 0);
    assert.equal(parseChunkSize(""), null);
    assert.equal(parseChunkSize("g"), null);
    assert.equal(parseChunkSize("1234567890abc"), null);
  });
});

describe("BodyTracker", () => {
  it("splits a content-length body from the bytes after it", () => {
    const tracker = new BodyTracker({ kind: "content-length", length: 5 }, fail);
    const first = tracker.push(bytes("abc"));
    assert.equal(first.body.toString("latin1"), "abc");
    assert.equal(first.done, false);
    const second = tracker.push(bytes("deGET"));
    assert.equal(second.body.toString("latin1"), "de");
    assert.equal(second.rest.toString("latin1"), "GET");
    assert.equal(second.done, true);
    assert.equal(tracker.done, true);
  });

  it("passes chunked bodies through verbatim, trailers included", () => {
    const wire = "4;ext=1\r\nWiki\r\n5\r\npedia\r\n0\r\nX-Trailer: yes\r\n\r\n";
    const tracker = new BodyTracker({ kind: "chunked" }, fail);
    let body = "";
    let done = false;
    // One byte at a time exercises every state transition across chunk boundaries.
    for (const ch of `${wire}NEXT`) {
      const progress = tracker.push(bytes(ch));
      body += progress.body.toString("latin1");
      if (progress.done && !done) {
        done = true;
        assert.equal(progress.rest.length, 0);
        continue;
      }
      if (done) assert.equal(progress.rest.toString("latin1"), ch);
    }
    assert.equal(done, true);
    assert.equal(body, wire);
  });

  it("returns the rest of a chunk after the terminating chunk", () => {
    const tracker = new BodyTracker({ kind: "chunked" }, fail);
    const progress = tracker.push(bytes("3\r\nabc\r\n0\r\n\r\nHTTP/1.1"));
    assert.equal(progress.done, true);
    assert.equal(progress.body.toString("latin1"), "3\r\nabc\r\n0\r\n\r\n");
    assert.equal(progress.rest.toString("latin1"), "HTTP/1.1");
  });

  it("rejects broken chunked framing", () => {
    assert.throws(() => new BodyTracker({ kind: "chunked" }, fail).push(bytes("zz\r\n")), /Invalid chunk size/);
    assert.throws(() => new BodyTracker({ kind: "chunked" }, fail).push(bytes("3\r\nabcX")), /Missing CRLF after chunk data/);
    assert.throws(() => new BodyTracker({ kind: "chunked" }, fail).push(bytes("3\nabc")), /Bare LF in chunked framing/);
    assert.throws(
      () => new BodyTracker({ kind: "chunked" }, fail).push(bytes("0\r\nbad trailer\r\n")),
      /Malformed chunked trailer/,
    );
  });

  it("treats everything as body when the message is close-delimited", () => {
    const tracker = new BodyTracker({ kind: "close-delimited" }, fail);
    const progress = tracker.push(bytes("anything"));
    assert.equal(progress.body.toString("latin1"), "anything");
    assert.equal(progress.done, false);
  });

  it("is done immediately for bodiless messages", () => {
    const tracker = new BodyTracker({ kind: "none" }, fail);
    assert.equal(tracker.done, true);
    assert.equal(tracker.push(bytes("x")).rest.toString("latin1"), "x");
  });
});

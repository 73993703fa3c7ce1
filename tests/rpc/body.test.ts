/**
 * Raw body reading: single documents, batch splitting with per-element
 * failures, and the cases that spoil the whole body.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { decodeBody, readRawBody, splitBatchElements } from "../../src/rpc/body.js";
import { ParseError } from "../../src/rpc/errors.js";

describe("rpc raw body", () => {
  it("parses a single document from text or bytes", () => {
    const text = '{"jsonrpc":"2.0","method":"ping","id":1}';
    const expected = { kind: "single", value: { jsonrpc: "2.0", method: "ping", id: 1 } };

    expect(readRawBody(text)).to.deep.equal(expected);
    expect(readRawBody(new TextEncoder().encode(text))).to.deep.equal(expected);
  });

  it("keeps the exact value of integers beyond the safe range", () => {
    expect(readRawBody('{"id":9007199254740993,"n":12,"f":0.5}')).to.deep.equal({
      kind: "single",
      value: { id: 9007199254740993n, n: 12, f: 0.5 },
    });
    expect(readRawBody("[9007199254740993]")).to.deep.equal({
      kind: "batch",
      slots: [{ ok: true, value: 9007199254740993n }],
    });
  });

  it("decodes a byte view that does not start at offset zero", () => {
    const backing = new TextEncoder().encode('xx{"a":1}');
    expect(decodeBody(backing.subarray(2))).to.equal('{"a":1}');
  });

  it("drops a leading byte order mark", () => {
    expect(decodeBody('\uFEFF{"a":1}')).to.equal('{"a":1}');
  });

  it("throws a parse error for malformed or empty single bodies", () => {
    expect(() => readRawBody('{"jsonrpc":"2.0",')).to.throw(ParseError);
    expect(() => readRawBody("")).to.throw(ParseError);
    expect(() => readRawBody("   ")).to.throw(ParseError);
  });

  it("sniffs a batch after leading whitespace", () => {
    const parsed = readRawBody('  \n [{"a":1}, {"b":2}]  ');
    expect(parsed).to.deep.equal({
      kind: "batch",
      slots: [
        { ok: true, value: { a: 1 } },
        { ok: true, value: { b: 2 } },
      ],
    });
  });

  it("isolates a malformed element from its siblings", () => {
    const parsed = readRawBody(
      '[{"jsonrpc":"2.0","method":"ping","id":1}, {"jsonrpc":"2.0","method":"ping"}, {"bad json"]',
    );
    expect(parsed).to.deep.equal({
      kind: "batch",
      slots: [
        { ok: true, value: { jsonrpc: "2.0", method: "ping", id: 1 } },
        { ok: true, value: { jsonrpc: "2.0", method: "ping" } },
        { ok: false, text: ' {"bad json"' },
      ],
    });
  });

  it("reads an empty array as a batch without elements", () => {
    expect(readRawBody("[]")).to.deep.equal({ kind: "batch", slots: [] });
    expect(readRawBody("[ \n ]")).to.deep.equal({ kind: "batch", slots: [] });
  });

  it("throws a parse error for unterminated batches or trailing garbage", () => {
    expect(() => readRawBody('[{"a":1}')).to.throw(ParseError);
    expect(() => readRawBody('[{"a":"unterminated]')).to.throw(ParseError);
    expect(() => readRawBody('[{"a":1}] x')).to.throw(ParseError);
  });
});

describe("rpc batch splitting", () => {
  it("ignores separators and brackets inside strings", () => {
    expect(splitBatchElements('["a,b", "c]d", "e\\"],"]', 0)).to.deep.equal(['"a,b"', ' "c]d"', ' "e\\"],"']);
  });

  it("keeps nested structures in one element", () => {
    expect(splitBatchElements('[[1,[2,3]],{"k":{"n":[4]}}]', 0)).to.deep.equal(["[1,[2,3]]", '{"k":{"n":[4]}}']);
  });

  it("unwinds to the matching opener on a mismatched closer", () => {
    expect(splitBatchElements('[{"a":[1}, 2]', 0)).to.deep.equal(['{"a":[1}', " 2"]);
  });

  it("keeps empty slots so they can be reported", () => {
    expect(splitBatchElements("[1,,2]", 0)).to.deep.equal(["1", "", "2"]);
    expect(splitBatchElements("[1,]", 0)).to.deep.equal(["1", ""]);
  });
});

import { describe, it } from "mocha";
import { expect } from "chai";

import { parseJson, stringifyJson } from "../../src/rpc/json.js";

describe("rpc json codec", () => {
  it("reads safe numbers as numbers and larger integers as bigint", () => {
    expect(parseJson('[1, -2.5, 1e3, 9007199254740991, 9007199254740992, -9223372036854775808]')).to.deep.equal([
      1, -2.5, 1000, 9007199254740991, 9007199254740992n, -9223372036854775808n,
    ]);
  });

  it("writes bigint values as bare integers", () => {
    expect(stringifyJson({ id: 9007199254740993n, name: "a" })).to.equal('{"id":9007199254740993,"name":"a"}');
  });

  it("throws a SyntaxError for malformed text", () => {
    expect(() => parseJson('{"a":')).to.throw(SyntaxError);
  });
});

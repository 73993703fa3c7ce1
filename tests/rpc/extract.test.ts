/**
 * Params extraction: zod-backed decoding of by-position and by-name params,
 * raw passthrough and the Invalid params data reported on failure.
 */
import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { InvalidParamsError } from "../../src/rpc/errors.js";
import {
  decodeParams,
  formatZodIssues,
  params,
  paramsWith,
  rawParams,
  runExtractor,
  toExtractor,
} from "../../src/rpc/extract.js";
import { RawJson, RequestEnvelope, idField, type RequestParams } from "../../src/rpc/protocol.js";

function call(parameters: RequestParams | undefined): RequestEnvelope {
  return new RequestEnvelope("test", parameters, idField(1));
}

async function failureOf(promise: Promise<unknown>): Promise<InvalidParamsError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof InvalidParamsError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the extraction to fail");
}

describe("rpc params extraction", () => {
  it("decodes raw params and leaves absent params undefined", () => {
    expect(decodeParams(call(new RawJson('{"a":[1,2]}')))).to.deep.equal({ a: [1, 2] });
    expect(decodeParams(call([1, "x"]))).to.deep.equal([1, "x"]);
    expect(decodeParams(call(undefined))).to.equal(undefined);
  });

  it("reports raw params that are not JSON as Invalid params", () => {
    expect(() => decodeParams(call(new RawJson("{oops")))).to.throw(InvalidParamsError);
  });

  it("decodes by-position params with a tuple schema", async () => {
    const extractor = params(z.tuple([z.number(), z.number()]));
    expect(await extractor.extract(call([2, 3]))).to.deep.equal([2, 3]);
  });

  it("decodes by-name params with an object schema", async () => {
    const extractor = params(z.object({ name: z.string(), greeting: z.string().default("hello") }));
    expect(await extractor.extract(call({ name: "ada" }))).to.deep.equal({ name: "ada", greeting: "hello" });
  });

  it("groups failing members by path in the error data", async () => {
    const extractor = params(z.object({ name: z.string(), age: z.number() }));
    const failure = await failureOf(Promise.resolve(extractor.extract(call({ name: 1, age: 2 }))));

    expect(failure.code).to.equal(-32602);
    expect(failure.data).to.deep.equal({
      hint: "name: Expected string, received number",
      issues: { name: ["Expected string, received number"] },
    });
  });

  it("puts failures on the params as a whole in the hint", async () => {
    const extractor = params(z.tuple([z.number()]));
    const failure = await failureOf(Promise.resolve(extractor.extract(call(undefined))));

    expect(failure.data).to.deep.equal({ hint: "Required", issues: {} });
  });

  it("falls back to a generic hint when zod reports nothing", () => {
    expect(formatZodIssues(new z.ZodError([]))).to.deep.equal({ hint: "Invalid parameters", issues: {} });
  });

  it("hands raw params through without validation", async () => {
    expect(await rawParams().extract(call({ anything: true }))).to.deep.equal({ anything: true });
  });

  it("maps whatever a custom decoder throws to Invalid params", async () => {
    const extractor = paramsWith((value) => {
      if (!Array.isArray(value)) {
        throw new Error("expected a list");
      }
      return value.length;
    });

    expect(await runExtractor(extractor, call([1, 2, 3]))).to.equal(3);
    const failure = await failureOf(runExtractor(extractor, call({})));
    expect(failure.data).to.deep.equal({ hint: "expected a list" });
  });

  it("formats zod errors thrown by a custom decoder", async () => {
    const extractor = paramsWith((value) => z.array(z.string()).parse(value));
    const failure = await failureOf(runExtractor(extractor, call([1])));

    expect(failure.data).to.deep.equal({
      hint: "0: Expected string, received number",
      issues: { "0": ["Expected string, received number"] },
    });
  });

  it("accepts a zod schema wherever an extractor is expected", async () => {
    const extractor = toExtractor(z.array(z.number()).transform((values) => values.length));
    expect(await runExtractor(extractor, call([5, 6]))).to.equal(2);
  });
});

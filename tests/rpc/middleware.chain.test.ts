/**
 * Continuation-passing middleware chain: ordering, short-circuits, envelope
 * transforms, single-use continuations and the logging middleware.
 */
import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { InternalError, InvalidParamsError } from "../../src/rpc/errors.js";
import type { ErasedHandler } from "../../src/rpc/handler.js";
import {
  Next,
  createLoggingMiddleware,
  runChain,
  toMiddleware,
  transform,
  type Middleware,
} from "../../src/rpc/middleware.js";
import { RequestEnvelope, idField } from "../../src/rpc/protocol.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

const envelope = new RequestEnvelope("echo", ["hi"], idField(9));

function tracing(label: string, trace: string[]): Middleware<void> {
  return toMiddleware<void>(async (request, context, next) => {
    trace.push(`${label}:in`);
    const result = await next.run(request, context);
    trace.push(`${label}:out`);
    return result;
  });
}

describe("rpc middleware chain", () => {
  it("runs middlewares outermost first and unwinds in reverse", async () => {
    const trace: string[] = [];
    const endpoint: ErasedHandler<void> = async () => {
      trace.push("handler");
      return "done";
    };

    const result = await runChain([tracing("a", trace), tracing("b", trace)], endpoint, envelope, undefined);

    expect(result).to.equal("done");
    expect(trace).to.deep.equal(["a:in", "b:in", "handler", "b:out", "a:out"]);
  });

  it("calls the endpoint directly when the chain is empty", async () => {
    const endpoint = sinon.stub<Parameters<ErasedHandler<string>>, ReturnType<ErasedHandler<string>>>();
    endpoint.resolves(42);

    expect(await runChain([], endpoint, envelope, "ctx")).to.equal(42);
    sinon.assert.calledOnceWithExactly(endpoint, envelope, "ctx");
  });

  it("ends the chain when a middleware does not delegate", async () => {
    const endpoint = sinon.stub<Parameters<ErasedHandler<void>>, ReturnType<ErasedHandler<void>>>();
    const gate = toMiddleware<void>(async () => "cached");

    expect(await runChain([gate], endpoint, envelope, undefined)).to.equal("cached");
    sinon.assert.notCalled(endpoint);
  });

  it("propagates failures thrown inside the chain", async () => {
    const endpoint: ErasedHandler<void> = async () => {
      throw new InvalidParamsError({ hint: "no" });
    };

    let caught: unknown;
    try {
      await runChain([tracing("a", [])], endpoint, envelope, undefined);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(InvalidParamsError);
  });

  it("hands transformed envelopes and contexts to the rest of the chain", async () => {
    const rename = transform<number>((request, context) => [request.with({ method: "renamed" }), context + 1]);
    const endpoint: ErasedHandler<number> = async (request, context) => `${request.method}/${context}`;

    expect(await runChain([rename], endpoint, envelope, 1)).to.equal("renamed/2");
  });

  it("stops before the next step once the signal is aborted", async () => {
    const trace: string[] = [];
    const controller = new AbortController();
    const reason = new Error("stop");
    const endpoint = sinon.spy(async () => "unreachable");
    const aborting = toMiddleware<void>(async (request, context, next) => {
      trace.push("abort:in");
      controller.abort(reason);
      return next.run(request, context);
    });

    let caught: unknown;
    try {
      await runChain([aborting, tracing("inner", trace)], endpoint, envelope, undefined, controller.signal);
    } catch (error) {
      caught = error;
    }

    expect(caught).to.equal(reason);
    expect(trace).to.deep.equal(["abort:in"]);
    expect(endpoint.called).to.equal(false);
  });

  it("rejects a continuation run twice", async () => {
    const next = new Next<void>([], async () => "once");

    expect(await next.run(envelope, undefined)).to.equal("once");
    let caught: unknown;
    try {
      await next.run(envelope, undefined);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(InternalError);
  });

  it("logs requests and responses with their method and id", async () => {
    const logger = new RecordingLogger();
    const result = await runChain([createLoggingMiddleware<void>(logger)], async () => "ok", envelope, undefined);

    expect(result).to.equal("ok");
    expect(logger.messages()).to.deep.equal(["rpc_request", "rpc_response"]);
    expect(logger.entries[0]?.payload).to.deep.equal({ method: "echo", id: 9, notification: false });
    expect(logger.entries[1]?.payload).to.include({ method: "echo", id: 9 });
    expect(logger.entries[1]?.payload).to.have.property("duration_ms").that.is.a("number");
  });

  it("logs failures with their code and rethrows them", async () => {
    const logger = new RecordingLogger();
    let caught: unknown;
    try {
      await runChain(
        [createLoggingMiddleware<void>(logger)],
        async () => {
          throw new InvalidParamsError();
        },
        envelope,
        undefined,
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(InvalidParamsError);
    expect(logger.messages("warn")).to.deep.equal(["rpc_failure"]);
    expect(logger.entries[1]?.payload).to.include({
      method: "echo",
      id: 9,
      code: -32602,
      message: "Invalid params",
    });
  });
});

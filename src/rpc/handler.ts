import { toRpcError, type ErrorMappingOptions } from "./errors.js";
import { runExtractor, toExtractor, type ExtractorLike } from "./extract.js";
import type { RequestEnvelope } from "./protocol.js";

/** Strongly-typed method implementation. Domain failures are thrown. */
export type Handler<P, R, C> = (params: P, context: C) => R | Promise<R>;

/**
 * Uniform calling convention every registered method is stored under. The
 * promise resolves with the serialised result or rejects with an `RpcError`.
 */
export type ErasedHandler<C> = (envelope: RequestEnvelope, context: C) => Promise<unknown>;

export interface HandlerOptions<R> {
  /** Turns the handler output into the `result` payload. Defaults to identity. */
  readonly serialize?: (output: R) => unknown;
}

/**
 * Erases the extractor, output and error types of {@link handler}. Extraction
 * failures surface as Invalid params; whatever the handler or the serializer
 * throws is mapped with {@link toRpcError}.
 */
export function eraseHandler<P, R, C>(
  extractor: ExtractorLike<P>,
  handler: Handler<P, R, C>,
  mapping: ErrorMappingOptions,
  options: HandlerOptions<R> = {},
): ErasedHandler<C> {
  const resolved = toExtractor(extractor);
  const serialize = options.serialize;

  return async (envelope, context) => {
    const params = await runExtractor(resolved, envelope);
    try {
      const output = await handler(params, context);
      const result = serialize ? serialize(output) : output;
      return result === undefined ? null : result;
    } catch (error) {
      throw toRpcError(error, mapping);
    }
  };
}

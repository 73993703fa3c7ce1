import { performance } from "node:perf_hooks";

import type { StructuredLogger } from "../logger.js";
import { InternalError, RpcError, errorText } from "./errors.js";
import type { ErasedHandler } from "./handler.js";
import type { RequestEnvelope } from "./protocol.js";

/**
 * Interceptor wrapped around a routed call. It may inspect or replace the
 * envelope and context, fail the call by throwing, or delegate to the rest of
 * the chain through {@link Next.run}. Not calling `next` ends the chain.
 */
export interface Middleware<C> {
  handle(envelope: RequestEnvelope, context: C, next: Next<C>): Promise<unknown>;
}

export type MiddlewareFn<C> = (envelope: RequestEnvelope, context: C, next: Next<C>) => Promise<unknown>;

export type MiddlewareLike<C> = Middleware<C> | MiddlewareFn<C>;

export function toMiddleware<C>(candidate: MiddlewareLike<C>): Middleware<C> {
  return typeof candidate === "function" ? { handle: candidate } : candidate;
}

/**
 * Single-use continuation: the middlewares left to run plus the terminal
 * handler. A second `run` on the same value rejects with Internal Error. Once
 * {@link signal} is aborted, `run` rejects with its reason instead of calling
 * the next step.
 */
export class Next<C> {
  private consumed = false;

  constructor(
    private readonly middlewares: readonly Middleware<C>[],
    private readonly endpoint: ErasedHandler<C>,
    private readonly signal?: AbortSignal,
    private readonly position = 0,
  ) {}

  async run(envelope: RequestEnvelope, context: C): Promise<unknown> {
    if (this.consumed) {
      throw new InternalError("middleware continuation invoked more than once");
    }
    this.consumed = true;
    this.signal?.throwIfAborted();

    const current = this.middlewares[this.position];
    if (current === undefined) {
      return this.endpoint(envelope, context);
    }
    const rest = new Next(this.middlewares, this.endpoint, this.signal, this.position + 1);
    return current.handle(envelope, context, rest);
  }
}

/** Starts the chain of {@link middlewares} ending in {@link endpoint}. */
export function runChain<C>(
  middlewares: readonly Middleware<C>[],
  endpoint: ErasedHandler<C>,
  envelope: RequestEnvelope,
  context: C,
  signal?: AbortSignal,
): Promise<unknown> {
  return new Next(middlewares, endpoint, signal).run(envelope, context);
}

export type Transform<C> = (
  envelope: RequestEnvelope,
  context: C,
) => readonly [RequestEnvelope, C] | Promise<readonly [RequestEnvelope, C]>;

/** Lifts a one-step transform into a middleware that transforms, then delegates. */
export function transform<C>(step: Transform<C>): Middleware<C> {
  return {
    async handle(envelope, context, next) {
      const [nextEnvelope, nextContext] = await step(envelope, context);
      return next.run(nextEnvelope, nextContext);
    },
  };
}

/**
 * Logs every call passing through it: `rpc_request` on the way in, then
 * `rpc_response` or `rpc_failure` with the elapsed time.
 */
export function createLoggingMiddleware<C>(logger: StructuredLogger): Middleware<C> {
  return {
    async handle(envelope, context, next) {
      const id = envelope.replyId();
      const startedAt = performance.now();
      logger.info("rpc_request", { method: envelope.method, id, notification: envelope.isNotification });
      try {
        const result = await next.run(envelope, context);
        logger.info("rpc_response", { method: envelope.method, id, duration_ms: elapsedSince(startedAt) });
        return result;
      } catch (error) {
        logger.warn("rpc_failure", {
          method: envelope.method,
          id,
          duration_ms: elapsedSince(startedAt),
          code: error instanceof RpcError ? error.code : null,
          message: errorText(error),
        });
        throw error;
      }
    },
  };
}

function elapsedSince(startedAt: number): number {
  return Math.round(performance.now() - startedAt);
}

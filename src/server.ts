import { DEFAULT_SERVER_CONFIG, createLogger, type ServerConfig } from "./config/serverConfig.js";
import { runInCallScope, type CallScope } from "./infra/callContext.js";
import type { StructuredLogger } from "./logger.js";
import { readRawBody, type ParsedBody, type RawBody } from "./rpc/body.js";
import {
  InvalidRequestError,
  MethodNotFoundError,
  RpcError,
  errorResponse,
  resultResponse,
  toRpcError,
  type ErrorMappingOptions,
} from "./rpc/errors.js";
import { rawParams, type ExtractorLike } from "./rpc/extract.js";
import { eraseHandler, type ErasedHandler, type Handler, type HandlerOptions } from "./rpc/handler.js";
import { runChain, toMiddleware, type Middleware, type MiddlewareLike } from "./rpc/middleware.js";
import {
  RequestEnvelope,
  parseRequestEnvelope,
  type DispatchResult,
  type JsonRpcResponse,
} from "./rpc/protocol.js";
import { MapRouter, createRoute, type Router } from "./rpc/router.js";

export interface ServerBuilderOptions<C> {
  /** Registry to fill; a fresh {@link MapRouter} by default. */
  readonly router?: Router<C>;
  /** Global middlewares, run outside every route's own middlewares. */
  readonly middlewares?: readonly MiddlewareLike<C>[];
  readonly config?: ServerConfig;
  /** Logger used by the engine; built from {@link config} when omitted. */
  readonly logger?: StructuredLogger;
}

export interface MethodOptions<R, C> extends HandlerOptions<R> {
  /** Middlewares of this method only, run inside the global ones. */
  readonly middlewares?: readonly MiddlewareLike<C>[];
}

/** Input accepted by {@link Server.handle}. */
export type DispatchInput = RequestEnvelope | readonly RequestEnvelope[] | RawBody;

export interface DispatchOptions {
  /**
   * Abandons the dispatch once aborted: the returned promise rejects with the
   * signal's reason and no result is produced. Calls still in flight stop at
   * their next middleware step; handlers read it from the call scope.
   */
  readonly signal?: AbortSignal;
}

/** A batch member: a decoded envelope, or the error of a malformed element. */
type BatchMember = RequestEnvelope | RpcError;

type CallOutcome = { readonly ok: true; readonly result: unknown } | { readonly ok: false; readonly error: RpcError };

/**
 * Collects methods and middlewares, then freezes them into a {@link Server}.
 *
 * ```ts
 * const server = new ServerBuilder<Session>()
 *   .use(authenticate)
 *   .method("sum", z.array(z.number()), (values) => values.reduce((a, b) => a + b, 0))
 *   .finish();
 * ```
 */
export class ServerBuilder<C = void> {
  private readonly router: Router<C>;
  private readonly globals: Middleware<C>[];
  private readonly logger: StructuredLogger;
  private readonly mapping: ErrorMappingOptions;
  private finished = false;

  constructor(options: ServerBuilderOptions<C> = {}) {
    const config = options.config ?? DEFAULT_SERVER_CONFIG;
    this.router = options.router ?? new MapRouter<C>();
    this.globals = (options.middlewares ?? []).map((middleware) => toMiddleware(middleware));
    this.logger = options.logger ?? createLogger(config);
    this.mapping = { exposeInternalErrors: config.exposeInternalErrors, logger: this.logger };
  }

  /** Appends global middlewares; they apply to every method, whenever registered. */
  use(...middlewares: MiddlewareLike<C>[]): this {
    this.assertOpen();
    for (const middleware of middlewares) {
      this.globals.push(toMiddleware(middleware));
    }
    return this;
  }

  /** Registers a handler receiving the params undecoded. */
  method<R>(name: string, handler: Handler<unknown, R, C>, options?: MethodOptions<R, C>): this;
  /** Registers a handler whose params are decoded by {@link extractor} (or a zod schema). */
  method<P, R>(
    name: string,
    extractor: ExtractorLike<P>,
    handler: Handler<P, R, C>,
    options?: MethodOptions<R, C>,
  ): this;
  method<P, R>(
    name: string,
    first: ExtractorLike<P> | Handler<unknown, R, C>,
    second?: Handler<P, R, C> | MethodOptions<R, C>,
    third?: MethodOptions<R, C>,
  ): this {
    this.assertOpen();

    let handler: ErasedHandler<C>;
    let options: MethodOptions<R, C> | undefined;
    if (typeof first === "function") {
      if (typeof second === "function") {
        throw new TypeError(`method "${name}" was given two handlers`);
      }
      handler = eraseHandler(rawParams(), first, this.mapping, second);
      options = second;
    } else {
      if (typeof second !== "function") {
        throw new TypeError(`method "${name}" has an extractor but no handler`);
      }
      handler = eraseHandler(first, second, this.mapping, third);
      options = third;
    }

    const own = (options?.middlewares ?? []).map((middleware) => toMiddleware(middleware));
    const displaced = this.router.insert(name, createRoute(handler, own));
    if (displaced) {
      this.logger.warn("method_overwritten", { method: name });
    } else {
      this.logger.debug("method_registered", { method: name, middlewares: own.length });
    }
    return this;
  }

  /**
   * Prepends the global middlewares to every route and hands the registry
   * over to a {@link Server}. The builder cannot be used afterwards.
   */
  finish(): Server<C> {
    this.assertOpen();
    this.finished = true;

    const globals = Object.freeze([...this.globals]);
    const names = this.router.names();
    if (globals.length > 0) {
      for (const name of names) {
        const route = this.router.get(name);
        if (route) {
          this.router.insert(name, createRoute(route.handler, [...globals, ...route.middlewares]));
        }
      }
    }

    this.logger.info("server_finished", { methods: names.length, global_middlewares: globals.length });
    return new Server(this.router, this.mapping, this.logger);
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error("server builder already finished");
    }
  }
}

/**
 * Dispatch engine. Turns envelopes, envelope lists, decoded JSON values or raw
 * bodies into JSON-RPC responses. Every failure met while dispatching becomes
 * a response (or is dropped for notifications); only an aborted signal makes
 * the returned promise reject.
 */
export class Server<C = void> {
  constructor(
    private readonly router: Router<C>,
    private readonly mapping: ErrorMappingOptions,
    private readonly logger: StructuredLogger,
  ) {}

  /** Names of the registered methods. */
  methods(): string[] {
    return this.router.names();
  }

  handle(input: DispatchInput, context: C, options: DispatchOptions = {}): Promise<DispatchResult> {
    const { signal } = options;
    return abortable(() => this.dispatch(input, context, signal), signal);
  }

  /**
   * Dispatches a JSON value a transport already decoded: an array is a batch,
   * anything else a single request.
   */
  handleValue(value: unknown, context: C, options: DispatchOptions = {}): Promise<DispatchResult> {
    const { signal } = options;
    return abortable(
      () =>
        Array.isArray(value)
          ? this.dispatchMembers(value.map((item: unknown) => this.toMember(item)), context, signal)
          : this.dispatchValue(value, context, signal),
      signal,
    );
  }

  private dispatch(input: DispatchInput, context: C, signal: AbortSignal | undefined): Promise<DispatchResult> {
    if (input instanceof RequestEnvelope) {
      return this.dispatchSingle(input, context, signal);
    }
    if (typeof input === "string" || input instanceof Uint8Array) {
      return this.dispatchBody(input, context, signal);
    }
    return this.dispatchMembers([...input], context, signal);
  }

  private async dispatchBody(body: RawBody, context: C, signal: AbortSignal | undefined): Promise<DispatchResult> {
    let parsed: ParsedBody;
    try {
      parsed = readRawBody(body);
    } catch (error) {
      this.logger.warn("rpc_parse_failed", { length: body.length });
      return { kind: "one", response: errorResponse(null, toRpcError(error, this.mapping)) };
    }

    if (parsed.kind === "single") {
      return this.dispatchValue(parsed.value, context, signal);
    }
    const members = parsed.slots.map((slot) => {
      if (slot.ok) {
        return this.toMember(slot.value);
      }
      this.logger.warn("rpc_invalid_request", { reason: "batch element is not valid JSON" });
      return new InvalidRequestError();
    });
    return this.dispatchMembers(members, context, signal);
  }

  /** A lone value that is not a valid envelope still gets an answer (id null). */
  private async dispatchValue(value: unknown, context: C, signal: AbortSignal | undefined): Promise<DispatchResult> {
    const member = this.toMember(value);
    if (member instanceof RpcError) {
      return { kind: "one", response: errorResponse(null, member) };
    }
    return this.dispatchSingle(member, context, signal);
  }

  private async dispatchSingle(
    envelope: RequestEnvelope,
    context: C,
    signal: AbortSignal | undefined,
  ): Promise<DispatchResult> {
    const response = await this.dispatchEnvelope(envelope, context, false, signal);
    return response ? { kind: "one", response } : { kind: "empty" };
  }

  /**
   * Runs every member concurrently and waits for all of them. Notifications
   * drop out; when nothing is left the result carries no body.
   */
  private async dispatchMembers(
    members: readonly BatchMember[],
    context: C,
    signal: AbortSignal | undefined,
  ): Promise<DispatchResult> {
    if (members.length === 0) {
      this.logger.warn("rpc_invalid_request", { reason: "empty batch" });
      return { kind: "one", response: errorResponse(null, new InvalidRequestError()) };
    }

    const responses = await Promise.all(
      members.map((member) =>
        member instanceof RpcError
          ? Promise.resolve(errorResponse(null, member))
          : this.dispatchEnvelope(member, context, true, signal),
      ),
    );
    const written = responses.filter((response): response is JsonRpcResponse => response !== null);
    return written.length === 0 ? { kind: "empty" } : { kind: "many", responses: written };
  }

  /** Response of one envelope, or `null` when its id asks for no reply. */
  private dispatchEnvelope(
    envelope: RequestEnvelope,
    context: C,
    batch: boolean,
    signal: AbortSignal | undefined,
  ): Promise<JsonRpcResponse | null> {
    const replyId = envelope.replyId();
    const scope: CallScope = { method: envelope.method, requestId: replyId, batch };
    return runInCallScope(signal ? { ...scope, signal } : scope, async () => {
      const outcome = await this.invoke(envelope, context, signal);
      if (replyId === null) {
        if (!outcome.ok) {
          this.logger.debug("rpc_notification_failed", { code: outcome.error.code, message: outcome.error.message });
        }
        return null;
      }
      return outcome.ok ? resultResponse(replyId, outcome.result) : errorResponse(replyId, outcome.error);
    });
  }

  /** Rejects with the signal's reason once aborted; every other failure becomes an outcome. */
  private async invoke(envelope: RequestEnvelope, context: C, signal: AbortSignal | undefined): Promise<CallOutcome> {
    signal?.throwIfAborted();
    const route = this.router.get(envelope.method);
    if (!route) {
      this.logger.warn("rpc_method_not_found");
      return { ok: false, error: new MethodNotFoundError() };
    }

    try {
      const result = await runChain(route.middlewares, route.handler, envelope, context, signal);
      return { ok: true, result };
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      return { ok: false, error: toRpcError(error, this.mapping) };
    }
  }

  private toMember(value: unknown): BatchMember {
    const parsed = parseRequestEnvelope(value);
    if (parsed.ok) {
      return parsed.envelope;
    }
    this.logger.warn("rpc_invalid_request", { reason: parsed.reason });
    return new InvalidRequestError();
  }
}

function abortable<T>(start: () => Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return start();
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    void start().then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

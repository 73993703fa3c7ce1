import type { StructuredLogger } from "../logger.js";
import {
  JSONRPC_VERSION,
  type JsonRpcErrorObject,
  type JsonRpcErrorResponse,
  type JsonRpcId,
  type JsonRpcSuccessResponse,
} from "./protocol.js";

/**
 * Reserved JSON-RPC 2.0 errors. These pairs are produced by the engine only;
 * domain code maps its failures through {@link RpcErrorLike} instead.
 */
export const JSON_RPC_ERROR_TAXONOMY = {
  PARSE_ERROR: { code: -32700, message: "Parse error" },
  INVALID_REQUEST: { code: -32600, message: "Invalid Request" },
  METHOD_NOT_FOUND: { code: -32601, message: "Method not found" },
  INVALID_PARAMS: { code: -32602, message: "Invalid params" },
  INTERNAL_ERROR: { code: -32603, message: "Internal Error" },
} as const;

export type ReservedErrorKind = keyof typeof JSON_RPC_ERROR_TAXONOMY;

/**
 * Protocol-level error. Anything thrown by a middleware or the terminal
 * handler ends up as one of these before it reaches a response.
 */
export class RpcError extends Error {
  readonly code: number;
  readonly data: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Wraps an arbitrary failure. The message stays "Internal Error" and the
   * text of {@link cause} goes to `data`.
   */
  static internal(cause: unknown): InternalError {
    return new InternalError(errorText(cause));
  }

  toErrorObject(): JsonRpcErrorObject {
    const error: JsonRpcErrorObject = { code: this.code, message: this.message };
    if (this.data !== undefined) {
      error.data = this.data;
    }
    return error;
  }
}

export class ParseError extends RpcError {
  constructor(data?: unknown) {
    super(JSON_RPC_ERROR_TAXONOMY.PARSE_ERROR.code, JSON_RPC_ERROR_TAXONOMY.PARSE_ERROR.message, data);
  }
}

export class InvalidRequestError extends RpcError {
  constructor(data?: unknown) {
    super(JSON_RPC_ERROR_TAXONOMY.INVALID_REQUEST.code, JSON_RPC_ERROR_TAXONOMY.INVALID_REQUEST.message, data);
  }
}

export class MethodNotFoundError extends RpcError {
  constructor(data?: unknown) {
    super(JSON_RPC_ERROR_TAXONOMY.METHOD_NOT_FOUND.code, JSON_RPC_ERROR_TAXONOMY.METHOD_NOT_FOUND.message, data);
  }
}

export class InvalidParamsError extends RpcError {
  constructor(data?: unknown) {
    super(JSON_RPC_ERROR_TAXONOMY.INVALID_PARAMS.code, JSON_RPC_ERROR_TAXONOMY.INVALID_PARAMS.message, data);
  }
}

export class InternalError extends RpcError {
  constructor(data?: unknown) {
    super(JSON_RPC_ERROR_TAXONOMY.INTERNAL_ERROR.code, JSON_RPC_ERROR_TAXONOMY.INTERNAL_ERROR.message, data);
  }
}

/** Instantiates the typed class of a reserved error. */
export function createReservedError(kind: ReservedErrorKind, data?: unknown): RpcError {
  switch (kind) {
    case "PARSE_ERROR":
      return new ParseError(data);
    case "INVALID_REQUEST":
      return new InvalidRequestError(data);
    case "METHOD_NOT_FOUND":
      return new MethodNotFoundError(data);
    case "INVALID_PARAMS":
      return new InvalidParamsError(data);
    case "INTERNAL_ERROR":
      return new InternalError(data);
  }
}

/**
 * Error-mapping capability. Domain error types implement it to choose the
 * `{ code, message, data }` triple of their responses; {@link describeError}
 * provides the defaults they can delegate to.
 */
export interface RpcErrorLike {
  toRpcError(): JsonRpcErrorObject;
}

export function isRpcErrorLike(value: unknown): value is RpcErrorLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "toRpcError" in value &&
    typeof value.toRpcError === "function"
  );
}

/** Textual rendering of a thrown value. */
export function errorText(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : String(error);
}

/**
 * Default mapping: code `0`, the error text as message and no data, each
 * replaceable through {@link overrides}.
 */
export function describeError(error: unknown, overrides: Partial<JsonRpcErrorObject> = {}): JsonRpcErrorObject {
  const described: JsonRpcErrorObject = {
    code: overrides.code ?? 0,
    message: overrides.message ?? errorText(error),
  };
  if (overrides.data !== undefined) {
    described.data = overrides.data;
  }
  return described;
}

export interface ErrorMappingOptions {
  /** Include the text of unexpected failures in Internal Error `data`. */
  readonly exposeInternalErrors: boolean;
  readonly logger?: StructuredLogger;
}

/**
 * Single conversion point from anything thrown during a call to the protocol
 * error sent back. Values that are neither {@link RpcError} nor
 * {@link RpcErrorLike} become Internal Error.
 */
export function toRpcError(thrown: unknown, options: ErrorMappingOptions): RpcError {
  if (thrown instanceof RpcError) {
    return thrown;
  }

  if (isRpcErrorLike(thrown)) {
    try {
      const mapped = thrown.toRpcError();
      return new RpcError(mapped.code, mapped.message, mapped.data);
    } catch (mappingFailure) {
      return internalFailure(mappingFailure, options);
    }
  }

  return internalFailure(thrown, options);
}

function internalFailure(cause: unknown, options: ErrorMappingOptions): RpcError {
  options.logger?.error("rpc_internal_error", {
    message: errorText(cause),
    name: cause instanceof Error ? cause.name : typeof cause,
  });
  return options.exposeInternalErrors ? RpcError.internal(cause) : new InternalError();
}

export function errorResponse(id: JsonRpcId, error: RpcError): JsonRpcErrorResponse {
  return { jsonrpc: JSONRPC_VERSION, error: error.toErrorObject(), id };
}

/** Success response; an `undefined` result is written as `null`. */
export function resultResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: JSONRPC_VERSION, result: result === undefined ? null : result, id };
}

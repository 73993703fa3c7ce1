import { z } from "zod";

import { parseJson, stringifyJson } from "./json.js";

/**
 * JSON-RPC 2.0 wire model: identifiers, request envelopes and response
 * objects. See https://www.jsonrpc.org/specification
 */

export const JSONRPC_VERSION = "2.0";

/**
 * Correlation token of a call. Numeric ids are signed 64-bit integers; those
 * beyond the safe range of a JS number are carried as `bigint`.
 */
export type JsonRpcId = string | number | bigint | null;

/**
 * Presence-aware view of the `id` member. `absent` and `null` both mark a call
 * that never gets a reply; only `value` is answered.
 */
export type RequestIdField =
  | { readonly kind: "absent" }
  | { readonly kind: "null" }
  | { readonly kind: "value"; readonly id: string | number | bigint };

export const ABSENT_ID: RequestIdField = Object.freeze({ kind: "absent" });
export const NULL_ID: RequestIdField = Object.freeze({ kind: "null" });

export function idField(id: JsonRpcId | undefined): RequestIdField {
  if (id === undefined) {
    return ABSENT_ID;
  }
  if (id === null) {
    return NULL_ID;
  }
  return Object.freeze({ kind: "value", id });
}

/**
 * Collapses the tristate into the id a reply is correlated with. `null` means
 * the call is answered by nobody.
 */
export function resolveReplyId(field: RequestIdField): JsonRpcId {
  return field.kind === "value" ? field.id : null;
}

/**
 * Params kept as unparsed JSON text. Extractors decode it lazily and treat it
 * exactly like the equivalent structured value.
 */
export class RawJson {
  constructor(readonly text: string) {}

  toJSON(): unknown {
    return parseJson(this.text);
  }
}

export type StructuredParams = Record<string, unknown> | unknown[];
export type RequestParams = RawJson | StructuredParams;

/** Wire form of a request or notification. */
export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: unknown;
  id?: JsonRpcId;
}

/** Decoded request or notification, consumed once by the dispatch engine. */
export class RequestEnvelope {
  readonly jsonrpc = JSONRPC_VERSION;

  constructor(
    readonly method: string,
    readonly params: RequestParams | undefined,
    readonly id: RequestIdField,
  ) {}

  /** True when no reply will ever be produced for this envelope. */
  get isNotification(): boolean {
    return this.id.kind !== "value";
  }

  replyId(): JsonRpcId {
    return resolveReplyId(this.id);
  }

  /** Copy with a different method and/or params; the id is preserved. */
  with(changes: { readonly method?: string; readonly params?: RequestParams | undefined }): RequestEnvelope {
    const params = "params" in changes ? changes.params : this.params;
    return new RequestEnvelope(changes.method ?? this.method, params, this.id);
  }

  toJSON(): JsonRpcRequest {
    const wire: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, method: this.method };
    if (this.params !== undefined) {
      wire.params = this.params;
    }
    if (this.id.kind !== "absent") {
      wire.id = resolveReplyId(this.id);
    }
    return wire;
  }
}

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const IdSchema = z.union([
  z.string(),
  z.number().int().safe(),
  z.bigint().min(INT64_MIN).max(INT64_MAX),
  z.null(),
]);

const RequestWireSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  method: z.string(),
  params: z.union([z.array(z.unknown()), z.record(z.unknown())]).nullable().optional(),
  id: IdSchema.optional(),
});

export type EnvelopeParseResult =
  | { readonly ok: true; readonly envelope: RequestEnvelope }
  | { readonly ok: false; readonly reason: string };

/**
 * Validates a decoded JSON value as a request envelope. `params: null` is
 * read as "no params"; unknown members are ignored.
 */
export function parseRequestEnvelope(value: unknown): EnvelopeParseResult {
  const parsed = RequestWireSchema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ");
    return { ok: false, reason };
  }

  const { method, params, id } = parsed.data;
  return { ok: true, envelope: new RequestEnvelope(method, params ?? undefined, idField(id)) };
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  result: unknown;
  id: JsonRpcId;
}

export interface JsonRpcErrorResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  error: JsonRpcErrorObject;
  id: JsonRpcId;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export function isErrorResponse(response: JsonRpcResponse): response is JsonRpcErrorResponse {
  return "error" in response;
}

/**
 * Outcome of a dispatch. `empty` tells the transport not to write a body at
 * all, which is not the same thing as an empty list.
 */
export type DispatchResult =
  | { readonly kind: "one"; readonly response: JsonRpcResponse }
  | { readonly kind: "many"; readonly responses: readonly JsonRpcResponse[] }
  | { readonly kind: "empty" };

/** Body text of {@link result}, or `undefined` when nothing must be written. */
export function serializeDispatchResult(result: DispatchResult): string | undefined {
  switch (result.kind) {
    case "one":
      return stringifyJson(result.response);
    case "many":
      return stringifyJson(result.responses);
    case "empty":
      return undefined;
  }
}

const ErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const ResponseWireSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: IdSchema,
  result: z.unknown().optional(),
  error: ErrorObjectSchema.optional(),
});

/**
 * Validates a decoded response object. Exactly one of `result` and `error`
 * must be present; a `result` of `null` counts as present.
 */
export function parseResponseObject(value: unknown): JsonRpcResponse | null {
  const parsed = ResponseWireSchema.safeParse(value);
  if (!parsed.success || typeof value !== "object" || value === null) {
    return null;
  }

  const hasResult = Object.prototype.hasOwnProperty.call(value, "result");
  const { id, result, error } = parsed.data;
  if (hasResult === (error !== undefined)) {
    return null;
  }
  if (error !== undefined) {
    const errorObject: JsonRpcErrorObject = { code: error.code, message: error.message };
    if (error.data !== undefined) {
      errorObject.data = error.data;
    }
    return { jsonrpc: JSONRPC_VERSION, error: errorObject, id };
  }
  return { jsonrpc: JSONRPC_VERSION, result, id };
}

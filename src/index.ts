export { ServerBuilder, Server } from "./server.js";
export type { DispatchInput, DispatchOptions, MethodOptions, ServerBuilderOptions } from "./server.js";

export {
  ABSENT_ID,
  JSONRPC_VERSION,
  NULL_ID,
  RawJson,
  RequestEnvelope,
  idField,
  isErrorResponse,
  parseRequestEnvelope,
  parseResponseObject,
  resolveReplyId,
  serializeDispatchResult,
} from "./rpc/protocol.js";
export type {
  DispatchResult,
  EnvelopeParseResult,
  JsonRpcErrorObject,
  JsonRpcErrorResponse,
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
  RequestIdField,
  RequestParams,
  StructuredParams,
} from "./rpc/protocol.js";

export { decodeBody, readRawBody } from "./rpc/body.js";
export { parseJson, stringifyJson } from "./rpc/json.js";
export type { BatchSlot, ParsedBody, RawBody } from "./rpc/body.js";

export {
  InternalError,
  InvalidParamsError,
  InvalidRequestError,
  JSON_RPC_ERROR_TAXONOMY,
  MethodNotFoundError,
  ParseError,
  RpcError,
  createReservedError,
  describeError,
  errorResponse,
  errorText,
  isRpcErrorLike,
  resultResponse,
  toRpcError,
} from "./rpc/errors.js";
export type { ErrorMappingOptions, ReservedErrorKind, RpcErrorLike } from "./rpc/errors.js";

export { decodeParams, formatZodIssues, params, paramsWith, rawParams, toExtractor } from "./rpc/extract.js";
export type { Extractor, ExtractorLike, ParamsSchema } from "./rpc/extract.js";

export { eraseHandler } from "./rpc/handler.js";
export type { ErasedHandler, Handler, HandlerOptions } from "./rpc/handler.js";

export { Next, createLoggingMiddleware, runChain, toMiddleware, transform } from "./rpc/middleware.js";
export type { Middleware, MiddlewareFn, MiddlewareLike, Transform } from "./rpc/middleware.js";

export { MapRouter, createRoute } from "./rpc/router.js";
export type { Route, Router } from "./rpc/router.js";

export { NotificationBuilder, RequestBuilder, notification, request } from "./rpc/builders.js";

export { StructuredLogger, parseRedactionDirectives } from "./logger.js";
export type { LogEntry, LogLevel, LogStream, LoggerOptions } from "./logger.js";

export { DEFAULT_SERVER_CONFIG, createLogger, loadServerConfig } from "./config/serverConfig.js";
export type { LogStreamName, ServerConfig } from "./config/serverConfig.js";

export { getCallScope } from "./infra/callContext.js";
export type { CallScope } from "./infra/callContext.js";

import { AsyncLocalStorage } from "node:async_hooks";

import type { JsonRpcId } from "../rpc/protocol.js";

/**
 * Correlation details of the call currently being dispatched. The engine opens
 * one scope per routed call so anything logged from middlewares or handlers is
 * tagged with the method and the request id without threading them through
 * every signature.
 */
export interface CallScope {
  readonly method: string;
  /** Correlation id of the call, `null` when no reply is expected. */
  readonly requestId: JsonRpcId;
  /** True when the call is a member of a batch. */
  readonly batch: boolean;
  /** Signal of the dispatch, present when the caller passed one. */
  readonly signal?: AbortSignal;
}

const storage = new AsyncLocalStorage<CallScope>();

/** Runs {@link callback} with {@link scope} visible to {@link getCallScope}. */
export function runInCallScope<T>(scope: CallScope, callback: () => T): T {
  return storage.run(scope, callback);
}

/** Scope of the call running in the current async execution, if any. */
export function getCallScope(): CallScope | undefined {
  return storage.getStore();
}

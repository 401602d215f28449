/**
 * Cancellation that follows a call through its async context.
 *
 * A call running under a deadline gets a scope holding an AbortSignal. Once
 * the deadline passes, anything the call still does against a session
 * (statements, staged writes, nested transactional calls) throws the abort
 * reason instead of reaching the store.
 */

import { AsyncLocalStorage } from 'async_hooks';

interface CallScope {
  signal: AbortSignal;
  parent?: CallScope;
}

const callScope = new AsyncLocalStorage<CallScope>();

export function runInScope<R>(signal: AbortSignal, operation: () => Promise<R>): Promise<R> {
  return callScope.run({ signal, parent: callScope.getStore() }, operation);
}

/**
 * Throw if the calling code runs inside a scope that has been aborted,
 * including any enclosing scope.
 */
export function throwIfCancelled(): void {
  for (let scope = callScope.getStore(); scope; scope = scope.parent) {
    scope.signal.throwIfAborted();
  }
}

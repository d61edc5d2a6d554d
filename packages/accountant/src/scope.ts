// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Decides which accountant a call site uses when none is passed explicitly.
 *
 * Resolution order:
 *   1. the explicit argument
 *   2. the innermost scope entered with `runWith()` in the current
 *      asynchronous execution context
 *   3. the shared default installed with `setDefault()`
 *   4. a fresh accountant from the `fallback` factory
 *
 * Scopes live in `AsyncLocalStorage`, so concurrent async tasks each see only
 * the scopes they entered themselves. The shared default is process-wide.
 */
export class ScopeResolver<A> {
  readonly #scopes = new AsyncLocalStorage<readonly A[]>();
  readonly #fallback: () => A;
  #default: A | undefined;

  /** @param fallback - Builds the accountant used when nothing else resolves. */
  constructor(fallback: () => A) {
    this.#fallback = fallback;
  }

  resolve(explicit?: A): A {
    if (explicit !== undefined) {
      return explicit;
    }
    return this.current() ?? this.#default ?? this.#fallback();
  }

  /**
   * Run `fn` with `accountant` as the innermost scope.
   *
   * The scope covers `fn` and every continuation it awaits. It ends when `fn`
   * returns or throws; the enclosing scope is then current again.
   */
  runWith<T>(accountant: A, fn: () => T): T {
    const stack = this.#scopes.getStore() ?? [];
    return this.#scopes.run([...stack, accountant], fn);
  }

  /** Innermost active scope in this execution context, if any. */
  current(): A | undefined {
    const stack = this.#scopes.getStore();
    return stack === undefined ? undefined : stack[stack.length - 1];
  }

  /** Number of nested scopes active in this execution context. */
  get depth(): number {
    return this.#scopes.getStore()?.length ?? 0;
  }

  /** Install the shared default until replaced or popped. */
  setDefault(accountant: A): void {
    this.#default = accountant;
  }

  getDefault(): A | undefined {
    return this.#default;
  }

  /** Remove and return the shared default. */
  popDefault(): A | undefined {
    const previous = this.#default;
    this.#default = undefined;
    return previous;
  }
}

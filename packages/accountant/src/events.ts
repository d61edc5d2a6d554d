// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Accountant event emitter.
 *
 * `AccountantEventEmitter` is a typed publish-subscribe bus for accountant
 * lifecycle events. Listeners are invoked synchronously, after the
 * accountant's critical section has been released.
 *
 * Supported events:
 *   - accountant:spend          — a spend was admitted and committed
 *   - accountant:rejected       — a spend was refused with a BudgetError
 *   - accountant:budget:warning — remaining ε fell below the configured threshold
 *
 * Usage:
 * ```ts
 * const events = new AccountantEventEmitter();
 * events.on(EVENT_REJECTED, (payload) => {
 *   console.warn('rejected', payload.requested, payload.remaining);
 * });
 * const accountant = new PrivacyAccountant({ epsilon: 1 }, { events });
 * ```
 */

import type { BudgetTotals } from './types.js';

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

/** Emitted after a spend has been committed to the ledger. */
export const EVENT_SPEND = 'accountant:spend' as const;

/** Emitted when a spend is refused because it would exceed the budget. */
export const EVENT_REJECTED = 'accountant:rejected' as const;

/** Emitted when the remaining ε drops below the configured warning threshold. */
export const EVENT_BUDGET_WARNING = 'accountant:budget:warning' as const;

export type AccountantEventName =
  | typeof EVENT_SPEND
  | typeof EVENT_REJECTED
  | typeof EVENT_BUDGET_WARNING;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface AccountantSpendEventPayload {
  /** The committed expenditure. */
  readonly spent: BudgetTotals;
  /** Composed totals after the commit. */
  readonly total: BudgetTotals;
  /** Ledger length after the commit. */
  readonly count: number;
  /** ISO 8601 timestamp of the commit. */
  readonly timestamp: string;
}

export interface AccountantRejectedEventPayload {
  readonly requested: BudgetTotals;
  /** `remaining()` at the time of the rejection. */
  readonly remaining: BudgetTotals;
  readonly timestamp: string;
}

export interface AccountantBudgetWarningEventPayload {
  /** Total ε budget. */
  readonly limit: number;
  /** Composed ε spent so far. */
  readonly spent: number;
  /** ε still affordable in a single query. */
  readonly remaining: number;
  /** Utilisation as a percentage [0, 100]. */
  readonly utilizationPercent: number;
  readonly timestamp: string;
}

/** Maps each event name to its payload type. */
export interface AccountantEventPayloadMap {
  [EVENT_SPEND]: AccountantSpendEventPayload;
  [EVENT_REJECTED]: AccountantRejectedEventPayload;
  [EVENT_BUDGET_WARNING]: AccountantBudgetWarningEventPayload;
}

export type AccountantEventListener<E extends AccountantEventName> = (
  payload: AccountantEventPayloadMap[E],
) => void;

// ---------------------------------------------------------------------------
// AccountantEventEmitter
// ---------------------------------------------------------------------------

/**
 * Typed publish-subscribe emitter for accountant events.
 *
 * Listeners run synchronously in registration order; a listener registered
 * twice for the same event is kept once. An error thrown by a listener stops
 * delivery and propagates to whoever emitted.
 */
export class AccountantEventEmitter {
  readonly #listeners = new Map<AccountantEventName, Set<(payload: unknown) => void>>();

  /** @returns `this` for fluent chaining. */
  on<E extends AccountantEventName>(event: E, listener: AccountantEventListener<E>): this {
    const listeners = this.#listeners.get(event) ?? new Set<(payload: unknown) => void>();
    listeners.add(listener as (payload: unknown) => void);
    this.#listeners.set(event, listeners);
    return this;
  }

  /**
   * Registers a listener that is removed before its first invocation. The
   * registration wraps `listener`, so `off(event, listener)` does not cancel it.
   */
  once<E extends AccountantEventName>(event: E, listener: AccountantEventListener<E>): this {
    const wrapper: AccountantEventListener<E> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };
    return this.on(event, wrapper);
  }

  off<E extends AccountantEventName>(event: E, listener: AccountantEventListener<E>): this {
    const listeners = this.#listeners.get(event);
    if (listeners !== undefined) {
      listeners.delete(listener as (payload: unknown) => void);
      if (listeners.size === 0) {
        this.#listeners.delete(event);
      }
    }
    return this;
  }

  /** @returns `true` if at least one listener was invoked. */
  emit<E extends AccountantEventName>(event: E, payload: AccountantEventPayloadMap[E]): boolean {
    const listeners = this.#listeners.get(event);
    if (listeners === undefined) {
      return false;
    }
    for (const listener of [...listeners]) {
      listener(payload);
    }
    return true;
  }

  listenerCount(event: AccountantEventName): number {
    return this.#listeners.get(event)?.size ?? 0;
  }
}

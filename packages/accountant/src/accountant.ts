// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import {
  DEFAULT_TOLERANCE,
  type AccountantConfigInput,
  type BudgetTotals,
  type PrivacyBudget,
  type SpendCheckResult,
  type SpendRecord,
} from './types.js';
import { parseAccountantConfig, parseSpendRequest } from './config.js';
import { BudgetError, ConfigurationError } from './errors.js';
import { SpendLedger } from './ledger.js';
import { admits, compose, maxAffordableEpsilon } from './composition.js';
import {
  AccountantEventEmitter,
  EVENT_BUDGET_WARNING,
  EVENT_REJECTED,
  EVENT_SPEND,
} from './events.js';
import type { AccountantTracer } from './telemetry.js';
import { ScopeResolver } from './scope.js';

/** Construction mode for the ε = ∞, δ = 1 fallback accountant. */
export const UNCONSTRAINED_BUDGET: unique symbol = Symbol('unconstrained-budget');

export interface AccountantOptions {
  /**
   * Receives spend, rejection and budget-warning events. A private emitter is
   * created when omitted.
   *
   * Spend and warning listeners run after the charge is in the ledger. An
   * error thrown by one propagates out of `spend()`/`trySpend()` unchanged,
   * but the charge stands: only a BudgetError means the spend was refused.
   */
  events?: AccountantEventEmitter;
  /** Wraps every spend in a tracing span. */
  tracer?: AccountantTracer;
}

export type SpendResult =
  | { readonly ok: true; readonly accountant: PrivacyAccountant }
  | { readonly ok: false; readonly error: BudgetError };

/**
 * PrivacyAccountant — tracks cumulative (ε, δ) privacy loss against a fixed
 * budget and refuses any spend that would exceed it.
 *
 * Design contract:
 *  - The budget and slack are fixed at construction.
 *  - `spend()` checks and commits in one critical section. A rejected spend
 *    leaves the ledger exactly as it was.
 *  - `check()`, `total()` and `remaining()` never mutate state.
 *  - With `slack > 0` totals use the tighter of the naive and advanced
 *    composition bounds; with `slack = 0` they are plain sums.
 *
 * Every operation is synchronous and does no I/O, so each call runs to
 * completion before any other caller can observe the ledger. Event listeners
 * and the tracer's span bookkeeping run outside the check-then-append step.
 */
export class PrivacyAccountant {
  /** Total ε budget. */
  readonly epsilon: number;
  /** Total δ budget. */
  readonly delta: number;
  /** δ reserved for advanced composition. */
  readonly slack: number;
  readonly events: AccountantEventEmitter;

  readonly #ledger = new SpendLedger();
  readonly #tolerance: number;
  readonly #warningThreshold: number | undefined;
  readonly #tracer: AccountantTracer | undefined;
  readonly #unconstrained: boolean;

  /**
   * @throws ConfigurationError for a negative ε, a δ outside [0, 1), a slack
   *   inconsistent with δ, or pre-spent records that already overrun the budget.
   */
  constructor(
    config: AccountantConfigInput,
    options: AccountantOptions = {},
    mode?: typeof UNCONSTRAINED_BUDGET,
  ) {
    this.events = options.events ?? new AccountantEventEmitter();
    this.#tracer = options.tracer;

    if (mode === UNCONSTRAINED_BUDGET) {
      this.epsilon = Number.POSITIVE_INFINITY;
      this.delta = 1;
      this.slack = 0;
      this.#tolerance = DEFAULT_TOLERANCE;
      this.#warningThreshold = undefined;
      this.#unconstrained = true;
      return;
    }

    const parsed = parseAccountantConfig(config);
    this.epsilon = parsed.epsilon;
    this.delta = parsed.delta;
    this.slack = parsed.slack;
    this.#tolerance = parsed.tolerance;
    this.#warningThreshold = parsed.warningThreshold;
    this.#unconstrained = false;

    for (const record of parsed.spentBudget) {
      this.#ledger.append(record);
    }
    const total = this.#total();
    if (total.epsilon > this.epsilon || total.delta > this.delta) {
      throw new ConfigurationError([
        `spentBudget: already spent (${total.epsilon}, ${total.delta}) exceeds the budget ` +
          `(${this.epsilon}, ${this.delta})`,
      ]);
    }
  }

  // ─── Scope resolution ─────────────────────────────────────────────────────

  /**
   * An accountant with ε = ∞ and δ = 1. Code written without any accounting
   * still runs against it, but it enforces nothing; `isUnconstrained` tells
   * it apart from a real budget.
   */
  static unconstrained(options: AccountantOptions = {}): PrivacyAccountant {
    return new PrivacyAccountant({ epsilon: Number.POSITIVE_INFINITY }, options, UNCONSTRAINED_BUDGET);
  }

  /** The accountant a call site without an explicit one would use. */
  static loadDefault(accountant?: PrivacyAccountant): PrivacyAccountant {
    return accountantScope.resolve(accountant);
  }

  /** Remove and return the shared default accountant, if one is installed. */
  static popDefault(): PrivacyAccountant | undefined {
    return accountantScope.popDefault();
  }

  /** Install this accountant as the shared default until replaced or popped. */
  setDefault(): this {
    accountantScope.setDefault(this);
    return this;
  }

  /**
   * Run `fn` with this accountant as the resolution target for every nested
   * `spend()` that does not pass one explicitly, including across awaits
   * inside `fn`. The previous scope is restored however `fn` ends.
   */
  run<T>(fn: () => T): T {
    return accountantScope.runWith(this, fn);
  }

  // ─── Spending ─────────────────────────────────────────────────────────────

  /**
   * Commit a spend of (ε, δ), returning `this` for chaining.
   *
   * @throws ConfigurationError if ε ≤ 0 or δ is outside [0, 1).
   * @throws BudgetError if the spend would exceed the budget. The ledger is untouched.
   */
  spend(epsilon: number, delta = 0): this {
    const result = this.trySpend(epsilon, delta);
    if (!result.ok) {
      throw result.error;
    }
    return this;
  }

  /**
   * Same as `spend()`, but a budget overrun comes back as `{ ok: false }`
   * instead of being thrown. Malformed requests still throw ConfigurationError,
   * and a throwing spend or warning listener surfaces after the commit.
   */
  trySpend(epsilon: number, delta = 0): SpendResult {
    const request = parseSpendRequest({ epsilon, delta });

    let total: BudgetTotals;
    try {
      total =
        this.#tracer !== undefined
          ? this.#tracer.traceSpend(request, () => this.#commit(request))
          : this.#commit(request);
    } catch (error: unknown) {
      if (error instanceof BudgetError) {
        this.events.emit(EVENT_REJECTED, {
          requested: error.requested,
          remaining: error.remaining,
          timestamp: new Date().toISOString(),
        });
        return { ok: false, error };
      }
      throw error;
    }

    this.events.emit(EVENT_SPEND, {
      spent: request,
      total,
      count: this.#ledger.length,
      timestamp: new Date().toISOString(),
    });
    this.#warnIfLow(total);

    return { ok: true, accountant: this };
  }

  /**
   * Preview whether (ε, δ) would be admitted. Read-only.
   */
  check(epsilon: number, delta = 0): SpendCheckResult {
    const request = parseSpendRequest({ epsilon, delta });
    return {
      permitted: admits(this.#ledger.records(), this.budget, this.slack, request),
      requested: request,
      remaining: this.#remaining(1),
    };
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  /** Composed (ε, δ) spent so far. */
  total(): BudgetTotals {
    return this.#total();
  }

  /**
   * Per-query ε such that `k` further equal-cost (ε, 0) queries stay within
   * budget, paired with the δ headroom left.
   *
   * The ε side is found by bisection and is within the configured
   * `tolerance`, relative to the answer itself; it never overshoots.
   */
  remaining(k = 1): BudgetTotals {
    if (!Number.isInteger(k) || k < 1) {
      throw new ConfigurationError([`k: must be an integer of at least 1, got ${k}`]);
    }
    return this.#remaining(k);
  }

  get budget(): PrivacyBudget {
    return { epsilon: this.epsilon, delta: this.delta };
  }

  /** Number of committed spends. */
  get length(): number {
    return this.#ledger.length;
  }

  /** Frozen copy of every committed spend, in commit order. */
  get spentBudget(): readonly SpendRecord[] {
    return this.#ledger.snapshot();
  }

  /** True for the ε = ∞, δ = 1 fallback, which enforces no guarantee. */
  get isUnconstrained(): boolean {
    return this.#unconstrained;
  }

  toString(): string {
    const spent = this.#ledger
      .snapshot()
      .map((record) => `(${record.epsilon}, ${record.delta})`)
      .join(', ');
    return (
      `PrivacyAccountant(epsilon=${this.epsilon}, delta=${this.delta}, ` +
      `slack=${this.slack}, spent=[${spent}])`
    );
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  /**
   * The check-then-append critical section. It is synchronous and calls no
   * listener or tracer code, so no other spend can interleave with it.
   */
  #commit(request: SpendRecord): BudgetTotals {
    if (!admits(this.#ledger.records(), this.budget, this.slack, request)) {
      throw new BudgetError(request, this.#remaining(1));
    }
    this.#ledger.append(request);
    return this.#total();
  }

  #total(): BudgetTotals {
    return compose(this.#ledger.records(), this.slack, this.delta);
  }

  #remaining(k: number): BudgetTotals {
    const records = this.#ledger.records();
    return {
      epsilon: maxAffordableEpsilon(records, this.budget, this.slack, k, 0, this.#tolerance),
      delta: Math.max(0, this.delta - compose(records, this.slack, this.delta).delta),
    };
  }

  #warnIfLow(total: BudgetTotals): void {
    const threshold = this.#warningThreshold;
    if (threshold === undefined || !(this.epsilon > 0) || !Number.isFinite(this.epsilon)) {
      return;
    }
    const remaining = this.remaining(1).epsilon;
    if (remaining >= threshold * this.epsilon) {
      return;
    }
    this.events.emit(EVENT_BUDGET_WARNING, {
      limit: this.epsilon,
      spent: total.epsilon,
      remaining,
      utilizationPercent: Math.min(100, (total.epsilon / this.epsilon) * 100),
      timestamp: new Date().toISOString(),
    });
  }
}

/**
 * Process-wide resolver behind `spend()`, `run()` and `setDefault()`.
 * Falls back to a fresh unconstrained accountant on every unresolved call.
 */
export const accountantScope = new ScopeResolver<PrivacyAccountant>(() =>
  PrivacyAccountant.unconstrained(),
);

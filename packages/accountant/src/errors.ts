// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { BudgetTotals } from './types.js';

/**
 * Base class for all accountant errors.
 *
 * Every error carries a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class AccountantError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'AccountantError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown for malformed budget parameters at construction or malformed spend
 * requests. Raised before the ledger is touched; values are never clamped.
 *
 * `details` carries one `path: message` entry per validation failure.
 */
export class ConfigurationError extends AccountantError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIGURATION', `Invalid privacy accounting parameters: ${details.join('; ')}`);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/**
 * Thrown when a well-formed spend would push the composed privacy loss past
 * the accountant's budget.
 *
 * A mechanism that receives this error must not release its result.
 * `remaining` is the accountant's `remaining()` at the time of rejection, so
 * the caller can decide whether to retry at a lower cost.
 */
export class BudgetError extends AccountantError {
  /** The (ε, δ) that was requested. */
  readonly requested: BudgetTotals;
  /** Per-query (ε, δ) still affordable when the request was rejected. */
  readonly remaining: BudgetTotals;

  constructor(requested: BudgetTotals, remaining: BudgetTotals) {
    super(
      'BUDGET_EXCEEDED',
      `Privacy spend of (${requested.epsilon}, ${requested.delta}) not permissible; ` +
        `will exceed remaining privacy budget of (${remaining.epsilon}, ${remaining.delta}).`,
    );
    this.name = 'BudgetError';
    this.requested = requested;
    this.remaining = remaining;
  }
}

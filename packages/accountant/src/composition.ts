// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Composition arithmetic for (ε, δ) privacy accounting.
 *
 * Every function here is pure: it reads a sequence of spend records and
 * returns numbers, never touching a ledger or an accountant.
 *
 * Two bounds are implemented:
 *
 *   naive     ε = Σ εᵢ
 *             δ = Σ δᵢ
 *
 *   advanced  ε = sqrt(2 · ln(1/s) · Σ εᵢ²) + Σ εᵢ · (e^εᵢ − 1)
 *             δ = Σ δᵢ + s                                (0 < s < 1)
 *
 * The advanced (strong composition) bound wins when many small-ε records are
 * summed; the naive bound wins for a handful of large ones. `compose()` picks
 * whichever gives the smaller ε without overrunning the δ limit.
 */

import {
  DEFAULT_TOLERANCE,
  type BudgetTotals,
  type PrivacyBudget,
  type SpendRecord,
} from './types.js';
import { ConfigurationError } from './errors.js';

/** Upper bound on halvings in `maxAffordableEpsilon`, whatever the tolerance. */
const MAX_BISECTION_STEPS = 200;

// ---------------------------------------------------------------------------
// Sums
// ---------------------------------------------------------------------------

/** The four running sums both bounds are computed from. */
interface CompositionSums {
  /** Σ εᵢ */
  readonly epsilon: number;
  /** Σ δᵢ */
  readonly delta: number;
  /** Σ εᵢ² */
  readonly squares: number;
  /** Σ εᵢ · (e^εᵢ − 1) */
  readonly growth: number;
}

function sumRecords(records: Iterable<SpendRecord>): CompositionSums {
  let epsilon = 0;
  let delta = 0;
  let squares = 0;
  let growth = 0;
  for (const record of records) {
    epsilon += record.epsilon;
    delta += record.delta;
    squares += record.epsilon ** 2;
    growth += record.epsilon * Math.expm1(record.epsilon);
  }
  return { epsilon, delta, squares, growth };
}

/** `sums` extended by `count ≥ 1` identical records, in constant time. */
function withRepeated(sums: CompositionSums, record: SpendRecord, count: number): CompositionSums {
  return {
    epsilon: sums.epsilon + count * record.epsilon,
    delta: sums.delta + count * record.delta,
    squares: sums.squares + count * record.epsilon ** 2,
    growth: sums.growth + count * record.epsilon * Math.expm1(record.epsilon),
  };
}

function assertAdvancedSlack(slack: number): void {
  if (!(slack > 0 && slack < 1)) {
    throw new ConfigurationError([`slack: advanced composition needs slack in (0, 1), got ${slack}`]);
  }
}

function advancedFromSums(sums: CompositionSums, slack: number): BudgetTotals {
  return {
    epsilon: Math.sqrt(2 * Math.log(1 / slack) * sums.squares) + sums.growth,
    delta: sums.delta + slack,
  };
}

function composeSums(sums: CompositionSums, slack: number, deltaLimit: number): BudgetTotals {
  const naive = { epsilon: sums.epsilon, delta: sums.delta };
  if (slack === 0) {
    return naive;
  }

  assertAdvancedSlack(slack);
  const advanced = advancedFromSums(sums, slack);
  if (advanced.epsilon < naive.epsilon && advanced.delta <= deltaLimit) {
    return advanced;
  }
  return naive;
}

// ---------------------------------------------------------------------------
// Bounds
// ---------------------------------------------------------------------------

/** Basic composition: coordinate-wise sum. Exact and always valid. */
export function naiveCompose(records: Iterable<SpendRecord>): BudgetTotals {
  const sums = sumRecords(records);
  return { epsilon: sums.epsilon, delta: sums.delta };
}

/**
 * Strong composition bound for a slack `s` in (0, 1).
 *
 * Throws ConfigurationError for a slack outside that interval.
 */
export function advancedCompose(records: Iterable<SpendRecord>, slack: number): BudgetTotals {
  assertAdvancedSlack(slack);
  return advancedFromSums(sumRecords(records), slack);
}

/**
 * Tightest available bound on the total privacy loss of `records`.
 *
 * With zero slack this is the naive sum. Otherwise the advanced bound is used
 * when its ε is strictly smaller and its δ (which includes the slack) stays
 * within `deltaLimit`.
 *
 * With slack > 0 the reported δ is not monotone across spends: it includes
 * the slack while the advanced bound is chosen and drops back to Σ δᵢ once a
 * large spend makes the naive bound the tighter one. Only ε never decreases.
 */
export function compose(
  records: Iterable<SpendRecord>,
  slack: number,
  deltaLimit: number = Number.POSITIVE_INFINITY,
): BudgetTotals {
  return composeSums(sumRecords(records), slack, deltaLimit);
}

// ---------------------------------------------------------------------------
// Admission
// ---------------------------------------------------------------------------

function sumsWithinBudget(sums: CompositionSums, budget: PrivacyBudget, slack: number): boolean {
  const totals = composeSums(sums, slack, budget.delta);
  return totals.epsilon <= budget.epsilon && totals.delta <= budget.delta;
}

/**
 * Whether committing `candidate` on top of `records` keeps the composed bound
 * within `budget` in both coordinates.
 *
 * Composition is monotone in every εᵢ and δᵢ, so this predicate is monotone
 * in the candidate's cost.
 */
export function admits(
  records: Iterable<SpendRecord>,
  budget: PrivacyBudget,
  slack: number,
  candidate: SpendRecord,
): boolean {
  return sumsWithinBudget(withRepeated(sumRecords(records), candidate, 1), budget, slack);
}

// ---------------------------------------------------------------------------
// Inversion
// ---------------------------------------------------------------------------

/**
 * Largest per-query ε such that `k` further queries of `(ε, deltaPerQuery)`
 * still fit within `budget`.
 *
 * The ledger is summed once; each probe adds the `k` queries arithmetically,
 * so the cost does not grow with `k`. The bracket `[0, budget.epsilon]` is
 * halved until its width is at most `tolerance` times its upper end, and the
 * lower end (which is always admissible) is returned, so the result can be
 * spent as-is and is within relative `tolerance` of the true maximum.
 *
 * - `k = 0` returns `budget.epsilon`.
 * - Returns 0 when no positive ε is admissible (including when the δ side
 *   alone is already exhausted).
 * - An unbounded ε budget returns `Infinity` when the δ side admits the queries.
 */
export function maxAffordableEpsilon(
  records: Iterable<SpendRecord>,
  budget: PrivacyBudget,
  slack: number,
  k: number,
  deltaPerQuery: number,
  tolerance: number = DEFAULT_TOLERANCE,
): number {
  if (!Number.isInteger(k) || k < 0) {
    throw new ConfigurationError([`k: must be a non-negative integer, got ${k}`]);
  }
  if (!(tolerance > 0)) {
    throw new ConfigurationError([`tolerance: must be positive, got ${tolerance}`]);
  }
  if (k === 0) {
    return budget.epsilon;
  }

  const spent = sumRecords(records);
  const fits = (epsilon: number): boolean =>
    sumsWithinBudget(withRepeated(spent, { epsilon, delta: deltaPerQuery }, k), budget, slack);

  if (!fits(0)) {
    return 0;
  }
  if (budget.epsilon === Number.POSITIVE_INFINITY) {
    return Number.POSITIVE_INFINITY;
  }
  if (fits(budget.epsilon)) {
    return budget.epsilon;
  }

  let lower = 0;
  let upper = budget.epsilon;

  for (let step = 0; step < MAX_BISECTION_STEPS && upper - lower > tolerance * upper; step++) {
    const mid = (lower + upper) / 2;
    if (fits(mid)) {
      lower = mid;
    } else {
      upper = mid;
    }
  }

  return lower;
}

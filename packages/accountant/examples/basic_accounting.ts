// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic_accounting.ts
 *
 * Demonstrates the minimal loop for budget-gated statistics:
 *   1. Create an accountant with a total (ε, δ) budget.
 *   2. Spend before releasing each result.
 *   3. Stop releasing as soon as a spend is refused.
 *   4. Inspect totals and what is left.
 *
 * Run with:  npx tsx packages/accountant/examples/basic_accounting.ts
 */

import { PrivacyAccountant, BudgetError } from '../src/index.js';

// ─── Setup ────────────────────────────────────────────────────────────────────

const accountant = new PrivacyAccountant({ epsilon: 2, delta: 1e-5 });

// ─── Simulate a sequence of private queries ───────────────────────────────────

const queries = [
  { name: 'mean(age)', epsilon: 0.5, delta: 0 },
  { name: 'var(age)', epsilon: 0.5, delta: 0 },
  { name: 'histogram(zip)', epsilon: 0.75, delta: 1e-6 },
  { name: 'median(income)', epsilon: 0.5, delta: 0 },
];

for (const query of queries) {
  try {
    accountant.spend(query.epsilon, query.delta);
  } catch (error: unknown) {
    if (error instanceof BudgetError) {
      console.log(
        `${query.name}: REFUSED  requested ε=${query.epsilon}  ` +
          `remaining ε=${error.remaining.epsilon.toFixed(4)}`,
      );
      break;
    }
    throw error;
  }
  console.log(`${query.name}: RELEASED  ε=${query.epsilon}  δ=${query.delta}`);
}

// ─── Final snapshot ───────────────────────────────────────────────────────────

const total = accountant.total();
const remaining = accountant.remaining();

console.log('\n── Privacy budget summary ─────────────────────────────');
console.log(`  Queries released : ${accountant.length}`);
console.log(`  Spent            : ε=${total.epsilon.toFixed(4)}  δ=${total.delta}`);
console.log(`  Remaining        : ε=${remaining.epsilon.toFixed(4)}  δ=${remaining.delta}`);
console.log(`  Per query (k=3)  : ε=${accountant.remaining(3).epsilon.toFixed(4)}`);
console.log('──────────────────────────────────────────────────────');

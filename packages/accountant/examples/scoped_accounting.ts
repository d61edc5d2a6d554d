// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * scoped_accounting.ts
 *
 * Demonstrates the three ways a mechanism can find its accountant:
 *   1. passed explicitly
 *   2. installed as the shared default
 *   3. entered as a scope with `run()`
 * and the advanced composition bound that slack buys.
 *
 * Run with:  npx tsx packages/accountant/examples/scoped_accounting.ts
 */

import {
  AccountantEventEmitter,
  EVENT_BUDGET_WARNING,
  PrivacyAccountant,
  spend,
} from '../src/index.js';

/** Stand-in for a mechanism: charges its cost, then "releases" a value. */
function noisyCount(values: readonly number[], epsilon: number, accountant?: PrivacyAccountant): number {
  spend(epsilon, 0, accountant);
  return values.length;
}

const data = [3, 1, 4, 1, 5, 9, 2, 6];

// ─── Explicit ─────────────────────────────────────────────────────────────────

const explicit = new PrivacyAccountant({ epsilon: 5 });
noisyCount(data, 1.618, explicit);
console.log(`explicit : ${explicit.toString()}`);

// ─── Default ──────────────────────────────────────────────────────────────────

const byDefault = new PrivacyAccountant({ epsilon: 5 }).setDefault();
noisyCount(data, 2.718);
PrivacyAccountant.popDefault();
console.log(`default  : ${byDefault.toString()}`);

// ─── Scoped ───────────────────────────────────────────────────────────────────

const scoped = new PrivacyAccountant({ epsilon: 5 });
scoped.run(() => {
  noisyCount(data, 1.5705);
  noisyCount(data, 1.5705);
});
console.log(`scoped   : ${scoped.toString()}`);

// ─── Advanced composition ─────────────────────────────────────────────────────

const events = new AccountantEventEmitter();
events.once(EVENT_BUDGET_WARNING, (payload) => {
  console.log(`warning  : ${payload.utilizationPercent.toFixed(1)}% of ε used`);
});

const withSlack = new PrivacyAccountant(
  { epsilon: 1, delta: 1e-3, slack: 1e-3, warningThreshold: 0.25 },
  { events },
);
let released = 0;
while (withSlack.trySpend(0.01).ok) {
  released += 1;
}
console.log(`slack    : ${released} queries at ε=0.01 within ε=1 (naive composition allows 100)`);

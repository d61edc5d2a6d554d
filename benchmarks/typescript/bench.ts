// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Accountant micro-benchmark.
 *
 * Runs five accounting scenarios against the real package and writes a JSON
 * results object to stdout. No external benchmark framework — uses
 * node:perf_hooks only.
 *
 * Usage:
 *   npm run bench > results/accountant.json
 */

import { performance } from 'node:perf_hooks';
import {
  PrivacyAccountant,
  compose,
  spend,
  type SpendRecord,
} from '../../packages/accountant/src/index.js';

// ─── Types ───────────────────────────────────────────────────────────────────

interface ScenarioResult {
  readonly name: string;
  readonly iterations: number;
  readonly ops_per_sec: number;
  readonly mean_ns: number;
  readonly stdev_ns: number;
}

interface BenchmarkReport {
  readonly runtime: string;
  readonly timestamp: string;
  readonly scenarios: readonly ScenarioResult[];
}

type BenchmarkFn = () => void;

/** Calls per timed round; one `performance.now()` pair brackets each round. */
const ROUND_SIZE = 100;

// ─── Timing helpers ───────────────────────────────────────────────────────────

/**
 * Times `fn` in rounds of `ROUND_SIZE` calls after one untimed round, and
 * reports the per-call mean and the spread between round means.
 */
function runScenario(name: string, iterations: number, fn: BenchmarkFn): ScenarioResult {
  const rounds = Math.max(1, Math.ceil(iterations / ROUND_SIZE));
  const roundMeansNs: number[] = [];

  for (let round = -1; round < rounds; round++) {
    const start = performance.now();
    for (let call = 0; call < ROUND_SIZE; call++) {
      fn();
    }
    if (round >= 0) {
      roundMeansNs.push(((performance.now() - start) * 1e6) / ROUND_SIZE);
    }
  }

  const mean = roundMeansNs.reduce((sum, value) => sum + value, 0) / rounds;
  const stdev = Math.sqrt(
    roundMeansNs.reduce((sum, value) => sum + (value - mean) ** 2, 0) / rounds,
  );

  return {
    name,
    iterations: rounds * ROUND_SIZE,
    ops_per_sec: mean > 0 ? Math.round(1e9 / mean) : 0,
    mean_ns: Math.round(mean),
    stdev_ns: Math.round(stdev),
  };
}

// ─── Scenarios ────────────────────────────────────────────────────────────────

const SMALL_SPENDS: readonly SpendRecord[] = Array.from({ length: 1_000 }, () => ({
  epsilon: 0.001,
  delta: 0,
}));

/** Scenario 1: admit-and-commit against a ledger that keeps growing. */
function benchSpend(): ScenarioResult {
  let accountant = new PrivacyAccountant({ epsilon: 1_000, delta: 1e-5, slack: 1e-6 });
  return runScenario('spend', 10_000, () => {
    if (!accountant.trySpend(0.01).ok) {
      accountant = new PrivacyAccountant({ epsilon: 1_000, delta: 1e-5, slack: 1e-6 });
    }
  });
}

/** Scenario 2: composition over 1 000 records with slack. */
function benchCompose(): ScenarioResult {
  return runScenario('compose_1000', 10_000, () => {
    compose(SMALL_SPENDS, 1e-6, 1e-5);
  });
}

/** Scenario 3: bisection for the per-query ε of 10 further queries. */
function benchRemaining(): ScenarioResult {
  const accountant = new PrivacyAccountant({
    epsilon: 10,
    delta: 1e-5,
    slack: 1e-6,
    spentBudget: [...SMALL_SPENDS],
  });
  return runScenario('remaining_k10', 1_000, () => {
    accountant.remaining(10);
  });
}

/** Scenario 4: bisection across a million further queries. */
function benchRemainingLargeK(): ScenarioResult {
  const accountant = new PrivacyAccountant({ epsilon: 10, delta: 1e-5, slack: 1e-6 }).spend(1);
  return runScenario('remaining_k1e6', 1_000, () => {
    accountant.remaining(1_000_000);
  });
}

/** Scenario 5: free-function spend resolved through a scope. */
function benchScopedSpend(): ScenarioResult {
  let accountant = new PrivacyAccountant({ epsilon: 1_000 });
  return runScenario('scoped_spend', 10_000, () => {
    if (accountant.check(0.01).permitted === false) {
      accountant = new PrivacyAccountant({ epsilon: 1_000 });
    }
    accountant.run(() => spend(0.01));
  });
}

// ─── Entry point ─────────────────────────────────────────────────────────────

function main(): void {
  const scenarios: ScenarioResult[] = [
    benchSpend(),
    benchCompose(),
    benchRemaining(),
    benchRemainingLargeK(),
    benchScopedSpend(),
  ];

  const report: BenchmarkReport = {
    runtime: `node-${process.version}`,
    timestamp: new Date().toISOString(),
    scenarios,
  };

  process.stdout.write(JSON.stringify(report, null, 2) + '\n');
}

main();

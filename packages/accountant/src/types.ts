// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';

/** Default relative tolerance for the bisection behind `remaining()`. */
export const DEFAULT_TOLERANCE = 1e-9;

// ─── Spend record ────────────────────────────────────────────────────────────

export const SpendRecordSchema = z.object({
  epsilon: z.number().positive('epsilon must be greater than 0'),
  delta: z.number().min(0, 'delta must be in [0, 1)').lt(1, 'delta must be in [0, 1)'),
});

/** One committed privacy expenditure. Never modified after it enters a ledger. */
export interface SpendRecord {
  readonly epsilon: number;
  readonly delta: number;
}

export const SpendRequestSchema = z.object({
  epsilon: z.number().positive('epsilon must be greater than 0'),
  delta: z
    .number()
    .min(0, 'delta must be in [0, 1)')
    .lt(1, 'delta must be in [0, 1)')
    .default(0),
});
export type SpendRequest = z.input<typeof SpendRequestSchema>;

// ─── Budget ──────────────────────────────────────────────────────────────────

/** Total (ε, δ) an accountant may ever spend. Fixed at construction. */
export interface PrivacyBudget {
  readonly epsilon: number;
  readonly delta: number;
}

/** A composed (ε, δ) pair, as reported by `total()` and `remaining()`. */
export interface BudgetTotals {
  readonly epsilon: number;
  readonly delta: number;
}

// ─── Accountant config ───────────────────────────────────────────────────────

export const AccountantConfigSchema = z
  .object({
    /** Total ε budget. `Infinity` is accepted. */
    epsilon: z.number().min(0, 'epsilon must be non-negative'),
    /** Total δ budget. */
    delta: z
      .number()
      .min(0, 'delta must be in [0, 1)')
      .lt(1, 'delta must be in [0, 1)')
      .default(0),
    /** δ set aside for the advanced composition bound. Must not exceed `delta`. */
    slack: z.number().min(0, 'slack must be non-negative').default(0),
    /** Expenditures already incurred before this accountant took over. */
    spentBudget: z.array(SpendRecordSchema).default([]),
    /** Relative bracket width at which `remaining()` stops bisecting. */
    tolerance: z.number().positive().lt(1).default(DEFAULT_TOLERANCE),
    /**
     * Fraction of the ε budget below which each successful spend also emits
     * an `accountant:budget:warning` event.
     */
    warningThreshold: z.number().gt(0).lt(1).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.slack > 0 && config.delta === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slack'],
        message: 'slack must be 0 when delta is 0',
      });
    } else if (config.slack > config.delta) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slack'],
        message: 'slack must not exceed delta',
      });
    }
  });

export type AccountantConfigInput = z.input<typeof AccountantConfigSchema>;
export type AccountantConfig = z.output<typeof AccountantConfigSchema>;

// ─── Results ─────────────────────────────────────────────────────────────────

/** Read-only admission preview returned by `PrivacyAccountant.check()`. */
export interface SpendCheckResult {
  readonly permitted: boolean;
  readonly requested: BudgetTotals;
  readonly remaining: BudgetTotals;
}

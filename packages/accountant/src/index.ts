// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @dp-ledger/accountant — budget ledger and composition arithmetic for
 * (ε, δ) differential-privacy accounting.
 *
 * Public API surface:
 *
 * Accountant
 *   PrivacyAccountant   — owns a budget and a ledger; admits or rejects spends
 *   spend               — charge the explicit, scoped, default or fallback accountant
 *   ScopeResolver       — explicit → scope → default → fallback resolution
 *
 * Composition
 *   naiveCompose, advancedCompose, compose, admits, maxAffordableEpsilon
 *
 * Errors
 *   AccountantError, ConfigurationError, BudgetError
 *
 * Observability
 *   AccountantEventEmitter — spend / rejected / budget-warning events
 *   AccountantTracer       — OpenTelemetry-compatible spans around spends
 */

// ─── Accountant ──────────────────────────────────────────────────────────────
export { PrivacyAccountant, accountantScope } from './accountant.js';
export type { AccountantOptions, SpendResult } from './accountant.js';
export { spend } from './spend.js';
export { ScopeResolver } from './scope.js';
export { SpendLedger } from './ledger.js';

// ─── Composition ─────────────────────────────────────────────────────────────
export {
  naiveCompose,
  advancedCompose,
  compose,
  admits,
  maxAffordableEpsilon,
} from './composition.js';

// ─── Types and schemas ───────────────────────────────────────────────────────
export type {
  SpendRecord,
  SpendRequest,
  PrivacyBudget,
  BudgetTotals,
  AccountantConfig,
  AccountantConfigInput,
  SpendCheckResult,
} from './types.js';
export {
  AccountantConfigSchema,
  SpendRecordSchema,
  SpendRequestSchema,
  DEFAULT_TOLERANCE,
} from './types.js';
export { parseAccountantConfig, parseSpendRequest, parseSpendRecord } from './config.js';

// ─── Errors ──────────────────────────────────────────────────────────────────
export { AccountantError, ConfigurationError, BudgetError } from './errors.js';

// ─── Observability ───────────────────────────────────────────────────────────
export {
  AccountantEventEmitter,
  EVENT_SPEND,
  EVENT_REJECTED,
  EVENT_BUDGET_WARNING,
} from './events.js';
export type {
  AccountantEventName,
  AccountantEventListener,
  AccountantEventPayloadMap,
  AccountantSpendEventPayload,
  AccountantRejectedEventPayload,
  AccountantBudgetWarningEventPayload,
} from './events.js';
export { AccountantTracer } from './telemetry.js';
export type { AccountantTracerConfig, OTelSpanLike, OTelTracerLike } from './telemetry.js';

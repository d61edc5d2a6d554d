// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { BudgetTotals } from './types.js';
import { BudgetError } from './errors.js';

/**
 * Minimal OpenTelemetry Span interface.
 *
 * This avoids a hard dependency on @opentelemetry/api. Any OTel-compatible
 * tracer that produces spans with these methods can be used.
 */
export interface OTelSpanLike {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: number; message?: string }): this;
  addEvent(name: string, attributes?: Record<string, string | number | boolean>): this;
  end(): void;
}

/**
 * Minimal OpenTelemetry Tracer interface.
 */
export interface OTelTracerLike {
  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): OTelSpanLike;
}

export interface AccountantTracerConfig {
  /** The OTel tracer instance to use for span creation. */
  tracer: OTelTracerLike;
  /** Service name attribute added to all spans. Defaults to "dp-accountant". */
  serviceName?: string;
}

/** OTel span status codes (matching OpenTelemetry SpanStatusCode). */
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * Wraps accountant spends in OpenTelemetry spans.
 *
 * Usage:
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const tracer = new AccountantTracer({ tracer: trace.getTracer('analytics') });
 * const accountant = new PrivacyAccountant({ epsilon: 2 }, { tracer });
 * ```
 *
 * Each spend produces one `dp.accountant.spend` span carrying the requested
 * cost and, when admitted, the composed totals afterwards.
 */
export class AccountantTracer {
  readonly #tracer: OTelTracerLike;
  readonly #serviceName: string;

  constructor(config: AccountantTracerConfig) {
    this.#tracer = config.tracer;
    this.#serviceName = config.serviceName ?? 'dp-accountant';
  }

  /**
   * Runs `commit` inside a span. `commit` returns the composed totals after
   * the spend, or throws.
   */
  traceSpend(requested: BudgetTotals, commit: () => BudgetTotals): BudgetTotals {
    const span = this.#tracer.startSpan('dp.accountant.spend', {
      attributes: {
        'service.name': this.#serviceName,
        'dp.epsilon.requested': requested.epsilon,
        'dp.delta.requested': requested.delta,
      },
    });

    try {
      const total = commit();
      span.setAttribute('dp.decision', 'admit');
      span.setAttribute('dp.epsilon.total', total.epsilon);
      span.setAttribute('dp.delta.total', total.delta);
      span.setStatus({ code: SPAN_STATUS_OK });
      return total;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      if (error instanceof BudgetError) {
        span.setAttribute('dp.decision', 'reject');
        span.addEvent('dp.budget.exceeded', {
          'dp.epsilon.remaining': error.remaining.epsilon,
          'dp.delta.remaining': error.remaining.delta,
        });
      }
      span.setStatus({ code: SPAN_STATUS_ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  }
}

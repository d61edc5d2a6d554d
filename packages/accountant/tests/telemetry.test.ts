// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { AccountantTracer } from '../src/telemetry.js';
import type { OTelSpanLike, OTelTracerLike } from '../src/telemetry.js';
import { PrivacyAccountant } from '../src/accountant.js';
import { BudgetError } from '../src/errors.js';

class RecordingSpan implements OTelSpanLike {
  readonly attributes: Record<string, string | number | boolean>;
  readonly events: string[] = [];
  status: { code: number; message?: string } | undefined;
  ended = false;

  constructor(readonly name: string, attributes: Record<string, string | number | boolean> = {}) {
    this.attributes = { ...attributes };
  }

  setAttribute(key: string, value: string | number | boolean): this {
    this.attributes[key] = value;
    return this;
  }

  setStatus(status: { code: number; message?: string }): this {
    this.status = status;
    return this;
  }

  addEvent(name: string): this {
    this.events.push(name);
    return this;
  }

  end(): void {
    this.ended = true;
  }
}

class RecordingTracer implements OTelTracerLike {
  readonly spans: RecordingSpan[] = [];

  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): RecordingSpan {
    const span = new RecordingSpan(name, options?.attributes);
    this.spans.push(span);
    return span;
  }
}

describe('AccountantTracer', () => {
  it('records an admitted spend', () => {
    const recorder = new RecordingTracer();
    const tracer = new AccountantTracer({ tracer: recorder, serviceName: 'survey-stats' });
    new PrivacyAccountant({ epsilon: 2 }, { tracer }).spend(0.5);

    expect(recorder.spans).toHaveLength(1);
    const span = recorder.spans[0];
    expect(span?.name).toBe('dp.accountant.spend');
    expect(span?.attributes).toEqual({
      'service.name': 'survey-stats',
      'dp.epsilon.requested': 0.5,
      'dp.delta.requested': 0,
      'dp.decision': 'admit',
      'dp.epsilon.total': 0.5,
      'dp.delta.total': 0,
    });
    expect(span?.status).toEqual({ code: 1 });
    expect(span?.ended).toBe(true);
  });

  it('records a rejected spend and still surfaces the BudgetError', () => {
    const recorder = new RecordingTracer();
    const tracer = new AccountantTracer({ tracer: recorder });
    const accountant = new PrivacyAccountant({ epsilon: 1 }, { tracer });

    expect(() => accountant.spend(2)).toThrow(BudgetError);

    const span = recorder.spans[0];
    expect(span?.attributes['service.name']).toBe('dp-accountant');
    expect(span?.attributes['dp.decision']).toBe('reject');
    expect(span?.events).toEqual(['dp.budget.exceeded']);
    expect(span?.status?.code).toBe(2);
    expect(span?.ended).toBe(true);
    expect(accountant.length).toBe(0);
  });
});

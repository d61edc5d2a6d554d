// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, vi } from 'vitest';
import {
  AccountantEventEmitter,
  EVENT_BUDGET_WARNING,
  EVENT_REJECTED,
  EVENT_SPEND,
} from '../src/events.js';
import type {
  AccountantBudgetWarningEventPayload,
  AccountantRejectedEventPayload,
  AccountantSpendEventPayload,
} from '../src/events.js';
import { PrivacyAccountant } from '../src/accountant.js';
import { BudgetError } from '../src/errors.js';

describe('AccountantEventEmitter', () => {
  it('invokes listeners in registration order', () => {
    const emitter = new AccountantEventEmitter();
    const calls: string[] = [];
    emitter.on(EVENT_REJECTED, () => calls.push('first'));
    emitter.on(EVENT_REJECTED, () => calls.push('second'));

    const delivered = emitter.emit(EVENT_REJECTED, {
      requested: { epsilon: 1, delta: 0 },
      remaining: { epsilon: 0, delta: 0 },
      timestamp: '2026-01-01T00:00:00.000Z',
    });

    expect(delivered).toBe(true);
    expect(calls).toEqual(['first', 'second']);
  });

  it('returns false when nobody is listening', () => {
    const emitter = new AccountantEventEmitter();
    expect(
      emitter.emit(EVENT_REJECTED, {
        requested: { epsilon: 1, delta: 0 },
        remaining: { epsilon: 0, delta: 0 },
        timestamp: '2026-01-01T00:00:00.000Z',
      }),
    ).toBe(false);
  });

  it('fires once-listeners a single time', () => {
    const emitter = new AccountantEventEmitter();
    const listener = vi.fn();
    emitter.once(EVENT_SPEND, listener);
    const payload: AccountantSpendEventPayload = {
      spent: { epsilon: 1, delta: 0 },
      total: { epsilon: 1, delta: 0 },
      count: 1,
      timestamp: '2026-01-01T00:00:00.000Z',
    };
    emitter.emit(EVENT_SPEND, payload);
    emitter.emit(EVENT_SPEND, payload);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount(EVENT_SPEND)).toBe(0);
  });

  it('removes a listener with off', () => {
    const emitter = new AccountantEventEmitter();
    const listener = vi.fn();
    emitter.on(EVENT_SPEND, listener).on(EVENT_REJECTED, vi.fn());
    emitter.off(EVENT_SPEND, listener);
    expect(emitter.listenerCount(EVENT_SPEND)).toBe(0);
    expect(emitter.listenerCount(EVENT_REJECTED)).toBe(1);
  });

  it('keeps a listener registered twice only once', () => {
    const emitter = new AccountantEventEmitter();
    const listener = vi.fn();
    emitter.on(EVENT_REJECTED, listener).on(EVENT_REJECTED, listener);
    expect(emitter.listenerCount(EVENT_REJECTED)).toBe(1);
  });
});

describe('PrivacyAccountant events', () => {
  it('emits a spend event after each commit', () => {
    const events = new AccountantEventEmitter();
    const received: AccountantSpendEventPayload[] = [];
    events.on(EVENT_SPEND, (payload) => received.push(payload));

    const accountant = new PrivacyAccountant({ epsilon: 5 }, { events });
    accountant.spend(1).spend(0.5);

    expect(received).toHaveLength(2);
    expect(received[1]?.spent).toEqual({ epsilon: 0.5, delta: 0 });
    expect(received[1]?.total).toEqual({ epsilon: 1.5, delta: 0 });
    expect(received[1]?.count).toBe(2);
    expect(typeof received[1]?.timestamp).toBe('string');
  });

  it('emits a rejected event before the BudgetError reaches the caller', () => {
    const events = new AccountantEventEmitter();
    const received: AccountantRejectedEventPayload[] = [];
    events.on(EVENT_REJECTED, (payload) => received.push(payload));

    const accountant = new PrivacyAccountant({ epsilon: 1 }, { events });
    expect(accountant.trySpend(2).ok).toBe(false);

    expect(received).toHaveLength(1);
    expect(received[0]?.requested).toEqual({ epsilon: 2, delta: 0 });
    expect(received[0]?.remaining).toEqual({ epsilon: 1, delta: 0 });
  });

  it('warns once remaining epsilon falls below the threshold', () => {
    const events = new AccountantEventEmitter();
    const received: AccountantBudgetWarningEventPayload[] = [];
    events.on(EVENT_BUDGET_WARNING, (payload) => received.push(payload));

    const accountant = new PrivacyAccountant({ epsilon: 10, warningThreshold: 0.5 }, { events });
    accountant.spend(4);
    expect(received).toHaveLength(0);

    accountant.spend(2);
    expect(received).toHaveLength(1);
    expect(received[0]?.limit).toBe(10);
    expect(received[0]?.spent).toBe(6);
    expect(received[0]?.remaining).toBeCloseTo(4, 6);
    expect(received[0]?.utilizationPercent).toBeCloseTo(60, 10);
  });

  it('keeps the charge when a spend listener throws', () => {
    const events = new AccountantEventEmitter();
    events.on(EVENT_SPEND, () => {
      throw new Error('listener failed');
    });
    const accountant = new PrivacyAccountant({ epsilon: 2 }, { events });

    let caught: unknown;
    try {
      accountant.spend(1);
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(Error);
    expect(caught).not.toBeInstanceOf(BudgetError);
    expect(caught instanceof Error && caught.message).toBe('listener failed');
    expect(accountant.length).toBe(1);
    expect(accountant.total()).toEqual({ epsilon: 1, delta: 0 });
  });

  it('does not warn without a threshold', () => {
    const events = new AccountantEventEmitter();
    const listener = vi.fn();
    events.on(EVENT_BUDGET_WARNING, listener);
    new PrivacyAccountant({ epsilon: 1 }, { events }).spend(0.99);
    expect(listener).not.toHaveBeenCalled();
  });
});

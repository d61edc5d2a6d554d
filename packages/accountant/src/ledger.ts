// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { SpendRecord } from './types.js';
import { parseSpendRecord } from './config.js';

/**
 * Append-only record of committed privacy expenditures.
 *
 * The ledger performs no budget check; that is the owning accountant's job.
 * It only guarantees ordering and that earlier entries never change. There is
 * no removal: privacy loss, once incurred, cannot be returned.
 */
export class SpendLedger {
  readonly #records: SpendRecord[] = [];

  /** Append a record unconditionally. Throws ConfigurationError on a malformed record. */
  append(record: SpendRecord): void {
    const validated = parseSpendRecord(record);
    this.#records.push(Object.freeze({ epsilon: validated.epsilon, delta: validated.delta }));
  }

  /**
   * Lazy view over the committed records in insertion order.
   *
   * Each call to `[Symbol.iterator]()` starts from the first record, so the
   * view can be walked any number of times.
   */
  records(): Iterable<SpendRecord> {
    const records = this.#records;
    return {
      *[Symbol.iterator](): Iterator<SpendRecord> {
        for (const record of records) {
          yield record;
        }
      },
    };
  }

  /** Number of committed records. */
  get length(): number {
    return this.#records.length;
  }

  /** Frozen copy of the committed records. */
  snapshot(): readonly SpendRecord[] {
    return Object.freeze([...this.#records]);
  }
}

// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { z } from 'zod';
import {
  AccountantConfigSchema,
  SpendRecordSchema,
  SpendRequestSchema,
  type AccountantConfig,
  type SpendRecord,
} from './types.js';
import { ConfigurationError } from './errors.js';

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/**
 * Parse and validate accountant construction parameters, throwing
 * ConfigurationError on failure.
 */
export function parseAccountantConfig(raw: unknown): AccountantConfig {
  const result = AccountantConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse and validate a single spend request. `delta` defaults to 0.
 */
export function parseSpendRequest(raw: unknown): SpendRecord {
  const result = SpendRequestSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse and validate a record about to be committed to a ledger.
 */
export function parseSpendRecord(raw: unknown): SpendRecord {
  const result = SpendRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

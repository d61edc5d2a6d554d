// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { accountantScope, type PrivacyAccountant } from './accountant.js';

/**
 * Charge (ε, δ) to an accountant and return the accountant that was charged.
 *
 * Without an explicit `accountant` the innermost `run()` scope is used, then
 * the shared default, then a throwaway unconstrained accountant.
 *
 * @throws ConfigurationError for a malformed request.
 * @throws BudgetError when the resolved accountant cannot afford the spend.
 */
export function spend(epsilon: number, delta = 0, accountant?: PrivacyAccountant): PrivacyAccountant {
  return accountantScope.resolve(accountant).spend(epsilon, delta);
}

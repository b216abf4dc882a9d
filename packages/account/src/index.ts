/**
 * @tanglekit/account — Account state and balances.
 */

export { Account } from "./account.js";
export type { LockedAccount } from "./account.js";
export { AccountLock } from "./account-lock.js";
export { computeBalance, mergeBalances, emptyBalance, tokenAmount } from "./balance-calculator.js";
export { addU64, subU64, addU256, subU256, sumU64 } from "./amount-math.js";
export type {
  AccountAddress,
  AccountBalance,
  AccountOptions,
  Balance,
  OutputRecord,
  Reservation,
} from "./types.js";

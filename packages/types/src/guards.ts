/**
 * Runtime Type Guards
 *
 * Narrowing for caught errors.
 */

import { WalletError } from "./errors.js";
import type { WalletErrorCode } from "./errors.js";

/**
 * Check that an unknown error is a WalletError, optionally with a given code.
 */
export function isWalletError(err: unknown, code?: WalletErrorCode): err is WalletError {
  if (!(err instanceof WalletError)) return false;
  return code === undefined || err.code === code;
}

/**
 * Protocol Parameters
 *
 * Network-defined constants the client needs to construct outputs and
 * transactions. The minimum storage deposit is a pluggable function of the
 * output; when omitted the rent-structure formula is used.
 */

import type { Output, RentStructure } from "./output.js";

/** Computes the minimum base amount an output must hold. */
export type StorageDepositFn = (output: Output, rent: RentStructure) => bigint;

export interface ProtocolParameters {
  /** Network name; its hash prefix is the network id of every essence. */
  readonly networkName: string;

  /** Human-readable part of bech32 addresses (e.g. "rms", "smr"). */
  readonly bech32Hrp: string;

  /** Total base token supply; no amount may exceed it. */
  readonly tokenSupply: bigint;

  readonly rentStructure: RentStructure;

  /** Override for the minimum storage deposit formula. */
  readonly storageDeposit?: StorageDepositFn | undefined;
}

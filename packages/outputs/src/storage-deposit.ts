/**
 * Minimum storage deposit.
 *
 * Every output must hold enough base amount to pay for the ledger space it
 * occupies. The default formula weighs the serialized output as data bytes
 * and adds a fixed offset for the output id (key bytes) and the metadata the
 * node stores beside it (block id, milestone index, milestone timestamp):
 *
 *   deposit = vByteCost × (vByteFactorData × size + offset)
 *   offset  = vByteFactorKey × 34 + vByteFactorData × (32 + 4 + 4)
 *
 * The formula is protocol-defined; ProtocolParameters.storageDeposit replaces it.
 */

import { ADDRESS_TYPE, OUTPUT_TYPE, UNLOCK_CONDITION_TYPE } from "@tanglekit/types";
import type {
  Address,
  BasicOutput,
  Output,
  ProtocolParameters,
  RentStructure,
} from "@tanglekit/types";
import { serializeOutput } from "./serializer.js";

const OUTPUT_ID_LENGTH = 34;
const BLOCK_ID_LENGTH = 32;
const MILESTONE_INDEX_LENGTH = 4;
const MILESTONE_TIMESTAMP_LENGTH = 4;

export function storageDepositOffset(rent: RentStructure): number {
  return (
    rent.vByteFactorKey * OUTPUT_ID_LENGTH +
    rent.vByteFactorData * (BLOCK_ID_LENGTH + MILESTONE_INDEX_LENGTH + MILESTONE_TIMESTAMP_LENGTH)
  );
}

/** Default rent-structure formula. */
export function rentStructureDeposit(output: Output, rent: RentStructure): bigint {
  const size = serializeOutput(output).length;
  const vBytes = rent.vByteFactorData * size + storageDepositOffset(rent);
  return BigInt(rent.vByteCost) * BigInt(vBytes);
}

/** Minimum storage deposit of an output under the given protocol parameters. */
export function minimumStorageDeposit(output: Output, params: ProtocolParameters): bigint {
  const fn = params.storageDeposit ?? rentStructureDeposit;
  return fn(output, params.rentStructure);
}

/**
 * Deposit of the smallest possible output owned by an address: a basic
 * output with a single address unlock condition and nothing else.
 */
export function minimumBasicOutputDeposit(
  params: ProtocolParameters,
  owner: Address = { type: ADDRESS_TYPE.ED25519, pubKeyHash: `0x${"00".repeat(32)}` },
): bigint {
  const output: BasicOutput = {
    type: OUTPUT_TYPE.BASIC,
    amount: 0n,
    nativeTokens: [],
    unlockConditions: [{ type: UNLOCK_CONDITION_TYPE.ADDRESS, address: owner }],
    features: [],
  };
  return minimumStorageDeposit(output, params);
}

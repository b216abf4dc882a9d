/**
 * Shared test fixtures: protocol parameters, records, an unlocked session
 * and an in-process network client.
 */

import { vi } from "vitest";
import { ADDRESS_TYPE, OUTPUT_TYPE, UNLOCK_CONDITION_TYPE } from "@tanglekit/types";
import type {
  Bip44Chain,
  Ed25519Address,
  InclusionStatus,
  NativeToken,
  OutputId,
  OutputWithId,
  ProtocolParameters,
  SignedTransaction,
  SubmissionHandle,
} from "@tanglekit/types";
import { addressToBech32 } from "@tanglekit/codec";
import { addressUnlockCondition, buildBasicOutput } from "@tanglekit/outputs";
import type { AccountAddress, OutputRecord } from "@tanglekit/account";
import { InMemorySecretStoreBackend, SecretStore, SecureSigner } from "@tanglekit/signer";
import type { SignerSession } from "@tanglekit/signer";
import type { NetworkClient } from "../src/node-client.js";

export const PARAMS: ProtocolParameters = {
  networkName: "testnet",
  bech32Hrp: "rms",
  tokenSupply: 1_813_620_509_061_365n,
  rentStructure: { vByteCost: 100, vByteFactorData: 1, vByteFactorKey: 10 },
};

export const COIN = 4219;
export const SEED = new Uint8Array(64).map((_, i) => 255 - i);

export const FOREIGN: Ed25519Address = { type: ADDRESS_TYPE.ED25519, pubKeyHash: `0x${"11".repeat(32)}` };
export const RECIPIENT: Ed25519Address = { type: ADDRESS_TYPE.ED25519, pubKeyHash: `0x${"22".repeat(32)}` };

/** 32-byte transaction id derived from n, output index 0. */
export function outputId(n: number): OutputId {
  return `0x${n.toString(16).padStart(64, "0")}0000`;
}

export function handle(n: number): SubmissionHandle {
  const body = n.toString(16).padStart(64, "0");
  return { blockId: `0x${body}`, transactionId: `0x${body}` };
}

interface Owner {
  readonly address: Ed25519Address;
  readonly chain: Bip44Chain;
}

export function record(n: number, amount: bigint, owner: Owner, nativeTokens: readonly NativeToken[] = []): OutputRecord {
  return {
    outputId: outputId(n),
    output: {
      type: OUTPUT_TYPE.BASIC,
      amount,
      nativeTokens,
      unlockConditions: [{ type: UNLOCK_CONDITION_TYPE.ADDRESS, address: owner.address }],
      features: [],
    },
    address: owner.address,
    chain: owner.chain,
  };
}

export function toRecipient(amount: bigint, nativeTokens: readonly NativeToken[] = []) {
  return buildBasicOutput(PARAMS, {
    amount,
    nativeTokens,
    unlockConditions: [addressUnlockCondition(RECIPIENT)],
  });
}

export function foreignOwner(addressIndex = 7): Owner {
  return { address: FOREIGN, chain: { coinType: COIN, account: 0, change: 0, addressIndex } };
}

/** An unlocked session over SEED and its first `count` public addresses. */
export async function unlockSession(count = 2): Promise<{ session: SignerSession; addresses: AccountAddress[] }> {
  const store = await SecretStore.create(new InMemorySecretStoreBackend(), "test-secret", {
    seed: SEED,
    iterations: 1_000,
  });
  const session = await new SecureSigner(store).unlock("test-secret");
  const generated = await session.generateAddresses(COIN, 0, { start: 0, end: count });
  return {
    session,
    addresses: generated.map((g) => ({ ...g, bech32: addressToBech32(g.address, PARAMS.bech32Hrp) })),
  };
}

/** In-process NetworkClient; statuses are served in order, the last one repeating. */
export class FakeNetworkClient implements NetworkClient {
  readonly submitted: SignedTransaction[] = [];
  readonly submitTransaction = vi.fn(async (signed: SignedTransaction): Promise<SubmissionHandle> => {
    this.submitted.push(signed);
    return { blockId: `0x${"b".repeat(62)}${this.submitted.length.toString(16).padStart(2, "0")}`, transactionId: signed.transactionId };
  });

  private readonly _statuses: InclusionStatus[];
  readonly getStatus = vi.fn(async (_handle: SubmissionHandle): Promise<InclusionStatus> => {
    const next = this._statuses.length > 1 ? this._statuses.shift() : this._statuses[0];
    return next ?? { kind: "pending" };
  });

  readonly unspent = new Map<string, OutputWithId[]>();
  readonly fetchUnspentOutputs = vi.fn(async (bech32Address: string): Promise<OutputWithId[]> => {
    return this.unspent.get(bech32Address) ?? [];
  });

  constructor(statuses: readonly InclusionStatus[] = [{ kind: "pending" }]) {
    this._statuses = [...statuses];
  }
}

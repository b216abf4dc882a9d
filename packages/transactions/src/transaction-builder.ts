/**
 * @tanglekit/transactions — Transaction preparation and signing.
 *
 * prepareTransaction turns targets into a balanced essence without touching
 * keys or the network; signTransaction adds the unlocks.
 *
 * Rules:
 * - Inputs appear in output id order
 * - 1..128 inputs and 1..128 outputs
 * - Inputs and outputs carry equal base and native token totals
 * - One signature unlock per distinct address, at its first input;
 *   later inputs of the same address reference it
 */

import { IncompleteSignaturesError, UNLOCK_TYPE, WalletError } from "@tanglekit/types";
import type {
  BasicOutput,
  Output,
  OutputId,
  SignedTransaction,
  TransactionEssence,
  Unlock,
} from "@tanglekit/types";
import { computeBalance } from "@tanglekit/account";
import type { Balance, OutputRecord } from "@tanglekit/account";
import { signatureKey } from "@tanglekit/signer";
import type { RequiredAddress, SignerSession } from "@tanglekit/signer";
import { selectInputs } from "./input-selection.js";
import type { SelectionRequest } from "./input-selection.js";
import { createEssence, createPayload, essenceHash, serializeTransactionPayload, transactionIdOf } from "./essence.js";

export const MAX_INPUTS = 128;
export const MAX_OUTPUTS = 128;

export interface PreparedTransaction {
  readonly essence: TransactionEssence;
  readonly essenceHash: Uint8Array;
  /** Consumed outputs in essence input order. */
  readonly inputs: readonly OutputRecord[];
  readonly inputIds: readonly OutputId[];
  readonly remainder: BasicOutput | undefined;
}

function compareOutputIds(a: OutputRecord, b: OutputRecord): number {
  const x = a.outputId.toLowerCase();
  const y = b.outputId.toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
}

function checkCount(kind: "input" | "output", count: number, max: number): void {
  if (count < 1 || count > max) {
    throw new WalletError(
      "INVALID_TRANSACTION",
      `Transaction has ${String(count)} ${kind}s; allowed range is 1..${String(max)}`,
    );
  }
}

function balancesEqual(a: Balance, b: Balance): boolean {
  if (a.baseAmount !== b.baseAmount) return false;
  if (a.nativeTokens.size !== b.nativeTokens.size) return false;
  for (const [id, amount] of a.nativeTokens) {
    if (b.nativeTokens.get(id) !== amount) return false;
  }
  return true;
}

/**
 * @throws WalletError INVALID_TRANSACTION when inputs and outputs do not balance
 */
export function checkBalanced(consumed: readonly Output[], created: readonly Output[]): void {
  const inputs = computeBalance(consumed);
  const outputs = computeBalance(created);
  if (!balancesEqual(inputs, outputs)) {
    throw new WalletError(
      "INVALID_TRANSACTION",
      `Inputs (${inputs.baseAmount.toString()}) and outputs (${outputs.baseAmount.toString()}) do not balance`,
    );
  }
}

/**
 * Select inputs and assemble the essence for `targets`.
 *
 * @throws InsufficientFundsError when the candidates cannot cover the targets
 * @throws WalletError INVALID_TRANSACTION on count limits or an unbalanced result
 */
export function prepareTransaction(request: SelectionRequest): PreparedTransaction {
  const selection = selectInputs(request);
  const inputs = [...selection.inputs].sort(compareOutputIds);

  checkCount("input", inputs.length, MAX_INPUTS);
  checkCount("output", selection.outputs.length, MAX_OUTPUTS);
  checkBalanced(
    inputs.map((r) => r.output),
    selection.outputs,
  );

  const essence = createEssence(request.protocol.networkName, inputs, selection.outputs);
  return {
    essence,
    essenceHash: essenceHash(essence),
    inputs,
    inputIds: inputs.map((r) => r.outputId),
    remainder: selection.remainder,
  };
}

/** Distinct signing addresses of the inputs, in first-use order. */
export function requiredSigners(inputs: readonly OutputRecord[]): RequiredAddress[] {
  const seen = new Set<string>();
  const required: RequiredAddress[] = [];
  for (const { address, chain } of inputs) {
    const key = signatureKey(address);
    if (seen.has(key)) continue;
    seen.add(key);
    required.push({ address, chain });
  }
  return required;
}

/**
 * Sign a prepared transaction.
 *
 * @throws IncompleteSignaturesError when the session produced no signature for some input address
 * @throws WalletError SIGNER_LOCKED when the session was released
 */
export async function signTransaction(
  prepared: PreparedTransaction,
  session: SignerSession,
): Promise<SignedTransaction> {
  const signatures = await session.sign(prepared.essenceHash, requiredSigners(prepared.inputs));

  const unlocks: Unlock[] = [];
  const signedAt = new Map<string, number>();
  const missing: string[] = [];

  prepared.inputs.forEach((input, index) => {
    const key = signatureKey(input.address);
    const reference = signedAt.get(key);
    if (reference !== undefined) {
      unlocks.push({ type: UNLOCK_TYPE.REFERENCE, reference });
      return;
    }
    const signature = signatures.get(key);
    if (signature === undefined) {
      if (!missing.includes(key)) missing.push(key);
      return;
    }
    signedAt.set(key, index);
    unlocks.push({ type: UNLOCK_TYPE.SIGNATURE, signature });
  });

  if (missing.length > 0) {
    throw new IncompleteSignaturesError(missing);
  }

  const payload = createPayload(prepared.essence, unlocks);
  const bytes = serializeTransactionPayload(payload);
  return {
    payload,
    bytes,
    transactionId: transactionIdOf(bytes),
    inputIds: prepared.inputIds,
  };
}

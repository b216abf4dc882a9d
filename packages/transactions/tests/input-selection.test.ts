/**
 * Tests for input selection and remainder handling.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ADDRESS_TYPE, InsufficientFundsError, OUTPUT_TYPE, UNLOCK_CONDITION_TYPE, isWalletError } from "@tanglekit/types";
import type { Ed25519Address } from "@tanglekit/types";
import { buildFoundryId } from "@tanglekit/codec";
import type { OutputRecord } from "@tanglekit/account";
import { isSelectable, selectInputs } from "../src/input-selection.js";
import type { SelectionRequest } from "../src/input-selection.js";
import { PARAMS, RECIPIENT, foreignOwner, outputId, record, toRecipient } from "./fixtures.js";

const OWNER = foreignOwner(0);
const REMAINDER: Ed25519Address = { type: ADDRESS_TYPE.ED25519, pubKeyHash: `0x${"33".repeat(32)}` };
const TOKEN = buildFoundryId(`0x${"2a".repeat(32)}`, 1);

function request(candidates: readonly OutputRecord[], targets: SelectionRequest["targets"]): SelectionRequest {
  return { candidates, targets, protocol: PARAMS, remainderAddress: REMAINDER };
}

function ids(records: readonly OutputRecord[]): string[] {
  return records.map((r) => r.outputId);
}

const THREE = [record(1, 100_000n, OWNER), record(2, 200_000n, OWNER), record(3, 300_000n, OWNER)];

describe("isSelectable", () => {
  it("accepts a plain basic output of the record's address", () => {
    expect(isSelectable(record(1, 100_000n, OWNER))).toBe(true);
  });

  it("rejects outputs with blocking conditions, other kinds, or another owner", () => {
    const base = record(1, 100_000n, OWNER);
    const timelocked: OutputRecord = {
      ...base,
      output: {
        ...base.output,
        unlockConditions: [...base.output.unlockConditions, { type: UNLOCK_CONDITION_TYPE.TIMELOCK, unixTime: 1 }],
      },
    };
    const nft: OutputRecord = {
      ...base,
      output: {
        type: OUTPUT_TYPE.NFT,
        amount: 100_000n,
        nativeTokens: [],
        nftId: `0x${"44".repeat(32)}`,
        unlockConditions: base.output.unlockConditions,
        features: [],
        immutableFeatures: [],
      },
    };
    const someoneElse: OutputRecord = { ...base, address: RECIPIENT };

    expect(isSelectable(timelocked)).toBe(false);
    expect(isSelectable(nft)).toBe(false);
    expect(isSelectable(someoneElse)).toBe(false);
  });
});

describe("selectInputs — base amount", () => {
  it("takes the largest output first and returns change", () => {
    const selection = selectInputs(request(THREE, [toRecipient(250_000n)]));

    expect(ids(selection.inputs)).toEqual([outputId(3)]);
    expect(selection.remainder?.amount).toBe(50_000n);
    expect(selection.remainder?.unlockConditions).toEqual([{ type: UNLOCK_CONDITION_TYPE.ADDRESS, address: REMAINDER }]);
    expect(selection.outputs).toHaveLength(2);
  });

  it("adds several inputs until covered", () => {
    const selection = selectInputs(request(THREE, [toRecipient(450_000n)]));
    expect(ids(selection.inputs)).toEqual([outputId(3), outputId(2)]);
    expect(selection.remainder?.amount).toBe(50_000n);
  });

  it("emits no change on an exact match", () => {
    const selection = selectInputs(request(THREE, [toRecipient(300_000n)]));
    expect(selection.remainder).toBeUndefined();
    expect(selection.outputs.map((o) => o.amount)).toEqual([300_000n]);
  });

  it("folds a surplus below the minimum deposit into the first target", () => {
    const selection = selectInputs(request(THREE, [toRecipient(280_000n), toRecipient(50_000n)]));

    expect(ids(selection.inputs)).toEqual([outputId(3), outputId(2)]);
    // 500000 - 330000 = 170000 is enough for change
    expect(selection.remainder?.amount).toBe(170_000n);

    const folded = selectInputs(request(THREE, [toRecipient(280_000n)]));
    expect(folded.remainder).toBeUndefined();
    expect(folded.outputs.map((o) => o.amount)).toEqual([300_000n]);
  });

  it("breaks amount ties by output id", () => {
    const tied = [record(9, 100_000n, OWNER), record(4, 100_000n, OWNER)];
    expect(ids(selectInputs(request(tied, [toRecipient(100_000n)])).inputs)).toEqual([outputId(4)]);
  });

  it("reports insufficient base funds", () => {
    try {
      selectInputs(request(THREE, [toRecipient(700_000n)]));
      expect.fail("expected insufficient funds");
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(InsufficientFundsError);
      if (!(err instanceof InsufficientFundsError)) return;
      expect(err.asset).toBe("base");
      expect(err.required).toBe(700_000n);
      expect(err.available).toBe(600_000n);
    }
  });

  it("ignores outputs that cannot be selected", () => {
    const base = record(5, 900_000n, OWNER);
    const locked: OutputRecord = {
      ...base,
      output: {
        ...base.output,
        unlockConditions: [...base.output.unlockConditions, { type: UNLOCK_CONDITION_TYPE.TIMELOCK, unixTime: 1 }],
      },
    };
    expect(() => selectInputs(request([locked], [toRecipient(100_000n)]))).toThrow(InsufficientFundsError);
  });

  it("requires at least one target", () => {
    try {
      selectInputs(request(THREE, []));
      expect.fail("expected an invalid transaction");
    } catch (err: unknown) {
      expect(isWalletError(err, "INVALID_TRANSACTION")).toBe(true);
    }
  });
});

describe("selectInputs — native tokens", () => {
  const holder = record(1, 100_000n, OWNER, [{ id: TOKEN, amount: 50n }]);
  const candidates = [holder, record(2, 200_000n, OWNER), record(3, 150_000n, OWNER)];

  it("covers tokens first and sends leftover tokens to change", () => {
    const selection = selectInputs(request(candidates, [toRecipient(60_000n, [{ id: TOKEN, amount: 30n }])]));

    // The change output needs 49600 for one native token, so the holder alone
    // (100000 < 60000 + 49600) is not enough and the largest other input joins.
    expect(ids(selection.inputs)).toEqual([outputId(1), outputId(2)]);
    expect(selection.remainder?.amount).toBe(240_000n);
    expect(selection.remainder?.nativeTokens).toEqual([{ id: TOKEN, amount: 20n }]);
  });

  it("needs no change when every token is spent", () => {
    const selection = selectInputs(request(candidates, [toRecipient(100_000n, [{ id: TOKEN, amount: 50n }])]));
    expect(ids(selection.inputs)).toEqual([outputId(1)]);
    expect(selection.remainder).toBeUndefined();
  });

  it("reports a missing token amount", () => {
    try {
      selectInputs(request(candidates, [toRecipient(60_000n, [{ id: TOKEN, amount: 100n }])]));
      expect.fail("expected insufficient funds");
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(InsufficientFundsError);
      if (!(err instanceof InsufficientFundsError)) return;
      expect(err.asset).toBe(TOKEN);
      expect(err.required).toBe(100n);
      expect(err.available).toBe(50n);
    }
  });

  it("counts the change deposit in the base requirement", () => {
    try {
      selectInputs(request([holder], [toRecipient(60_000n, [{ id: TOKEN, amount: 30n }])]));
      expect.fail("expected insufficient funds");
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(InsufficientFundsError);
      if (!(err instanceof InsufficientFundsError)) return;
      expect(err.asset).toBe("base");
      expect(err.required).toBe(109_600n);
      expect(err.available).toBe(100_000n);
    }
  });
});

describe("selectInputs — determinism", () => {
  const pool = [
    record(1, 100_000n, OWNER),
    record(2, 100_000n, OWNER),
    record(3, 250_000n, OWNER),
    record(4, 75_000n, OWNER),
    record(5, 250_000n, OWNER),
    record(6, 60_000n, OWNER),
  ];

  it("selects the same inputs for any candidate order", () => {
    const expected = ids(selectInputs(request(pool, [toRecipient(520_000n)])).inputs);
    expect(expected).toEqual([outputId(3), outputId(5), outputId(1)]);

    fc.assert(
      fc.property(fc.shuffledSubarray(pool, { minLength: pool.length }), (shuffled) => {
        expect(ids(selectInputs(request(shuffled, [toRecipient(520_000n)])).inputs)).toEqual(expected);
      }),
    );
  });
});

/**
 * @tanglekit/account — Account state.
 *
 * One Account per wallet account: its addresses, the unspent outputs the
 * node reported for them, and the marks that keep in-flight inputs from
 * being selected twice.
 *
 * Rules:
 * - Every mutation runs under the account's own lock (withLock)
 * - An output is in at most one of: spendable, reserved, pending
 * - Reads return snapshots; callers never see later mutations
 * - Distinct accounts share nothing
 */

import { WalletError, addressKey } from "@tanglekit/types";
import type { Address, OutputId, ProtocolParameters, SubmissionHandle } from "@tanglekit/types";
import { minimumStorageDeposit } from "@tanglekit/outputs";
import type {
  AccountAddress,
  AccountBalance,
  AccountOptions,
  OutputRecord,
  Reservation,
} from "./types.js";
import { AccountLock } from "./account-lock.js";
import { computeBalance } from "./balance-calculator.js";
import { sumU64 } from "./amount-math.js";

/**
 * Mutation handle passed to a withLock section. It stops working once the
 * section ends.
 */
export interface LockedAccount {
  spendable(): readonly OutputRecord[];
  reserve(outputIds: readonly OutputId[]): Reservation;
  release(reservation: Reservation): void;
  markPending(reservation: Reservation, handle: SubmissionHandle): void;
  applySync(records: readonly OutputRecord[]): void;
  settleConfirmed(handle: SubmissionHandle): readonly OutputId[];
  settleConflicting(handle: SubmissionHandle): readonly OutputId[];
}

export class Account {
  readonly alias: string;
  readonly index: number;
  readonly coinType: number;
  readonly protocol: ProtocolParameters;

  private readonly _lock = new AccountLock();
  private readonly _addresses: AccountAddress[] = [];
  private readonly _remainder: AccountAddress | undefined;

  private _unspent = new Map<OutputId, OutputRecord>();
  /** output id → reservation id */
  private readonly _reserved = new Map<OutputId, number>();
  /** output id → transaction id */
  private readonly _pending = new Map<OutputId, string>();
  /** transaction id → handle and its inputs */
  private readonly _inFlight = new Map<string, { handle: SubmissionHandle; outputIds: OutputId[] }>();
  private _nextReservation = 1;

  constructor(options: AccountOptions) {
    this.alias = options.alias;
    this.index = options.index;
    this.coinType = options.coinType;
    this.protocol = options.protocol;
    this._remainder = options.remainderAddress;
    this.addAddresses(options.addresses ?? []);
  }

  // ─── Addresses ──────────────────────────────────────────────────────

  addresses(): readonly AccountAddress[] {
    return [...this._addresses];
  }

  publicAddresses(): readonly AccountAddress[] {
    return this._addresses.filter((a) => !a.internal);
  }

  addAddresses(addresses: readonly AccountAddress[]): void {
    for (const addr of addresses) {
      if (this.findAddress(addr.address) === undefined) this._addresses.push(addr);
    }
  }

  findAddress(address: Address): AccountAddress | undefined {
    const key = addressKey(address);
    return this._addresses.find((a) => addressKey(a.address) === key);
  }

  /**
   * Where change goes: the configured remainder address, else the first
   * public address.
   *
   * @throws WalletError UNKNOWN_ACCOUNT when the account has no addresses
   */
  remainderAddress(): AccountAddress {
    const remainder = this._remainder ?? this.publicAddresses()[0] ?? this._addresses[0];
    if (remainder === undefined) {
      throw new WalletError("UNKNOWN_ACCOUNT", `Account "${this.alias}" has no addresses`);
    }
    return remainder;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  /** Unspent outputs in output id order. */
  unspent(): readonly OutputRecord[] {
    return [...this._unspent.values()].sort((a, b) => (a.outputId < b.outputId ? -1 : a.outputId > b.outputId ? 1 : 0));
  }

  /** Unspent outputs neither reserved nor pending. */
  spendable(): readonly OutputRecord[] {
    return this.unspent().filter((r) => !this._reserved.has(r.outputId) && !this._pending.has(r.outputId));
  }

  isPending(outputId: OutputId): boolean {
    return this._pending.has(outputId);
  }

  isReserved(outputId: OutputId): boolean {
    return this._reserved.has(outputId);
  }

  /** Submissions whose inputs are still marked pending. */
  pendingTransactions(): readonly SubmissionHandle[] {
    return [...this._inFlight.values()].map((entry) => entry.handle);
  }

  balance(): AccountBalance {
    const unspent = this.unspent();
    const spendable = this.spendable();
    return {
      total: computeBalance(unspent.map((r) => r.output)),
      available: computeBalance(spendable.map((r) => r.output)),
      requiredStorageDeposit: sumU64(unspent.map((r) => minimumStorageDeposit(r.output, this.protocol))),
      pendingOutputs: this._pending.size,
    };
  }

  // ─── Locked mutations ───────────────────────────────────────────────

  /** Run a critical section with exclusive access to this account's state. */
  async withLock<T>(fn: (locked: LockedAccount) => Promise<T> | T): Promise<T> {
    return this._lock.runExclusive(async () => {
      let active = true;
      const guard = <A extends unknown[], R>(op: (...args: A) => R) => {
        return (...args: A): R => {
          if (!active) throw new Error(`Account "${this.alias}" lock handle used after its section ended`);
          return op(...args);
        };
      };
      const locked: LockedAccount = {
        spendable: guard(() => this.spendable()),
        reserve: guard((ids: readonly OutputId[]) => this.doReserve(ids)),
        release: guard((r: Reservation) => this.doRelease(r)),
        markPending: guard((r: Reservation, h: SubmissionHandle) => this.doMarkPending(r, h)),
        applySync: guard((records: readonly OutputRecord[]) => this.doApplySync(records)),
        settleConfirmed: guard((h: SubmissionHandle) => this.doSettleConfirmed(h)),
        settleConflicting: guard((h: SubmissionHandle) => this.doSettleConflicting(h)),
      };
      try {
        return await fn(locked);
      } finally {
        active = false;
      }
    });
  }

  get isLocked(): boolean {
    return this._lock.isLocked;
  }

  applySync(records: readonly OutputRecord[]): Promise<void> {
    return this.withLock((l) => l.applySync(records));
  }

  reserve(outputIds: readonly OutputId[]): Promise<Reservation> {
    return this.withLock((l) => l.reserve(outputIds));
  }

  release(reservation: Reservation): Promise<void> {
    return this.withLock((l) => l.release(reservation));
  }

  markPending(reservation: Reservation, handle: SubmissionHandle): Promise<void> {
    return this.withLock((l) => l.markPending(reservation, handle));
  }

  settleConfirmed(handle: SubmissionHandle): Promise<readonly OutputId[]> {
    return this.withLock((l) => l.settleConfirmed(handle));
  }

  settleConflicting(handle: SubmissionHandle): Promise<readonly OutputId[]> {
    return this.withLock((l) => l.settleConflicting(handle));
  }

  // ─── Mutation bodies (lock held) ────────────────────────────────────

  private doReserve(outputIds: readonly OutputId[]): Reservation {
    for (const id of outputIds) {
      if (!this._unspent.has(id)) {
        throw new WalletError("INVALID_TRANSACTION", `Output ${id} is not unspent in account "${this.alias}"`);
      }
      if (this._reserved.has(id) || this._pending.has(id)) {
        throw new WalletError("INVALID_TRANSACTION", `Output ${id} is already reserved or pending`);
      }
    }
    const reservation: Reservation = { id: this._nextReservation++, outputIds: [...outputIds] };
    for (const id of outputIds) this._reserved.set(id, reservation.id);
    return reservation;
  }

  private doRelease(reservation: Reservation): void {
    for (const id of reservation.outputIds) {
      if (this._reserved.get(id) === reservation.id) this._reserved.delete(id);
    }
  }

  private doMarkPending(reservation: Reservation, handle: SubmissionHandle): void {
    const outputIds: OutputId[] = [];
    for (const id of reservation.outputIds) {
      if (this._reserved.get(id) !== reservation.id) continue;
      this._reserved.delete(id);
      this._pending.set(id, handle.transactionId);
      outputIds.push(id);
    }
    this._inFlight.set(handle.transactionId, { handle, outputIds });
  }

  private doApplySync(records: readonly OutputRecord[]): void {
    this._unspent = new Map(records.map((r) => [r.outputId, r]));

    for (const id of [...this._reserved.keys()]) {
      if (!this._unspent.has(id)) this._reserved.delete(id);
    }
    for (const [id, txId] of [...this._pending.entries()]) {
      if (this._unspent.has(id)) continue;
      this._pending.delete(id);
      const entry = this._inFlight.get(txId);
      if (entry === undefined) continue;
      const remaining = entry.outputIds.filter((o) => o !== id);
      if (remaining.length === 0) {
        this._inFlight.delete(txId);
      } else {
        this._inFlight.set(txId, { handle: entry.handle, outputIds: remaining });
      }
    }
  }

  private takeInFlight(handle: SubmissionHandle): OutputId[] {
    const entry = this._inFlight.get(handle.transactionId);
    if (entry === undefined) return [];
    this._inFlight.delete(handle.transactionId);
    for (const id of entry.outputIds) this._pending.delete(id);
    return entry.outputIds;
  }

  private doSettleConfirmed(handle: SubmissionHandle): readonly OutputId[] {
    const spent = this.takeInFlight(handle);
    for (const id of spent) this._unspent.delete(id);
    return spent;
  }

  private doSettleConflicting(handle: SubmissionHandle): readonly OutputId[] {
    return this.takeInFlight(handle);
  }
}

/**
 * @tanglekit/wallet — Wallet facade.
 *
 * Owns the accounts of one seed and wires them to a node client: derive
 * addresses, sync unspent outputs, build and send outputs, and wait for
 * inclusion.
 *
 * Rules:
 * - Account aliases are unique; indexes are assigned in creation order,
 *   one account creation at a time
 * - The wallet never holds a signer session; callers pass one per call
 * - Logged fields are aliases, ids and counts, never key material
 */

import { NOOP_LOGGER, WalletError } from "@tanglekit/types";
import type {
  BasicOutput,
  InclusionReference,
  Logger,
  Output,
  ProtocolParameters,
  SubmissionHandle,
} from "@tanglekit/types";
import { addressToBech32, bech32ToAddress } from "@tanglekit/codec";
import { Account, AccountLock } from "@tanglekit/account";
import type { AccountAddress, AccountBalance, OutputRecord } from "@tanglekit/account";
import { addressUnlockCondition, buildBasicOutput, buildOutput } from "@tanglekit/outputs";
import type { BasicOutputSpec, OutputSpec } from "@tanglekit/outputs";
import { FileSecretStoreBackend, SecretStore, SecureSigner } from "@tanglekit/signer";
import type { SignerSession } from "@tanglekit/signer";
import { DEFAULT_RETRY_CONFIG, HttpNodeClient, awaitInclusion, buildAndSubmit } from "@tanglekit/transactions";
import type { InclusionPollOptions, NetworkClient, RetryConfig } from "@tanglekit/transactions";
import type { WalletConfig } from "./config.js";
import { protocolParametersFromConfig } from "./config.js";
import { createLogger } from "./logger.js";

export const DEFAULT_COIN_TYPE = 4219;

export interface WalletOptions {
  readonly protocol: ProtocolParameters;
  readonly client: NetworkClient;
  /** Default: 4219 */
  readonly coinType?: number;
  readonly logger?: Logger;
  /** Retry transient submission failures. Omitted: one attempt. */
  readonly submitRetry?: RetryConfig;
  /** Defaults for retryTransactionUntilIncluded. */
  readonly confirmation?: InclusionPollOptions;
}

export interface CreateAccountOptions {
  /** Public addresses to derive. Default: 1 */
  readonly addressCount?: number;
  /** Send change to a derived internal address instead of the first public one. */
  readonly internalRemainder?: boolean;
}

export interface AmountRecipient {
  /** Bech32 address. */
  readonly address: string;
  readonly amount: bigint;
}

export class Wallet {
  readonly protocol: ProtocolParameters;
  readonly coinType: number;

  private readonly _client: NetworkClient;
  private readonly _logger: Logger;
  private readonly _submitRetry: RetryConfig | undefined;
  private readonly _confirmation: InclusionPollOptions;
  private readonly _accounts = new Map<string, Account>();
  private readonly _createLock = new AccountLock();

  constructor(options: WalletOptions) {
    this.protocol = options.protocol;
    this.coinType = options.coinType ?? DEFAULT_COIN_TYPE;
    this._client = options.client;
    this._logger = options.logger ?? NOOP_LOGGER;
    this._submitRetry = options.submitRetry;
    this._confirmation = options.confirmation ?? {};
  }

  /**
   * Wallet over HttpNodeClient with parameters, retry and polling taken from
   * config. Without an injected logger, pino is built from LOG_LEVEL and
   * pretty-prints in development.
   */
  static fromConfig(config: WalletConfig, overrides: { client?: NetworkClient; logger?: Logger } = {}): Wallet {
    const logger =
      overrides.logger ?? createLogger({ level: config.LOG_LEVEL, pretty: config.NODE_ENV === "development" });
    return new Wallet({
      protocol: protocolParametersFromConfig(config),
      client:
        overrides.client ??
        new HttpNodeClient({ baseUrl: config.NODE_URL, timeoutMs: config.REQUEST_TIMEOUT_MS, logger }),
      coinType: config.COIN_TYPE,
      logger,
      submitRetry: { ...DEFAULT_RETRY_CONFIG, maxAttempts: config.SUBMIT_MAX_ATTEMPTS },
      confirmation: {
        intervalMs: config.CONFIRM_INTERVAL_MS,
        maxAttempts: config.CONFIRM_MAX_ATTEMPTS,
        maxWaitMs: config.CONFIRM_MAX_WAIT_MS,
      },
    });
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  async createAccount(alias: string, session: SignerSession, options: CreateAccountOptions = {}): Promise<Account> {
    const addressCount = options.addressCount ?? 1;
    if (!Number.isInteger(addressCount) || addressCount < 1) {
      throw new RangeError(`addressCount must be a positive integer, got ${String(addressCount)}`);
    }
    // The alias check, index and registration must see one consistent map.
    return this._createLock.runExclusive(() => this.doCreateAccount(alias, session, addressCount, options));
  }

  private async doCreateAccount(
    alias: string,
    session: SignerSession,
    addressCount: number,
    options: CreateAccountOptions,
  ): Promise<Account> {
    if (this._accounts.has(alias)) {
      throw new Error(`Account "${alias}" already exists`);
    }

    const index = this._accounts.size;
    const addresses = await this.deriveAddresses(session, index, addressCount, false);
    const [remainderAddress] =
      options.internalRemainder === true ? await this.deriveAddresses(session, index, 1, true) : [];

    const account = new Account({
      alias,
      index,
      coinType: this.coinType,
      protocol: this.protocol,
      addresses: remainderAddress !== undefined ? [...addresses, remainderAddress] : addresses,
      remainderAddress,
    });
    this._accounts.set(alias, account);
    this._logger.info({ account: alias, index, addresses: addresses.length }, "Account created");
    return account;
  }

  private async deriveAddresses(
    session: SignerSession,
    index: number,
    count: number,
    internal: boolean,
  ): Promise<AccountAddress[]> {
    const generated = await session.generateAddresses(this.coinType, index, { start: 0, end: count }, internal);
    return generated.map((g) => ({
      address: g.address,
      bech32: addressToBech32(g.address, this.protocol.bech32Hrp),
      chain: g.chain,
      internal: g.internal,
    }));
  }

  /** @throws WalletError UNKNOWN_ACCOUNT */
  getAccount(alias: string): Account {
    const account = this._accounts.get(alias);
    if (account === undefined) {
      throw new WalletError("UNKNOWN_ACCOUNT", `No account with alias "${alias}"`);
    }
    return account;
  }

  accounts(): readonly Account[] {
    return [...this._accounts.values()];
  }

  /** Replace the account's unspent set with what the node reports for its addresses. */
  async sync(alias: string): Promise<AccountBalance> {
    const account = this.getAccount(alias);
    const records = new Map<string, OutputRecord>();

    for (const { address, bech32, chain } of account.addresses()) {
      for (const { outputId, output } of await this._client.fetchUnspentOutputs(bech32)) {
        if (!records.has(outputId)) records.set(outputId, { outputId, output, address, chain });
      }
    }

    await account.applySync([...records.values()]);
    const balance = account.balance();
    this._logger.info(
      { account: alias, outputs: records.size, pendingOutputs: balance.pendingOutputs },
      "Account synced",
    );
    return balance;
  }

  getBalance(alias: string): AccountBalance {
    return this.getAccount(alias).balance();
  }

  // ─── Outputs ────────────────────────────────────────────────────────

  buildBasicOutput(spec: Omit<BasicOutputSpec, "type">): BasicOutput {
    return buildBasicOutput(this.protocol, spec);
  }

  buildOutput(spec: OutputSpec): Output {
    return buildOutput(this.protocol, spec);
  }

  // ─── Send & confirm ─────────────────────────────────────────────────

  async sendOutputs(alias: string, outputs: readonly Output[], session: SignerSession): Promise<SubmissionHandle> {
    return buildAndSubmit(this.getAccount(alias), outputs, session, {
      client: this._client,
      logger: this._logger,
      retry: this._submitRetry,
    });
  }

  /** Send base amounts to bech32 addresses, one basic output each. */
  async sendAmount(alias: string, recipients: readonly AmountRecipient[], session: SignerSession): Promise<SubmissionHandle> {
    const outputs = recipients.map((r) =>
      this.buildBasicOutput({
        amount: r.amount,
        unlockConditions: [addressUnlockCondition(bech32ToAddress(r.address).address)],
      }),
    );
    return this.sendOutputs(alias, outputs, session);
  }

  /**
   * Poll until the transaction is decided and settle the account.
   *
   * @throws WalletError CONFLICTING_TRANSACTION, TIMEOUT or CANCELLED
   */
  async retryTransactionUntilIncluded(
    alias: string,
    handle: SubmissionHandle,
    options: InclusionPollOptions = {},
  ): Promise<InclusionReference> {
    const account = this.getAccount(alias);
    return awaitInclusion(account, handle, this._client, {
      ...this._confirmation,
      ...options,
      logger: options.logger ?? this._logger.child({ account: alias }),
    });
  }
}

/**
 * Open the on-disk secret store named by config.
 *
 * @throws WalletError STORE_NOT_FOUND when there is no store at SECRET_STORE_PATH
 */
export function openSigner(config: WalletConfig): SecureSigner {
  return new SecureSigner(SecretStore.open(new FileSecretStoreBackend(config.SECRET_STORE_PATH)));
}

/** Create the on-disk secret store named by config, with its KDF work factor. */
export async function createSigner(config: WalletConfig, passphrase: string, seed?: Uint8Array): Promise<SecureSigner> {
  const backend = new FileSecretStoreBackend(config.SECRET_STORE_PATH);
  const store = await SecretStore.create(backend, passphrase, { seed, iterations: config.KDF_ITERATIONS });
  return new SecureSigner(store);
}

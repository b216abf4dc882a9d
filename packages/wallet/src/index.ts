/**
 * @tanglekit/wallet — Wallet facade, configuration and logging.
 */

export { Wallet, DEFAULT_COIN_TYPE, openSigner, createSigner } from "./wallet.js";
export type { WalletOptions, CreateAccountOptions, AmountRecipient } from "./wallet.js";

export { ConfigSchema, loadConfig, protocolParametersFromConfig } from "./config.js";
export type { WalletConfig } from "./config.js";

export { createLogger, REDACTED_PATHS } from "./logger.js";
export type { LoggerOptions } from "./logger.js";

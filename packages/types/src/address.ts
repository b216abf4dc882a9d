/**
 * Address Types
 *
 * Ledger identities. Every variant carries a 32-byte body; the `type`
 * discriminant is also the kind byte of the binary form.
 *
 * Rules:
 * - Bodies are 0x-prefixed lowercase hex (see @tanglekit/codec)
 * - Addresses are immutable values, compared by kind + body
 */

/** 0x-prefixed, lowercase hex string. */
export type HexString = string;

/** Kind bytes of the address variants. */
export const ADDRESS_TYPE = {
  ED25519: 0,
  ALIAS: 8,
  NFT: 16,
} as const;

export type AddressType = (typeof ADDRESS_TYPE)[keyof typeof ADDRESS_TYPE];

/** Address derived from an Ed25519 public key (BLAKE2b-256 of the key). */
export interface Ed25519Address {
  readonly type: typeof ADDRESS_TYPE.ED25519;
  readonly pubKeyHash: HexString;
}

/** Address of an alias (account) output. */
export interface AliasAddress {
  readonly type: typeof ADDRESS_TYPE.ALIAS;
  readonly aliasId: HexString;
}

/** Address of an NFT output. */
export interface NftAddress {
  readonly type: typeof ADDRESS_TYPE.NFT;
  readonly nftId: HexString;
}

export type Address = Ed25519Address | AliasAddress | NftAddress;

/**
 * Hardened BIP-44 derivation chain of an account address:
 * m/44'/coinType'/account'/change'/addressIndex'
 */
export interface Bip44Chain {
  readonly coinType: number;
  readonly account: number;
  readonly change: number;
  readonly addressIndex: number;
}

/** The 32-byte body of any address variant. */
export function addressBody(address: Address): HexString {
  switch (address.type) {
    case ADDRESS_TYPE.ED25519:
      return address.pubKeyHash;
    case ADDRESS_TYPE.ALIAS:
      return address.aliasId;
    case ADDRESS_TYPE.NFT:
      return address.nftId;
  }
}

/** Stable map key for an address: "<kind>:<body>". */
export function addressKey(address: Address): string {
  return `${address.type}:${addressBody(address).toLowerCase()}`;
}

export function addressesEqual(a: Address, b: Address): boolean {
  return addressKey(a) === addressKey(b);
}

/**
 * Address Types
 *
 * Accounts are identified by hex addresses: "0x" followed by 1–64 hex
 * digits. Comparison is always done on the lower-cased form.
 */

/**
 * An account address (e.g., "0xa11ce", "0x00000000000000000000000000000001").
 */
export type Address = string;

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{1,64}$/;

/**
 * Whether a value is a well-formed address. The null address counts as
 * well-formed; use `isNullAddress` to reject it.
 */
export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Whether an address is the null address ("0x0", "0x000…0").
 */
export function isNullAddress(address: Address): boolean {
  return /^0x0+$/.test(address);
}

/**
 * Lower-case an address so that "0xABC" and "0xabc" name the same account.
 */
export function normalizeAddress(address: Address): Address {
  return address.toLowerCase();
}

/**
 * Compare two addresses, ignoring hex digit case.
 */
export function sameAddress(a: Address, b: Address): boolean {
  return normalizeAddress(a) === normalizeAddress(b);
}

/**
 * Starknet address validation.
 * An address is a field element: "0x" + 1..64 hex chars.
 */

const STARKNET_ADDRESS_RE = /^0x[0-9a-fA-F]{1,64}$/;

export type AddressCheck =
  | { ok: true; address: string }
  | { ok: false; reason: string };

/**
 * Validate and normalise an address to the canonical 66-char,
 * lowercase, zero-padded form.
 */
export function validateStarknetAddress(raw: string): AddressCheck {
  const address = raw.trim();
  if (address.length === 0) {
    return { ok: false, reason: "address cannot be empty" };
  }
  if (!address.startsWith("0x")) {
    return { ok: false, reason: "address must start with 0x" };
  }
  if (!STARKNET_ADDRESS_RE.test(address)) {
    return { ok: false, reason: "invalid Starknet address format" };
  }
  return { ok: true, address: normalizeStarknetAddress(address) };
}

/** Pad to 0x + 64 lowercase hex chars. Input must already be valid. */
export function normalizeStarknetAddress(address: string): string {
  return "0x" + address.slice(2).toLowerCase().padStart(64, "0");
}

import { hash, num, type BigNumberish } from "starknet";

// P = 2^251 + 17 * 2^192 + 1
export const FIELD_PRIME = 2n ** 251n + 17n * 2n ** 192n + 1n;

// Contract addresses must stay below 2^251 - 256
export const ADDRESS_BOUND = 2n ** 251n - 256n;

export const MAX_U64 = 2n ** 64n - 1n;
export const MAX_U128 = 2n ** 128n - 1n;

const CAIRO_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const DECIMAL = /^[0-9]+$/;

/**
 * Raised by the parsers in this module when a user supplied value cannot be
 * turned into a field element. Callers convert it into a validation error.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

function decode(value: BigNumberish, label: string): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidInputError(`${label} is not an integer: ${value}`);
    }
    return BigInt(value);
  }
  const trimmed = value.trim();
  if ((num.isHex(trimmed) && trimmed.length > 2) || DECIMAL.test(trimmed)) {
    return num.toBigInt(trimmed);
  }
  throw new InvalidInputError(
    `${label} is not a valid field element: ${value}`,
  );
}

// Parse a BigNumberish into a field element, rejecting anything outside [0, P)
export function parseFelt(value: BigNumberish, label: string): bigint {
  const felt = decode(value, label);
  if (felt < 0n || felt >= FIELD_PRIME) {
    throw new InvalidInputError(
      `${label} is out of the field element range: ${value}`,
    );
  }
  return felt;
}

export function parseContractAddress(
  value: BigNumberish,
  label = "Contract address",
): bigint {
  const felt = parseFelt(value, label);
  if (felt === 0n) {
    throw new InvalidInputError(`${label} must not be zero`);
  }
  if (felt >= ADDRESS_BOUND) {
    throw new InvalidInputError(
      `${label} is not a valid contract address: ${value}`,
    );
  }
  return felt;
}

/**
 * Resolve an entry point to its selector. Hex values are taken as selectors,
 * Cairo identifiers are hashed with the Starknet keccak.
 */
export function resolveSelector(entryPoint: string): bigint {
  const trimmed = entryPoint.trim();
  if (num.isHex(trimmed)) {
    return parseFelt(trimmed, "Entry point selector");
  }
  if (CAIRO_IDENTIFIER.test(trimmed)) {
    return num.toBigInt(hash.getSelectorFromName(trimmed));
  }
  throw new InvalidInputError(
    `Entry point "${entryPoint}" cannot be resolved to a selector`,
  );
}

// Convert a field element to its 0x-prefixed hex representation
export function toFeltHex(value: bigint): string {
  return num.toHex(value);
}

export function isFeltHex(value: string): boolean {
  return (
    num.isHex(value) && value.length > 2 && num.toBigInt(value) < FIELD_PRIME
  );
}

import { DomainViolationError } from "../errors.js";

/**
 * EVM type definitions
 *
 * Only single-word value types are modeled: every value fits one 32-byte
 * storage slot and one ABI word.
 */

export type EvmType =
  | { kind: "uint"; bits: number }
  | { kind: "int"; bits: number }
  | { kind: "bool" };

/** Runtime representation of a decoded value */
export type EvmValue = bigint | boolean;

/**
 * Common EVM types
 */
export const EvmTypes = {
  uint256: { kind: "uint", bits: 256 },
  uint128: { kind: "uint", bits: 128 },
  uint64: { kind: "uint", bits: 64 },
  uint8: { kind: "uint", bits: 8 },

  int256: { kind: "int", bits: 256 },
  int8: { kind: "int", bits: 8 },

  bool: { kind: "bool" },
} as const satisfies Record<string, EvmType>;

export const MAX_U256 = (1n << 256n) - 1n;

/**
 * Validate integer bit width (must be 8-256 and multiple of 8)
 */
function validateIntegerBits(bits: number, typeName: string): void {
  if (bits < 8 || bits > 256 || bits % 8 !== 0) {
    throw new Error(
      `Invalid type '${typeName}': bit width must be 8-256 and multiple of 8, got ${bits}`
    );
  }
}

/**
 * Map TypeScript type name to EVM type
 */
export function mapType(typeName: string): EvmType {
  // Handle u256, u128, etc. and the Uint<N> generic syntax
  const uintMatch = typeName.match(/^u(\d+)$/) ?? typeName.match(/^Uint<(\d+)>$/);
  if (uintMatch) {
    const bits = parseInt(uintMatch[1] ?? "", 10);
    validateIntegerBits(bits, typeName);
    return { kind: "uint", bits };
  }

  // Handle i256, i128, etc. and the Int<N> generic syntax
  const intMatch = typeName.match(/^i(\d+)$/) ?? typeName.match(/^Int<(\d+)>$/);
  if (intMatch) {
    const bits = parseInt(intMatch[1] ?? "", 10);
    validateIntegerBits(bits, typeName);
    return { kind: "int", bits };
  }

  switch (typeName) {
    case "bool":
    case "boolean":
      return EvmTypes.bool;
    case "bigint":
      return EvmTypes.uint256;
    default:
      throw new Error(`Unknown type '${typeName}': cannot map to EVM type`);
  }
}

/**
 * Get the Solidity type name for ABI encoding
 */
export function toSolidityType(type: EvmType): string {
  switch (type.kind) {
    case "uint":
      return `uint${type.bits}`;
    case "int":
      return `int${type.bits}`;
    case "bool":
      return "bool";
  }
}

/**
 * Convert a Solidity type string to EvmType
 * e.g., "uint256" -> { kind: "uint", bits: 256 }
 */
export function fromSolidityType(typeName: string): EvmType {
  const uintMatch = typeName.match(/^uint(\d+)?$/);
  if (uintMatch) {
    const bits = uintMatch[1] ? parseInt(uintMatch[1], 10) : 256;
    validateIntegerBits(bits, typeName);
    return { kind: "uint", bits };
  }

  const intMatch = typeName.match(/^int(\d+)?$/);
  if (intMatch) {
    const bits = intMatch[1] ? parseInt(intMatch[1], 10) : 256;
    validateIntegerBits(bits, typeName);
    return { kind: "int", bits };
  }

  if (typeName === "bool") {
    return EvmTypes.bool;
  }

  throw new Error(`Unknown Solidity type '${typeName}'`);
}

/**
 * Closed range [min, max] of the integers a type can hold.
 * bool is treated as the integers 0 and 1.
 */
export function typeRange(type: EvmType): { min: bigint; max: bigint } {
  switch (type.kind) {
    case "uint":
      return { min: 0n, max: (1n << BigInt(type.bits)) - 1n };
    case "int": {
      const half = 1n << BigInt(type.bits - 1);
      return { min: -half, max: half - 1n };
    }
    case "bool":
      return { min: 0n, max: 1n };
  }
}

export function isInDomain(value: bigint, type: EvmType): boolean {
  const { min, max } = typeRange(type);
  return value >= min && value <= max;
}

/**
 * Reject a value outside its type's range. Values are never clamped or wrapped.
 */
export function assertInDomain(value: bigint, type: EvmType, label: string): void {
  const { min, max } = typeRange(type);
  if (value < min || value > max) {
    throw new DomainViolationError(label, value, min, max);
  }
}

/**
 * Check that a runtime value has the JS shape of its type and lies in its domain
 */
export function checkValue(value: unknown, type: EvmType, label: string): EvmValue {
  if (type.kind === "bool") {
    if (typeof value !== "boolean") {
      throw new TypeError(`Expected a boolean for '${label}', got ${typeof value}`);
    }
    return value;
  }
  if (typeof value !== "bigint") {
    throw new TypeError(`Expected a bigint for '${label}', got ${typeof value}`);
  }
  assertInDomain(value, type, label);
  return value;
}

/**
 * Convert a value to its unsigned 256-bit word (two's complement for int)
 */
export function toWord(value: EvmValue): bigint {
  if (typeof value === "boolean") {
    return value ? 1n : 0n;
  }
  return value < 0n ? (1n << 256n) + value : value;
}

/**
 * Inverse of toWord. The word is assumed canonical for the type.
 */
export function fromWord(word: bigint, type: EvmType): EvmValue {
  switch (type.kind) {
    case "bool":
      return word !== 0n;
    case "uint":
      return word;
    case "int":
      return toSigned(word);
  }
}

function toSigned(word: bigint): bigint {
  return word > MAX_U256 >> 1n ? word - (1n << 256n) : word;
}

/**
 * Whether a word is the canonical encoding of some value of the type
 */
export function isCanonicalWord(word: bigint, type: EvmType): boolean {
  if (word < 0n || word > MAX_U256) return false;
  switch (type.kind) {
    case "uint":
    case "bool":
      return isInDomain(word, type);
    case "int":
      return isInDomain(toSigned(word), type);
  }
}

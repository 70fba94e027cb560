import { concat, hexToBigInt, isHex, keccak256, numberToHex, size, slice, toBytes, type Hex } from "viem";
import type { Parameter } from "../analyzer/index.js";
import { CalldataError } from "../errors.js";
import {
  checkValue,
  fromWord,
  isCanonicalWord,
  toSolidityType,
  toWord,
  type EvmType,
  type EvmValue,
} from "./types.js";

const SELECTOR_SIZE = 4;
const WORD_SIZE = 32;

/**
 * Compute function selector from function name and parameters
 * selector = keccak256(signature)[0:4]
 */
export function computeSelector(name: string, params: Parameter[]): Hex {
  return computeSelectorFromSignature(computeSignature(name, params));
}

/**
 * Compute function selector from a signature string
 * e.g., "set(uint256)" -> 0x60fe47b1
 */
export function computeSelectorFromSignature(signature: string): Hex {
  return slice(keccak256(toBytes(signature)), 0, SELECTOR_SIZE);
}

/**
 * Compute function signature
 * e.g., "setBoth(uint256,uint256)"
 */
export function computeSignature(name: string, params: Parameter[]): string {
  const paramTypes = params.map((p) => toSolidityType(p.type)).join(",");
  return `${name}(${paramTypes})`;
}

/**
 * Encode one value as a 32-byte word. Out-of-range values are rejected.
 */
export function encodeWord(value: EvmValue, type: EvmType, label = "value"): Hex {
  const checked = checkValue(value, type, label);
  return numberToHex(toWord(checked), { size: WORD_SIZE });
}

/**
 * Decode one 32-byte word, rejecting encodings the type cannot produce
 * (dirty high bits, bad sign extension, bool other than 0 or 1).
 */
export function decodeWord(word: Hex, type: EvmType, label = "value"): EvmValue {
  assertBytes(word, label);
  if (size(word) !== WORD_SIZE) {
    throw new CalldataError(`Expected a 32-byte word for '${label}', got ${size(word)} bytes`);
  }
  const raw = hexToBigInt(word);
  if (!isCanonicalWord(raw, type)) {
    throw new CalldataError(`Word for '${label}' is not a valid ${toSolidityType(type)}`);
  }
  return fromWord(raw, type);
}

/**
 * Encode calldata for a function call: selector followed by one word per argument
 */
export function encodeCalldata(selector: Hex, params: Parameter[], args: EvmValue[]): Hex {
  if (args.length !== params.length) {
    throw new CalldataError(`Expected ${params.length} argument(s), got ${args.length}`);
  }
  return concat([selector, ...params.map((p, i) => encodeWord(args[i] ?? 0n, p.type, p.name))]);
}

/**
 * Extract the selector from calldata
 */
export function selectorOf(calldata: Hex): Hex {
  assertBytes(calldata, "calldata");
  if (size(calldata) < SELECTOR_SIZE) {
    throw new CalldataError(`Calldata is ${size(calldata)} bytes; a selector needs 4`);
  }
  return slice(calldata, 0, SELECTOR_SIZE);
}

/**
 * Decode the arguments that follow the selector
 */
export function decodeCalldata(calldata: Hex, params: Parameter[]): EvmValue[] {
  assertBytes(calldata, "calldata");
  const expected = SELECTOR_SIZE + params.length * WORD_SIZE;
  if (size(calldata) !== expected) {
    throw new CalldataError(`Expected ${expected} bytes of calldata, got ${size(calldata)}`);
  }
  return params.map((p, i) => {
    const start = SELECTOR_SIZE + i * WORD_SIZE;
    return decodeWord(slice(calldata, start, start + WORD_SIZE), p.type, p.name);
  });
}

/**
 * Encode return data; functions without a return type return empty data
 */
export function encodeReturnData(type: EvmType | null, value: unknown): Hex {
  if (type === null) return "0x";
  return encodeWord(checkValue(value, type, "return value"), type, "return value");
}

/**
 * Decode return data
 */
export function decodeReturnData(data: Hex, type: EvmType | null): EvmValue | null {
  if (type === null) {
    assertBytes(data, "return data");
    if (size(data) !== 0) {
      throw new CalldataError(`Expected empty return data, got ${size(data)} bytes`);
    }
    return null;
  }
  return decodeWord(data, type, "return value");
}

function assertBytes(value: string, label: string): void {
  if (!isHex(value) || value.length % 2 !== 0) {
    throw new CalldataError(`'${label}' is not a 0x-prefixed byte string`);
  }
}

import { describe, it, expect } from "vitest";
import {
  computeSelector,
  computeSelectorFromSignature,
  computeSignature,
  decodeCalldata,
  decodeReturnData,
  decodeWord,
  encodeCalldata,
  encodeReturnData,
  encodeWord,
  selectorOf,
} from "../../src/evm/abi.js";
import { EvmTypes, MAX_U256 } from "../../src/evm/types.js";
import { CalldataError, DomainViolationError } from "../../src/errors.js";
import type { Parameter } from "../../src/analyzer/index.js";

const ZERO_WORD = "0".repeat(64);
const word = (hex: string) => hex.padStart(64, "0");

const X: Parameter[] = [{ name: "x", type: EvmTypes.uint256 }];

describe("Selectors", () => {
  it("should build canonical signatures", () => {
    expect(computeSignature("set", X)).toBe("set(uint256)");
    expect(computeSignature("get", [])).toBe("get()");
    expect(
      computeSignature("mix", [
        { name: "a", type: EvmTypes.int8 },
        { name: "b", type: EvmTypes.bool },
      ])
    ).toBe("mix(int8,bool)");
  });

  it("should compute the ValueStore selectors", () => {
    expect(computeSelector("set", X)).toBe("0x60fe47b1");
    expect(computeSelector("get", [])).toBe("0x6d4ce63c");
    expect(computeSelectorFromSignature("get()")).toBe("0x6d4ce63c");
  });

  it("should read the selector from calldata", () => {
    expect(selectorOf(`0x60fe47b1${word("2a")}`)).toBe("0x60fe47b1");
    expect(() => selectorOf("0x60fe")).toThrow("Calldata is 2 bytes; a selector needs 4");
  });
});

describe("Calldata", () => {
  it("should encode a uint256 argument", () => {
    expect(encodeCalldata("0x60fe47b1", X, [42n])).toBe(`0x60fe47b1${word("2a")}`);
  });

  it("should encode calls without arguments as the bare selector", () => {
    expect(encodeCalldata("0x6d4ce63c", [], [])).toBe("0x6d4ce63c");
  });

  it("should refuse to encode out-of-range arguments", () => {
    expect(() => encodeCalldata("0x60fe47b1", X, [-1n])).toThrow(DomainViolationError);
    expect(() => encodeCalldata("0x60fe47b1", X, [MAX_U256 + 1n])).toThrow(DomainViolationError);
  });

  it("should check the argument count", () => {
    expect(() => encodeCalldata("0x60fe47b1", X, [])).toThrow("Expected 1 argument(s), got 0");
  });

  it("should decode arguments", () => {
    expect(decodeCalldata(`0x60fe47b1${word("2a")}`, X)).toEqual([42n]);
    expect(decodeCalldata(`0x60fe47b1${"f".repeat(64)}`, X)).toEqual([MAX_U256]);
  });

  it("should reject calldata of the wrong length", () => {
    expect(() => decodeCalldata(`0x60fe47b1${"00".repeat(31)}`, X)).toThrow(
      "Expected 36 bytes of calldata, got 35"
    );
    expect(() => decodeCalldata(`0x6d4ce63c${ZERO_WORD}`, [])).toThrow(
      "Expected 4 bytes of calldata, got 36"
    );
  });

  it("should reject strings that are not byte strings", () => {
    expect(() => decodeCalldata("0x123", [])).toThrow(CalldataError);
    expect(() => selectorOf("0xzz12ab34")).toThrow("'calldata' is not a 0x-prefixed byte string");
  });
});

describe("Words", () => {
  it("should encode signed and boolean words", () => {
    expect(encodeWord(-1n, EvmTypes.int8)).toBe(`0x${"f".repeat(64)}`);
    expect(encodeWord(true, EvmTypes.bool)).toBe(`0x${word("1")}`);
  });

  it("should reject dirty high bits for narrow types", () => {
    expect(() => decodeWord(`0x${word("100")}`, EvmTypes.uint8, "small")).toThrow(
      "Word for 'small' is not a valid uint8"
    );
    expect(() => decodeWord(`0x${word("2")}`, EvmTypes.bool, "flag")).toThrow(
      "Word for 'flag' is not a valid bool"
    );
  });

  it("should decode sign-extended words", () => {
    expect(decodeWord(`0x${"f".repeat(62)}80`, EvmTypes.int8)).toBe(-128n);
  });
});

describe("Return data", () => {
  it("should be empty for functions without a return type", () => {
    expect(encodeReturnData(null, undefined)).toBe("0x");
    expect(decodeReturnData("0x", null)).toBeNull();
    expect(() => decodeReturnData(`0x${ZERO_WORD}`, null)).toThrow(
      "Expected empty return data, got 32 bytes"
    );
  });

  it("should encode one word for a uint256 return", () => {
    expect(encodeReturnData(EvmTypes.uint256, 7n)).toBe(`0x${word("7")}`);
    expect(decodeReturnData(`0x${word("7")}`, EvmTypes.uint256)).toBe(7n);
  });

  it("should reject return values of the wrong shape", () => {
    expect(() => encodeReturnData(EvmTypes.uint256, "7")).toThrow(
      "Expected a bigint for 'return value', got string"
    );
  });
});

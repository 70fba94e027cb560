import { describe, it, expect } from "vitest";
import {
  EvmTypes,
  MAX_U256,
  assertInDomain,
  checkValue,
  fromSolidityType,
  fromWord,
  isCanonicalWord,
  mapType,
  toSolidityType,
  toWord,
  typeRange,
} from "../../src/evm/types.js";
import { DomainViolationError } from "../../src/errors.js";

describe("Type mapping", () => {
  it("should map unsigned integer aliases", () => {
    expect(mapType("u256")).toEqual({ kind: "uint", bits: 256 });
    expect(mapType("u8")).toEqual({ kind: "uint", bits: 8 });
    expect(mapType("Uint<64>")).toEqual({ kind: "uint", bits: 64 });
    expect(mapType("bigint")).toEqual({ kind: "uint", bits: 256 });
  });

  it("should map signed integer aliases", () => {
    expect(mapType("i128")).toEqual({ kind: "int", bits: 128 });
    expect(mapType("Int<32>")).toEqual({ kind: "int", bits: 32 });
  });

  it("should map booleans", () => {
    expect(mapType("bool")).toEqual({ kind: "bool" });
    expect(mapType("boolean")).toEqual({ kind: "bool" });
  });

  it("should reject invalid bit widths", () => {
    expect(() => mapType("u7")).toThrow(
      "Invalid type 'u7': bit width must be 8-256 and multiple of 8, got 7"
    );
    expect(() => mapType("u512")).toThrow("got 512");
  });

  it("should reject unknown types", () => {
    expect(() => mapType("string")).toThrow("Unknown type 'string': cannot map to EVM type");
  });

  it("should convert to and from Solidity names", () => {
    expect(toSolidityType(EvmTypes.uint256)).toBe("uint256");
    expect(toSolidityType({ kind: "int", bits: 64 })).toBe("int64");
    expect(toSolidityType(EvmTypes.bool)).toBe("bool");
    expect(fromSolidityType("uint")).toEqual({ kind: "uint", bits: 256 });
    expect(fromSolidityType("int8")).toEqual({ kind: "int", bits: 8 });
    expect(fromSolidityType("bool")).toEqual({ kind: "bool" });
    expect(() => fromSolidityType("address")).toThrow("Unknown Solidity type 'address'");
  });
});

describe("Domains", () => {
  it("should compute type ranges", () => {
    expect(typeRange(EvmTypes.uint8)).toEqual({ min: 0n, max: 255n });
    expect(typeRange(EvmTypes.int8)).toEqual({ min: -128n, max: 127n });
    expect(typeRange(EvmTypes.uint256)).toEqual({ min: 0n, max: MAX_U256 });
    expect(typeRange(EvmTypes.bool)).toEqual({ min: 0n, max: 1n });
  });

  it("should accept the range bounds", () => {
    expect(() => assertInDomain(0n, EvmTypes.uint256, "x")).not.toThrow();
    expect(() => assertInDomain(MAX_U256, EvmTypes.uint256, "x")).not.toThrow();
    expect(() => assertInDomain(-128n, EvmTypes.int8, "x")).not.toThrow();
  });

  it("should reject values outside the range", () => {
    expect(() => assertInDomain(256n, EvmTypes.uint8, "small")).toThrow(
      "Value 256 for 'small' is outside the range [0, 255]"
    );
    expect(() => assertInDomain(-1n, EvmTypes.uint256, "x")).toThrow(DomainViolationError);
    expect(() => assertInDomain(128n, EvmTypes.int8, "x")).toThrow(DomainViolationError);
  });

  it("should check the runtime shape of values", () => {
    expect(checkValue(true, EvmTypes.bool, "flag")).toBe(true);
    expect(checkValue(5n, EvmTypes.uint8, "n")).toBe(5n);
    expect(() => checkValue(1n, EvmTypes.bool, "flag")).toThrow(
      "Expected a boolean for 'flag', got bigint"
    );
    expect(() => checkValue(5, EvmTypes.uint8, "n")).toThrow("Expected a bigint for 'n', got number");
  });
});

describe("Words", () => {
  it("should encode negative integers as two's complement", () => {
    expect(toWord(-1n)).toBe(MAX_U256);
    expect(fromWord(MAX_U256, EvmTypes.int8)).toBe(-1n);
    expect(fromWord(MAX_U256, EvmTypes.uint256)).toBe(MAX_U256);
  });

  it("should encode booleans as 0 and 1", () => {
    expect(toWord(true)).toBe(1n);
    expect(toWord(false)).toBe(0n);
    expect(fromWord(1n, EvmTypes.bool)).toBe(true);
    expect(fromWord(0n, EvmTypes.bool)).toBe(false);
  });

  it("should recognise canonical words", () => {
    expect(isCanonicalWord(255n, EvmTypes.uint8)).toBe(true);
    expect(isCanonicalWord(256n, EvmTypes.uint8)).toBe(false);
    expect(isCanonicalWord(MAX_U256, EvmTypes.int8)).toBe(true);
    expect(isCanonicalWord(MAX_U256 - 200n, EvmTypes.int8)).toBe(false);
    expect(isCanonicalWord(2n, EvmTypes.bool)).toBe(false);
    expect(isCanonicalWord(MAX_U256 + 1n, EvmTypes.uint256)).toBe(false);
  });
});

import { describe, it, expect } from "vitest";
import { abiToJson, generateAbi } from "../../src/evm/abiGenerator.js";
import { inspectSource } from "../../src/inspect.js";
import { VALUE_STORE_INFO } from "../../src/valueStore.js";

describe("ABI generation", () => {
  it("should describe the ValueStore functions", () => {
    expect(generateAbi(VALUE_STORE_INFO)).toEqual([
      {
        type: "function",
        name: "set",
        inputs: [{ name: "x", type: "uint256" }],
        outputs: [],
        stateMutability: "nonpayable",
      },
      {
        type: "function",
        name: "get",
        inputs: [],
        outputs: [{ name: "", type: "uint256" }],
        stateMutability: "view",
      },
    ]);
  });

  it("should put the constructor first and leave out internal functions", () => {
    const result = inspectSource(`
      export class Owned {
        @storage owner: u160 = 0n;

        constructor(initial: u160) {
          this.owner = initial;
        }

        @internal
        check(): void {}

        @view
        public isOwner(who: u160): bool {
          return who === this.owner;
        }
      }
    `);

    expect(result.errors).toEqual([]);
    expect(result.abi).toEqual([
      {
        type: "constructor",
        inputs: [{ name: "initial", type: "uint160" }],
        stateMutability: "nonpayable",
      },
      {
        type: "function",
        name: "isOwner",
        inputs: [{ name: "who", type: "uint160" }],
        outputs: [{ name: "", type: "bool" }],
        stateMutability: "view",
      },
    ]);
  });

  it("should serialize compactly on request", () => {
    const abi = generateAbi({ ...VALUE_STORE_INFO, functions: VALUE_STORE_INFO.functions.slice(1) });
    expect(abiToJson(abi, false)).toBe(
      '[{"type":"function","name":"get","inputs":[],"outputs":[{"name":"","type":"uint256"}],"stateMutability":"view"}]'
    );
  });
});

import { ValueStore } from "../contracts/ValueStore.js";
import type { ContractInfo, Parameter } from "./analyzer/index.js";
import { computeSelector } from "./evm/abi.js";
import { EvmTypes, assertInDomain } from "./evm/types.js";
import { CalldataError } from "./errors.js";
import { ContractHost } from "./host/host.js";
import { MemorySlotStorage, type SlotStorage } from "./host/storage.js";

const SET_PARAMS: Parameter[] = [{ name: "x", type: EvmTypes.uint256 }];

/** What the analyzer derives from contracts/ValueStore.ts */
export const VALUE_STORE_INFO: ContractInfo = {
  name: "ValueStore",
  storage: [{ name: "value", type: EvmTypes.uint256, slot: 0n, defaultValue: 0n }],
  functions: [
    {
      name: "set",
      selector: computeSelector("set", SET_PARAMS),
      params: SET_PARAMS,
      returnType: null,
      visibility: "public",
      mutability: "nonpayable",
      isConstructor: false,
    },
    {
      name: "get",
      selector: computeSelector("get", []),
      params: [],
      returnType: EvmTypes.uint256,
      visibility: "public",
      mutability: "view",
      isConstructor: false,
    },
  ],
  constructor: null,
};

/**
 * Typed access to a deployed ValueStore.
 * Accepts any bigint and rejects values outside [0, 2^256 - 1] before calling.
 */
export class ValueStoreClient {
  constructor(readonly host: ContractHost<ValueStore>) {}

  set(value: bigint): void {
    assertInDomain(value, EvmTypes.uint256, "value");
    this.host.invoke("set", [value]);
  }

  get(): bigint {
    const value = this.host.invoke("get");
    if (typeof value !== "bigint") {
      throw new CalldataError("ValueStore.get returned no value");
    }
    return value;
  }
}

export function deployValueStore(storage: SlotStorage = new MemorySlotStorage()): ValueStoreClient {
  return new ValueStoreClient(ContractHost.deploy(() => new ValueStore(), VALUE_STORE_INFO, storage));
}

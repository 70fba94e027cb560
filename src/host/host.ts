import type { Hex } from "viem";
import type { ContractInfo, FunctionInfo, StorageVariable } from "../analyzer/index.js";
import {
  decodeCalldata,
  decodeReturnData,
  encodeCalldata,
  encodeReturnData,
  selectorOf,
} from "../evm/abi.js";
import { checkValue, fromWord, toWord, type EvmValue } from "../evm/types.js";
import { HostBusyError, UnknownSelectorError, errorMessage } from "../errors.js";
import { MemorySlotStorage, type SlotStorage } from "./storage.js";

export interface CallResult {
  returnData: Hex;
  errors: string[];
}

/**
 * Runs one contract instance against slot storage.
 *
 * Storage fields are restored from the slots before every call, and the
 * fields of a state-changing function are committed together once it returns.
 * A call that fails commits nothing.
 */
export class ContractHost<T extends object> {
  private readonly functions = new Map<string, FunctionInfo>();
  private executing: string | null = null;

  private constructor(
    readonly instance: T,
    readonly info: ContractInfo,
    readonly storage: SlotStorage
  ) {
    for (const fn of info.functions) {
      if (fn.visibility === "public") {
        this.functions.set(fn.selector.toLowerCase(), fn);
      }
    }
  }

  /**
   * Instantiate a contract. On fresh storage the constructed field values are
   * committed; on storage that already holds a deployment they are discarded.
   */
  static deploy<T extends object>(
    factory: () => T,
    info: ContractInfo,
    storage: SlotStorage = new MemorySlotStorage()
  ): ContractHost<T> {
    const host = new ContractHost(factory(), info, storage);
    if (!storage.isInitialized()) {
      storage.commit(host.collectWrites());
    }
    return host;
  }

  /**
   * Execute ABI-encoded calldata
   */
  call(calldata: Hex): CallResult {
    try {
      return { returnData: this.execute(calldata), errors: [] };
    } catch (err) {
      return { returnData: "0x", errors: [errorMessage(err)] };
    }
  }

  /**
   * Call a public function by name, throwing whatever the call raises
   */
  invoke(name: string, args: EvmValue[] = []): EvmValue | null {
    const fn = this.info.functions.find((f) => f.name === name && f.visibility === "public");
    if (!fn) {
      throw new Error(`${this.info.name} has no public function '${name}'`);
    }
    const returnData = this.execute(encodeCalldata(fn.selector, fn.params, args));
    return decodeReturnData(returnData, fn.returnType);
  }

  /**
   * Current value of a storage variable, read from its slot
   */
  read(name: string): EvmValue {
    const variable = this.info.storage.find((v) => v.name === name);
    if (!variable) {
      throw new Error(`${this.info.name} has no storage variable '${name}'`);
    }
    return fromWord(this.storage.load(variable.slot), variable.type);
  }

  private execute(calldata: Hex): Hex {
    if (this.executing !== null) {
      throw new HostBusyError(this.executing);
    }

    const selector = selectorOf(calldata).toLowerCase();
    const fn = this.functions.get(selector);
    if (!fn) {
      throw new UnknownSelectorError(selector);
    }
    const args = decodeCalldata(calldata, fn.params);

    this.executing = fn.name;
    try {
      this.restoreFields();
      const result = this.dispatch(fn, args);
      const returnData = encodeReturnData(fn.returnType, result);
      if (fn.mutability === "nonpayable" || fn.mutability === "payable") {
        this.storage.commit(this.collectWrites());
      }
      return returnData;
    } finally {
      this.executing = null;
    }
  }

  private dispatch(fn: FunctionInfo, args: EvmValue[]): unknown {
    const method: unknown = Reflect.get(this.instance, fn.name);
    if (typeof method !== "function") {
      throw new Error(`${this.info.name}.${fn.name} is not a method`);
    }
    return Reflect.apply(method, this.instance, args);
  }

  private restoreFields(): void {
    for (const variable of this.info.storage) {
      Reflect.set(this.instance, variable.name, fromWord(this.storage.load(variable.slot), variable.type));
    }
  }

  /**
   * Words for every storage field; an unset field stores zero
   */
  private collectWrites(): Map<bigint, bigint> {
    const writes = new Map<bigint, bigint>();
    for (const variable of this.info.storage) {
      writes.set(variable.slot, this.fieldWord(variable));
    }
    return writes;
  }

  private fieldWord(variable: StorageVariable): bigint {
    const value: unknown = Reflect.get(this.instance, variable.name);
    if (value === undefined) return 0n;
    return toWord(checkValue(value, variable.type, `${this.info.name}.${variable.name}`));
  }
}

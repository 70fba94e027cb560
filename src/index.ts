export { ValueStore } from "../contracts/ValueStore.js";
export { VALUE_STORE_INFO, ValueStoreClient, deployValueStore } from "./valueStore.js";
export { ContractHost } from "./host/host.js";
export type { CallResult } from "./host/host.js";
export { MemorySlotStorage, FileSlotStorage } from "./host/storage.js";
export type { SlotStorage } from "./host/storage.js";
export { inspectSource, inspectFile } from "./inspect.js";
export type { InspectResult } from "./inspect.js";
export { Analyzer } from "./analyzer/index.js";
export type { ContractInfo, FunctionInfo, Parameter, StorageVariable } from "./analyzer/index.js";
export { Parser } from "./parser/index.js";

export * from "./errors.js";
export * from "./evm/types.js";
export * from "./evm/abi.js";
export * from "./evm/abiGenerator.js";

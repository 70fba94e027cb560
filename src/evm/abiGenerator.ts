import type { ContractInfo, FunctionInfo, Parameter } from "../analyzer/index.js";
import { toSolidityType } from "./types.js";

/**
 * ABI types following Ethereum JSON ABI specification
 */
export interface AbiParameter {
  name: string;
  type: string;
}

export interface AbiFunctionItem {
  type: "function";
  name: string;
  inputs: AbiParameter[];
  outputs: AbiParameter[];
  stateMutability: "pure" | "view" | "nonpayable" | "payable";
}

export interface AbiConstructorItem {
  type: "constructor";
  inputs: AbiParameter[];
  stateMutability: "nonpayable" | "payable";
}

export type AbiItem = AbiFunctionItem | AbiConstructorItem;

/**
 * Generate Ethereum ABI JSON from contract info
 */
export function generateAbi(contract: ContractInfo): AbiItem[] {
  const abi: AbiItem[] = [];

  if (contract.constructor) {
    abi.push(generateConstructorAbi(contract.constructor));
  }

  for (const func of contract.functions) {
    if (func.visibility === "public") {
      abi.push(generateFunctionAbi(func));
    }
  }

  return abi;
}

function generateConstructorAbi(ctor: FunctionInfo): AbiConstructorItem {
  return {
    type: "constructor",
    inputs: ctor.params.map(paramToAbiParam),
    stateMutability: ctor.mutability === "payable" ? "payable" : "nonpayable",
  };
}

function generateFunctionAbi(func: FunctionInfo): AbiFunctionItem {
  return {
    type: "function",
    name: func.name,
    inputs: func.params.map(paramToAbiParam),
    outputs: func.returnType ? [{ name: "", type: toSolidityType(func.returnType) }] : [],
    stateMutability: func.mutability,
  };
}

function paramToAbiParam(param: Parameter): AbiParameter {
  return {
    name: param.name,
    type: toSolidityType(param.type),
  };
}

/**
 * Serialize ABI to JSON string
 */
export function abiToJson(abi: AbiItem[], pretty = true): string {
  return JSON.stringify(abi, null, pretty ? 2 : undefined);
}

import type { SourceFile } from "ts-morph";
import { Parser } from "./parser/index.js";
import { Analyzer, type ContractInfo } from "./analyzer/index.js";
import { generateAbi, type AbiItem } from "./evm/abiGenerator.js";
import { errorMessage } from "./errors.js";

export interface InspectResult {
  contract: ContractInfo | null;
  abi: AbiItem[];
  errors: string[];
}

const NO_CONTRACT = "No contract found. Export a class to define a contract.";

function inspect(parser: Parser, load: (parser: Parser) => SourceFile): InspectResult {
  try {
    const sourceFile = load(parser);
    if (parser.getContracts(sourceFile).length === 0) {
      return { contract: null, abi: [], errors: [NO_CONTRACT] };
    }

    // The first exported class is the contract; later ones are helpers
    const [contract] = new Analyzer().analyze(sourceFile);
    if (!contract) {
      return { contract: null, abi: [], errors: [NO_CONTRACT] };
    }
    return { contract, abi: generateAbi(contract), errors: [] };
  } catch (err) {
    return { contract: null, abi: [], errors: [errorMessage(err)] };
  }
}

/**
 * Analyze contract source text: storage layout, functions and ABI
 */
export function inspectSource(source: string): InspectResult {
  return inspect(new Parser(), (parser) => parser.parse(source));
}

export function inspectFile(filePath: string): InspectResult {
  return inspect(new Parser(true), (parser) => parser.parseFile(filePath));
}

import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { isHex } from "viem";
import { abiToJson } from "./evm/abiGenerator.js";
import { toSolidityType } from "./evm/types.js";
import { errorMessage } from "./errors.js";
import { FileSlotStorage, MemorySlotStorage } from "./host/storage.js";
import { inspectFile, type InspectResult } from "./inspect.js";
import { deployValueStore } from "./valueStore.js";

export const DEFAULT_STATE_FILE = "value-store.state.json";

type Command = "get" | "set" | "call" | "abi" | "layout" | "help" | "version";

const COMMANDS: readonly Command[] = ["get", "set", "call", "abi", "layout", "help", "version"];

export interface CliArgs {
  command: Command;
  positional: string | undefined;
  state: string;
  output: string | undefined;
}

export interface CliIO {
  log(message: string): void;
  error(message: string): void;
}

const DEFAULT_ARGS: CliArgs = {
  command: "help",
  positional: undefined,
  state: DEFAULT_STATE_FILE,
  output: undefined,
};

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseArgs(args: string[]): CliArgs {
  const command = args[0];

  if (!command || args.includes("--help") || args.includes("-h")) {
    return DEFAULT_ARGS;
  }

  if (args.includes("--version") || args.includes("-v")) {
    return { ...DEFAULT_ARGS, command: "version" };
  }

  if (!isCommand(command)) {
    throw new Error(`Unknown command: ${command}`);
  }

  let positional: string | undefined;
  let state = DEFAULT_STATE_FILE;
  let output: string | undefined;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--state" || arg === "-o" || arg === "--output") {
      const value = args[++i];
      if (value === undefined) {
        throw new Error(`Missing value for ${arg}`);
      }
      if (arg === "--state") {
        state = value;
      } else {
        output = value;
      }
    } else if (positional === undefined) {
      positional = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return { command, positional, state, output };
}

/**
 * Parse a decimal or 0x-prefixed hex integer.
 * Range is checked later, by the store.
 */
export function parseInteger(text: string): bigint {
  if (/^-?\d+$/.test(text) || /^0x[0-9a-fA-F]+$/.test(text)) {
    return BigInt(text);
  }
  throw new Error(`Invalid integer '${text}'`);
}

const HELP = `
value-store - A single persistent uint256 slot

USAGE:
  value-store <command> [options]

COMMANDS:
  get                  Print the stored value
  set <value>          Store a value (decimal or 0x hex)
  call <calldata>      Execute ABI calldata against the store and print the return data
  abi <file.ts>        Print the ABI of the contract in a TypeScript file
  layout <file.ts>     Print slot, name, type and default of each storage variable
  help                 Show this help message
  version              Show version

OPTIONS:
  --state <file>       State file (default: ${DEFAULT_STATE_FILE})
  -o, --output <file>  Write the ABI to a file (abi only)
  -h, --help           Show help
  -v, --version        Show version

EXAMPLES:
  value-store set 42
  value-store get
  value-store call 0x6d4ce63c
  value-store abi contracts/ValueStore.ts -o ValueStore.abi.json
`;

function requirePositional(args: CliArgs, what: string): string {
  if (args.positional === undefined) {
    throw new Error(`No ${what} specified`);
  }
  return args.positional;
}

function inspectOrFail(args: CliArgs, io: CliIO): InspectResult | null {
  const result = inspectFile(resolve(requirePositional(args, "input file")));
  if (result.errors.length > 0) {
    io.error("Analysis errors:");
    result.errors.forEach((e) => io.error(`  ${e}`));
    return null;
  }
  return result;
}

/**
 * Run one CLI command and return the process exit code
 */
export function runCli(argv: string[], io: CliIO = console): number {
  try {
    const args = parseArgs(argv);

    switch (args.command) {
      case "help":
        io.log(HELP);
        return 0;

      case "version":
        io.log("value-store v0.1.0");
        return 0;

      case "get": {
        // Reading never creates the state file
        const storage = new FileSlotStorage(resolve(args.state));
        const store = deployValueStore(storage.isInitialized() ? storage : new MemorySlotStorage());
        io.log(store.get().toString());
        return 0;
      }

      case "set": {
        const value = parseInteger(requirePositional(args, "value"));
        deployValueStore(new FileSlotStorage(resolve(args.state))).set(value);
        return 0;
      }

      case "call": {
        const calldata = requirePositional(args, "calldata");
        if (!isHex(calldata)) {
          throw new Error(`Calldata must be 0x-prefixed hex, got '${calldata}'`);
        }
        const store = deployValueStore(new FileSlotStorage(resolve(args.state)));
        const result = store.host.call(calldata);
        if (result.errors.length > 0) {
          result.errors.forEach((e) => io.error(`Error: ${e}`));
          return 1;
        }
        io.log(result.returnData);
        return 0;
      }

      case "abi": {
        const result = inspectOrFail(args, io);
        if (!result) return 1;
        const json = abiToJson(result.abi);
        if (args.output) {
          writeFileSync(args.output, json);
          io.log(`ABI written to ${args.output}`);
        } else {
          io.log(json);
        }
        return 0;
      }

      case "layout": {
        const result = inspectOrFail(args, io);
        if (!result?.contract) return 1;
        for (const variable of result.contract.storage) {
          const line = `${variable.slot}\t${variable.name}\t${toSolidityType(variable.type)}`;
          io.log(variable.defaultValue === undefined ? line : `${line}\t${variable.defaultValue}`);
        }
        return 0;
      }
    }
  } catch (err) {
    io.error(`Error: ${errorMessage(err)}`);
    return 1;
  }
}

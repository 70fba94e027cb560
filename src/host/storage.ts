import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { isHex, numberToHex } from "viem";
import { z } from "zod";
import { DomainViolationError, StorageError, errorMessage } from "../errors.js";
import { MAX_U256 } from "../evm/types.js";

/**
 * Persistent word storage of one contract instance.
 * Unwritten slots read as zero.
 */
export interface SlotStorage {
  load(slot: bigint): bigint;
  /** Apply every write or none of them */
  commit(writes: ReadonlyMap<bigint, bigint>): void;
  /** Non-zero slots, ordered by slot */
  entries(): Array<[bigint, bigint]>;
  /** Whether any commit has happened, i.e. the contract was deployed here */
  isInitialized(): boolean;
}


function validateWrites(writes: ReadonlyMap<bigint, bigint>): void {
  for (const [slot, word] of writes) {
    if (slot < 0n || slot > MAX_U256) {
      throw new DomainViolationError("slot", slot, 0n, MAX_U256);
    }
    if (word < 0n || word > MAX_U256) {
      throw new DomainViolationError(`slot ${slot}`, word, 0n, MAX_U256);
    }
  }
}

function applyWrites(slots: Map<bigint, bigint>, writes: ReadonlyMap<bigint, bigint>): void {
  for (const [slot, word] of writes) {
    if (word === 0n) {
      slots.delete(slot);
    } else {
      slots.set(slot, word);
    }
  }
}

function sortedEntries(slots: Map<bigint, bigint>): Array<[bigint, bigint]> {
  return [...slots.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export class MemorySlotStorage implements SlotStorage {
  private slots = new Map<bigint, bigint>();
  private initialized = false;

  load(slot: bigint): bigint {
    return this.slots.get(slot) ?? 0n;
  }

  commit(writes: ReadonlyMap<bigint, bigint>): void {
    validateWrites(writes);
    applyWrites(this.slots, writes);
    this.initialized = true;
  }

  entries(): Array<[bigint, bigint]> {
    return sortedEntries(this.slots);
  }

  isInitialized(): boolean {
    return this.initialized;
  }
}

/**
 * Slot storage kept in a JSON state file.
 * Each commit rewrites the file through a temporary sibling and a rename,
 * so the file always holds either the old or the new state.
 */
export class FileSlotStorage implements SlotStorage {
  private state: { slots: Map<bigint, bigint>; initialized: boolean } | null = null;

  constructor(readonly path: string) {}

  load(slot: bigint): bigint {
    return this.read().slots.get(slot) ?? 0n;
  }

  commit(writes: ReadonlyMap<bigint, bigint>): void {
    validateWrites(writes);
    const current = this.read();
    const next = new Map(current.slots);
    applyWrites(next, writes);

    const tempPath = `${this.path}.tmp`;
    try {
      writeFileSync(tempPath, serializeState(next));
      renameSync(tempPath, this.path);
    } catch (err) {
      rmSync(tempPath, { force: true });
      throw new StorageError(`Failed to write state file ${this.path}: ${errorMessage(err)}`);
    }
    this.state = { slots: next, initialized: true };
  }

  entries(): Array<[bigint, bigint]> {
    return sortedEntries(this.read().slots);
  }

  isInitialized(): boolean {
    return this.read().initialized;
  }

  private read(): { slots: Map<bigint, bigint>; initialized: boolean } {
    if (this.state) return this.state;
    if (!existsSync(this.path)) {
      this.state = { slots: new Map(), initialized: false };
      return this.state;
    }

    let text: string;
    try {
      text = readFileSync(this.path, "utf-8");
    } catch (err) {
      throw new StorageError(`Failed to read state file ${this.path}: ${errorMessage(err)}`);
    }
    this.state = parseState(text, this.path);
    return this.state;
  }
}

/**
 * A 0x-prefixed hex string holding a 256-bit word, read as a bigint
 */
const HexWordSchema = z.string().transform((value, ctx) => {
  if (!isHex(value) || value === "0x") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a 0x-prefixed hex string" });
    return z.NEVER;
  }
  const word = BigInt(value);
  if (word > MAX_U256) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "does not fit in 256 bits" });
    return z.NEVER;
  }
  return word;
});

export const StateFileSchema = z.object({
  version: z.literal(1),
  initialized: z.boolean().optional(),
  slots: z.record(z.string(), HexWordSchema),
});

export function serializeState(slots: Map<bigint, bigint>): string {
  const file: z.input<typeof StateFileSchema> = { version: 1, initialized: true, slots: {} };
  for (const [slot, word] of sortedEntries(slots)) {
    file.slots[numberToHex(slot)] = numberToHex(word);
  }
  return `${JSON.stringify(file, null, 2)}\n`;
}

function describeIssue(issue: z.ZodIssue): string {
  const [field, key] = issue.path;
  if (field === undefined || field === "version") return "is not a version 1 state file";
  if (field === "slots" && key === undefined) return "has no slots object";
  if (field === "slots") return `slot ${String(key)} ${issue.message}`;
  return `field ${issue.path.join(".")}: ${issue.message}`;
}

export function parseState(
  text: string,
  source = "state"
): { slots: Map<bigint, bigint>; initialized: boolean } {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new StorageError(`${source} is not valid JSON: ${errorMessage(err)}`);
  }

  const result = StateFileSchema.safeParse(data);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new StorageError(`${source} ${issue ? describeIssue(issue) : "is not a state file"}`);
  }

  const slots = new Map<bigint, bigint>();
  for (const [key, word] of Object.entries(result.data.slots)) {
    const slot = HexWordSchema.safeParse(key);
    if (!slot.success) {
      throw new StorageError(`${source} slot key ${key} ${slot.error.issues[0]?.message ?? "is invalid"}`);
    }
    if (word !== 0n) slots.set(slot.data, word);
  }

  // Non-zero slots mean a deployment happened, whatever the flag says
  const initialized = result.data.initialized === true || slots.size > 0;
  return { slots, initialized };
}

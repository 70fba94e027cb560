import { storage, view, type u256 } from "../runtime/index.js";

/**
 * Value Store contract
 *
 * One storage slot holding one unsigned 256-bit integer.
 */
export class ValueStore {
  @storage value: u256 = 0n;

  /**
   * Replace the stored value
   */
  public set(x: u256): void {
    this.value = x;
  }

  /**
   * Read the stored value
   */
  @view
  public get(): u256 {
    return this.value;
  }
}

/**
 * Contract runtime types.
 * Import these in TypeScript contracts; the decorators only mark members
 * for the analyzer and do nothing when the class runs.
 */

// Integer Types
export type UintBitSize =
  | 8
  | 16
  | 24
  | 32
  | 40
  | 48
  | 56
  | 64
  | 72
  | 80
  | 88
  | 96
  | 104
  | 112
  | 120
  | 128
  | 136
  | 144
  | 152
  | 160
  | 168
  | 176
  | 184
  | 192
  | 200
  | 208
  | 216
  | 224
  | 232
  | 240
  | 248
  | 256;

export type IntBitSize = UintBitSize;

/** Unsigned integer with N bits */
export type Uint<N extends UintBitSize> = bigint & { readonly __uint?: N };

/** Signed integer with N bits */
export type Int<N extends IntBitSize> = bigint & { readonly __int?: N };

export type u8 = Uint<8>;
export type u16 = Uint<16>;
export type u32 = Uint<32>;
export type u64 = Uint<64>;
export type u128 = Uint<128>;
export type u256 = Uint<256>;

export type i8 = Int<8>;
export type i64 = Int<64>;
export type i128 = Int<128>;
export type i256 = Int<256>;

export type bool = boolean;

// Decorators
export function storage(_target: object, _propertyKey: string): void {}
export function view(_target: object, _propertyKey: string): void {}
export function pure(_target: object, _propertyKey: string): void {}
export function payable(_target: object, _propertyKey: string): void {}
/** Marks a method as internal (not exposed in the ABI) */
export function internal(_target: object, _propertyKey: string): void {}

/**
 * Pins a storage variable to a specific slot.
 * Usage: @storage @slot(100n) customData: u256 = 0n;
 */
export function slot(_slotNumber: bigint | number): PropertyDecorator {
  return (_target: object, _propertyKey: string | symbol) => {};
}

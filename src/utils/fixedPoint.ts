// src/utils/fixedPoint.ts
// Integer helpers for the fixed-width datapaths. Everything here floors.

export const U8_MAX = 255;
export const U16_MAX = 65535;
export const PRICE_MAX = 4095; // 12-bit price / volume field
export const ORDER_QTY_MAX = 63; // 6-bit order quantity field

export const clamp = (value: number, min: number, max: number): number =>
    Math.min(max, Math.max(min, value));

export const saturateU8 = (value: number): number => clamp(value, 0, U8_MAX);

export const saturateU16 = (value: number): number =>
    clamp(value, 0, U16_MAX);

/** Wrap to a signed 32-bit accumulator the way the MAC units do. */
export const toInt32 = (value: number): number => value | 0;

/** Signed delta squeezed into an offset-binary byte: ±127 around 128. */
export const offsetByte = (delta: number): number =>
    clamp(Math.trunc(delta), -127, 127) + 128;

/** Arithmetic right shift that floors for negative numbers as well. */
export const shiftRight = (value: number, bits: number): number =>
    Math.floor(value / 2 ** bits);

export const bitLength = (value: number): number => {
    let bits = 0;
    let remaining = Math.max(0, Math.trunc(value));
    while (remaining > 0) {
        remaining = Math.floor(remaining / 2);
        bits++;
    }
    return bits;
};

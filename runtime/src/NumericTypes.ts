import { ByteOrder } from "./ByteOrder.js";

// Integer types of 32 bits and less and the float types use number; 64 and 128-bit integers use bigint.
// Setters reduce out-of-range input modulo 2^(8 * width), the same way DataView does.

export const u8 = ByteOrder.define<number, 1>("u8", 1, {
    get: view => view.getUint8(0),
    set: (view, value) => view.setUint8(0, value),
});

export const i8 = ByteOrder.define<number, 1>("i8", 1, {
    get: view => view.getInt8(0),
    set: (view, value) => view.setInt8(0, value),
});

export const u16 = ByteOrder.define<number, 2>("u16", 2, {
    get: (view, littleEndian) => view.getUint16(0, littleEndian),
    set: (view, value, littleEndian) => view.setUint16(0, value, littleEndian),
});

export const i16 = ByteOrder.define<number, 2>("i16", 2, {
    get: (view, littleEndian) => view.getInt16(0, littleEndian),
    set: (view, value, littleEndian) => view.setInt16(0, value, littleEndian),
});

export const u32 = ByteOrder.define<number, 4>("u32", 4, {
    get: (view, littleEndian) => view.getUint32(0, littleEndian),
    set: (view, value, littleEndian) => view.setUint32(0, value, littleEndian),
});

export const i32 = ByteOrder.define<number, 4>("i32", 4, {
    get: (view, littleEndian) => view.getInt32(0, littleEndian),
    set: (view, value, littleEndian) => view.setInt32(0, value, littleEndian),
});

export const u64 = ByteOrder.define<bigint, 8>("u64", 8, {
    get: (view, littleEndian) => view.getBigUint64(0, littleEndian),
    set: (view, value, littleEndian) => view.setBigUint64(0, value, littleEndian),
});

export const i64 = ByteOrder.define<bigint, 8>("i64", 8, {
    get: (view, littleEndian) => view.getBigInt64(0, littleEndian),
    set: (view, value, littleEndian) => view.setBigInt64(0, value, littleEndian),
});

export const u128 = ByteOrder.define<bigint, 16>("u128", 16, wideInt(false));

export const i128 = ByteOrder.define<bigint, 16>("i128", 16, wideInt(true));

export const f32 = ByteOrder.define<number, 4>("f32", 4, {
    get: (view, littleEndian) => view.getFloat32(0, littleEndian),
    set: (view, value, littleEndian) => view.setFloat32(0, value, littleEndian),
});

export const f64 = ByteOrder.define<number, 8>("f64", 8, {
    get: (view, littleEndian) => view.getFloat64(0, littleEndian),
    set: (view, value, littleEndian) => view.setFloat64(0, value, littleEndian),
});

export const numericTypes = {
    u8, i8,
    u16, i16,
    u32, i32,
    u64, i64,
    u128, i128,
    f32, f64,
} as const;

export type NumericTypeName = keyof typeof numericTypes;

const MASK_64 = (1n << 64n) - 1n;

// DataView has no 128-bit accessors, so the value is split into two 64-bit halves.
function wideInt(signed: boolean): ByteOrder.Layout<bigint> {
    return {
        get(view: DataView, littleEndian: boolean): bigint {
            const high = view.getBigUint64(littleEndian ? 8 : 0, littleEndian);
            const low = view.getBigUint64(littleEndian ? 0 : 8, littleEndian);
            const value = (high << 64n) | low;
            return signed ? BigInt.asIntN(128, value) : value;
        },

        set(view: DataView, value: bigint, littleEndian: boolean): void {
            const bits = BigInt.asUintN(128, value);
            view.setBigUint64(littleEndian ? 8 : 0, bits >> 64n, littleEndian);
            view.setBigUint64(littleEndian ? 0 : 8, bits & MASK_64, littleEndian);
        },
    };
}

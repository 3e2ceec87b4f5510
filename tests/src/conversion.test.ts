import { describe, expect, it } from "vitest";
import {
    BigEndian, ByteLengthError, ByteOrder, Endian, LittleEndian,
    f32, f64, fromBytes, i128, i16, i32, i64, i8, numericTypes, orderOf, toBytes, u128, u16, u32, u64, u8,
} from "@endian-io/runtime";
import { bytes, captureSync } from "./streams.js";

function checkRoundTrip<T>(type: ByteOrder<T>, values: readonly T[]): void {
    for(const value of values) {
        expect(type.fromBeBytes(type.toBeBytes(value))).toBe(value);
        expect(type.fromLeBytes(type.toLeBytes(value))).toBe(value);
    }
}

function checkReversed<T>(type: ByteOrder<T>, values: readonly T[]): void {
    for(const value of values) {
        const be = bytes(type.toBeBytes(value));
        expect(be).toHaveLength(type.width);
        expect(be).toEqual(bytes(type.toLeBytes(value)).reverse());
    }
}

const samples = {
    u8: [0, 1, 127, 128, 255],
    i8: [-128, -1, 0, 1, 127],
    u16: [0, 1, 0x1234, 0xFFFF],
    i16: [-32768, -2, 0, 32767],
    u32: [0, 0xDEADBEEF, 0xFFFFFFFF],
    i32: [-2147483648, -1, 0, 2147483647],
    u64: [0n, 0x0123456789ABCDEFn, (1n << 64n) - 1n],
    i64: [-(1n << 63n), -1n, 0n, (1n << 63n) - 1n],
    u128: [0n, 0x0102030405060708090A0B0C0D0E0F10n, (1n << 128n) - 1n],
    i128: [-(1n << 127n), -1n, 0n, (1n << 127n) - 1n],
    f32: [0, -0, -1.5, 3.140625, Number.POSITIVE_INFINITY, Number.NaN],
    f64: [Math.PI, -0, Number.NEGATIVE_INFINITY, Number.MIN_VALUE, Number.MAX_VALUE, Number.NaN],
};

describe("byte order conversion", () => {
    it("encodes u16 256 in both orders", () => {
        expect(bytes(u16.toBeBytes(256))).toEqual([0x01, 0x00]);
        expect(bytes(u16.toLeBytes(256))).toEqual([0x00, 0x01]);
        expect(u16.fromLeBytes(new Uint8Array([0x00, 0x01]))).toBe(256);
        expect(u16.fromBeBytes(new Uint8Array([0x00, 0x01]))).toBe(1);
    });

    it("encodes i32 -1 as four 0xFF bytes in either order", () => {
        expect(bytes(i32.toBeBytes(-1))).toEqual([0xFF, 0xFF, 0xFF, 0xFF]);
        expect(bytes(i32.toLeBytes(-1))).toEqual([0xFF, 0xFF, 0xFF, 0xFF]);
        expect(i32.fromBeBytes(new Uint8Array([0xFF, 0xFF, 0xFF, 0xFF]))).toBe(-1);
        expect(i32.fromLeBytes(new Uint8Array([0xFF, 0xFF, 0xFF, 0xFF]))).toBe(-1);
    });

    it("lays out 32 and 64-bit integers most significant byte first in big-endian", () => {
        expect(bytes(u32.toBeBytes(0x12345678))).toEqual([0x12, 0x34, 0x56, 0x78]);
        expect(bytes(u32.toLeBytes(0x12345678))).toEqual([0x78, 0x56, 0x34, 0x12]);
        expect(bytes(i16.toBeBytes(-2))).toEqual([0xFF, 0xFE]);
        expect(bytes(u64.toBeBytes(0x0102030405060708n))).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
        expect(bytes(u64.toLeBytes(0x0102030405060708n))).toEqual([8, 7, 6, 5, 4, 3, 2, 1]);
        expect(bytes(i64.toBeBytes(-2n))).toEqual([0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFE]);
    });

    it("lays out 128-bit integers across both halves", () => {
        const value = 0x0102030405060708090A0B0C0D0E0F10n;
        const ascending = Array.from({ length: 16 }, (_, i) => i + 1);
        expect(bytes(u128.toBeBytes(value))).toEqual(ascending);
        expect(bytes(u128.toLeBytes(value))).toEqual([...ascending].reverse());

        const min = -(1n << 127n);
        expect(bytes(i128.toBeBytes(min))).toEqual([0x80, ...new Array<number>(15).fill(0)]);
        expect(bytes(i128.toLeBytes(min))).toEqual([...new Array<number>(15).fill(0), 0x80]);
        expect(i128.fromBeBytes(new Uint8Array(16).fill(0xFF))).toBe(-1n);
        expect(u128.fromBeBytes(new Uint8Array(16).fill(0xFF))).toBe((1n << 128n) - 1n);
    });

    it("encodes floats as their IEEE-754 bit patterns", () => {
        expect(bytes(f32.toBeBytes(1.5))).toEqual([0x3F, 0xC0, 0x00, 0x00]);
        expect(bytes(f32.toLeBytes(-1.5))).toEqual([0x00, 0x00, 0xC0, 0xBF]);
        expect(bytes(f64.toBeBytes(1))).toEqual([0x3F, 0xF0, 0, 0, 0, 0, 0, 0]);
        expect(bytes(f64.toBeBytes(-0))).toEqual([0x80, 0, 0, 0, 0, 0, 0, 0]);
        expect(f64.fromLeBytes(new Uint8Array([0, 0, 0, 0, 0, 0, 0xE0, 0x3F]))).toBe(0.5);
    });

    it("round-trips every type in both orders", () => {
        checkRoundTrip(u8, samples.u8);
        checkRoundTrip(i8, samples.i8);
        checkRoundTrip(u16, samples.u16);
        checkRoundTrip(i16, samples.i16);
        checkRoundTrip(u32, samples.u32);
        checkRoundTrip(i32, samples.i32);
        checkRoundTrip(u64, samples.u64);
        checkRoundTrip(i64, samples.i64);
        checkRoundTrip(u128, samples.u128);
        checkRoundTrip(i128, samples.i128);
        checkRoundTrip(f32, samples.f32);
        checkRoundTrip(f64, samples.f64);
    });

    it("produces big-endian bytes as the reverse of little-endian bytes", () => {
        checkReversed(u16, samples.u16);
        checkReversed(i16, samples.i16);
        checkReversed(u32, samples.u32);
        checkReversed(i32, samples.i32);
        checkReversed(u64, samples.u64);
        checkReversed(i64, samples.i64);
        checkReversed(u128, samples.u128);
        checkReversed(i128, samples.i128);
        checkReversed(f32, samples.f32);
        checkReversed(f64, samples.f64);
        expect(bytes(u16.toBeBytes(0x1234))).not.toEqual(bytes(u16.toLeBytes(0x1234)));
    });

    it("wraps out-of-range input modulo the type's width", () => {
        expect(bytes(u8.toBeBytes(300))).toEqual([44]);
        expect(bytes(i8.toBeBytes(200))).toEqual([200]);
        expect(i8.fromBeBytes(new Uint8Array([200]))).toBe(-56);
        expect(bytes(u16.toLeBytes(-1))).toEqual([0xFF, 0xFF]);
        expect(bytes(u64.toBeBytes(-1n))).toEqual(new Array<number>(8).fill(0xFF));
        expect(bytes(u128.toBeBytes(-1n))).toEqual(new Array<number>(16).fill(0xFF));
        expect(bytes(i128.toLeBytes(1n << 128n))).toEqual(new Array<number>(16).fill(0));
    });

    it("decodes from a view into a larger buffer", () => {
        const backing = new Uint8Array([9, 9, 0x01, 0x00, 9]);
        expect(u16.fromBeBytes(backing.subarray(2, 4))).toBe(256);
    });

    it("rejects buffers of the wrong length", () => {
        const err = captureSync(() => u32.fromBeBytes(new Uint8Array(3)));
        expect(err).toBeInstanceOf(ByteLengthError);
        expect(err).toBeInstanceOf(RangeError);
        expect(err).toMatchObject({
            message: "u32 requires exactly 4 bytes, got 3",
            typeName: "u32",
            expected: 4,
            actual: 3,
        });
        expect(() => u8.fromLeBytes(new Uint8Array(2))).toThrow(ByteLengthError);
    });

    it("lists every numeric type with its width", () => {
        expect(Object.values(numericTypes).map(type => [type.name, type.width])).toEqual([
            ["u8", 1], ["i8", 1],
            ["u16", 2], ["i16", 2],
            ["u32", 4], ["i32", 4],
            ["u64", 8], ["i64", 8],
            ["u128", 16], ["i128", 16],
            ["f32", 4], ["f64", 8],
        ]);
    });
});

describe("run-time byte order", () => {
    it("dispatches to the matching fixed order", () => {
        expect(bytes(u16.toBytes(256, Endian.Big))).toEqual(bytes(u16.toBeBytes(256)));
        expect(bytes(u16.toBytes(256, Endian.Little))).toEqual(bytes(u16.toLeBytes(256)));
        expect(i64.fromBytes(i64.toBeBytes(-7n), Endian.Big)).toBe(-7n);
        expect(i64.fromBytes(i64.toLeBytes(-7n), Endian.Little)).toBe(-7n);
        expect(bytes(toBytes(u32, 1, Endian.Little))).toEqual([1, 0, 0, 0]);
        expect(fromBytes(u32, new Uint8Array([0, 0, 0, 1]), Endian.Big)).toBe(1);
    });

    it("maps each value to its order object", () => {
        expect(orderOf(Endian.Big)).toBe(BigEndian);
        expect(orderOf(Endian.Little)).toBe(LittleEndian);
        expect(BigEndian.endian).toBe("big");
        expect(LittleEndian.endian).toBe("little");
        expect(bytes(BigEndian.toBytes(u16, 256))).toEqual([0x01, 0x00]);
        expect(LittleEndian.fromBytes(u16, new Uint8Array([0x00, 0x01]))).toBe(256);
    });

    it("recognizes only big and little", () => {
        expect(Endian.isEndian("big")).toBe(true);
        expect(Endian.isEndian("little")).toBe(true);
        expect(Endian.isEndian("native")).toBe(false);
        expect(Endian.isEndian(0)).toBe(false);
    });

    it("throws for an unknown order from an untyped caller", () => {
        const order: unknown = JSON.parse('"native"');
        expect(() => Reflect.apply(u16.toBytes, u16, [1, order])).toThrow(new TypeError("Unknown byte order: native"));
    });
});

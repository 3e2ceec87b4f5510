import { ByteOrder } from "./ByteOrder.js";
import { Endian } from "./Endian.js";

/**
 * A byte order fixed by type rather than by a run-time value.
 * The order objects hold no state beyond their tag.
 */
export interface Order<O extends Endian = Endian> {
    readonly endian: O;
    toBytes<T>(type: ByteOrder<T>, value: T): Uint8Array;
    fromBytes<T>(type: ByteOrder<T>, bytes: Uint8Array): T;
}

export type BigEndian = Order<Endian.Big>;

export const BigEndian: BigEndian = {
    endian: Endian.Big,

    toBytes<T>(type: ByteOrder<T>, value: T): Uint8Array {
        return type.toBeBytes(value);
    },

    fromBytes<T>(type: ByteOrder<T>, bytes: Uint8Array): T {
        return type.fromBeBytes(bytes);
    },
};

export type LittleEndian = Order<Endian.Little>;

export const LittleEndian: LittleEndian = {
    endian: Endian.Little,

    toBytes<T>(type: ByteOrder<T>, value: T): Uint8Array {
        return type.toLeBytes(value);
    },

    fromBytes<T>(type: ByteOrder<T>, bytes: Uint8Array): T {
        return type.fromLeBytes(bytes);
    },
};

export function orderOf(endian: Endian.Big): BigEndian;
export function orderOf(endian: Endian.Little): LittleEndian;
export function orderOf(endian: Endian): Order;
export function orderOf(endian: Endian): Order {
    switch(endian) {
        case Endian.Big: return BigEndian;
        case Endian.Little: return LittleEndian;
        default: return Endian.invalid(endian);
    }
}

export function toBytes<T>(type: ByteOrder<T>, value: T, endian: Endian): Uint8Array {
    return type.toBytes(value, endian);
}

export function fromBytes<T>(type: ByteOrder<T>, bytes: Uint8Array, endian: Endian): T {
    return type.fromBytes(bytes, endian);
}

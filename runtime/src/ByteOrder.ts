import { Endian } from "./Endian.js";
import { ByteLengthError } from "./Errors.js";

export type ByteWidth = 1 | 2 | 4 | 8 | 16;

/**
 * Converts values of one fixed-width numeric type to and from their
 * big-endian and little-endian byte representations.
 */
export interface ByteOrder<T, N extends ByteWidth = ByteWidth> {
    readonly name: string;
    readonly width: N;

    toBeBytes(value: T): Uint8Array;
    toLeBytes(value: T): Uint8Array;
    toBytes(value: T, endian: Endian): Uint8Array;

    fromBeBytes(bytes: Uint8Array): T;
    fromLeBytes(bytes: Uint8Array): T;
    fromBytes(bytes: Uint8Array, endian: Endian): T;
}

export namespace ByteOrder {
    /**
     * How a type lays out its value in a `width`-byte view.
     * `littleEndian` follows the `DataView` accessor convention.
     */
    export interface Layout<T> {
        get(view: DataView, littleEndian: boolean): T;
        set(view: DataView, value: T, littleEndian: boolean): void;
    }

    export function define<T, N extends ByteWidth>(name: string, width: N, layout: Layout<T>): ByteOrder<T, N> {
        function encode(value: T, littleEndian: boolean): Uint8Array {
            const bytes = new Uint8Array(width);
            layout.set(new DataView(bytes.buffer), value, littleEndian);
            return bytes;
        }

        function decode(bytes: Uint8Array, littleEndian: boolean): T {
            if(bytes.length !== width) {
                throw new ByteLengthError(name, width, bytes.length);
            }

            return layout.get(new DataView(bytes.buffer, bytes.byteOffset, width), littleEndian);
        }

        return {
            name,
            width,

            toBeBytes(value: T): Uint8Array {
                return encode(value, false);
            },

            toLeBytes(value: T): Uint8Array {
                return encode(value, true);
            },

            toBytes(value: T, endian: Endian): Uint8Array {
                switch(endian) {
                    case Endian.Big: return encode(value, false);
                    case Endian.Little: return encode(value, true);
                    default: return Endian.invalid(endian);
                }
            },

            fromBeBytes(bytes: Uint8Array): T {
                return decode(bytes, false);
            },

            fromLeBytes(bytes: Uint8Array): T {
                return decode(bytes, true);
            },

            fromBytes(bytes: Uint8Array, endian: Endian): T {
                switch(endian) {
                    case Endian.Big: return decode(bytes, false);
                    case Endian.Little: return decode(bytes, true);
                    default: return Endian.invalid(endian);
                }
            },
        };
    }
}

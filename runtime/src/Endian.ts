export type Endian = Endian.Big | Endian.Little;

export namespace Endian {
    export const Big = "big";
    export type Big = typeof Big;

    export const Little = "little";
    export type Little = typeof Little;

    export function isEndian(value: unknown): value is Endian {
        return value === Big || value === Little;
    }

    // Reached only when an untyped caller passes something other than "big" or "little".
    export function invalid(endian: never): never {
        throw new TypeError(`Unknown byte order: ${String(endian)}`);
    }
}

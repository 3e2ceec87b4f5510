/**
 * Base class for errors raised by the stream extensions themselves.
 * Failures reported by the underlying stream are rethrown as they are.
 */
export class EndianIOError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "EndianIOError";
    }
}

/**
 * The stream reached end of input before a whole value was read.
 */
export class UnexpectedEndOfStreamError extends EndianIOError {
    readonly code = "ERR_UNEXPECTED_EOF";

    constructor(readonly expected: number, readonly received: number) {
        super(`Unexpected end of stream: expected ${expected} bytes, received ${received}`);
        this.name = "UnexpectedEndOfStreamError";
    }
}

/**
 * The sink accepted no bytes before the whole value was written.
 */
export class WriteZeroError extends EndianIOError {
    readonly code = "ERR_WRITE_ZERO";

    constructor(readonly expected: number, readonly written: number) {
        super(`Failed to write whole value: wrote ${written} of ${expected} bytes`);
        this.name = "WriteZeroError";
    }
}

export class ByteLengthError extends RangeError {
    constructor(readonly typeName: string, readonly expected: number, readonly actual: number) {
        super(`${typeName} requires exactly ${expected} bytes, got ${actual}`);
        this.name = "ByteLengthError";
    }
}

export function isUnexpectedEndOfStream(err: unknown): err is UnexpectedEndOfStreamError {
    return err instanceof UnexpectedEndOfStreamError;
}

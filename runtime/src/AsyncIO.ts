import { ByteOrder } from "./ByteOrder.js";
import { Endian } from "./Endian.js";
import { UnexpectedEndOfStreamError, WriteZeroError } from "./Errors.js";

/**
 * A byte source whose reads may suspend. `read` resolves with the number of
 * bytes placed in `dst`, at most `dst.length`; 0 means end of input.
 */
export interface AsyncByteSource {
    read(dst: Uint8Array): Promise<number>;
}

/**
 * A byte sink whose writes may suspend. `write` resolves with how many bytes of `src` were accepted.
 */
export interface AsyncByteSink {
    write(src: Uint8Array): Promise<number>;
}

// Bytes taken from the source before a failure, or before the caller stops awaiting, are not given back.
export async function readExact(source: AsyncByteSource, count: number): Promise<Uint8Array> {
    const buffer = new Uint8Array(count);
    let progress = 0;
    while(progress < count) {
        const read = await source.read(buffer.subarray(progress));
        if(read === 0) {
            throw new UnexpectedEndOfStreamError(count, progress);
        }
        progress += read;
    }
    return buffer;
}

export async function writeAll(sink: AsyncByteSink, bytes: Uint8Array): Promise<void> {
    let progress = 0;
    while(progress < bytes.length) {
        const written = await sink.write(bytes.subarray(progress));
        if(written === 0) {
            throw new WriteZeroError(bytes.length, progress);
        }
        progress += written;
    }
}

export class AsyncEndianReader implements AsyncByteSource {
    constructor(private readonly source: AsyncByteSource) {}

    read(dst: Uint8Array): Promise<number> {
        return this.source.read(dst);
    }

    readBytes(count: number): Promise<Uint8Array> {
        return readExact(this.source, count);
    }

    async readBe<T>(type: ByteOrder<T>): Promise<T> {
        return type.fromBeBytes(await readExact(this.source, type.width));
    }

    async readLe<T>(type: ByteOrder<T>): Promise<T> {
        return type.fromLeBytes(await readExact(this.source, type.width));
    }

    async readNe<T>(type: ByteOrder<T>, endian: Endian): Promise<T> {
        switch(endian) {
            case Endian.Big: return this.readBe(type);
            case Endian.Little: return this.readLe(type);
            default: return Endian.invalid(endian);
        }
    }
}

export class AsyncEndianWriter implements AsyncByteSink {
    constructor(private readonly sink: AsyncByteSink) {}

    write(src: Uint8Array): Promise<number> {
        return this.sink.write(src);
    }

    writeBytes(data: Uint8Array): Promise<void> {
        return writeAll(this.sink, data);
    }

    async writeBe<T>(type: ByteOrder<T>, value: T): Promise<void> {
        return writeAll(this.sink, type.toBeBytes(value));
    }

    async writeLe<T>(type: ByteOrder<T>, value: T): Promise<void> {
        return writeAll(this.sink, type.toLeBytes(value));
    }

    async writeNe<T>(type: ByteOrder<T>, value: T, endian: Endian): Promise<void> {
        switch(endian) {
            case Endian.Big: return this.writeBe(type, value);
            case Endian.Little: return this.writeLe(type, value);
            default: return Endian.invalid(endian);
        }
    }
}

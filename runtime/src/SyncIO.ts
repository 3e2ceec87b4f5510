import { ByteOrder } from "./ByteOrder.js";
import { Endian } from "./Endian.js";
import { UnexpectedEndOfStreamError, WriteZeroError } from "./Errors.js";

/**
 * A blocking byte source. `readSync` fills at most `dst.length` bytes and
 * returns how many it read; 0 means end of input.
 */
export interface SyncByteSource {
    readSync(dst: Uint8Array): number;
}

/**
 * A blocking byte sink. `writeSync` returns how many bytes of `src` it accepted.
 */
export interface SyncByteSink {
    writeSync(src: Uint8Array): number;
}

export function readExactSync(source: SyncByteSource, count: number): Uint8Array {
    const buffer = new Uint8Array(count);
    let progress = 0;
    while(progress < count) {
        const read = source.readSync(buffer.subarray(progress));
        if(read === 0) {
            throw new UnexpectedEndOfStreamError(count, progress);
        }
        progress += read;
    }
    return buffer;
}

export function writeAllSync(sink: SyncByteSink, bytes: Uint8Array): void {
    let progress = 0;
    while(progress < bytes.length) {
        const written = sink.writeSync(bytes.subarray(progress));
        if(written === 0) {
            throw new WriteZeroError(bytes.length, progress);
        }
        progress += written;
    }
}

export class SyncEndianReader implements SyncByteSource {
    constructor(private readonly source: SyncByteSource) {}

    readSync(dst: Uint8Array): number {
        return this.source.readSync(dst);
    }

    readBytes(count: number): Uint8Array {
        return readExactSync(this.source, count);
    }

    readBe<T>(type: ByteOrder<T>): T {
        return type.fromBeBytes(readExactSync(this.source, type.width));
    }

    readLe<T>(type: ByteOrder<T>): T {
        return type.fromLeBytes(readExactSync(this.source, type.width));
    }

    readNe<T>(type: ByteOrder<T>, endian: Endian): T {
        switch(endian) {
            case Endian.Big: return this.readBe(type);
            case Endian.Little: return this.readLe(type);
            default: return Endian.invalid(endian);
        }
    }
}

export class SyncEndianWriter implements SyncByteSink {
    constructor(private readonly sink: SyncByteSink) {}

    writeSync(src: Uint8Array): number {
        return this.sink.writeSync(src);
    }

    writeBytes(data: Uint8Array): void {
        writeAllSync(this.sink, data);
    }

    writeBe<T>(type: ByteOrder<T>, value: T): void {
        writeAllSync(this.sink, type.toBeBytes(value));
    }

    writeLe<T>(type: ByteOrder<T>, value: T): void {
        writeAllSync(this.sink, type.toLeBytes(value));
    }

    writeNe<T>(type: ByteOrder<T>, value: T, endian: Endian): void {
        switch(endian) {
            case Endian.Big: return this.writeBe(type, value);
            case Endian.Little: return this.writeLe(type, value);
            default: return Endian.invalid(endian);
        }
    }
}

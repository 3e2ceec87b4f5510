import type { AsyncByteSink, AsyncByteSource } from "./AsyncIO.js";
import type { SyncByteSink, SyncByteSource } from "./SyncIO.js";

export class MemorySource implements SyncByteSource, AsyncByteSource {
    constructor(private readonly data: Uint8Array) {}
    private index: number = 0;

    readSync(dst: Uint8Array): number {
        const count = Math.min(dst.length, this.remaining);
        dst.set(this.data.subarray(this.index, this.index + count));
        this.index += count;
        return count;
    }

    async read(dst: Uint8Array): Promise<number> {
        return this.readSync(dst);
    }

    get remaining(): number {
        return this.data.length - this.index;
    }

    isEOF(): boolean {
        return this.index >= this.data.length;
    }
}

/**
 * Growable in-memory sink. With a `capacity`, writes past it make no progress.
 */
export class MemorySink implements SyncByteSink, AsyncByteSink {
    constructor(readonly capacity: number = Number.POSITIVE_INFINITY) {}
    private readonly data: number[] = [];

    writeSync(src: Uint8Array): number {
        const count = Math.min(src.length, this.capacity - this.data.length);
        for(let i = 0; i < count; ++i) {
            this.data.push(src[i]);
        }
        return count;
    }

    async write(src: Uint8Array): Promise<number> {
        return this.writeSync(src);
    }

    get length(): number {
        return this.data.length;
    }

    toUint8Array(): Uint8Array {
        return new Uint8Array(this.data);
    }
}

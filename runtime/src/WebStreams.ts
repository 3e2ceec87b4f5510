import type {
    ReadableStream, ReadableStreamBYOBReader, ReadableStreamDefaultReader, WritableStream, WritableStreamDefaultWriter,
} from "stream/web";
import { AsyncByteSink, AsyncByteSource, AsyncEndianReader, AsyncEndianWriter } from "./AsyncIO.js";
import { EndianIOError } from "./Errors.js";

export interface LockedByteSource extends AsyncByteSource {
    releaseLock(): void;
}

/**
 * Reads from a byte `ReadableStream` through a BYOB reader. The stream fills
 * at most the requested count, so whatever is not read stays in the stream.
 */
export class WebByteStreamSource implements LockedByteSource {
    constructor(readonly reader: ReadableStreamBYOBReader) {}

    async read(dst: Uint8Array): Promise<number> {
        if(dst.length === 0) {
            return 0;
        }

        // The read transfers the view's buffer, so it gets one of its own.
        const result = await this.reader.read(new Uint8Array(dst.length));
        if(result.done) {
            return 0;
        }

        dst.set(result.value);
        return result.value.length;
    }

    releaseLock(): void {
        this.reader.releaseLock();
    }
}

/**
 * Reads from a `ReadableStream` of byte chunks. The unread tail of the most
 * recent chunk is kept until the next call, and the lock cannot be released
 * while any of it is left.
 */
export class WebStreamSource implements LockedByteSource {
    constructor(readonly reader: ReadableStreamDefaultReader<Uint8Array>) {}

    private pending: Uint8Array = new Uint8Array(0);
    private done: boolean = false;

    async read(dst: Uint8Array): Promise<number> {
        if(dst.length === 0) {
            return 0;
        }

        while(this.pending.length === 0) {
            if(this.done) {
                return 0;
            }

            const result = await this.reader.read();
            if(result.done) {
                this.done = true;
                return 0;
            }
            this.pending = result.value;
        }

        const count = Math.min(this.pending.length, dst.length);
        dst.set(this.pending.subarray(0, count));
        this.pending = this.pending.subarray(count);
        return count;
    }

    releaseLock(): void {
        if(this.pending.length > 0) {
            throw new EndianIOError(`Cannot release the stream with ${this.pending.length} unread bytes of its last chunk`);
        }
        this.reader.releaseLock();
    }
}

export class WebStreamSink implements AsyncByteSink {
    constructor(readonly writer: WritableStreamDefaultWriter<Uint8Array>) {}

    async write(src: Uint8Array): Promise<number> {
        // The stream may queue the chunk, so it gets its own copy.
        await this.writer.write(src.slice());
        return src.length;
    }

    releaseLock(): void {
        this.writer.releaseLock();
    }
}

export class WebStreamReader extends AsyncEndianReader {
    constructor(private readonly lockedSource: LockedByteSource) {
        super(lockedSource);
    }

    releaseLock(): void {
        this.lockedSource.releaseLock();
    }
}

export class WebStreamWriter extends AsyncEndianWriter {
    constructor(private readonly lockedSink: WebStreamSink) {
        super(lockedSink);
    }

    releaseLock(): void {
        this.lockedSink.releaseLock();
    }
}

/**
 * Locks `stream` and reads from it, through a BYOB reader when it is a byte stream.
 */
export function webReader(stream: ReadableStream<Uint8Array>): WebStreamReader {
    return new WebStreamReader(lockSource(stream));
}

export function webWriter(stream: WritableStream<Uint8Array>): WebStreamWriter {
    return new WebStreamWriter(new WebStreamSink(stream.getWriter()));
}

function lockSource(stream: ReadableStream<Uint8Array>): LockedByteSource {
    let reader: ReadableStreamBYOBReader;
    try {
        reader = stream.getReader({ mode: "byob" });
    }
    catch(e) {
        // Only byte streams hand out BYOB readers; anything else is read chunk by chunk.
        if(!(e instanceof TypeError) || stream.locked) {
            throw e;
        }
        return new WebStreamSource(stream.getReader());
    }
    return new WebByteStreamSource(reader);
}

import { Readable, Writable } from "stream";
import { AsyncByteSink, AsyncByteSource, AsyncEndianReader, AsyncEndianWriter } from "./AsyncIO.js";

/**
 * Reads from a Node.js `Readable` in paused mode. Chunks larger than the
 * requested count are split and the remainder is returned to the stream
 * with `unshift`, so other consumers of the stream see it next.
 */
export class NodeStreamSource implements AsyncByteSource {
    constructor(readonly stream: Readable) {}

    async read(dst: Uint8Array): Promise<number> {
        if(dst.length === 0) {
            return 0;
        }

        while(true) {
            if(this.stream.errored !== null) {
                throw this.stream.errored;
            }
            if(this.stream.readableEnded || this.stream.destroyed) {
                return 0;
            }

            const chunk: unknown = this.stream.read();
            if(chunk === null) {
                await nextEvent(this.stream);
                continue;
            }
            if(!(chunk instanceof Uint8Array)) {
                throw new TypeError(`Expected a byte stream, got a chunk of type ${typeof chunk}`);
            }

            const count = Math.min(chunk.length, dst.length);
            dst.set(chunk.subarray(0, count));
            if(count < chunk.length) {
                this.stream.unshift(chunk.subarray(count));
            }
            return count;
        }
    }
}

/**
 * Writes to a Node.js `Writable`. Each write settles once the stream's
 * write callback runs, with the stream's own error if it fails.
 */
export class NodeStreamSink implements AsyncByteSink {
    constructor(readonly stream: Writable) {}

    write(src: Uint8Array): Promise<number> {
        return new Promise((resolve, reject) => {
            this.stream.write(src, err => {
                if(err) {
                    reject(err);
                }
                else {
                    resolve(src.length);
                }
            });
        });
    }
}

export function nodeReader(stream: Readable): AsyncEndianReader {
    return new AsyncEndianReader(new NodeStreamSource(stream));
}

export function nodeWriter(stream: Writable): AsyncEndianWriter {
    return new AsyncEndianWriter(new NodeStreamSink(stream));
}

function nextEvent(stream: Readable): Promise<void> {
    return new Promise((resolve, reject) => {
        const onReady = (): void => {
            cleanup();
            resolve();
        };
        const onError = (err: Error): void => {
            cleanup();
            reject(err);
        };
        const cleanup = (): void => {
            stream.off("readable", onReady);
            stream.off("end", onReady);
            stream.off("close", onReady);
            stream.off("error", onError);
        };

        stream.on("readable", onReady);
        stream.on("end", onReady);
        stream.on("close", onReady);
        stream.on("error", onError);
    });
}

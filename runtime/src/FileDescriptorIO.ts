import * as fs from "fs";
import type { SyncByteSink, SyncByteSource } from "./SyncIO.js";

/**
 * Blocking reads from an open file descriptor. With a `position`, reads
 * start there and advance it; with `null`, the descriptor's own file
 * position is used.
 */
export class FileDescriptorSource implements SyncByteSource {
    constructor(readonly fd: number, private position: number | null = null) {}

    readSync(dst: Uint8Array): number {
        const count = fs.readSync(this.fd, dst, 0, dst.length, this.position);
        if(this.position !== null) {
            this.position += count;
        }
        return count;
    }
}

export class FileDescriptorSink implements SyncByteSink {
    constructor(readonly fd: number, private position: number | null = null) {}

    writeSync(src: Uint8Array): number {
        const count = fs.writeSync(this.fd, src, 0, src.length, this.position);
        if(this.position !== null) {
            this.position += count;
        }
        return count;
    }
}

export { Endian } from "./Endian.js";
export { ByteOrder } from "./ByteOrder.js";
export type { ByteWidth } from "./ByteOrder.js";
export { u8, i8, u16, i16, u32, i32, u64, i64, u128, i128, f32, f64, numericTypes } from "./NumericTypes.js";
export type { NumericTypeName } from "./NumericTypes.js";
export { BigEndian, LittleEndian, orderOf, toBytes, fromBytes } from "./Order.js";
export type { Order } from "./Order.js";

export { EndianIOError, UnexpectedEndOfStreamError, WriteZeroError, ByteLengthError, isUnexpectedEndOfStream } from "./Errors.js";

export { SyncEndianReader, SyncEndianWriter, readExactSync, writeAllSync } from "./SyncIO.js";
export type { SyncByteSource, SyncByteSink } from "./SyncIO.js";
export { AsyncEndianReader, AsyncEndianWriter, readExact, writeAll } from "./AsyncIO.js";
export type { AsyncByteSource, AsyncByteSink } from "./AsyncIO.js";

export { NodeStreamSource, NodeStreamSink, nodeReader, nodeWriter } from "./NodeStreams.js";
export { WebByteStreamSource, WebStreamSource, WebStreamSink, WebStreamReader, WebStreamWriter, webReader, webWriter } from "./WebStreams.js";
export type { LockedByteSource } from "./WebStreams.js";
export { MemorySource, MemorySink } from "./MemoryIO.js";
export { FileDescriptorSource, FileDescriptorSink } from "./FileDescriptorIO.js";

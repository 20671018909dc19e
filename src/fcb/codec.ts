/**
 * Primitive codec: fixed-width little-endian scalars, blobs and length-prefixed strings.
 * Knows nothing about the node tree.
 */

import { EncodingError, TruncatedInputError } from "../errors.js";
import { CANONICAL_NAN32_BITS, CANONICAL_NAN64_BITS, FcbValue, NanBits, VECTOR_LENGTH, ValueKind, kindName } from "./types.js";

export type StringEncoding = "utf-8" | "latin1";

/** Read cursor over [start, end) of a buffer. Positions are absolute in the buffer. */
export class ByteCursor {
	private readonly buffer: Buffer;
	private offset: number;
	public readonly end: number;

	constructor(buffer: Buffer, start = 0, end = buffer.length) {
		this.buffer = buffer;
		this.offset = start;
		this.end = end;
	}

	get position(): number {
		return this.offset;
	}

	get remaining(): number {
		return this.end - this.offset;
	}

	/** Cursor over the next `length` bytes; this cursor skips past them. */
	public sub(length: number): ByteCursor {
		this.need(length, "sub-range");
		const cursor = new ByteCursor(this.buffer, this.offset, this.offset + length);
		this.offset += length;
		return cursor;
	}

	public readUInt8(): number {
		this.need(1, "UInt8");
		return this.buffer.readUInt8(this.offset++);
	}

	public readInt8(): number {
		this.need(1, "Int8");
		return this.buffer.readInt8(this.offset++);
	}

	public readUInt16(): number {
		this.need(2, "UInt16");
		const v = this.buffer.readUInt16LE(this.offset);
		this.offset += 2;
		return v;
	}

	public readInt16(): number {
		this.need(2, "Int16");
		const v = this.buffer.readInt16LE(this.offset);
		this.offset += 2;
		return v;
	}

	public readUInt32(): number {
		this.need(4, "UInt32");
		const v = this.buffer.readUInt32LE(this.offset);
		this.offset += 4;
		return v;
	}

	public readInt32(): number {
		this.need(4, "Int32");
		const v = this.buffer.readInt32LE(this.offset);
		this.offset += 4;
		return v;
	}

	public readBigUInt64(): bigint {
		this.need(8, "UInt64");
		const v = this.buffer.readBigUInt64LE(this.offset);
		this.offset += 8;
		return v;
	}

	public readBigInt64(): bigint {
		this.need(8, "Int64");
		const v = this.buffer.readBigInt64LE(this.offset);
		this.offset += 8;
		return v;
	}

	/** Copy of the next `length` bytes */
	public readBytes(length: number): Uint8Array {
		this.need(length, `${length}-byte blob`);
		const out = new Uint8Array(this.buffer.subarray(this.offset, this.offset + length));
		this.offset += length;
		return out;
	}

	private need(n: number, what: string): void {
		if (n < 0 || this.offset + n > this.end) {
			throw new TruncatedInputError(`Need ${n} bytes for ${what}, ${this.remaining} remaining`, this.offset);
		}
	}
}

/** Growable write target; chunks are concatenated once at the end. */
export class ByteSink {
	private chunks: Buffer[] = [];
	private size = 0;

	get length(): number {
		return this.size;
	}

	public writeUInt8(v: number): number {
		return this.push(1, (b) => b.writeUInt8(v, 0));
	}

	public writeInt8(v: number): number {
		return this.push(1, (b) => b.writeInt8(v, 0));
	}

	public writeUInt16(v: number): number {
		return this.push(2, (b) => b.writeUInt16LE(v, 0));
	}

	public writeInt16(v: number): number {
		return this.push(2, (b) => b.writeInt16LE(v, 0));
	}

	public writeUInt32(v: number): number {
		return this.push(4, (b) => b.writeUInt32LE(v, 0));
	}

	public writeInt32(v: number): number {
		return this.push(4, (b) => b.writeInt32LE(v, 0));
	}

	public writeBigUInt64(v: bigint): number {
		return this.push(8, (b) => b.writeBigUInt64LE(v, 0));
	}

	public writeBigInt64(v: bigint): number {
		return this.push(8, (b) => b.writeBigInt64LE(v, 0));
	}

	public writeFloat32(v: number): number {
		return this.push(4, (b) => b.writeFloatLE(v, 0));
	}

	public writeFloat64(v: number): number {
		return this.push(8, (b) => b.writeDoubleLE(v, 0));
	}

	public writeBytes(bytes: Uint8Array): number {
		const b = Buffer.from(bytes);
		this.chunks.push(b);
		this.size += b.length;
		return b.length;
	}

	public toBuffer(): Buffer {
		return Buffer.concat(this.chunks, this.size);
	}

	private push(n: number, fill: (b: Buffer) => void): number {
		const b = Buffer.alloc(n);
		fill(b);
		this.chunks.push(b);
		this.size += n;
		return n;
	}
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** u32 byte length (terminator included), bytes, NUL */
export function readString(cursor: ByteCursor, encoding: StringEncoding = "utf-8"): string {
	const start = cursor.position;
	const length = cursor.readUInt32();
	if (length === 0) {
		throw new EncodingError("String length 0 leaves no room for the terminator", start);
	}
	const bytes = cursor.readBytes(length);
	const nul = bytes.indexOf(0);
	if (nul !== length - 1) {
		throw new EncodingError(
			nul < 0 ? `String of declared length ${length} is not NUL-terminated` : `String of declared length ${length} ends at byte ${nul}`,
			start
		);
	}
	const content = bytes.subarray(0, length - 1);
	if (encoding === "latin1") return Buffer.from(content).toString("latin1");
	try {
		return utf8Decoder.decode(content);
	} catch {
		throw new EncodingError("String is not valid UTF-8", start);
	}
}

export function writeString(sink: ByteSink, value: string, encoding: StringEncoding = "utf-8"): number {
	if (value.includes("\0")) {
		throw new EncodingError(`String contains a NUL character: ${JSON.stringify(value)}`);
	}
	if (encoding === "latin1" && /[^\u0000-\u00ff]/.test(value)) {
		throw new EncodingError(`String is not representable in latin1: ${JSON.stringify(value)}`);
	}
	const bytes = Buffer.from(value + "\0", encoding === "latin1" ? "latin1" : "utf8");
	return sink.writeUInt32(bytes.length) + sink.writeBytes(bytes);
}

const scratch = Buffer.alloc(8);

function floatFromBits(bits: bigint, wide: boolean): number {
	if (wide) {
		scratch.writeBigUInt64LE(bits, 0);
		return scratch.readDoubleLE(0);
	}
	scratch.writeUInt32LE(Number(bits), 0);
	return scratch.readFloatLE(0);
}

/** Reads `count` floats through their bit patterns; NaNs other than the canonical one keep theirs. */
function readFloats(cursor: ByteCursor, count: number, wide: boolean): { values: number[]; nanBits?: NanBits } {
	const canonical = wide ? CANONICAL_NAN64_BITS : CANONICAL_NAN32_BITS;
	const values: number[] = [];
	let nanBits: NanBits | undefined;
	for (let i = 0; i < count; i++) {
		const bits = wide ? cursor.readBigUInt64() : BigInt(cursor.readUInt32());
		const v = floatFromBits(bits, wide);
		if (Number.isNaN(v) && bits !== canonical) {
			nanBits = nanBits ?? [];
			nanBits[i] = bits;
		}
		values.push(v);
	}
	return nanBits ? { values, nanBits } : { values };
}

function writeFloats(sink: ByteSink, values: number[], nanBits: NanBits | undefined, wide: boolean): number {
	let written = 0;
	values.forEach((v, i) => {
		const bits = Number.isNaN(v) ? nanBits?.[i] : undefined;
		if (bits === undefined) {
			written += wide ? sink.writeFloat64(v) : sink.writeFloat32(v);
		} else {
			written += wide ? sink.writeBigUInt64(bits) : sink.writeUInt32(Number(bits));
		}
	});
	return written;
}

export function readScalar(cursor: ByteCursor, kind: ValueKind): FcbValue {
	switch (kind) {
		case ValueKind.Blob: {
			const length = cursor.readUInt32();
			return { kind, value: cursor.readBytes(length) };
		}
		case ValueKind.Bool: {
			const at = cursor.position;
			const b = cursor.readUInt8();
			if (b > 1) throw new EncodingError(`Bool byte ${b} is neither 0 nor 1`, at);
			return { kind, value: b === 1 };
		}
		case ValueKind.Int8:
			return { kind, value: cursor.readInt8() };
		case ValueKind.UInt8:
			return { kind, value: cursor.readUInt8() };
		case ValueKind.Int16:
			return { kind, value: cursor.readInt16() };
		case ValueKind.UInt16:
			return { kind, value: cursor.readUInt16() };
		case ValueKind.Int32:
			return { kind, value: cursor.readInt32() };
		case ValueKind.UInt32:
			return { kind, value: cursor.readUInt32() };
		case ValueKind.Int64:
			return { kind, value: cursor.readBigInt64() };
		case ValueKind.UInt64:
			return { kind, value: cursor.readBigUInt64() };
		case ValueKind.Id64:
			return { kind, value: cursor.readBigUInt64() };
		case ValueKind.Float32:
		case ValueKind.Float64: {
			const { values, nanBits } = readFloats(cursor, 1, kind === ValueKind.Float64);
			return nanBits ? { kind, value: values[0], nanBits } : { kind, value: values[0] };
		}
		case ValueKind.String:
			return { kind, value: readString(cursor) };
		case ValueKind.Vector2:
		case ValueKind.Vector3:
		case ValueKind.Vector4: {
			const { values, nanBits } = readFloats(cursor, VECTOR_LENGTH[kind], false);
			return nanBits ? { kind, value: values, nanBits } : { kind, value: values };
		}
	}
}

const INT_RANGE: Record<number, [number, number]> = {
	[ValueKind.Int8]: [-0x80, 0x7f],
	[ValueKind.UInt8]: [0, 0xff],
	[ValueKind.Int16]: [-0x8000, 0x7fff],
	[ValueKind.UInt16]: [0, 0xffff],
	[ValueKind.Int32]: [-0x80000000, 0x7fffffff],
	[ValueKind.UInt32]: [0, 0xffffffff]
};

const BIGINT_RANGE: Record<number, [bigint, bigint]> = {
	[ValueKind.Int64]: [-(1n << 63n), (1n << 63n) - 1n],
	[ValueKind.UInt64]: [0n, (1n << 64n) - 1n],
	[ValueKind.Id64]: [0n, (1n << 64n) - 1n]
};

/** Range check for integer kinds; the markup reader uses it too. */
export function checkRange(kind: ValueKind, value: number | bigint): void {
	if (typeof value === "bigint") {
		const range = BIGINT_RANGE[kind];
		if (range && (value < range[0] || value > range[1])) {
			throw new EncodingError(`${value} is out of range for ${kindName(kind)}`);
		}
		return;
	}
	const range = INT_RANGE[kind];
	if (range && (!Number.isInteger(value) || value < range[0] || value > range[1])) {
		throw new EncodingError(`${value} is not a valid ${kindName(kind)}`);
	}
}

export function writeScalar(sink: ByteSink, v: FcbValue): number {
	switch (v.kind) {
		case ValueKind.Blob:
			return sink.writeUInt32(v.value.length) + sink.writeBytes(v.value);
		case ValueKind.Bool:
			return sink.writeUInt8(v.value ? 1 : 0);
		case ValueKind.Int8:
			checkRange(v.kind, v.value);
			return sink.writeInt8(v.value);
		case ValueKind.UInt8:
			checkRange(v.kind, v.value);
			return sink.writeUInt8(v.value);
		case ValueKind.Int16:
			checkRange(v.kind, v.value);
			return sink.writeInt16(v.value);
		case ValueKind.UInt16:
			checkRange(v.kind, v.value);
			return sink.writeUInt16(v.value);
		case ValueKind.Int32:
			checkRange(v.kind, v.value);
			return sink.writeInt32(v.value);
		case ValueKind.UInt32:
			checkRange(v.kind, v.value);
			return sink.writeUInt32(v.value);
		case ValueKind.Int64:
			checkRange(v.kind, v.value);
			return sink.writeBigInt64(v.value);
		case ValueKind.UInt64:
		case ValueKind.Id64:
			checkRange(v.kind, v.value);
			return sink.writeBigUInt64(v.value);
		case ValueKind.Float32:
			return writeFloats(sink, [v.value], v.nanBits, false);
		case ValueKind.Float64:
			return writeFloats(sink, [v.value], v.nanBits, true);
		case ValueKind.String:
			return writeString(sink, v.value);
		case ValueKind.Vector2:
		case ValueKind.Vector3:
		case ValueKind.Vector4: {
			const n = VECTOR_LENGTH[v.kind];
			if (v.value.length !== n) {
				throw new EncodingError(`${kindName(v.kind)} needs ${n} components, got ${v.value.length}`);
			}
			return writeFloats(sink, v.value, v.nanBits, false);
		}
	}
}

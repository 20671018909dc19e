import { describe, expect, it } from "vitest";
import { EncodingError, TruncatedInputError } from "../errors.js";
import { ByteCursor, ByteSink, readScalar, readString, writeScalar, writeString } from "./codec.js";
import { ValueKind } from "./types.js";

function stringBytes(length: number, content: number[]): Buffer {
	const b = Buffer.alloc(4 + content.length);
	b.writeUInt32LE(length, 0);
	Buffer.from(content).copy(b, 4);
	return b;
}

describe("ByteCursor", () => {
	it("reads little-endian scalars", () => {
		const cursor = new ByteCursor(Buffer.from([0x01, 0x02, 0x03, 0x04, 0xff, 0xff]));
		expect(cursor.readUInt32()).toBe(0x04030201);
		expect(cursor.readInt16()).toBe(-1);
		expect(cursor.remaining).toBe(0);
	});

	it("throws TruncatedInputError with the offset where the read started", () => {
		const cursor = new ByteCursor(Buffer.from([1, 2, 3]));
		cursor.readUInt8();
		try {
			cursor.readUInt32();
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(TruncatedInputError);
			expect(err).toHaveProperty("code", "TRUNCATED_INPUT");
			expect(err).toHaveProperty("offset", 1);
		}
	});

	it("keeps sub-cursors inside their range", () => {
		const cursor = new ByteCursor(Buffer.from([1, 2, 3, 4, 5]));
		const sub = cursor.sub(2);
		expect(cursor.position).toBe(2);
		expect(sub.readUInt8()).toBe(1);
		expect(sub.readUInt8()).toBe(2);
		expect(() => sub.readUInt8()).toThrow(TruncatedInputError);
	});
});

describe("strings", () => {
	it("reads a NUL-terminated UTF-8 string whose length includes the terminator", () => {
		expect(readString(new ByteCursor(stringBytes(4, [0x61, 0x62, 0x63, 0])))).toBe("abc");
	});

	it("rejects a zero length", () => {
		expect(() => readString(new ByteCursor(stringBytes(0, [])))).toThrow(EncodingError);
	});

	it("rejects a missing terminator", () => {
		expect(() => readString(new ByteCursor(stringBytes(3, [0x61, 0x62, 0x63])))).toThrow(EncodingError);
	});

	it("rejects an embedded NUL", () => {
		expect(() => readString(new ByteCursor(stringBytes(4, [0x61, 0, 0x63, 0])))).toThrow(/ends at byte 1/);
	});

	it("rejects invalid UTF-8 but reads the same bytes as latin1", () => {
		expect(() => readString(new ByteCursor(stringBytes(2, [0xff, 0])))).toThrow(EncodingError);
		expect(readString(new ByteCursor(stringBytes(2, [0xff, 0])), "latin1")).toBe("ÿ");
	});

	it("writes length, bytes and terminator", () => {
		const sink = new ByteSink();
		expect(writeString(sink, "hé")).toBe(8);
		expect([...sink.toBuffer()]).toEqual([4, 0, 0, 0, 0x68, 0xc3, 0xa9, 0]);
	});

	it("refuses strings that cannot be encoded", () => {
		expect(() => writeString(new ByteSink(), "a\0b")).toThrow(EncodingError);
		expect(() => writeString(new ByteSink(), "€", "latin1")).toThrow(EncodingError);
	});
});

describe("scalars", () => {
	it("writes Int8 as one two's-complement byte", () => {
		const sink = new ByteSink();
		expect(writeScalar(sink, { kind: ValueKind.Int8, value: -5 })).toBe(1);
		expect([...sink.toBuffer()]).toEqual([0xfb]);
	});

	it("rejects out-of-range integers", () => {
		expect(() => writeScalar(new ByteSink(), { kind: ValueKind.Int8, value: 200 })).toThrow(EncodingError);
		expect(() => writeScalar(new ByteSink(), { kind: ValueKind.UInt32, value: -1 })).toThrow(EncodingError);
		expect(() => writeScalar(new ByteSink(), { kind: ValueKind.Int64, value: 1n << 63n })).toThrow(EncodingError);
	});

	it("reads back the largest Id64", () => {
		const sink = new ByteSink();
		writeScalar(sink, { kind: ValueKind.Id64, value: 0xffffffffffffffffn });
		expect(readScalar(new ByteCursor(sink.toBuffer()), ValueKind.Id64)).toEqual({ kind: ValueKind.Id64, value: 0xffffffffffffffffn });
	});

	it("stores vectors as consecutive Float32 values", () => {
		const sink = new ByteSink();
		expect(writeScalar(sink, { kind: ValueKind.Vector2, value: [1.5, -2] })).toBe(8);
		const buf = sink.toBuffer();
		expect(buf.readFloatLE(0)).toBe(1.5);
		expect(buf.readFloatLE(4)).toBe(-2);
	});

	it("keeps the bit patterns of non-canonical NaNs", () => {
		const bytes = Buffer.from([0x01, 0x00, 0x80, 0x7f, 0x00, 0x00, 0xc0, 0x7f, 0x34, 0x12, 0xc0, 0xff, 0x01, 0, 0, 0, 0, 0, 0xf0, 0x7f]);
		const cursor = new ByteCursor(bytes);
		const scalar = readScalar(cursor, ValueKind.Float32);
		const vector = readScalar(cursor, ValueKind.Vector2);
		const wide = readScalar(cursor, ValueKind.Float64);
		expect(scalar).toEqual({ kind: ValueKind.Float32, value: NaN, nanBits: [0x7f800001n] });
		expect(wide).toEqual({ kind: ValueKind.Float64, value: NaN, nanBits: [0x7ff0000000000001n] });
		const sink = new ByteSink();
		writeScalar(sink, scalar);
		writeScalar(sink, vector);
		writeScalar(sink, wide);
		expect(sink.toBuffer().toString("hex")).toBe(bytes.toString("hex"));
	});

	it("writes the canonical NaN, and ignores kept bits once the value is a number", () => {
		const sink = new ByteSink();
		writeScalar(sink, { kind: ValueKind.Float32, value: NaN });
		writeScalar(sink, { kind: ValueKind.Float32, value: 1, nanBits: [0x7f800001n] });
		expect(sink.toBuffer().toString("hex")).toBe("0000c07f0000803f");
	});

	it("rejects vectors of the wrong length", () => {
		expect(() => writeScalar(new ByteSink(), { kind: ValueKind.Vector3, value: [1, 2] })).toThrow(/needs 3 components/);
	});

	it("rejects Bool bytes other than 0 and 1", () => {
		expect(() => readScalar(new ByteCursor(Buffer.from([2])), ValueKind.Bool)).toThrow(EncodingError);
		expect(readScalar(new ByteCursor(Buffer.from([1])), ValueKind.Bool)).toEqual({ kind: ValueKind.Bool, value: true });
	});

	it("reads a Blob as its own copy", () => {
		const buf = Buffer.from([2, 0, 0, 0, 0xaa, 0xbb]);
		const value = readScalar(new ByteCursor(buf), ValueKind.Blob);
		buf[4] = 0;
		expect(value).toEqual({ kind: ValueKind.Blob, value: new Uint8Array([0xaa, 0xbb]) });
	});
});

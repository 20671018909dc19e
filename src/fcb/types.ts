/**
 * FCB types – binary resource tree of the level files.
 * Layout: header (magic, version, flags, root count, node count, attribute count) + depth-first nodes.
 */

export const FCB_MAGIC = 0x4643626e; // "nbCF"
export const FCB_VERSION = 3;
export const FCB_HEADER_SIZE = 20;
/** tag + payloadLength */
export const NODE_HEADER_SIZE = 8;

export enum ValueKind {
	Blob = 0,
	Bool = 1,
	Int8 = 2,
	UInt8 = 3,
	Int16 = 4,
	UInt16 = 5,
	Int32 = 6,
	UInt32 = 7,
	Int64 = 8,
	UInt64 = 9,
	Float32 = 10,
	Float64 = 11,
	String = 12,
	Vector2 = 13,
	Vector3 = 14,
	Vector4 = 15,
	Id64 = 16
}

export type IntegerKind = ValueKind.Int8 | ValueKind.UInt8 | ValueKind.Int16 | ValueKind.UInt16 | ValueKind.Int32 | ValueKind.UInt32;
export type BigIntKind = ValueKind.Int64 | ValueKind.UInt64 | ValueKind.Id64;
export type FloatKind = ValueKind.Float32 | ValueKind.Float64;
export type VectorKind = ValueKind.Vector2 | ValueKind.Vector3 | ValueKind.Vector4;

export interface ValueKindMap {
	[ValueKind.Blob]: Uint8Array;
	[ValueKind.Bool]: boolean;
	[ValueKind.Int8]: number;
	[ValueKind.UInt8]: number;
	[ValueKind.Int16]: number;
	[ValueKind.UInt16]: number;
	[ValueKind.Int32]: number;
	[ValueKind.UInt32]: number;
	[ValueKind.Int64]: bigint;
	[ValueKind.UInt64]: bigint;
	[ValueKind.Float32]: number;
	[ValueKind.Float64]: number;
	[ValueKind.String]: string;
	[ValueKind.Vector2]: number[];
	[ValueKind.Vector3]: number[];
	[ValueKind.Vector4]: number[];
	[ValueKind.Id64]: bigint;
}

/** Float32 and Float64 NaN patterns JavaScript produces when it writes NaN */
export const CANONICAL_NAN32_BITS = 0x7fc00000n;
export const CANONICAL_NAN64_BITS = 0x7ff8000000000000n;

/** Raw bits of NaN components other than the canonical one, by component index (0 for scalars). */
export type NanBits = Array<bigint | undefined>;

export type FloatBearingKind = FloatKind | VectorKind;

type TypedValue<K extends ValueKind> = K extends FloatBearingKind
	? { kind: K; value: ValueKindMap[K]; nanBits?: NanBits }
	: { kind: K; value: ValueKindMap[K] };

/** A typed value: `kind` discriminates the JS type of `value`. */
export type FcbValue = { [K in ValueKind]: TypedValue<K> }[ValueKind];

export type FcbAttribute = FcbValue & {
	/** CRC-32 of the member name */
	hash: number;
};

export interface FcbNode {
	tag: number;
	attributes: FcbAttribute[];
	children: FcbNode[];
	/** Verbatim payload of a node whose tag is not in the vocabulary. */
	opaque?: Uint8Array;
	sourceOffset?: number;
	sourceLength?: number;
}

export interface ResourceFile {
	name: string;
	version: number;
	flags: number;
	roots: FcbNode[];
}

export interface FcbHeader {
	magic: number;
	version: number;
	flags: number;
	rootCount: number;
	nodeCount: number;
	attributeCount: number;
}

export const VECTOR_LENGTH: Record<VectorKind, number> = {
	[ValueKind.Vector2]: 2,
	[ValueKind.Vector3]: 3,
	[ValueKind.Vector4]: 4
};

export function isValueKind(n: number): n is ValueKind {
	return Number.isInteger(n) && n >= ValueKind.Blob && n <= ValueKind.Id64;
}

export function isIntegerKind(kind: ValueKind): kind is IntegerKind {
	return kind >= ValueKind.Int8 && kind <= ValueKind.UInt32;
}

export function isBigIntKind(kind: ValueKind): kind is BigIntKind {
	return kind === ValueKind.Int64 || kind === ValueKind.UInt64 || kind === ValueKind.Id64;
}

export function isVectorKind(kind: ValueKind): kind is VectorKind {
	return kind === ValueKind.Vector2 || kind === ValueKind.Vector3 || kind === ValueKind.Vector4;
}

export function kindName(kind: ValueKind): string {
	return ValueKind[kind];
}

const KIND_BY_NAME = new Map<string, ValueKind>(
	Object.values(ValueKind)
		.filter((v): v is ValueKind => typeof v === "number")
		.map((k) => [ValueKind[k], k])
);

export function kindFromName(name: string): ValueKind | undefined {
	return KIND_BY_NAME.get(name);
}

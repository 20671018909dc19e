/**
 * Text form of typed values in markup attributes.
 *
 * A value is written plainly when the vocabulary declares its member's kind and the kinds agree,
 * otherwise as `Kind:text`. Float32 texts are the shortest decimals that parse back to the same bits;
 * NaNs other than the canonical one are written with their pattern, as `NaN:0x7F800001`.
 */

import { EncodingError, MarkupFormatError } from "../errors.js";
import { checkRange } from "../fcb/codec.js";
import {
	CANONICAL_NAN32_BITS,
	CANONICAL_NAN64_BITS,
	FcbValue,
	FloatKind,
	NanBits,
	VECTOR_LENGTH,
	ValueKind,
	VectorKind,
	isVectorKind,
	kindFromName,
	kindName
} from "../fcb/types.js";

const KIND_PREFIX = /^([A-Za-z0-9]+):/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^-?\d+$/;
const HEX = /^(?:[0-9A-Fa-f]{2})*$/;
const NAN_PATTERN = /^NaN:0x([0-9A-Fa-f]{1,16})$/;

function formatNan(bits: bigint | undefined, digits: number): string {
	return bits === undefined ? "NaN" : `NaN:0x${bits.toString(16).toUpperCase().padStart(digits, "0")}`;
}

/** Shortest decimal that `Math.fround` maps back to `v` */
export function formatFloat32(v: number, nanBits?: bigint): string {
	if (Number.isNaN(v)) return formatNan(nanBits, 8);
	if (v === Infinity) return "Infinity";
	if (v === -Infinity) return "-Infinity";
	if (Object.is(v, -0)) return "-0";
	const f = Math.fround(v);
	for (let p = 1; p <= 9; p++) {
		const candidate = Number(f.toPrecision(p));
		if (Math.fround(candidate) === f) return String(candidate);
	}
	return String(f);
}

export function formatFloat64(v: number, nanBits?: bigint): string {
	if (Number.isNaN(v)) return formatNan(nanBits, 16);
	if (Object.is(v, -0)) return "-0";
	return String(v);
}

export function formatHex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString("hex").toUpperCase();
}

export function formatValue(v: FcbValue): string {
	switch (v.kind) {
		case ValueKind.Blob:
			return formatHex(v.value);
		case ValueKind.Bool:
			return v.value ? "true" : "false";
		case ValueKind.Float32:
			return formatFloat32(v.value, v.nanBits?.[0]);
		case ValueKind.Float64:
			return formatFloat64(v.value, v.nanBits?.[0]);
		case ValueKind.String:
			return v.value;
		case ValueKind.Vector2:
		case ValueKind.Vector3:
		case ValueKind.Vector4:
			return v.value.map((c, i) => formatFloat32(c, v.nanBits?.[i])).join(",");
		default:
			return String(v.value);
	}
}

function looksPrefixed(text: string): boolean {
	const m = text.match(KIND_PREFIX);
	return m !== null && kindFromName(m[1]) !== undefined;
}

/** Attribute text for a value whose member has `declared` kind (if any) */
export function encodeAttributeValue(v: FcbValue, declared: ValueKind | undefined): string {
	const text = formatValue(v);
	if (declared === v.kind && !(v.kind === ValueKind.String && looksPrefixed(text))) return text;
	return `${kindName(v.kind)}:${text}`;
}

/** Inverse of `encodeAttributeValue`; `where` names the element and attribute in errors. */
export function decodeAttributeValue(text: string, declared: ValueKind | undefined, where: string): FcbValue {
	const m = text.match(KIND_PREFIX);
	const explicit = m ? kindFromName(m[1]) : undefined;
	if (m && explicit !== undefined) {
		return parseValue(explicit, text.slice(m[0].length), where);
	}
	if (declared === undefined) {
		throw new MarkupFormatError(where, `value "${text}" has no kind prefix and the member has no declared kind`);
	}
	return parseValue(declared, text, where);
}

interface ParsedFloat {
	value: number;
	/** Set only for a NaN pattern other than the canonical one */
	nanBits?: bigint;
}

/** Decimal or `NaN:0x…` text; the pattern must be a NaN of the given width. */
function parseFloatText(text: string, wide: boolean, where: string): ParsedFloat {
	const m = text.trim().match(NAN_PATTERN);
	if (!m) return { value: wide ? parseFloat64(text, where) : parseFloat32(text, where) };
	const bits = BigInt(`0x${m[1]}`);
	const [exponent, mantissa, max] = wide ? [0x7ff0000000000000n, 0xfffffffffffffn, 0xffffffffffffffffn] : [0x7f800000n, 0x7fffffn, 0xffffffffn];
	if (bits > max || (bits & exponent) !== exponent || (bits & mantissa) === 0n) {
		throw new MarkupFormatError(where, `"${text}" is not a ${wide ? "Float64" : "Float32"} NaN pattern`);
	}
	return bits === (wide ? CANONICAL_NAN64_BITS : CANONICAL_NAN32_BITS) ? { value: NaN } : { value: NaN, nanBits: bits };
}

function collectNanBits(parts: ParsedFloat[]): NanBits | undefined {
	let nanBits: NanBits | undefined;
	parts.forEach((p, i) => {
		if (p.nanBits === undefined) return;
		nanBits = nanBits ?? [];
		nanBits[i] = p.nanBits;
	});
	return nanBits;
}

export function parseFloat32(text: string, where: string): number {
	return Math.fround(parseFloat64(text, where));
}

export function parseFloat64(text: string, where: string): number {
	const t = text.trim();
	switch (t) {
		case "NaN":
			return NaN;
		case "Infinity":
		case "+Infinity":
			return Infinity;
		case "-Infinity":
			return -Infinity;
	}
	if (!DECIMAL.test(t)) throw new MarkupFormatError(where, `"${text}" is not a number`);
	return Number(t);
}

function parseVector(kind: VectorKind, text: string, where: string): FcbValue {
	const texts = text.split(",");
	if (texts.length !== VECTOR_LENGTH[kind]) {
		throw new MarkupFormatError(where, `${kindName(kind)} needs ${VECTOR_LENGTH[kind]} components, got "${text}"`);
	}
	const parts = texts.map((p) => parseFloatText(p, false, where));
	const value = parts.map((p) => p.value);
	const nanBits = collectNanBits(parts);
	return nanBits ? { kind, value, nanBits } : { kind, value };
}

function parseFloatValue(kind: FloatKind, text: string, where: string): FcbValue {
	const parsed = parseFloatText(text, kind === ValueKind.Float64, where);
	return parsed.nanBits === undefined ? { kind, value: parsed.value } : { kind, value: parsed.value, nanBits: [parsed.nanBits] };
}

function parseInteger(kind: ValueKind, text: string, where: string): number {
	const t = text.trim();
	if (!INTEGER.test(t)) throw new MarkupFormatError(where, `"${text}" is not an integer`);
	const n = Number(t);
	inRange(kind, n, where);
	return n;
}

function parseBigInteger(kind: ValueKind, text: string, where: string): bigint {
	const t = text.trim();
	if (!INTEGER.test(t)) throw new MarkupFormatError(where, `"${text}" is not an integer`);
	const n = BigInt(t);
	inRange(kind, n, where);
	return n;
}

function inRange(kind: ValueKind, n: number | bigint, where: string): void {
	try {
		checkRange(kind, n);
	} catch (err) {
		if (err instanceof EncodingError) throw new MarkupFormatError(where, err.message);
		throw err;
	}
}

function parseBool(text: string, where: string): boolean {
	switch (text.trim()) {
		case "true":
		case "True":
		case "1":
			return true;
		case "false":
		case "False":
		case "0":
			return false;
		default:
			throw new MarkupFormatError(where, `"${text}" is not a Bool`);
	}
}

export function parseHex(text: string, where: string): Uint8Array {
	const t = text.trim();
	if (!HEX.test(t)) throw new MarkupFormatError(where, `"${text}" is not an even-length hex string`);
	return new Uint8Array(Buffer.from(t, "hex"));
}

export function parseValue(kind: ValueKind, text: string, where: string): FcbValue {
	if (isVectorKind(kind)) return parseVector(kind, text, where);
	switch (kind) {
		case ValueKind.Blob:
			return { kind, value: parseHex(text, where) };
		case ValueKind.Bool:
			return { kind, value: parseBool(text, where) };
		case ValueKind.Int8:
		case ValueKind.UInt8:
		case ValueKind.Int16:
		case ValueKind.UInt16:
		case ValueKind.Int32:
		case ValueKind.UInt32:
			return { kind, value: parseInteger(kind, text, where) };
		case ValueKind.Int64:
		case ValueKind.UInt64:
		case ValueKind.Id64:
			return { kind, value: parseBigInteger(kind, text, where) };
		case ValueKind.Float32:
		case ValueKind.Float64:
			return parseFloatValue(kind, text, where);
		case ValueKind.String:
			return { kind, value: text };
		default:
			throw new MarkupFormatError(where, `unsupported kind ${kindName(kind)}`);
	}
}

/** `& < > "` and control characters as character references */
export function escapeMarkup(unsafe: string): string {
	return unsafe.replace(/[<>&"\u0000-\u001f\u007f]/g, (c) => {
		switch (c) {
			case "<":
				return "&lt;";
			case ">":
				return "&gt;";
			case "&":
				return "&amp;";
			case '"':
				return "&quot;";
			default:
				return `&#${c.charCodeAt(0)};`;
		}
	});
}

const NAMED_ENTITIES: Record<string, string> = { amp: "&", lt: "<", gt: ">", quot: '"', apos: "'" };

/** `where` names the element and attribute in errors */
export function unescapeMarkup(text: string, where = "markup"): string {
	return text.replace(/&(#x[0-9A-Fa-f]+|#\d+|amp|lt|gt|quot|apos);/g, (whole, ref: string) => {
		if (!ref.startsWith("#")) return NAMED_ENTITIES[ref] ?? whole;
		const codePoint = ref.startsWith("#x") ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10);
		if (codePoint > 0x10ffff) throw new MarkupFormatError(where, `character reference ${whole} is beyond U+10FFFF`);
		return String.fromCodePoint(codePoint);
	});
}

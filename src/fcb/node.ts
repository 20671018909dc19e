/**
 * Node operations exposed to the editing layer.
 * Attributes are addressed by member name (hashed through the vocabulary) or by hash.
 */

import { InternalConsistencyError } from "../errors.js";
import { formatHashName } from "./hash.js";
import { CANONICAL_NAN32_BITS, CANONICAL_NAN64_BITS, FcbAttribute, FcbNode, FcbValue, NanBits, ValueKind } from "./types.js";
import { Vocabulary } from "./vocabulary.js";

export type MemberKey = string | number;

function keyHash(key: MemberKey, vocab: Vocabulary): number {
	return typeof key === "number" ? key >>> 0 : vocab.memberHashOf(key);
}

function assertDecoded(node: FcbNode, action: string): void {
	if (node.opaque) {
		throw new InternalConsistencyError(`Cannot ${action} on opaque node ${formatHashName(node.tag)}`);
	}
}

/** First attribute with the member's hash */
export function getAttribute(node: FcbNode, key: MemberKey, vocab: Vocabulary = Vocabulary.bundled()): FcbAttribute | undefined {
	const hash = keyHash(key, vocab);
	return node.attributes.find((a) => a.hash === hash);
}

/** Replaces the first attribute with the member's hash in place, or appends. */
export function setAttribute(node: FcbNode, key: MemberKey, value: FcbValue, vocab: Vocabulary = Vocabulary.bundled()): FcbAttribute {
	assertDecoded(node, "set an attribute");
	const hash = keyHash(key, vocab);
	const attr: FcbAttribute = { hash, ...value };
	const index = node.attributes.findIndex((a) => a.hash === hash);
	if (index >= 0) node.attributes[index] = attr;
	else node.attributes.push(attr);
	return attr;
}

export function removeAttribute(node: FcbNode, key: MemberKey, vocab: Vocabulary = Vocabulary.bundled()): boolean {
	assertDecoded(node, "remove an attribute");
	const hash = keyHash(key, vocab);
	const index = node.attributes.findIndex((a) => a.hash === hash);
	if (index < 0) return false;
	node.attributes.splice(index, 1);
	return true;
}

export function listChildren(node: FcbNode, type?: string, vocab: Vocabulary = Vocabulary.bundled()): FcbNode[] {
	if (type === undefined) return [...node.children];
	const tag = vocab.typeTagOf(type);
	return node.children.filter((c) => c.tag === tag);
}

export function addChild(node: FcbNode, child: FcbNode, index = node.children.length): void {
	assertDecoded(node, "add a child");
	if (index < 0 || index > node.children.length) {
		throw new RangeError(`Child index ${index} out of range 0..${node.children.length}`);
	}
	node.children.splice(index, 0, child);
}

export function removeChild(node: FcbNode, index: number): FcbNode {
	assertDecoded(node, "remove a child");
	if (index < 0 || index >= node.children.length) {
		throw new RangeError(`Child index ${index} out of range 0..${node.children.length - 1}`);
	}
	const [removed] = node.children.splice(index, 1);
	return removed;
}

export function reorderChildren(node: FcbNode, from: number, to: number): void {
	assertDecoded(node, "reorder children");
	const n = node.children.length;
	if (from < 0 || from >= n || to < 0 || to >= n) {
		throw new RangeError(`Cannot move child ${from} to ${to} among ${n}`);
	}
	const [moved] = node.children.splice(from, 1);
	node.children.splice(to, 0, moved);
}

/** Vocabulary name, or `_0x…` for unknown tags */
export function typeName(node: FcbNode, vocab: Vocabulary = Vocabulary.bundled()): string {
	return vocab.typeNameOf(node.tag) ?? formatHashName(node.tag);
}

export function cloneValue(v: FcbValue): FcbValue {
	switch (v.kind) {
		case ValueKind.Blob:
			return { kind: v.kind, value: new Uint8Array(v.value) };
		case ValueKind.Vector2:
		case ValueKind.Vector3:
		case ValueKind.Vector4:
			return v.nanBits ? { kind: v.kind, value: [...v.value], nanBits: [...v.nanBits] } : { kind: v.kind, value: [...v.value] };
		case ValueKind.Float32:
		case ValueKind.Float64:
			return v.nanBits ? { kind: v.kind, value: v.value, nanBits: [...v.nanBits] } : { kind: v.kind, value: v.value };
		default:
			return { ...v };
	}
}

/** Deep copy without source offsets */
export function cloneNode(node: FcbNode): FcbNode {
	const copy: FcbNode = {
		tag: node.tag,
		attributes: node.attributes.map((a) => ({ hash: a.hash, ...cloneValue(a) })),
		children: node.children.map(cloneNode)
	};
	if (node.opaque) copy.opaque = new Uint8Array(node.opaque);
	return copy;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	return a.length === b.length && a.every((x, i) => x === b[i]);
}

function floatParts(v: FcbValue): { parts: number[]; nanBits?: NanBits; wide: boolean } | undefined {
	switch (v.kind) {
		case ValueKind.Float32:
			return { parts: [v.value], nanBits: v.nanBits, wide: false };
		case ValueKind.Float64:
			return { parts: [v.value], nanBits: v.nanBits, wide: true };
		case ValueKind.Vector2:
		case ValueKind.Vector3:
		case ValueKind.Vector4:
			return { parts: v.value, nanBits: v.nanBits, wide: false };
		default:
			return undefined;
	}
}

/**
 * Same kind and value. Float32 components compare as the Float32 they serialize to,
 * Float64 as stored; -0 differs from 0 and NaNs compare by bit pattern.
 */
export function valuesEqual(a: FcbValue, b: FcbValue): boolean {
	if (a.kind !== b.kind) return false;
	const fa = floatParts(a);
	const fb = floatParts(b);
	if (fa && fb) {
		const canonical = fa.wide ? CANONICAL_NAN64_BITS : CANONICAL_NAN32_BITS;
		return (
			fa.parts.length === fb.parts.length &&
			fa.parts.every((x, i) => {
				const y = fb.parts[i];
				if (Number.isNaN(x) || Number.isNaN(y)) {
					return Number.isNaN(x) && Number.isNaN(y) && (fa.nanBits?.[i] ?? canonical) === (fb.nanBits?.[i] ?? canonical);
				}
				return fa.wide ? Object.is(x, y) : Object.is(Math.fround(x), Math.fround(y));
			})
		);
	}
	const x = a.value;
	const y = b.value;
	if (x instanceof Uint8Array) return y instanceof Uint8Array && bytesEqual(x, y);
	return Object.is(x, y);
}

/** Tag, attribute order and values, children and opaque payloads; source offsets are ignored. */
export function nodesEqual(a: FcbNode, b: FcbNode): boolean {
	if (a.tag !== b.tag) return false;
	if (a.opaque || b.opaque) {
		return a.opaque !== undefined && b.opaque !== undefined && bytesEqual(a.opaque, b.opaque);
	}
	if (a.attributes.length !== b.attributes.length || a.children.length !== b.children.length) return false;
	for (let i = 0; i < a.attributes.length; i++) {
		if (a.attributes[i].hash !== b.attributes[i].hash || !valuesEqual(a.attributes[i], b.attributes[i])) return false;
	}
	return a.children.every((c, i) => nodesEqual(c, b.children[i]));
}

/** Depth-first, parents before children */
export function* walk(node: FcbNode, parent?: FcbNode): Generator<{ node: FcbNode; parent?: FcbNode }> {
	yield { node, parent };
	for (const child of node.children) yield* walk(child, node);
}

/**
 * Cross-file ID bookkeeping for a loaded level.
 *
 * Identity members (e.g. Entity.disEntityId) declare an ID in an ID space; reference members
 * (e.g. Entity.hidParentId, Link.targetEntityId) point at one. Both tables come from the vocabulary.
 * The value 0 is the null reference.
 */

import { basename } from "node:path";
import { IdCollisionError, InternalConsistencyError, UnknownIdError } from "../errors.js";
import { checkRange } from "../fcb/codec.js";
import { formatHashName } from "../fcb/hash.js";
import { cloneNode, walk } from "../fcb/node.js";
import { FCB_VERSION, FcbAttribute, FcbNode, ValueKind, isBigIntKind, isIntegerKind, isVectorKind } from "../fcb/types.js";
import { fromMarkup, parseMarkup } from "../markup/markup-reader.js";
import { renderMarkup, toMarkup } from "../markup/markup-writer.js";
import { Level } from "./level.js";

export const NULL_ID = 0n;
export const DEFAULT_SPACE = "entity";
export const DUPLICATE_OFFSET = 20;

export interface Identity {
	path: string;
	node: FcbNode;
	/** Attribute index within the node */
	index: number;
	space: string;
	id: bigint;
}

export interface Reference {
	path: string;
	node: FcbNode;
	index: number;
	hash: number;
	memberName: string;
	space: string;
	targetId: bigint;
	crossFile: boolean;
}

export interface RenumberResult {
	space: string;
	oldId: bigint;
	newId: bigint;
	/** Identity plus references rewritten */
	rewritten: number;
	files: string[];
}

/** ID held by an integer attribute, undefined for other kinds */
export function idValue(attr: FcbAttribute): bigint | undefined {
	if (isBigIntKind(attr.kind) && typeof attr.value === "bigint") return attr.value;
	if (isIntegerKind(attr.kind) && typeof attr.value === "number") return BigInt(attr.value);
	return undefined;
}

/** Same member and kind, new ID; throws EncodingError when the ID does not fit the kind. */
export function withId(attr: FcbAttribute, id: bigint): FcbAttribute {
	const kind = attr.kind;
	if (isBigIntKind(kind)) {
		checkRange(kind, id);
		return { hash: attr.hash, kind, value: id };
	}
	if (isIntegerKind(kind)) {
		const n = Number(id);
		checkRange(kind, n);
		return { hash: attr.hash, kind, value: n };
	}
	throw new InternalConsistencyError(`Member ${formatHashName(attr.hash)} does not hold an ID`);
}

function identitiesIn(level: Level, path: string, root: FcbNode, out: Identity[]): void {
	for (const { node } of walk(root)) {
		node.attributes.forEach((attr, index) => {
			const rule = level.vocabulary.identityFor(node.tag, attr.hash);
			const id = rule ? idValue(attr) : undefined;
			if (rule && id !== undefined) out.push({ path, node, index, space: rule.space, id });
		});
	}
}

function referencesIn(level: Level, path: string, root: FcbNode, out: Reference[]): void {
	for (const { node } of walk(root)) {
		node.attributes.forEach((attr, index) => {
			const rule = level.vocabulary.referenceFor(node.tag, attr.hash);
			const targetId = rule ? idValue(attr) : undefined;
			if (rule && targetId !== undefined) {
				out.push({ path, node, index, hash: attr.hash, memberName: rule.member, space: rule.space, targetId, crossFile: rule.crossFile });
			}
		});
	}
}

export function scanIdentities(level: Level): Identity[] {
	const out: Identity[] = [];
	for (const { path, file } of level.loaded()) {
		for (const root of file.roots) identitiesIn(level, path, root, out);
	}
	return out;
}

export function scanReferences(level: Level): Reference[] {
	const out: Reference[] = [];
	for (const { path, file } of level.loaded()) {
		for (const root of file.roots) referencesIn(level, path, root, out);
	}
	return out;
}

/** space -> id -> owners. More than one owner is a collision. */
export class IdIndex {
	private spaces = new Map<string, Map<bigint, Identity[]>>();

	constructor(identities: Iterable<Identity> = []) {
		for (const identity of identities) this.add(identity);
	}

	public add(identity: Identity): void {
		let ids = this.spaces.get(identity.space);
		if (!ids) {
			ids = new Map();
			this.spaces.set(identity.space, ids);
		}
		const owners = ids.get(identity.id);
		if (owners) owners.push(identity);
		else ids.set(identity.id, [identity]);
	}

	public owners(space: string, id: bigint): Identity[] {
		return this.spaces.get(space)?.get(id) ?? [];
	}

	public has(space: string, id: bigint): boolean {
		return this.owners(space, id).length > 0;
	}

	/** IDs with more than one owner */
	public collisions(): Array<{ space: string; id: bigint; owners: Identity[] }> {
		const out: Array<{ space: string; id: bigint; owners: Identity[] }> = [];
		this.spaces.forEach((ids, space) =>
			ids.forEach((owners, id) => {
				if (owners.length > 1) out.push({ space, id, owners });
			})
		);
		return out;
	}
}

export function buildIdIndex(level: Level): IdIndex {
	return new IdIndex(scanIdentities(level));
}

/** References whose non-null target exists nowhere in the level */
export function findDangling(level: Level, index: IdIndex = buildIdIndex(level)): Reference[] {
	return scanReferences(level).filter((ref) => ref.targetId !== NULL_ID && !index.has(ref.space, ref.targetId));
}

/**
 * Moves the identity `oldId` to `newId` and rewrites every reference to it, under the level lock.
 * All writes are computed and range-checked before the first one is applied.
 * A `newId` that dangling references already point at is refused.
 */
export function renumber(level: Level, oldId: bigint, newId: bigint, space: string = DEFAULT_SPACE): Promise<RenumberResult> {
	return level.exclusive((): RenumberResult => {
		const index = buildIdIndex(level);
		const owners = index.owners(space, oldId);
		if (owners.length === 0) throw new UnknownIdError(`No ${space} with ID ${oldId}`);
		if (owners.length > 1) throw new IdCollisionError(`${space} ID ${oldId} is held by ${owners.length} nodes`);
		if (oldId === newId) return { space, oldId, newId, rewritten: 0, files: [] };
		if (newId === NULL_ID) throw new IdCollisionError(`${space} ID ${newId} is the null reference`);
		if (index.has(space, newId)) throw new IdCollisionError(`${space} ID ${newId} is already in use`);

		const references = scanReferences(level).filter((ref) => ref.space === space);
		const waiting = references.filter((ref) => ref.targetId === newId);
		if (waiting.length > 0) {
			const holders = waiting.map((ref) => `${basename(ref.path)} ${ref.memberName}`).join(", ");
			throw new IdCollisionError(`${space} ID ${newId} is already referenced by ${holders}`);
		}

		const sites: Array<{ path: string; node: FcbNode; index: number }> = [owners[0], ...references.filter((ref) => ref.targetId === oldId)];
		const writes = sites.map((site) => ({ ...site, attr: withId(site.node.attributes[site.index], newId) }));

		const files = new Set<string>();
		for (const w of writes) {
			w.node.attributes[w.index] = w.attr;
			files.add(w.path);
		}
		files.forEach((path) => level.markDirty(path));
		return { space, oldId, newId, rewritten: writes.length, files: [...files] };
	});
}

/** Hands out IDs above everything the level declares or references. */
export class IdAllocator {
	private next = new Map<string, bigint>();

	constructor(private readonly level: Level) {}

	public allocate(space: string): bigint {
		let n = this.next.get(space);
		if (n === undefined) {
			n = NULL_ID;
			for (const identity of scanIdentities(this.level)) if (identity.space === space && identity.id > n) n = identity.id;
			for (const ref of scanReferences(this.level)) if (ref.space === space && ref.targetId > n) n = ref.targetId;
		}
		n += 1n;
		this.next.set(space, n);
		return n;
	}
}

export function allocateIds(level: Level, space: string, count: number): bigint[] {
	const allocator = new IdAllocator(level);
	const out: bigint[] = [];
	for (let i = 0; i < count; i++) out.push(allocator.allocate(space));
	return out;
}

/**
 * Gives every identity inside `roots` a fresh ID and retargets references between them.
 * References leaving the set are kept.
 */
function freshenIds(level: Level, roots: FcbNode[], allocator: IdAllocator): void {
	const mapping = new Map<string, Map<bigint, bigint>>();
	const vocab = level.vocabulary;
	for (const root of roots) {
		for (const { node } of walk(root)) {
			node.attributes.forEach((attr, i) => {
				const rule = vocab.identityFor(node.tag, attr.hash);
				const id = rule ? idValue(attr) : undefined;
				if (!rule || id === undefined) return;
				const fresh = allocator.allocate(rule.space);
				let ids = mapping.get(rule.space);
				if (!ids) {
					ids = new Map();
					mapping.set(rule.space, ids);
				}
				ids.set(id, fresh);
				node.attributes[i] = withId(attr, fresh);
			});
		}
	}
	for (const root of roots) {
		for (const { node } of walk(root)) {
			node.attributes.forEach((attr, i) => {
				const rule = vocab.referenceFor(node.tag, attr.hash);
				const target = rule ? idValue(attr) : undefined;
				if (!rule || target === undefined) return;
				const fresh = mapping.get(rule.space)?.get(target);
				if (fresh !== undefined) node.attributes[i] = withId(attr, fresh);
			});
		}
	}
}

function existingNames(level: Level): Set<string> {
	const nameHash = level.vocabulary.memberHashOf("hidName");
	const names = new Set<string>();
	for (const { file } of level.loaded()) {
		for (const root of file.roots) {
			for (const { node } of walk(root)) {
				for (const attr of node.attributes) {
					if (attr.hash === nameHash && attr.kind === ValueKind.String) names.add(attr.value);
				}
			}
		}
	}
	return names;
}

/** `base_Copy`, then `base_Copy_1`, `base_Copy_2`, … where base drops an existing copy suffix */
export function uniqueCopyName(name: string, taken: ReadonlySet<string>): string {
	const base = name.match(/^(.+?)_Copy(?:_\d+)?$/)?.[1] ?? name;
	let candidate = `${base}_Copy`;
	for (let i = 1; taken.has(candidate); i++) candidate = `${base}_Copy_${i}`;
	return candidate;
}

function renameCopy(level: Level, node: FcbNode, taken: Set<string>): void {
	const nameHash = level.vocabulary.memberHashOf("hidName");
	const i = node.attributes.findIndex((a) => a.hash === nameHash && a.kind === ValueKind.String);
	if (i < 0) return;
	const attr = node.attributes[i];
	if (attr.kind !== ValueKind.String) return;
	const name = uniqueCopyName(attr.value, taken);
	taken.add(name);
	node.attributes[i] = { hash: attr.hash, kind: ValueKind.String, value: name };
}

const POSITION_MEMBERS = ["hidPos", "hidPos_precise"];

function movePosition(level: Level, node: FcbNode, move: (xyz: number[]) => number[]): void {
	for (const member of POSITION_MEMBERS) {
		const hash = level.vocabulary.memberHashOf(member);
		node.attributes.forEach((attr, i) => {
			if (attr.hash !== hash || !isVectorKind(attr.kind) || !Array.isArray(attr.value)) return;
			node.attributes[i] = { hash, kind: attr.kind, value: move(attr.value).map(Math.fround) };
		});
	}
}

function positionOf(level: Level, node: FcbNode): number[] | undefined {
	const hash = level.vocabulary.memberHashOf("hidPos");
	const attr = node.attributes.find((a) => a.hash === hash);
	return attr && isVectorKind(attr.kind) && Array.isArray(attr.value) ? attr.value : undefined;
}

/** Siblings array holding `node` in `path`, and its index there */
function locate(level: Level, path: string, node: FcbNode): { siblings: FcbNode[]; index: number } {
	const file = level.file(path);
	const top = file.roots.indexOf(node);
	if (top >= 0) return { siblings: file.roots, index: top };
	for (const root of file.roots) {
		for (const { node: parent } of walk(root)) {
			const i = parent.children.indexOf(node);
			if (i >= 0) return { siblings: parent.children, index: i };
		}
	}
	throw new InternalConsistencyError(`Node is not part of ${path}`);
}

export interface DuplicateOptions {
	/** Added to the first two position axes */
	offset?: [number, number];
}

/** Copy of `node` right after it, with fresh IDs, a unique name and a shifted position. Runs under the level lock. */
export function duplicateEntity(level: Level, path: string, node: FcbNode, options: DuplicateOptions = {}): Promise<FcbNode> {
	const [dx, dy] = options.offset ?? [DUPLICATE_OFFSET, DUPLICATE_OFFSET];
	return level.exclusive((): FcbNode => {
		const { siblings, index } = locate(level, path, node);
		const copy = cloneNode(node);
		freshenIds(level, [copy], new IdAllocator(level));
		renameCopy(level, copy, existingNames(level));
		movePosition(level, copy, ([x, y, ...rest]) => [x + dx, y + dy, ...rest]);
		siblings.splice(index + 1, 0, copy);
		level.markDirty(path);
		return copy;
	});
}

/** Standalone markup document of the selected subtrees */
export function exportEntities(level: Level, selection: FcbNode[]): string {
	return renderMarkup(toMarkup({ name: "", version: FCB_VERSION, flags: 0, roots: selection }, level.vocabulary));
}

export interface ImportOptions {
	/** Where the first imported node lands; the others keep their offsets to it */
	position?: [number, number, number];
	/** Defaults to the file's first root */
	parent?: FcbNode;
}

/** Appends the nodes of an exported document with fresh IDs and unique names. Runs under the level lock. */
export function importEntities(level: Level, path: string, text: string, options: ImportOptions = {}): Promise<FcbNode[]> {
	return level.exclusive((): FcbNode[] => {
		const file = level.file(path);
		const parent = options.parent ?? file.roots[0];
		if (!parent) throw new InternalConsistencyError(`${path} has no root to import into`);
		if (parent.opaque) throw new InternalConsistencyError(`Cannot import into opaque node ${formatHashName(parent.tag)}`);

		const nodes = fromMarkup(parseMarkup(text), level.vocabulary).roots;
		freshenIds(level, nodes, new IdAllocator(level));
		const taken = existingNames(level);
		for (const node of nodes) renameCopy(level, node, taken);

		const target = options.position;
		const anchor = nodes.length > 0 ? positionOf(level, nodes[0]) : undefined;
		if (target && anchor) {
			const delta = target.map((t, i) => t - (anchor[i] ?? 0));
			for (const node of nodes) movePosition(level, node, (xyz) => xyz.map((c, i) => c + (delta[i] ?? 0)));
		}
		parent.children.push(...nodes);
		level.markDirty(path);
		return nodes;
	});
}

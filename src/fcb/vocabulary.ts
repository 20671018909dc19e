/**
 * Vocabulary: known type tags and member names (stored in the binary as CRC-32 hashes),
 * the declared value kind of each member, and which members hold IDs or references to IDs.
 *
 * Sources: the bundled `data/vocabulary.json`, a JSON file of the same shape,
 * or a `binary_classes.xml` class/member hash list.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { XMLParser } from "fast-xml-parser";
import { crc32, hashOf } from "./hash.js";
import { ValueKind, kindFromName } from "./types.js";

export interface IdentityRule {
	type: string;
	member: string;
	/** ID space, e.g. "entity" or "sector" */
	space: string;
}

export interface ReferenceRule {
	/** Type name, or "*" for every type */
	type: string;
	member: string;
	space: string;
	/** The target usually lives in another file of the level */
	crossFile: boolean;
}

export interface NamedHash {
	name: string;
	/** hex, overrides CRC-32 of the name */
	hash?: string;
}

export interface MemberDefinition {
	kind?: string;
	hash?: string;
}

export interface VocabularyDefinition {
	types: Array<string | NamedHash>;
	members: Record<string, string | MemberDefinition>;
	identities?: IdentityRule[];
	references?: ReferenceRule[];
}

/** Attribute and element names starting with this prefix belong to the markup schema. */
export const RESERVED_PREFIX = "fcb.";

const BUNDLED_PATH = fileURLToPath(new URL("../../data/vocabulary.json", import.meta.url));

function ruleKey(tag: number, member: number): string {
	return `${tag >>> 0}:${member >>> 0}`;
}

function parseHex(hex: string, what: string): number {
	const clean = hex.replace(/^0x/i, "");
	if (!/^[0-9A-Fa-f]{1,8}$/.test(clean)) throw new Error(`Invalid ${what} hash: ${hex}`);
	return parseInt(clean, 16) >>> 0;
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}

function asString(v: unknown, what: string): string {
	if (typeof v !== "string" || v === "") throw new Error(`Vocabulary: ${what} must be a non-empty string`);
	return v;
}

function checkName(name: string, what: string): string {
	if (name.startsWith(RESERVED_PREFIX)) throw new Error(`Vocabulary: ${what} "${name}" uses the reserved prefix "${RESERVED_PREFIX}"`);
	return name;
}

export class Vocabulary {
	private typeNames = new Map<number, string>();
	private typeTags = new Map<string, number>();
	private memberNames = new Map<number, string>();
	private memberHashes = new Map<string, number>();
	private memberKinds = new Map<number, ValueKind>();
	private identities = new Map<string, IdentityRule>();
	private references = new Map<string, ReferenceRule>();
	private wildcardReferences = new Map<number, ReferenceRule>();

	private static bundledInstance: Vocabulary | undefined;

	public static empty(): Vocabulary {
		return new Vocabulary();
	}

	public static fromDefinition(input: unknown): Vocabulary {
		const vocab = new Vocabulary();
		vocab.addDefinition(input);
		return vocab;
	}

	public static fromJsonFile(path: string): Vocabulary {
		return Vocabulary.fromDefinition(JSON.parse(readFileSync(path, "utf8")));
	}

	/** The vocabulary shipped in `data/vocabulary.json`. */
	public static bundled(): Vocabulary {
		Vocabulary.bundledInstance ??= Vocabulary.fromJsonFile(BUNDLED_PATH);
		return Vocabulary.bundledInstance;
	}

	/** Bundled vocabulary, extended by a JSON or binary-classes XML file when given. */
	public static load(path?: string): Vocabulary {
		if (!path) return Vocabulary.bundled();
		const extra = path.toLowerCase().endsWith(".xml") ? Vocabulary.fromBinaryClassesXml(readFileSync(path, "utf8")) : Vocabulary.fromJsonFile(path);
		return Vocabulary.bundled().merge(extra);
	}

	/**
	 * `<class hash="…" name="…"><member hash="…" name="…"/></class>` lists.
	 * Members get no declared kind, so their values keep an explicit kind prefix in markup.
	 */
	public static fromBinaryClassesXml(xml: string): Vocabulary {
		const parser = new XMLParser({
			ignoreAttributes: false,
			attributeNamePrefix: "@_",
			isArray: (name) => name === "class" || name === "member"
		});
		const doc: unknown = parser.parse(xml);
		const vocab = new Vocabulary();
		const classes: unknown[] = [];
		const collect = (el: unknown) => {
			if (Array.isArray(el)) {
				el.forEach(collect);
				return;
			}
			if (!isRecord(el)) return;
			for (const [key, value] of Object.entries(el)) {
				if (key === "class" && Array.isArray(value)) classes.push(...value);
				else if (!key.startsWith("@_")) collect(value);
			}
		};
		collect(doc);
		for (const cls of classes) {
			if (!isRecord(cls)) continue;
			const hash = typeof cls["@_hash"] === "string" ? parseHex(cls["@_hash"], "class") : undefined;
			const name = typeof cls["@_name"] === "string" ? cls["@_name"] : undefined;
			if (hash !== undefined) vocab.addType(name ?? `Class_${cls["@_hash"]}`, hash);
			else if (name) vocab.addType(name);
			const members = Array.isArray(cls.member) ? cls.member : [];
			for (const m of members) {
				if (!isRecord(m) || typeof m["@_name"] !== "string") continue;
				const mh = typeof m["@_hash"] === "string" ? parseHex(m["@_hash"], "member") : undefined;
				vocab.addMember(m["@_name"], undefined, mh);
			}
		}
		return vocab;
	}

	public addType(name: string, tag: number = crc32(name)): void {
		checkName(name, "type");
		this.typeNames.set(tag >>> 0, name);
		this.typeTags.set(name, tag >>> 0);
	}

	public addMember(name: string, kind?: ValueKind, hash: number = crc32(name)): void {
		checkName(name, "member");
		this.memberNames.set(hash >>> 0, name);
		this.memberHashes.set(name, hash >>> 0);
		if (kind !== undefined) this.memberKinds.set(hash >>> 0, kind);
	}

	public addIdentity(rule: IdentityRule): void {
		this.identities.set(ruleKey(this.typeTagOf(rule.type), this.memberHashOf(rule.member)), rule);
	}

	public addReference(rule: ReferenceRule): void {
		const member = this.memberHashOf(rule.member);
		if (rule.type === "*") this.wildcardReferences.set(member, rule);
		else this.references.set(ruleKey(this.typeTagOf(rule.type), member), rule);
	}

	/** Later entries win; used to layer a user vocabulary over the bundled one. */
	public merge(other: Vocabulary): Vocabulary {
		const out = new Vocabulary();
		for (const src of [this, other]) {
			src.typeNames.forEach((name, tag) => out.addType(name, tag));
			src.memberNames.forEach((name, hash) => out.addMember(name, src.memberKinds.get(hash), hash));
			src.identities.forEach((rule) => out.addIdentity(rule));
			src.references.forEach((rule) => out.addReference(rule));
			src.wildcardReferences.forEach((rule) => out.addReference(rule));
		}
		return out;
	}

	public isKnownTag(tag: number): boolean {
		return this.typeNames.has(tag >>> 0);
	}

	public typeNameOf(tag: number): string | undefined {
		return this.typeNames.get(tag >>> 0);
	}

	public typeTagOf(name: string): number {
		return this.typeTags.get(name) ?? hashOf(name);
	}

	public memberNameOf(hash: number): string | undefined {
		return this.memberNames.get(hash >>> 0);
	}

	public memberHashOf(name: string): number {
		return this.memberHashes.get(name) ?? hashOf(name);
	}

	public isKnownMember(name: string): boolean {
		return this.memberHashes.has(name);
	}

	public memberKind(hash: number): ValueKind | undefined {
		return this.memberKinds.get(hash >>> 0);
	}

	public identityFor(tag: number, member: number): IdentityRule | undefined {
		return this.identities.get(ruleKey(tag, member));
	}

	public referenceFor(tag: number, member: number): ReferenceRule | undefined {
		return this.references.get(ruleKey(tag, member)) ?? this.wildcardReferences.get(member >>> 0);
	}

	public identityRules(): IdentityRule[] {
		return [...this.identities.values()];
	}

	private addDefinition(input: unknown): void {
		if (!isRecord(input)) throw new Error("Vocabulary: definition must be an object");
		const { types, members, identities, references } = input;
		if (!Array.isArray(types)) throw new Error("Vocabulary: types must be an array");
		for (const t of types) {
			if (typeof t === "string") this.addType(t);
			else if (isRecord(t)) {
				const name = asString(t.name, "type name");
				this.addType(name, typeof t.hash === "string" ? parseHex(t.hash, "type") : undefined);
			} else throw new Error("Vocabulary: type entries must be strings or { name, hash }");
		}
		if (!isRecord(members)) throw new Error("Vocabulary: members must be an object");
		for (const [name, def] of Object.entries(members)) {
			const kindText = typeof def === "string" ? def : isRecord(def) && typeof def.kind === "string" ? def.kind : undefined;
			const kind = kindText === undefined ? undefined : kindFromName(kindText);
			if (kindText !== undefined && kind === undefined) throw new Error(`Vocabulary: unknown kind "${kindText}" for member ${name}`);
			const hash = isRecord(def) && typeof def.hash === "string" ? parseHex(def.hash, "member") : undefined;
			this.addMember(name, kind, hash);
		}
		for (const rule of Array.isArray(identities) ? identities : []) {
			if (!isRecord(rule)) throw new Error("Vocabulary: identity rules must be objects");
			this.addIdentity({
				type: asString(rule.type, "identity type"),
				member: asString(rule.member, "identity member"),
				space: asString(rule.space, "identity space")
			});
		}
		for (const rule of Array.isArray(references) ? references : []) {
			if (!isRecord(rule)) throw new Error("Vocabulary: reference rules must be objects");
			this.addReference({
				type: asString(rule.type, "reference type"),
				member: asString(rule.member, "reference member"),
				space: asString(rule.space, "reference space"),
				crossFile: rule.crossFile === true
			});
		}
	}
}

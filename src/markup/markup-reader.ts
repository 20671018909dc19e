import { readFileSync } from "node:fs";
import { basename } from "node:path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MarkupFormatError } from "../errors.js";
import { parseHashName } from "../fcb/hash.js";
import { FCB_VERSION, FcbAttribute, FcbNode, ResourceFile } from "../fcb/types.js";
import { RESERVED_PREFIX, Vocabulary } from "../fcb/vocabulary.js";
import { MarkupDocument, MarkupElement, RAW_ATTRIBUTE, ROOT_ELEMENT } from "./types.js";
import { decodeAttributeValue, parseHex, unescapeMarkup } from "./values.js";

const ATTR_PREFIX = "@_";
const REPEATED_MEMBER = /^(.+)\.(\d+)$/;

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** One entry of fast-xml-parser's preserveOrder output: `{ tag: [...children], ":@": {...attrs} }` */
function toElement(entry: Record<string, unknown>): MarkupElement | undefined {
	const name = Object.keys(entry).find((k) => k !== ":@" && k !== "#text" && k !== "#comment" && !k.startsWith("?"));
	if (name === undefined) return undefined;
	const attributes: Array<[string, string]> = [];
	const rawAttrs = entry[":@"];
	if (isRecord(rawAttrs)) {
		for (const [key, value] of Object.entries(rawAttrs)) {
			if (!key.startsWith(ATTR_PREFIX)) continue;
			const attr = key.slice(ATTR_PREFIX.length);
			attributes.push([attr, unescapeMarkup(typeof value === "string" ? value : String(value), `${name}@${attr}`)]);
		}
	}
	const body = entry[name];
	return { name, attributes, children: Array.isArray(body) ? toElements(body) : [] };
}

function toElements(list: unknown[]): MarkupElement[] {
	const out: MarkupElement[] = [];
	for (const entry of list) {
		if (!isRecord(entry)) continue;
		const el = toElement(entry);
		if (el) out.push(el);
	}
	return out;
}

export function parseMarkup(text: string): MarkupDocument {
	const xml = text.replace(/^\uFEFF/, "");
	const valid = XMLValidator.validate(xml);
	if (valid !== true) {
		throw new MarkupFormatError(`line ${valid.err.line}`, valid.err.msg);
	}
	const parser = new XMLParser({
		ignoreAttributes: false,
		attributeNamePrefix: ATTR_PREFIX,
		preserveOrder: true,
		processEntities: false,
		trimValues: false,
		parseTagValue: false,
		parseAttributeValue: false,
		ignoreDeclaration: true
	});
	const parsed: unknown = parser.parse(xml);
	const roots = Array.isArray(parsed) ? toElements(parsed) : [];
	if (roots.length !== 1) {
		throw new MarkupFormatError("document", `expected one root element, found ${roots.length}`);
	}
	return { root: roots[0] };
}

function attributeValue(el: MarkupElement, name: string): string | undefined {
	return el.attributes.find(([n]) => n === name)?.[1];
}

/** Member hash of a markup attribute name, undoing the `.N` suffix of repeated members */
function memberHash(name: string, vocab: Vocabulary): number {
	if (vocab.isKnownMember(name) || parseHashName(name) !== undefined) return vocab.memberHashOf(name);
	const m = name.match(REPEATED_MEMBER);
	if (m && (vocab.isKnownMember(m[1]) || parseHashName(m[1]) !== undefined)) return vocab.memberHashOf(m[1]);
	return vocab.memberHashOf(name);
}

export function nodeFromMarkup(el: MarkupElement, vocab: Vocabulary = Vocabulary.bundled(), path: string = el.name): FcbNode {
	const tag = vocab.typeTagOf(el.name);
	const raw = attributeValue(el, RAW_ATTRIBUTE);
	if (raw !== undefined) {
		if (vocab.isKnownTag(tag)) {
			throw new MarkupFormatError(path, `${RAW_ATTRIBUTE} is only allowed on types the vocabulary does not know`);
		}
		if (el.attributes.length !== 1 || el.children.length > 0) {
			throw new MarkupFormatError(path, `element with ${RAW_ATTRIBUTE} cannot have other attributes or children`);
		}
		return { tag, attributes: [], children: [], opaque: parseHex(raw, `${path}@${RAW_ATTRIBUTE}`) };
	}

	const attributes: FcbAttribute[] = [];
	for (const [name, text] of el.attributes) {
		const where = `${path}@${name}`;
		if (name.startsWith(RESERVED_PREFIX)) {
			throw new MarkupFormatError(where, "unknown reserved attribute");
		}
		const hash = memberHash(name, vocab);
		attributes.push({ hash, ...decodeAttributeValue(text, vocab.memberKind(hash), where) });
	}
	const children = el.children.map((child, i) => nodeFromMarkup(child, vocab, `${path}/${child.name}[${i}]`));
	return { tag, attributes, children };
}

export function fromMarkup(doc: MarkupDocument, vocab: Vocabulary = Vocabulary.bundled(), name = ""): ResourceFile {
	const root = doc.root;
	if (root.name !== ROOT_ELEMENT) {
		throw new MarkupFormatError(root.name, `root element must be <${ROOT_ELEMENT}>`);
	}
	const version = parseHeaderNumber(root, "version", FCB_VERSION);
	const flags = parseHeaderNumber(root, "flags", 0);
	return {
		name,
		version,
		flags,
		roots: root.children.map((child, i) => nodeFromMarkup(child, vocab, `${ROOT_ELEMENT}/${child.name}[${i}]`))
	};
}

function parseHeaderNumber(root: MarkupElement, attr: string, fallback: number): number {
	const text = attributeValue(root, attr);
	if (text === undefined) return fallback;
	if (!/^\d+$/.test(text) || Number(text) > 0xffff) {
		throw new MarkupFormatError(`${ROOT_ELEMENT}@${attr}`, `"${text}" is not a 16-bit unsigned integer`);
	}
	return Number(text);
}

export function readMarkupFile(path: string, vocab: Vocabulary = Vocabulary.bundled()): ResourceFile {
	const name = basename(path).replace(/\.converted\.xml$/, "");
	return fromMarkup(parseMarkup(readFileSync(path, "utf8")), vocab, name);
}

import { writeFileSync } from "node:fs";
import { formatHashName } from "../fcb/hash.js";
import { typeName } from "../fcb/node.js";
import { FcbNode, ResourceFile } from "../fcb/types.js";
import { Vocabulary } from "../fcb/vocabulary.js";
import { MarkupDocument, MarkupElement, RAW_ATTRIBUTE, ROOT_ELEMENT } from "./types.js";
import { encodeAttributeValue, escapeMarkup, formatHex } from "./values.js";

export function nodeToMarkup(node: FcbNode, vocab: Vocabulary = Vocabulary.bundled()): MarkupElement {
	const name = typeName(node, vocab);
	if (node.opaque) {
		return { name, attributes: [[RAW_ATTRIBUTE, formatHex(node.opaque)]], children: [] };
	}
	const seen = new Map<string, number>();
	const attributes: Array<[string, string]> = node.attributes.map((attr) => {
		const member = vocab.memberNameOf(attr.hash) ?? formatHashName(attr.hash);
		const occurrence = (seen.get(member) ?? 0) + 1;
		seen.set(member, occurrence);
		const attrName = occurrence === 1 ? member : `${member}.${occurrence}`;
		return [attrName, encodeAttributeValue(attr, vocab.memberKind(attr.hash))];
	});
	return { name, attributes, children: node.children.map((c) => nodeToMarkup(c, vocab)) };
}

export function toMarkup(file: ResourceFile, vocab: Vocabulary = Vocabulary.bundled()): MarkupDocument {
	return {
		root: {
			name: ROOT_ELEMENT,
			attributes: [
				["version", String(file.version)],
				["flags", String(file.flags)]
			],
			children: file.roots.map((r) => nodeToMarkup(r, vocab))
		}
	};
}

function renderElement(el: MarkupElement, indent: number, eol: string): string {
	const spacing = "\t".repeat(indent);
	const attrs = el.attributes.map(([name, value]) => ` ${name}="${escapeMarkup(value)}"`).join("");
	if (el.children.length === 0) {
		return `${spacing}<${el.name}${attrs} />${eol}`;
	}
	let xml = `${spacing}<${el.name}${attrs}>${eol}`;
	for (const child of el.children) {
		xml += renderElement(child, indent + 1, eol);
	}
	xml += `${spacing}</${el.name}>${eol}`;
	return xml;
}

export function renderMarkup(doc: MarkupDocument, eol = "\n"): string {
	return '<?xml version="1.0" encoding="utf-8"?>' + eol + renderElement(doc.root, 0, eol);
}

export function writeMarkupFile(outputPath: string, file: ResourceFile, vocab: Vocabulary = Vocabulary.bundled()): void {
	writeFileSync(outputPath, renderMarkup(toMarkup(file, vocab)), "utf8");
}

/**
 * Round-trip checks: binary → tree → binary must be byte-identical,
 * and binary → markup → tree must give the same tree.
 */

import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { describeError } from "./errors.js";
import { nodesEqual } from "./fcb/node.js";
import { parse } from "./fcb/reader.js";
import { ResourceFile } from "./fcb/types.js";
import { Vocabulary } from "./fcb/vocabulary.js";
import { serialize } from "./fcb/writer.js";
import { fromMarkup, parseMarkup } from "./markup/markup-reader.js";
import { renderMarkup, toMarkup } from "./markup/markup-writer.js";

export interface VerifyResult {
	file: string;
	/** Re-serialized bytes equal the input */
	binary: boolean;
	markup: boolean;
	error?: string;
}

export function filesEqual(a: ResourceFile, b: ResourceFile): boolean {
	return a.version === b.version && a.flags === b.flags && a.roots.length === b.roots.length && a.roots.every((r, i) => nodesEqual(r, b.roots[i]));
}

export function verifyBytes(name: string, bytes: Uint8Array, vocab: Vocabulary = Vocabulary.bundled()): VerifyResult {
	try {
		const file = parse(bytes, { name, vocabulary: vocab });
		const again = serialize(file);
		const binary = Buffer.from(bytes).equals(again);
		const text = renderMarkup(toMarkup(file, vocab));
		const markup = filesEqual(file, fromMarkup(parseMarkup(text), vocab));
		return { file: name, binary, markup };
	} catch (err) {
		return { file: name, binary: false, markup: false, error: describeError(err) };
	}
}

/** `.fcb` files below `dir`, relative paths sorted */
export function collectFcbFiles(dir: string, base = ""): string[] {
	const files: string[] = [];
	for (const entry of readdirSync(join(dir, base), { withFileTypes: true })) {
		const rel = base ? `${base}/${entry.name}` : entry.name;
		if (entry.isDirectory()) {
			files.push(...collectFcbFiles(dir, rel));
		} else if (entry.name.toLowerCase().endsWith(".fcb")) {
			files.push(rel);
		}
	}
	return files.sort();
}

export function verifyDirectory(dir: string, vocab: Vocabulary = Vocabulary.bundled()): VerifyResult[] {
	return collectFcbFiles(dir).map((rel) => verifyBytes(rel, readFileSync(join(dir, rel)), vocab));
}

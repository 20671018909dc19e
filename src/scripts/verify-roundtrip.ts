#!/usr/bin/env node
/**
 * Round-trip verification over a directory of level files
 * FCB → tree → FCB: byte comparison
 * FCB → markup → tree: tree comparison
 * Files that differ get their re-serialized bytes and markup written to tmp-verify/ for diffing.
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { parse } from "../fcb/reader.js";
import { Vocabulary } from "../fcb/vocabulary.js";
import { serialize } from "../fcb/writer.js";
import { renderMarkup, toMarkup } from "../markup/markup-writer.js";
import { verifyDirectory } from "../verify.js";

const dir = process.argv[2] ?? join(process.cwd(), "levels");
const TMP = join(process.cwd(), "tmp-verify");

console.log(`\n=== Round trip (FCB -> markup -> FCB) in ${dir} ===\n`);
const vocabulary = Vocabulary.bundled();
const results = verifyDirectory(dir, vocabulary);
let ok = 0;
let diff = 0;

for (const r of results) {
	if (r.binary && r.markup) {
		console.log(`  OK   ${r.file}`);
		ok++;
		continue;
	}
	diff++;
	if (r.error) {
		console.log(`  FAIL ${r.file}: ${r.error}`);
		continue;
	}
	console.log(`  DIFF ${r.file}${r.binary ? "" : " (binary)"}${r.markup ? "" : " (markup)"}`);
	const file = parse(readFileSync(join(dir, r.file)), { name: r.file, vocabulary });
	const base = join(TMP, r.file.replace(/\//g, "_"));
	mkdirSync(TMP, { recursive: true });
	writeFileSync(`${base}.roundtrip.fcb`, serialize(file));
	writeFileSync(`${base}.converted.xml`, renderMarkup(toMarkup(file, vocabulary)), "utf8");
}

console.log(`\n${ok} identical, ${diff} different of ${results.length} files`);
process.exit(diff === 0 ? 0 : 1);

#!/usr/bin/env node
/**
 * FCB level tools
 * Usage:
 *   convert <input.fcb> [output.xml]      - binary to markup
 *   convert <input.xml> [output.fcb]      - markup to binary
 *   export-level <containerDir> <sectorDir>
 *   import-level <containerDir> <sectorDir>
 *   verify <dir>
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { resolveConfig } from "./config.js";
import { ConversionCancelledError, describeError } from "./errors.js";
import { FcbReader } from "./fcb/reader.js";
import { Vocabulary } from "./fcb/vocabulary.js";
import { writeFcb } from "./fcb/writer.js";
import { CONVERSION_CACHE_FILE, ConversionCache } from "./level/cache.js";
import { assertComplete, markupPathFor, loadLevel, saveLevel, MARKUP_SUFFIX } from "./level/orchestrator.js";
import { NodeFileStore } from "./level/store.js";
import { createLogger } from "./log.js";
import { readMarkupFile } from "./markup/markup-reader.js";
import { writeMarkupFile } from "./markup/markup-writer.js";
import { verifyDirectory } from "./verify.js";

const HELP = `
FCB level tools - binary level files <-> editable markup

Usage:
  convert <input.fcb> [output.xml]         - binary to markup (default: <input>${MARKUP_SUFFIX})
  convert <input.xml> [output.fcb]         - markup to binary
  export-level <containerDir> <sectorDir>  - write ${MARKUP_SUFFIX} beside every level file
  import-level <containerDir> <sectorDir>  - rebuild binaries from newer markup
  verify <dir>                             - round-trip check of every .fcb below <dir>

Options:
  --verbose | --quiet                      - log level (env FCB_LOG_LEVEL)
  --vocab <file.json|binary_classes.xml>   - extra type and member names
  --concurrency <n>                        - files loaded in parallel (env FCB_CONCURRENCY)
  --markup                                 - treat markup as authoritative
  --force                                  - rewrite every loaded file on import-level
  --no-cache                               - re-export markup of unchanged binaries too

Examples:
  fcb-level convert worlds/sector_12.data.fcb
  fcb-level export-level ./level ./level/sectors
  fcb-level import-level ./level ./level/sectors --force
`;

const argv = process.argv.slice(2);
if (argv.length === 0 || argv.includes("--help") || argv.includes("-h") || argv[0] === "help") {
	console.log(HELP);
	process.exit(argv.length === 0 ? 1 : 0);
}

async function main(): Promise<number> {
	const { config, positionals } = resolveConfig(argv);
	const [command, first, second] = positionals;
	const logger = createLogger(config.logLevel);
	const vocabulary = Vocabulary.load(config.vocabularyPath);

	if (!first) {
		console.error(HELP);
		return 1;
	}

	if (command === "convert") {
		if (!existsSync(first)) {
			logger.error(`File not found: ${first}`);
			return 1;
		}
		if (first.toLowerCase().endsWith(".xml")) {
			const output = second ?? (first.endsWith(MARKUP_SUFFIX) ? first.slice(0, -MARKUP_SUFFIX.length) : first.replace(/\.xml$/i, ".fcb"));
			logger.info(`Converting ${first} -> ${output}...`);
			writeFcb(output, readMarkupFile(first, vocabulary));
			logger.info(`Done: ${output}`);
		} else {
			const output = second ?? markupPathFor(first);
			logger.info(`Converting ${first} -> ${output}...`);
			const file = new FcbReader(first, { vocabulary, logger }).read();
			writeMarkupFile(output, file, vocabulary);
			logger.info(`Done: ${output}`);
		}
		return 0;
	}

	if (command === "export-level" || command === "import-level") {
		if (!second) {
			console.error(HELP);
			return 1;
		}
		const store = new NodeFileStore();
		const controller = new AbortController();
		process.once("SIGINT", () => controller.abort());
		const exporting = command === "export-level";
		const cachePath = join(first, CONVERSION_CACHE_FILE);
		const cache = config.cache ? await ConversionCache.load(store, cachePath, logger) : undefined;
		const { level, report } = await loadLevel(
			store,
			{ containerDir: first, sectorDir: second },
			{
				vocabulary,
				logger,
				concurrency: config.concurrency,
				authority: exporting ? "binary" : config.markupAuthoritative ? "markup" : undefined,
				writeMarkup: exporting,
				cache,
				signal: controller.signal
			}
		);
		assertComplete(report);
		if (exporting) {
			report.loaded.forEach((p) => logger.info(`  - ${markupPathFor(p)}`));
			if (cache) {
				logger.debug(`Conversion cache: ${cache.hits} unchanged, ${cache.misses} converted`);
				await cache.save(store, cachePath);
			}
			return report.failed.length > 0 ? 1 : 0;
		}
		const saved = await saveLevel(level, store, { force: config.force, cache });
		saved.written.forEach((p) => logger.info(`  - ${p}`));
		if (cache) await cache.save(store, cachePath);
		return report.failed.length + saved.failed.length > 0 ? 1 : 0;
	}

	if (command === "verify") {
		const results = verifyDirectory(first, vocabulary);
		let bad = 0;
		for (const r of results) {
			const ok = r.binary && r.markup;
			if (!ok) bad++;
			logger.info(`  ${ok ? "OK  " : "DIFF"} ${r.file}${r.error ? ` (${r.error})` : ""}${!r.error && !r.binary ? " binary" : ""}${!r.error && !r.markup ? " markup" : ""}`);
		}
		logger.info(`${results.length - bad} of ${results.length} files round-trip`);
		return bad === 0 ? 0 : 1;
	}

	logger.error(`Unknown command: ${command}`);
	return 1;
}

main().then(
	(code) => process.exit(code),
	(err: unknown) => {
		if (err instanceof ConversionCancelledError) {
			console.warn(`Warning: ${err.message}`);
			process.exit(130);
		}
		console.error("Error:", describeError(err));
		process.exit(1);
	}
);

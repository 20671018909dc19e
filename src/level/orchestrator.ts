/**
 * Loads and saves a whole level: container files plus per-sector files, each tracked through
 * Unloaded → BinaryLoaded → MarkupSynced → Dirty → Saved.
 *
 * For every file either the binary or its `.converted.xml` markup is authoritative; the newer one wins
 * unless the caller says otherwise.
 */

import { basename, join } from "node:path";
import { ConversionCancelledError, describeError } from "../errors.js";
import { parse } from "../fcb/reader.js";
import { ResourceFile } from "../fcb/types.js";
import { Vocabulary } from "../fcb/vocabulary.js";
import { serialize } from "../fcb/writer.js";
import { Logger, silentLogger } from "../log.js";
import { fromMarkup, parseMarkup } from "../markup/markup-reader.js";
import { renderMarkup, toMarkup } from "../markup/markup-writer.js";
import { ConversionCache } from "./cache.js";
import { Authority, FileRole, Level, LevelEntry, LevelLocation } from "./level.js";
import { findDangling } from "./references.js";
import { FileState, transition } from "./state.js";
import { FileStore } from "./store.js";

export const CONTAINER_STEMS = ["mapsdata", "managers", "omnis", "sectorsdep", "entitylibrary_full"] as const;
export const BINARY_EXTENSION = ".fcb";
export const SECTOR_SUFFIX = ".data.fcb";
export const MARKUP_SUFFIX = ".converted.xml";
export const DEFAULT_CONCURRENCY = 4;

export function markupPathFor(binaryPath: string): string {
	return binaryPath + MARKUP_SUFFIX;
}

export interface AuthorityInput {
	binaryMtime?: number;
	markupMtime?: number;
	explicit?: Authority;
}

/** Explicit choice, else the side that exists, else markup only when strictly newer. */
export function decideAuthority({ binaryMtime, markupMtime, explicit }: AuthorityInput): Authority {
	if (explicit) return explicit;
	if (markupMtime === undefined) return "binary";
	if (binaryMtime === undefined) return "markup";
	return markupMtime > binaryMtime ? "markup" : "binary";
}

export interface LevelFile {
	path: string;
	role: FileRole;
}

/** Container files in fixed stem order, then sector files sorted by name. */
export async function enumerateLevelFiles(store: FileStore, location: LevelLocation): Promise<LevelFile[]> {
	const out: LevelFile[] = [];
	const seen = new Set<string>();
	const push = (path: string, role: FileRole) => {
		if (seen.has(path)) return;
		seen.add(path);
		out.push({ path, role });
	};

	const containerNames = new Set(await store.list(location.containerDir));
	for (const stem of CONTAINER_STEMS) {
		const name = stem + BINARY_EXTENSION;
		if (containerNames.has(name) || containerNames.has(name + MARKUP_SUFFIX)) {
			push(join(location.containerDir, name), "container");
		}
	}

	const sectorNames = new Set<string>();
	for (const name of await store.list(location.sectorDir)) {
		const binaryName = name.endsWith(MARKUP_SUFFIX) ? name.slice(0, -MARKUP_SUFFIX.length) : name;
		if (binaryName.endsWith(SECTOR_SUFFIX)) sectorNames.add(binaryName);
	}
	for (const name of [...sectorNames].sort()) push(join(location.sectorDir, name), "sector");
	return out;
}

export interface LoadOptions {
	vocabulary?: Vocabulary;
	logger?: Logger;
	concurrency?: number;
	/** Overrides the mtime comparison for every file */
	authority?: Authority;
	/** Write `.converted.xml` beside every binary-authoritative file */
	writeMarkup?: boolean;
	/** Skips rewriting markup already written from the same binary bytes */
	cache?: ConversionCache;
	signal?: AbortSignal;
}

export interface LoadReport {
	loaded: string[];
	failed: Array<{ path: string; error: string }>;
	/** Files never started because the signal fired */
	skipped: string[];
	cancelled: boolean;
}

async function loadEntry(store: FileStore, level: Level, entry: LevelEntry, options: LoadOptions): Promise<void> {
	const [binaryMtime, markupMtime] = await Promise.all([store.mtime(entry.path), store.mtime(entry.markupPath)]);
	const authority = decideAuthority({ binaryMtime, markupMtime, explicit: options.authority });
	const name = basename(entry.path);
	entry.authority = authority;

	if (authority === "markup") {
		const text = Buffer.from(await store.read(entry.markupPath)).toString("utf8");
		entry.file = fromMarkup(parseMarkup(text), level.vocabulary, name);
		entry.state = transition(entry.state, "loadMarkup");
		level.logger.debug(`${name}: loaded from markup`);
		return;
	}

	const bytes = await store.read(entry.path);
	const file = parse(bytes, { name, vocabulary: level.vocabulary, logger: level.logger });
	entry.file = file;
	entry.state = transition(entry.state, "loadBinary");
	if (options.writeMarkup) {
		if (options.cache?.isConverted(entry.path, bytes, markupMtime !== undefined)) {
			level.logger.debug(`${name}: markup is up to date`);
		} else {
			await store.writeAtomic(entry.markupPath, Buffer.from(renderMarkup(toMarkup(file, level.vocabulary)), "utf8"));
			options.cache?.markConverted(entry.path, bytes);
		}
	}
	entry.state = transition(entry.state, "sync");
	level.logger.debug(`${name}: loaded from binary`);
}

/**
 * Reads every file of the level with at most `concurrency` in flight.
 * A failing file is recorded and left Unloaded; the signal is checked before each file starts.
 */
export async function loadLevel(store: FileStore, location: LevelLocation, options: LoadOptions = {}): Promise<{ level: Level; report: LoadReport }> {
	const level = new Level(location, options.vocabulary ?? Vocabulary.bundled(), options.logger ?? silentLogger);
	for (const { path, role } of await enumerateLevelFiles(store, location)) {
		level.addEntry({ path, markupPath: markupPathFor(path), role, state: FileState.Unloaded });
	}

	const entries = level.list();
	const report: LoadReport = { loaded: [], failed: [], skipped: [], cancelled: false };
	const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
	let next = 0;

	const worker = async () => {
		while (next < entries.length) {
			if (options.signal?.aborted) return;
			const entry = entries[next++];
			try {
				await loadEntry(store, level, entry, options);
			} catch (err) {
				entry.error = describeError(err);
				entry.file = undefined;
				entry.state = FileState.Unloaded;
				level.logger.error(`${entry.path}: ${entry.error}`);
			}
		}
	};
	await Promise.all(Array.from({ length: Math.min(concurrency, entries.length) }, worker));

	for (const entry of entries) {
		if (entry.error !== undefined) report.failed.push({ path: entry.path, error: entry.error });
		else if (entry.state === FileState.Unloaded) report.skipped.push(entry.path);
		else report.loaded.push(entry.path);
	}
	report.cancelled = report.skipped.length > 0 && options.signal?.aborted === true;
	level.logger.info(`Loaded ${report.loaded.length} of ${entries.length} level files` + (report.failed.length ? `, ${report.failed.length} failed` : ""));
	return { level, report };
}

/** Throws when a load stopped early; a partly loaded level must not be saved. */
export function assertComplete(report: LoadReport): void {
	if (report.cancelled) {
		throw new ConversionCancelledError(`Conversion cancelled, ${report.skipped.length} of ${report.loaded.length + report.failed.length + report.skipped.length} level files not loaded`);
	}
}

export interface SaveOptions {
	/** Rewrite every loaded file, not only dirty ones */
	force?: boolean;
	/** Also refresh `.converted.xml` beside each written binary */
	writeMarkup?: boolean;
	/** Kept in step with the markup of every written binary */
	cache?: ConversionCache;
}

export interface SaveReport {
	written: string[];
	failed: Array<{ path: string; error: string }>;
	/** Dangling references; never block the save */
	warnings: string[];
}

async function saveEntry(store: FileStore, level: Level, entry: LevelEntry, file: ResourceFile, options: SaveOptions): Promise<void> {
	const bytes = serialize(file);
	if (options.writeMarkup) {
		await store.writeAtomic(entry.markupPath, Buffer.from(renderMarkup(toMarkup(file, level.vocabulary)), "utf8"));
	}
	options.cache?.invalidate(entry.path);
	await store.writeAtomic(entry.path, bytes);
	if (options.writeMarkup) options.cache?.markConverted(entry.path, bytes);
}

/**
 * Writes dirty files (all loaded files with `force`) under the level lock.
 * A file edited while its write was in flight stays Dirty.
 */
export function saveLevel(level: Level, store: FileStore, options: SaveOptions = {}): Promise<SaveReport> {
	return level.exclusive(async () => {
		const report: SaveReport = { written: [], failed: [], warnings: [] };
		for (const ref of findDangling(level)) {
			const message = `${basename(ref.path)}: ${ref.memberName} refers to missing ${ref.space} ${ref.targetId}`;
			report.warnings.push(message);
			level.logger.warn(message);
		}

		for (const entry of level.list()) {
			const file = entry.file;
			if (!file || entry.state === FileState.Unloaded) continue;
			if (!options.force && entry.state !== FileState.Dirty) continue;
			const revision = level.revision(entry.path);
			try {
				const after = transition(entry.state, "save");
				await saveEntry(store, level, entry, file, options);
				if (level.revision(entry.path) === revision) entry.state = after;
				entry.error = undefined;
				report.written.push(entry.path);
			} catch (err) {
				entry.error = describeError(err);
				report.failed.push({ path: entry.path, error: entry.error });
				level.logger.error(`${entry.path}: ${entry.error}`);
			}
		}
		level.logger.info(`Saved ${report.written.length} level files` + (report.failed.length ? `, ${report.failed.length} failed` : ""));
		return report;
	});
}

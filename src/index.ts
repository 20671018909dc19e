/**
 * FCB level tools
 *
 * Reads and writes the binary FCB resource files of a game level, converts them to and from
 * an editable markup form, and keeps the IDs that link a level's files together consistent.
 *
 * @example
 * ```ts
 * import { parse, toMarkup, renderMarkup, loadLevel, NodeFileStore } from "fcb-level-tools";
 *
 * const file = parse(readFileSync("sector_12.data.fcb"));
 * writeFileSync("sector_12.data.fcb.converted.xml", renderMarkup(toMarkup(file)));
 *
 * const { level, report } = await loadLevel(new NodeFileStore(), { containerDir: "level", sectorDir: "level/sectors" });
 * ```
 */

export * from "./errors.js";
export { createLogger, silentLogger, isLogLevel } from "./log.js";
export type { Logger, LogLevel } from "./log.js";
export { resolveConfig } from "./config.js";
export type { ToolConfig, ResolvedArgs } from "./config.js";

export * from "./fcb/types.js";
export { ByteCursor, ByteSink, readScalar, writeScalar, readString, writeString } from "./fcb/codec.js";
export type { StringEncoding } from "./fcb/codec.js";
export { crc32, formatHashName, parseHashName, hashOf } from "./fcb/hash.js";
export { Vocabulary, RESERVED_PREFIX } from "./fcb/vocabulary.js";
export type { IdentityRule, ReferenceRule, VocabularyDefinition } from "./fcb/vocabulary.js";
export { FcbReader, parse } from "./fcb/reader.js";
export type { ReadOptions } from "./fcb/reader.js";
export { serialize, writeFcb } from "./fcb/writer.js";
export * from "./fcb/node.js";

export type { MarkupDocument, MarkupElement } from "./markup/types.js";
export { toMarkup, nodeToMarkup, renderMarkup, writeMarkupFile } from "./markup/markup-writer.js";
export { fromMarkup, nodeFromMarkup, parseMarkup, readMarkupFile } from "./markup/markup-reader.js";
export { formatValue, parseValue, formatFloat32, escapeMarkup, unescapeMarkup } from "./markup/values.js";

export { FileState, transition } from "./level/state.js";
export type { FileEvent } from "./level/state.js";
export { Level } from "./level/level.js";
export type { LevelEntry, LevelLocation, Authority, FileRole } from "./level/level.js";
export { NodeFileStore, MemoryFileStore } from "./level/store.js";
export type { FileStore } from "./level/store.js";
export { ConversionCache, CONVERSION_CACHE_FILE, contentHash } from "./level/cache.js";
export * from "./level/references.js";
export * from "./level/orchestrator.js";
export { verifyBytes, verifyDirectory, filesEqual } from "./verify.js";
export type { VerifyResult } from "./verify.js";

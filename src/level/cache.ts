import { createHash } from "node:crypto";
import { describeError } from "../errors.js";
import { Logger, silentLogger } from "../log.js";
import { FileStore } from "./store.js";

export const CONVERSION_CACHE_FILE = ".fcb-conversion-cache.json";
const CACHE_VERSION = 1;

interface CacheFile {
	version: number;
	/** Binary path → sha256 of the bytes its markup was written from */
	files: Record<string, string>;
}

export function contentHash(bytes: Uint8Array): string {
	return createHash("sha256").update(bytes).digest("hex");
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readCacheFile(data: unknown): Array<[string, string]> {
	if (!isRecord(data) || data.version !== CACHE_VERSION || !isRecord(data.files)) {
		throw new Error(`expected { "version": ${CACHE_VERSION}, "files": { ... } }`);
	}
	return Object.entries(data.files).map(([path, hash]): [string, string] => {
		if (typeof hash !== "string") throw new Error(`hash of ${path} is not a string`);
		return [path, hash];
	});
}

/**
 * Remembers which binaries already have markup written from their current bytes,
 * so an export can skip rendering unchanged files.
 */
export class ConversionCache {
	private readonly hashes: Map<string, string>;
	public hits = 0;
	public misses = 0;

	constructor(entries: Iterable<[string, string]> = []) {
		this.hashes = new Map(entries);
	}

	get size(): number {
		return this.hashes.size;
	}

	/** Hit when the markup exists and was written from exactly these bytes */
	public isConverted(path: string, bytes: Uint8Array, markupExists: boolean): boolean {
		const cached = this.hashes.get(path);
		const hit = markupExists && cached !== undefined && cached === contentHash(bytes);
		if (hit) this.hits++;
		else this.misses++;
		return hit;
	}

	public markConverted(path: string, bytes: Uint8Array): void {
		this.hashes.set(path, contentHash(bytes));
	}

	public invalidate(path: string): void {
		this.hashes.delete(path);
	}

	public toJSON(): CacheFile {
		return { version: CACHE_VERSION, files: Object.fromEntries([...this.hashes].sort(([a], [b]) => a.localeCompare(b))) };
	}

	/** A missing file gives an empty cache; an unreadable one is logged and ignored. */
	public static async load(store: FileStore, cachePath: string, logger: Logger = silentLogger): Promise<ConversionCache> {
		if ((await store.mtime(cachePath)) === undefined) return new ConversionCache();
		try {
			const data: unknown = JSON.parse(Buffer.from(await store.read(cachePath)).toString("utf8"));
			return new ConversionCache(readCacheFile(data));
		} catch (err) {
			logger.warn(`Ignoring conversion cache ${cachePath}: ${describeError(err)}`);
			return new ConversionCache();
		}
	}

	public async save(store: FileStore, cachePath: string): Promise<void> {
		await store.writeAtomic(cachePath, Buffer.from(JSON.stringify(this.toJSON(), null, "\t") + "\n", "utf8"));
	}
}

import { readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join, normalize } from "node:path";

/** File system access used by the level services. Paths are plain strings. */
export interface FileStore {
	/** File names (not paths) directly inside `dir`, sorted */
	list(dir: string): Promise<string[]>;
	read(path: string): Promise<Uint8Array>;
	/** Modification time in ms, undefined when the file does not exist */
	mtime(path: string): Promise<number | undefined>;
	/** Write to a temporary sibling, then rename over `path` */
	writeAtomic(path: string, data: Uint8Array): Promise<void>;
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class NodeFileStore implements FileStore {
	public async list(dir: string): Promise<string[]> {
		try {
			const entries = await readdir(dir, { withFileTypes: true });
			return entries
				.filter((e) => e.isFile())
				.map((e) => e.name)
				.sort();
		} catch (err) {
			if (isNotFound(err)) return [];
			throw err;
		}
	}

	public async read(path: string): Promise<Uint8Array> {
		return readFile(path);
	}

	public async mtime(path: string): Promise<number | undefined> {
		try {
			return (await stat(path)).mtimeMs;
		} catch (err) {
			if (isNotFound(err)) return undefined;
			throw err;
		}
	}

	public async writeAtomic(path: string, data: Uint8Array): Promise<void> {
		const tmp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
		try {
			await writeFile(tmp, data);
			await rename(tmp, path);
		} catch (err) {
			await rm(tmp, { force: true });
			throw err;
		}
	}
}

interface MemoryEntry {
	data: Uint8Array;
	mtime: number;
}

/** In-process store for tests; time is a counter that advances on every write. */
export class MemoryFileStore implements FileStore {
	private files = new Map<string, MemoryEntry>();
	private clock = 1000;
	/** Paths whose next writes fail */
	public readonly failingWrites = new Set<string>();
	public writes: string[] = [];

	public put(path: string, data: Uint8Array | string, mtime?: number): void {
		const bytes = typeof data === "string" ? new Uint8Array(Buffer.from(data, "utf8")) : new Uint8Array(data);
		this.clock = Math.max(this.clock + 1, mtime ?? 0);
		this.files.set(normalize(path), { data: bytes, mtime: mtime ?? this.clock });
	}

	public has(path: string): boolean {
		return this.files.has(normalize(path));
	}

	public get(path: string): Uint8Array | undefined {
		return this.files.get(normalize(path))?.data;
	}

	public async list(dir: string): Promise<string[]> {
		const target = normalize(dir);
		return [...this.files.keys()]
			.filter((p) => dirname(p) === target)
			.map((p) => basename(p))
			.sort();
	}

	public async read(path: string): Promise<Uint8Array> {
		const entry = this.files.get(normalize(path));
		if (!entry) throw Object.assign(new Error(`ENOENT: no such file, open '${path}'`), { code: "ENOENT" });
		return new Uint8Array(entry.data);
	}

	public async mtime(path: string): Promise<number | undefined> {
		return this.files.get(normalize(path))?.mtime;
	}

	public async writeAtomic(path: string, data: Uint8Array): Promise<void> {
		if (this.failingWrites.has(normalize(path))) {
			throw Object.assign(new Error(`EACCES: permission denied, rename '${path}'`), { code: "EACCES" });
		}
		this.writes.push(normalize(path));
		this.put(path, data);
	}
}

import { InternalConsistencyError } from "../errors.js";
import { ResourceFile } from "../fcb/types.js";
import { Vocabulary } from "../fcb/vocabulary.js";
import { Logger, silentLogger } from "../log.js";
import { FileEvent, FileState, isLoaded, transition } from "./state.js";

export type FileRole = "container" | "sector";
export type Authority = "binary" | "markup";

export interface LevelEntry {
	/** Binary path */
	path: string;
	markupPath: string;
	role: FileRole;
	state: FileState;
	authority?: Authority;
	file?: ResourceFile;
	/** Last load or save failure */
	error?: string;
}

export interface LevelLocation {
	containerDir: string;
	sectorDir: string;
}

/** Loaded level: its files in enumeration order plus a lock that serializes mutations. */
export class Level {
	public readonly location: LevelLocation;
	public readonly vocabulary: Vocabulary;
	public readonly logger: Logger;
	private readonly entries: LevelEntry[] = [];
	private readonly byPath = new Map<string, LevelEntry>();
	private readonly revisions = new Map<string, number>();
	private tail: Promise<void> = Promise.resolve();

	constructor(location: LevelLocation, vocabulary: Vocabulary = Vocabulary.bundled(), logger: Logger = silentLogger) {
		this.location = location;
		this.vocabulary = vocabulary;
		this.logger = logger;
	}

	public addEntry(entry: LevelEntry): void {
		if (this.byPath.has(entry.path)) throw new InternalConsistencyError(`Duplicate level entry ${entry.path}`);
		this.entries.push(entry);
		this.byPath.set(entry.path, entry);
	}

	public list(): readonly LevelEntry[] {
		return this.entries;
	}

	/** Trees of loaded entries, in enumeration order */
	public loaded(): Array<{ path: string; file: ResourceFile }> {
		const out: Array<{ path: string; file: ResourceFile }> = [];
		for (const entry of this.entries) {
			if (entry.file && isLoaded(entry.state)) out.push({ path: entry.path, file: entry.file });
		}
		return out;
	}

	public entry(path: string): LevelEntry {
		const entry = this.byPath.get(path);
		if (!entry) throw new InternalConsistencyError(`No level file ${path}`);
		return entry;
	}

	public file(path: string): ResourceFile {
		const file = this.entry(path).file;
		if (!file) throw new InternalConsistencyError(`Level file ${path} is not loaded`);
		return file;
	}

	public apply(path: string, event: FileEvent): FileState {
		const entry = this.entry(path);
		entry.state = transition(entry.state, event);
		return entry.state;
	}

	public markDirty(path: string): void {
		this.apply(path, "edit");
		this.revisions.set(path, this.revision(path) + 1);
	}

	/** Count of edits to the file so far */
	public revision(path: string): number {
		return this.revisions.get(path) ?? 0;
	}

	public dirtyPaths(): string[] {
		return this.entries.filter((e) => e.state === FileState.Dirty).map((e) => e.path);
	}

	/** Runs `fn` after every earlier exclusive call has settled. */
	public exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
		const run = this.tail.then(fn);
		this.tail = run.then(
			() => undefined,
			() => undefined
		);
		return run;
	}

	/** One mutation of one file, serialized with every other edit and save of this level. */
	public edit<T>(path: string, fn: (file: ResourceFile) => T | Promise<T>): Promise<T> {
		return this.exclusive(async () => {
			const result = await fn(this.file(path));
			this.markDirty(path);
			return result;
		});
	}
}

import { InternalConsistencyError } from "../errors.js";

export enum FileState {
	Unloaded = "Unloaded",
	BinaryLoaded = "BinaryLoaded",
	MarkupSynced = "MarkupSynced",
	Dirty = "Dirty",
	Saved = "Saved"
}

export type FileEvent =
	/** binary parsed */
	| "loadBinary"
	/** markup parsed and taken as authoritative; binary must be re-derived */
	| "loadMarkup"
	/** markup form derived from the binary */
	| "sync"
	| "edit"
	| "save"
	| "unload";

const TRANSITIONS: Record<FileState, Partial<Record<FileEvent, FileState>>> = {
	[FileState.Unloaded]: { loadBinary: FileState.BinaryLoaded, loadMarkup: FileState.Dirty },
	[FileState.BinaryLoaded]: { sync: FileState.MarkupSynced, edit: FileState.Dirty },
	[FileState.MarkupSynced]: { edit: FileState.Dirty, save: FileState.Saved },
	[FileState.Dirty]: { edit: FileState.Dirty, save: FileState.Saved },
	[FileState.Saved]: { edit: FileState.Dirty, save: FileState.Saved }
};

export function transition(state: FileState, event: FileEvent): FileState {
	if (event === "unload") return FileState.Unloaded;
	const next = TRANSITIONS[state][event];
	if (next === undefined) {
		throw new InternalConsistencyError(`Illegal file state transition: ${event} in state ${state}`);
	}
	return next;
}

export function isLoaded(state: FileState): boolean {
	return state !== FileState.Unloaded;
}

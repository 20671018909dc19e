import { describe, expect, it } from "vitest";
import { InternalConsistencyError } from "../errors.js";
import { FileEvent, FileState, isLoaded, transition } from "./state.js";

describe("transition", () => {
	it("follows a binary-authoritative file through edit and save", () => {
		const events: FileEvent[] = ["loadBinary", "sync", "edit", "edit", "save", "save", "edit"];
		const states: FileState[] = [];
		let state = FileState.Unloaded;
		for (const event of events) {
			state = transition(state, event);
			states.push(state);
		}
		expect(states).toEqual([
			FileState.BinaryLoaded,
			FileState.MarkupSynced,
			FileState.Dirty,
			FileState.Dirty,
			FileState.Saved,
			FileState.Saved,
			FileState.Dirty
		]);
	});

	it("treats markup-authoritative loads as dirty", () => {
		expect(transition(FileState.Unloaded, "loadMarkup")).toBe(FileState.Dirty);
	});

	it("unloads from any state", () => {
		for (const state of Object.values(FileState)) {
			expect(transition(state, "unload")).toBe(FileState.Unloaded);
		}
	});

	it("rejects illegal transitions", () => {
		expect(() => transition(FileState.Unloaded, "edit")).toThrow(InternalConsistencyError);
		expect(() => transition(FileState.BinaryLoaded, "save")).toThrow("Illegal file state transition: save in state BinaryLoaded");
		expect(() => transition(FileState.Dirty, "loadBinary")).toThrow(InternalConsistencyError);
	});

	it("counts every state but Unloaded as loaded", () => {
		expect(Object.values(FileState).filter(isLoaded)).toEqual([FileState.BinaryLoaded, FileState.MarkupSynced, FileState.Dirty, FileState.Saved]);
	});
});

/** Small in-memory level files for tests. */

import { FCB_VERSION, FcbAttribute, FcbNode, FcbValue, ResourceFile, ValueKind } from "../fcb/types.js";
import { Vocabulary } from "../fcb/vocabulary.js";
import { Level } from "../level/level.js";
import { FileState } from "../level/state.js";

export const vocab = Vocabulary.bundled();

export function attr(member: string, value: FcbValue): FcbAttribute {
	return { hash: vocab.memberHashOf(member), ...value };
}

export function node(type: string, attributes: FcbAttribute[] = [], children: FcbNode[] = []): FcbNode {
	return { tag: vocab.typeTagOf(type), attributes, children };
}

export const id64 = (value: bigint): FcbValue => ({ kind: ValueKind.Id64, value });
export const str = (value: string): FcbValue => ({ kind: ValueKind.String, value });
export const i32 = (value: number): FcbValue => ({ kind: ValueKind.Int32, value });
export const vec3 = (x: number, y: number, z: number): FcbValue => ({ kind: ValueKind.Vector3, value: [x, y, z] });

export function entity(id: bigint, name: string, pos: [number, number, number] = [0, 0, 0], extra: FcbAttribute[] = [], children: FcbNode[] = []): FcbNode {
	return node("Entity", [attr("disEntityId", id64(id)), attr("hidName", str(name)), attr("hidPos", vec3(...pos)), ...extra], children);
}

export function file(name: string, roots: FcbNode[], flags = 0): ResourceFile {
	return { name, version: FCB_VERSION, flags, roots };
}

/** WorldSector with an Entities list */
export function sector(name: string, sectorId: number, entities: FcbNode[]): ResourceFile {
	return file(name, [node("WorldSector", [attr("Id", i32(sectorId))], [node("Entities", [], entities)])]);
}

/** Level whose files are already loaded from binary */
export function levelOf(files: ResourceFile[]): Level {
	const level = new Level({ containerDir: "/level", sectorDir: "/level/sectordata" }, vocab);
	for (const f of files) {
		level.addEntry({ path: f.name, markupPath: `${f.name}.converted.xml`, role: "sector", state: FileState.BinaryLoaded, file: f });
	}
	return level;
}

/** Captures log lines per level */
export function captureSink() {
	const lines: { log: string[]; warn: string[]; error: string[] } = { log: [], warn: [], error: [] };
	return {
		lines,
		sink: {
			log: (m: string) => lines.log.push(m),
			warn: (m: string) => lines.warn.push(m),
			error: (m: string) => lines.error.push(m)
		}
	};
}

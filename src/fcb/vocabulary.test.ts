import { describe, expect, it } from "vitest";
import { crc32 } from "./hash.js";
import { ValueKind } from "./types.js";
import { Vocabulary } from "./vocabulary.js";

describe("Vocabulary", () => {
	it("bundles the level types and member kinds", () => {
		const vocab = Vocabulary.bundled();
		expect(vocab.typeNameOf(crc32("Entity"))).toBe("Entity");
		expect(vocab.memberKind(crc32("hidPos"))).toBe(ValueKind.Vector3);
		expect(vocab.memberKind(crc32("disEntityId"))).toBe(ValueKind.Id64);
	});

	it("tells identities from references per type", () => {
		const vocab = Vocabulary.bundled();
		const id = crc32("disEntityId");
		expect(vocab.identityFor(crc32("Entity"), id)?.space).toBe("entity");
		expect(vocab.referenceFor(crc32("Entity"), id)).toBeUndefined();
		expect(vocab.referenceFor(crc32("UniversalObject"), id)).toMatchObject({ space: "entity", crossFile: true });
	});

	it("applies wildcard reference rules to every type", () => {
		const vocab = Vocabulary.bundled();
		expect(vocab.referenceFor(crc32("CVehicle"), crc32("disLinkedEntityId"))?.member).toBe("disLinkedEntityId");
	});

	it("validates definitions", () => {
		expect(() => Vocabulary.fromDefinition({ types: [], members: { x: "Int33" } })).toThrow(/unknown kind "Int33"/);
		expect(() => Vocabulary.fromDefinition({ types: ["fcb.raw"], members: {} })).toThrow(/reserved prefix/);
		expect(() => Vocabulary.fromDefinition([])).toThrow(/must be an object/);
	});

	it("takes explicit hashes over CRC-32", () => {
		const vocab = Vocabulary.fromDefinition({ types: [{ name: "Thing", hash: "0x10" }], members: { size: { kind: "UInt16", hash: "20" } } });
		expect(vocab.typeTagOf("Thing")).toBe(0x10);
		expect(vocab.memberNameOf(0x20)).toBe("size");
		expect(vocab.memberKind(0x20)).toBe(ValueKind.UInt16);
	});

	it("reads binary class lists", () => {
		const xml = `<classes>
	<class hash="0000ABCD" name="CCustom">
		<member hash="00001234" name="customField" />
		<member name="other" />
	</class>
</classes>`;
		const vocab = Vocabulary.fromBinaryClassesXml(xml);
		expect(vocab.typeNameOf(0xabcd)).toBe("CCustom");
		expect(vocab.memberNameOf(0x1234)).toBe("customField");
		expect(vocab.memberHashOf("other")).toBe(crc32("other"));
		expect(vocab.memberKind(0x1234)).toBeUndefined();
	});

	it("merges with later entries winning", () => {
		const extra = Vocabulary.fromDefinition({ types: ["Extra"], members: { hidPos: "Vector4" } });
		const merged = Vocabulary.bundled().merge(extra);
		expect(merged.isKnownTag(crc32("Extra"))).toBe(true);
		expect(merged.isKnownTag(crc32("Entity"))).toBe(true);
		expect(merged.memberKind(crc32("hidPos"))).toBe(ValueKind.Vector4);
		expect(merged.identityFor(crc32("Entity"), crc32("disEntityId"))?.space).toBe("entity");
	});
});

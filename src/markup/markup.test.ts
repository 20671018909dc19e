import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MarkupFormatError } from "../errors.js";
import { crc32 } from "../fcb/hash.js";
import { nodesEqual } from "../fcb/node.js";
import { FcbReader, parse } from "../fcb/reader.js";
import { FcbNode, ValueKind } from "../fcb/types.js";
import { serialize, writeFcb } from "../fcb/writer.js";
import { attr, entity, file, id64, node, sector, str, vec3, vocab } from "../testing/fixtures.js";
import { fromMarkup, nodeFromMarkup, parseMarkup, readMarkupFile } from "./markup-reader.js";
import { nodeToMarkup, renderMarkup, toMarkup, writeMarkupFile } from "./markup-writer.js";
import { MarkupElement } from "./types.js";

const HEAD = '<?xml version="1.0" encoding="utf-8"?>\n';

function roundTrip(text: string) {
	return fromMarkup(parseMarkup(text), vocab, "x.fcb");
}

function markupError(text: string): MarkupFormatError {
	try {
		roundTrip(text);
	} catch (err) {
		if (err instanceof MarkupFormatError) return err;
		throw err;
	}
	throw new Error("expected a MarkupFormatError");
}

describe("toMarkup", () => {
	it("renders known members plainly and escapes text", () => {
		const f = file("a.fcb", [node("Entity", [attr("disEntityId", id64(42n)), attr("hidPos", vec3(1.5, 0.1, -0)), attr("hidName", str('Tree "big" <1>'))])]);
		expect(renderMarkup(toMarkup(f, vocab))).toBe(
			HEAD + '<fcb version="3" flags="0">\n\t<Entity disEntityId="42" hidPos="1.5,0.1,-0" hidName="Tree &quot;big&quot; &lt;1&gt;" />\n</fcb>\n'
		);
	});

	it("spells unknown hashes and keeps the kind of unknown members", () => {
		const unknown: FcbNode = { tag: 0xcafebabe, attributes: [{ hash: 0xbeef, kind: ValueKind.UInt16, value: 7 }], children: [] };
		expect(renderMarkup(toMarkup(file("a.fcb", [unknown]), vocab))).toBe(HEAD + '<fcb version="3" flags="0">\n\t<_0xCAFEBABE _0x0000BEEF="UInt16:7" />\n</fcb>\n');
	});

	it("writes opaque nodes as raw hex", () => {
		const opaque: FcbNode = { tag: 0x12345678, attributes: [], children: [], opaque: new Uint8Array([0xde, 0xad]) };
		expect(toMarkup(file("a.fcb", [opaque]), vocab).root.children[0]).toEqual({ name: "_0x12345678", attributes: [["fcb.raw", "DEAD"]], children: [] });
	});

	it("numbers repeated members and nests children with tabs", () => {
		const f = file("a.fcb", [node("Entities", [], [node("Entity", [attr("hidName", str("a")), attr("hidName", str("b"))])])]);
		expect(renderMarkup(toMarkup(f, vocab), "\r\n")).toBe(
			'<?xml version="1.0" encoding="utf-8"?>\r\n<fcb version="3" flags="0">\r\n\t<Entities>\r\n\t\t<Entity hidName="a" hidName.2="b" />\r\n\t</Entities>\r\n</fcb>\r\n'
		);
	});
});

describe("single nodes", () => {
	it("converts one node and its children both ways", () => {
		const gate = entity(20n, "Gate", [0, 0.5, 0], [], [node("Link", [attr("targetEntityId", id64(10n))])]);
		const el = nodeToMarkup(gate, vocab);
		expect(el).toEqual({
			name: "Entity",
			attributes: [
				["disEntityId", "20"],
				["hidName", "Gate"],
				["hidPos", "0,0.5,0"]
			],
			children: [{ name: "Link", attributes: [["targetEntityId", "10"]], children: [] }]
		});
		expect(nodesEqual(nodeFromMarkup(el, vocab), gate)).toBe(true);
	});

	it("names the failing element by the path it was given", () => {
		const el: MarkupElement = { name: "Entity", attributes: [["hidPos", "1"]], children: [] };
		expect(() => nodeFromMarkup(el, vocab, "sector/Entity[4]")).toThrow(new MarkupFormatError("sector/Entity[4]@hidPos", 'Vector3 needs 3 components, got "1"'));
	});
});

describe("markup edits", () => {
	it("reorders, changes and removes entities and re-serializes the result", () => {
		const original = sector("sec.data.fcb", 1, [entity(1n, "A", [1, 2, 3]), entity(2n, "B"), entity(3n, "C")]);
		const lines = renderMarkup(toMarkup(original, vocab)).split("\n");
		expect(lines[4]).toBe('\t\t\t<Entity disEntityId="1" hidName="A" hidPos="1,2,3" />');
		const edited = [
			...lines.slice(0, 4),
			lines[5].replace('hidName="B"', 'hidName="Bee"'),
			lines[4].replace('hidPos="1,2,3"', 'hidPos="4,5,6.5"'),
			...lines.slice(7)
		].join("\n");

		const back = fromMarkup(parseMarkup(edited), vocab, "sec.data.fcb");
		const expected = sector("sec.data.fcb", 1, [entity(2n, "Bee"), entity(1n, "A", [4, 5, 6.5])]);
		expect(nodesEqual(back.roots[0], expected.roots[0])).toBe(true);
		const bytes = serialize(back);
		expect(bytes.equals(serialize(expected))).toBe(true);
		expect(nodesEqual(parse(bytes).roots[0], expected.roots[0])).toBe(true);
	});
});

describe("markup round trip", () => {
	const tricky = file(
		"sector.data.fcb",
		[
			node("WorldSector", [attr("Id", { kind: ValueKind.Int32, value: -3 })], [
				node("Entities", [], [
					entity(9007199254740993n, "line1\nline2\t\u0001 & done", [Math.fround(0.1), -0, Math.fround(1e-40)], [
						attr("hidScale", { kind: ValueKind.Float32, value: NaN }),
						attr("hidName", str("Int32:5")),
						attr("hidResourceCount", { kind: ValueKind.Int64, value: -(1n << 63n) }),
						{ hash: 0x00000010, kind: ValueKind.Blob, value: new Uint8Array([0, 1, 0xff]) },
						{ hash: 0x00000011, kind: ValueKind.Float64, value: -0 }
					]),
					{ tag: 0x12345678, attributes: [], children: [], opaque: new Uint8Array([1, 2, 3]) }
				])
			])
		],
		0
	);

	it("reproduces every value and the same binary", () => {
		const back = roundTrip(renderMarkup(toMarkup(tricky, vocab)));
		expect(back.version).toBe(3);
		expect(back.flags).toBe(0);
		expect(nodesEqual(back.roots[0], tricky.roots[0])).toBe(true);
		expect(serialize(back).equals(serialize(tricky))).toBe(true);
	});

	it("keeps NaN bit patterns", () => {
		const nans = file("nan.fcb", [
			node("Entity", [
				attr("hidScale", { kind: ValueKind.Float32, value: NaN, nanBits: [0x7f800001n] }),
				attr("hidPos", { kind: ValueKind.Vector3, value: [1, NaN, 0], nanBits: [undefined, 0xffc01234n] }),
				{ hash: 0x00000011, kind: ValueKind.Float64, value: NaN, nanBits: [0x7ff0000000000001n] }
			])
		]);
		const doc = toMarkup(nans, vocab);
		expect(doc.root.children[0].attributes).toEqual([
			["hidScale", "NaN:0x7F800001"],
			["hidPos", "1,NaN:0xFFC01234,0"],
			["_0x00000011", "Float64:NaN:0x7FF0000000000001"]
		]);
		const back = roundTrip(renderMarkup(doc));
		expect(nodesEqual(back.roots[0], nans.roots[0])).toBe(true);
		expect(serialize(back).equals(serialize(nans))).toBe(true);
	});

	it("accepts hand-written types and members", () => {
		const back = roundTrip('<fcb version="3" flags="0"><Widget customFlag="Bool:true" hidName="w" /></fcb>');
		expect(back.roots[0]).toEqual({
			tag: crc32("Widget"),
			attributes: [
				{ hash: crc32("customFlag"), kind: ValueKind.Bool, value: true },
				{ hash: crc32("hidName"), kind: ValueKind.String, value: "w" }
			],
			children: []
		});
	});

	it("reads a byte order mark and defaults the header", () => {
		const back = roundTrip("\uFEFF" + HEAD + "<fcb />");
		expect(back).toEqual({ name: "x.fcb", version: 3, flags: 0, roots: [] });
	});
});

describe("markup errors", () => {
	it("locates bad values by element path and attribute", () => {
		const err = markupError('<fcb><WorldSector><Entities><Entity hidPos="1,2" /></Entities></WorldSector></fcb>');
		expect(err.element).toBe("fcb/WorldSector[0]/Entities[0]/Entity[0]@hidPos");
		expect(err.message).toMatch(/needs 3 components/);
	});

	it("requires a kind for members without a declared one", () => {
		expect(markupError('<fcb><Entity mystery="5" /></fcb>').element).toBe("fcb/Entity[0]@mystery");
	});

	it("rejects reserved attributes other than raw", () => {
		expect(markupError('<fcb><Entity fcb.other="x" /></fcb>').message).toBe("fcb/Entity[0]@fcb.other: unknown reserved attribute");
	});

	it("rejects raw nodes with other content", () => {
		expect(markupError('<fcb><_0x12345678 fcb.raw="00" hidName="a" /></fcb>').element).toBe("fcb/_0x12345678[0]");
	});

	it("rejects raw payloads on known types", () => {
		expect(markupError('<fcb><Entity fcb.raw="00" /></fcb>').message).toBe("fcb/Entity[0]: fcb.raw is only allowed on types the vocabulary does not know");
	});

	it("rejects character references beyond Unicode", () => {
		expect(markupError('<fcb><Entity hidName="&#99999999;" /></fcb>').message).toBe("Entity@hidName: character reference &#99999999; is beyond U+10FFFF");
	});

	it("rejects malformed XML", () => {
		expect(markupError("<fcb><Entity></fcb>").element).toMatch(/^line \d+$/);
	});

	it("rejects a wrong root element", () => {
		expect(markupError("<level />").message).toBe("level: root element must be <fcb>");
	});

	it("rejects header numbers out of range", () => {
		expect(markupError('<fcb version="70000" />').element).toBe("fcb@version");
		expect(markupError('<fcb flags="x" />').element).toBe("fcb@flags");
	});
});

describe("markup files", () => {
	let dir = "";

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "fcb-markup-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("writes markup beside a binary and reads it back under the binary's name", () => {
		const binaryPath = join(dir, "sec_0_0.data.fcb");
		writeFcb(binaryPath, sector("sec_0_0.data.fcb", 1, [entity(10n, "Tree", [1, 2, 3])]));
		const loaded = new FcbReader(binaryPath, { vocabulary: vocab }).read();
		writeMarkupFile(`${binaryPath}.converted.xml`, loaded, vocab);

		const back = readMarkupFile(`${binaryPath}.converted.xml`, vocab);
		expect(back.name).toBe("sec_0_0.data.fcb");
		expect(serialize(back).equals(readFileSync(binaryPath))).toBe(true);
	});
});

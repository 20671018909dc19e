import { describe, expect, it } from "vitest";
import { ValueKind } from "./fcb/types.js";
import { serialize } from "./fcb/writer.js";
import { attr, entity, id64, sector, vocab } from "./testing/fixtures.js";
import { verifyBytes } from "./verify.js";

const sample = sector("sec_0_0.data.fcb", 1, [entity(10n, "Tree", [1, 2, 3]), entity(11n, "Rock", [0.5, 0, 0], [attr("hidParentId", id64(10n))])]);

describe("verifyBytes", () => {
	it("passes a file that survives both round trips", () => {
		expect(verifyBytes("a.fcb", serialize(sample), vocab)).toEqual({ file: "a.fcb", binary: true, markup: true });
	});

	it("passes a file holding NaN payloads", () => {
		const nans = sector("nan.data.fcb", 1, [
			entity(10n, "Tree", [1, 2, 3], [attr("hidScale", { kind: ValueKind.Float32, value: NaN, nanBits: [0xffc01234n] })])
		]);
		expect(verifyBytes("nan.data.fcb", serialize(nans), vocab)).toEqual({ file: "nan.data.fcb", binary: true, markup: true });
	});

	it("reports files that do not parse", () => {
		expect(verifyBytes("bad.fcb", Buffer.from("junk"), vocab)).toEqual({
			file: "bad.fcb",
			binary: false,
			markup: false,
			error: "File has 4 bytes, header needs 20 (at offset 0)"
		});
	});
});

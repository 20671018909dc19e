import { writeFileSync } from "node:fs";
import { EncodingError } from "../errors.js";
import { ByteSink, writeScalar } from "./codec.js";
import { FCB_MAGIC, FcbNode, ResourceFile } from "./types.js";

interface Counts {
	nodes: number;
	attributes: number;
}

/** tag, payload length, payload. Lengths come only from what was emitted. */
function encodeNode(node: FcbNode, counts: Counts): Buffer {
	counts.nodes++;
	const payload = node.opaque ? Buffer.from(node.opaque) : encodePayload(node, counts);
	const head = Buffer.alloc(8);
	head.writeUInt32LE(node.tag >>> 0, 0);
	head.writeUInt32LE(payload.length, 4);
	return Buffer.concat([head, payload]);
}

function encodePayload(node: FcbNode, counts: Counts): Buffer {
	if (node.attributes.length > 0xffff) {
		throw new EncodingError(`Node has ${node.attributes.length} attributes, at most 65535 fit`);
	}
	const sink = new ByteSink();
	sink.writeUInt16(node.attributes.length);
	for (const attr of node.attributes) {
		sink.writeUInt32(attr.hash >>> 0);
		sink.writeUInt8(attr.kind);
		writeScalar(sink, attr);
	}
	counts.attributes += node.attributes.length;
	sink.writeUInt32(node.children.length);
	for (const child of node.children) {
		sink.writeBytes(encodeNode(child, counts));
	}
	return sink.toBuffer();
}

/** Header counts and payload lengths are recomputed; `flags` is written back as given. */
export function serialize(file: ResourceFile): Buffer {
	const counts: Counts = { nodes: 0, attributes: 0 };
	const body = new ByteSink();
	for (const root of file.roots) {
		body.writeBytes(encodeNode(root, counts));
	}

	const header = new ByteSink();
	header.writeUInt32(FCB_MAGIC);
	header.writeUInt16(file.version);
	header.writeUInt16(file.flags);
	header.writeUInt32(file.roots.length);
	header.writeUInt32(counts.nodes);
	header.writeUInt32(counts.attributes);
	return Buffer.concat([header.toBuffer(), body.toBuffer()]);
}

export function writeFcb(outputPath: string, file: ResourceFile): void {
	writeFileSync(outputPath, serialize(file));
}

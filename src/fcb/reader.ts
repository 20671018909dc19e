import { readFileSync } from "node:fs";
import { basename } from "node:path";
import { MalformedHeaderError, TruncatedInputError } from "../errors.js";
import { Logger, silentLogger } from "../log.js";
import { ByteCursor, readScalar } from "./codec.js";
import { formatHashName } from "./hash.js";
import { FCB_HEADER_SIZE, FCB_MAGIC, FCB_VERSION, FcbAttribute, FcbHeader, FcbNode, NODE_HEADER_SIZE, ResourceFile, isValueKind } from "./types.js";
import { Vocabulary } from "./vocabulary.js";

/** Smallest encodings, used to reject counts that cannot fit before allocating anything. An opaque node may be a bare header. */
const MIN_ATTRIBUTE_SIZE = 4 + 1 + 1;
const MIN_NODE_SIZE = NODE_HEADER_SIZE;

export interface ReadOptions {
	/** File name recorded in the ResourceFile */
	name?: string;
	vocabulary?: Vocabulary;
	logger?: Logger;
}

/**
 * Reads one FCB file into a node tree. Stateless between instances; one instance per file.
 */
export class FcbReader {
	private buffer: Buffer;
	private readonly name: string;
	private readonly vocabulary: Vocabulary;
	private readonly logger: Logger;
	private header!: FcbHeader;
	private nodeCount = 0;
	private attributeCount = 0;
	private unknownTags = new Set<number>();

	constructor(pathOrBuffer: string | Uint8Array, options: ReadOptions = {}) {
		if (typeof pathOrBuffer === "string") {
			this.buffer = readFileSync(pathOrBuffer);
			this.name = options.name ?? basename(pathOrBuffer);
		} else {
			this.buffer = Buffer.isBuffer(pathOrBuffer) ? pathOrBuffer : Buffer.from(pathOrBuffer.buffer, pathOrBuffer.byteOffset, pathOrBuffer.byteLength);
			this.name = options.name ?? "";
		}
		this.vocabulary = options.vocabulary ?? Vocabulary.bundled();
		this.logger = options.logger ?? silentLogger;
	}

	public read(): ResourceFile {
		this.readHeader();
		const body = this.readBody();
		const roots: FcbNode[] = [];
		for (let i = 0; i < this.header.rootCount; i++) {
			roots.push(this.readNode(body, 0));
		}
		if (body.remaining > 0) {
			throw new MalformedHeaderError(`${body.remaining} trailing bytes after ${this.header.rootCount} root nodes`, body.position);
		}
		if (this.nodeCount !== this.header.nodeCount) {
			throw new MalformedHeaderError(`Header declares ${this.header.nodeCount} nodes, file contains ${this.nodeCount}`, 12);
		}
		if (this.attributeCount !== this.header.attributeCount) {
			throw new MalformedHeaderError(`Header declares ${this.header.attributeCount} attributes, file contains ${this.attributeCount}`, 16);
		}
		for (const tag of this.unknownTags) {
			this.logger.info(`${this.name || "FCB"}: unknown type tag ${formatHashName(tag)} kept as opaque node`);
		}
		return { name: this.name, version: this.header.version, flags: this.header.flags, roots };
	}

	public getHeader(): FcbHeader {
		return this.header;
	}

	private readHeader() {
		if (this.buffer.length < FCB_HEADER_SIZE) {
			throw new TruncatedInputError(`File has ${this.buffer.length} bytes, header needs ${FCB_HEADER_SIZE}`, 0);
		}
		const cursor = new ByteCursor(this.buffer, 0, FCB_HEADER_SIZE);
		const magic = cursor.readUInt32();
		if (magic !== FCB_MAGIC) {
			throw new MalformedHeaderError(`Invalid FCB magic: 0x${magic.toString(16)}`, 0);
		}
		const version = cursor.readUInt16();
		if (version !== FCB_VERSION) {
			throw new MalformedHeaderError(`Unsupported FCB version ${version}`, 4);
		}
		this.header = {
			magic,
			version,
			flags: cursor.readUInt16(),
			rootCount: cursor.readUInt32(),
			nodeCount: cursor.readUInt32(),
			attributeCount: cursor.readUInt32()
		};
	}

	private readBody(): ByteCursor {
		const body = new ByteCursor(this.buffer, FCB_HEADER_SIZE);
		if (this.header.rootCount * MIN_NODE_SIZE > body.remaining || this.header.nodeCount * MIN_NODE_SIZE > body.remaining) {
			throw new MalformedHeaderError(`Header counts (${this.header.rootCount} roots, ${this.header.nodeCount} nodes) exceed the ${body.remaining}-byte body`, 8);
		}
		return body;
	}

	private readNode(cursor: ByteCursor, depth: number): FcbNode {
		if (depth > 256) throw new MalformedHeaderError("Node nesting deeper than 256 levels", cursor.position);
		const start = cursor.position;
		const tag = cursor.readUInt32();
		const payloadLength = cursor.readUInt32();
		if (payloadLength > cursor.remaining) {
			throw new MalformedHeaderError(`Node payload length ${payloadLength} exceeds the ${cursor.remaining} remaining bytes`, start + 4);
		}
		const payload = cursor.sub(payloadLength);
		this.nodeCount++;

		if (!this.vocabulary.isKnownTag(tag)) {
			this.unknownTags.add(tag);
			return {
				tag,
				attributes: [],
				children: [],
				opaque: payload.readBytes(payloadLength),
				sourceOffset: start,
				sourceLength: NODE_HEADER_SIZE + payloadLength
			};
		}

		const node: FcbNode = { tag, attributes: [], children: [], sourceOffset: start, sourceLength: NODE_HEADER_SIZE + payloadLength };
		try {
			this.readPayload(payload, node, depth);
		} catch (err) {
			// Running off the end of a payload means the declared length is too small
			if (err instanceof TruncatedInputError) {
				throw new MalformedHeaderError(`Node content runs past its declared payload length ${payloadLength}`, start + 4);
			}
			throw err;
		}
		if (payload.remaining !== 0) {
			throw new MalformedHeaderError(`Node payload has ${payload.remaining} unread bytes of ${payloadLength}`, payload.position);
		}
		return node;
	}

	private readPayload(payload: ByteCursor, node: FcbNode, depth: number) {
		const attributeCount = payload.readUInt16();
		if (attributeCount * MIN_ATTRIBUTE_SIZE > payload.remaining) {
			throw new MalformedHeaderError(`Attribute count ${attributeCount} cannot fit in ${payload.remaining} bytes`, payload.position - 2);
		}
		for (let i = 0; i < attributeCount; i++) {
			node.attributes.push(this.readAttribute(payload));
		}
		this.attributeCount += attributeCount;

		const childCount = payload.readUInt32();
		if (childCount * MIN_NODE_SIZE > payload.remaining) {
			throw new MalformedHeaderError(`Child count ${childCount} cannot fit in ${payload.remaining} bytes`, payload.position - 4);
		}
		for (let i = 0; i < childCount; i++) {
			node.children.push(this.readNode(payload, depth + 1));
		}
	}

	private readAttribute(cursor: ByteCursor): FcbAttribute {
		const hash = cursor.readUInt32();
		const kindOffset = cursor.position;
		const kind = cursor.readUInt8();
		if (!isValueKind(kind)) {
			throw new MalformedHeaderError(`Unknown value kind ${kind} for member ${formatHashName(hash)}`, kindOffset);
		}
		return { hash, ...readScalar(cursor, kind) };
	}
}

/** Pure entry point: bytes in, tree out. */
export function parse(bytes: Uint8Array, options: ReadOptions = {}): ResourceFile {
	return new FcbReader(bytes, options).read();
}

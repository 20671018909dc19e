/** CRC-32 (reflected, poly 0xEDB88320) – type and member names are stored as this hash. */

const CRC_TABLE = (() => {
	const table = new Uint32Array(256);
	for (let n = 0; n < 256; n++) {
		let c = n;
		for (let k = 0; k < 8; k++) {
			c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
		}
		table[n] = c >>> 0;
	}
	return table;
})();

export function crc32(input: string | Uint8Array): number {
	const bytes = typeof input === "string" ? Buffer.from(input, "utf8") : input;
	let crc = 0xffffffff;
	for (let i = 0; i < bytes.length; i++) {
		crc = CRC_TABLE[(crc ^ bytes[i]) & 0xff] ^ (crc >>> 8);
	}
	return (crc ^ 0xffffffff) >>> 0;
}

/** `_0x1A2B3C4D` – markup name of a hash without a known name */
export function formatHashName(hash: number): string {
	return `_0x${(hash >>> 0).toString(16).toUpperCase().padStart(8, "0")}`;
}

const HASH_NAME = /^_0x([0-9A-Fa-f]{8})$/;

export function parseHashName(name: string): number | undefined {
	const m = name.match(HASH_NAME);
	return m ? parseInt(m[1], 16) >>> 0 : undefined;
}

/** Hash of a name, accepting the `_0x…` spelling for unnamed hashes. */
export function hashOf(name: string): number {
	return parseHashName(name) ?? crc32(name);
}

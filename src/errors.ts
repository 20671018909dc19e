/**
 * Error taxonomy of the codec and the level services.
 * Every error carries a stable `code`; binary errors also carry the byte offset where decoding stopped.
 */

export type FcbErrorCode =
	| "TRUNCATED_INPUT"
	| "MALFORMED_HEADER"
	| "ENCODING_ERROR"
	| "MARKUP_FORMAT"
	| "ID_COLLISION"
	| "UNKNOWN_ID"
	| "INTERNAL_CONSISTENCY"
	| "CONVERSION_CANCELLED";

export class FcbError extends Error {
	public readonly code: FcbErrorCode;
	public readonly offset?: number;

	constructor(code: FcbErrorCode, message: string, offset?: number) {
		super(offset === undefined ? message : `${message} (at offset ${offset})`);
		this.name = new.target.name;
		this.code = code;
		this.offset = offset;
	}
}

/** Input ends before the field being read. */
export class TruncatedInputError extends FcbError {
	constructor(message: string, offset?: number) {
		super("TRUNCATED_INPUT", message, offset);
	}
}

/** Counts or lengths that contradict each other or the input size. */
export class MalformedHeaderError extends FcbError {
	constructor(message: string, offset?: number) {
		super("MALFORMED_HEADER", message, offset);
	}
}

export class EncodingError extends FcbError {
	constructor(message: string, offset?: number) {
		super("ENCODING_ERROR", message, offset);
	}
}

/** Markup text that does not follow the element/attribute schema. */
export class MarkupFormatError extends FcbError {
	public readonly element: string;

	constructor(element: string, message: string) {
		super("MARKUP_FORMAT", `${element}: ${message}`);
		this.element = element;
	}
}

/** An ID would be held by two nodes of the same space. Never expected outside a bug. */
export class IdCollisionError extends FcbError {
	constructor(message: string) {
		super("ID_COLLISION", message);
	}
}

export class UnknownIdError extends FcbError {
	constructor(message: string) {
		super("UNKNOWN_ID", message);
	}
}

export class InternalConsistencyError extends FcbError {
	constructor(message: string) {
		super("INTERNAL_CONSISTENCY", message);
	}
}

export class ConversionCancelledError extends FcbError {
	constructor(message = "Conversion cancelled") {
		super("CONVERSION_CANCELLED", message);
	}
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

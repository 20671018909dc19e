/** Element tree of a markup document, independent of the text rendering. */
export interface MarkupElement {
	name: string;
	/** In document order; names may carry a `.N` suffix for repeated members */
	attributes: Array<[string, string]>;
	children: MarkupElement[];
}

export interface MarkupDocument {
	/** `<fcb version=".." flags="..">` */
	root: MarkupElement;
}

export const ROOT_ELEMENT = "fcb";
/** Hex payload of a node whose tag the vocabulary does not know */
export const RAW_ATTRIBUTE = "fcb.raw";

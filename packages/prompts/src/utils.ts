import { eastAsianWidth } from "get-east-asian-width";

// Grapheme segmenter (shared instance)
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Split text into grapheme clusters.
 */
export function toGraphemes(text: string): string[] {
	const graphemes: string[] = [];
	for (const { segment } of segmenter.segment(text)) {
		graphemes.push(segment);
	}
	return graphemes;
}

/**
 * Check if a grapheme cluster could be an emoji rendered two columns wide.
 */
function couldBeEmoji(segment: string): boolean {
	const cp = segment.codePointAt(0) ?? 0;
	return (
		(cp >= 0x1f000 && cp <= 0x1fbff) || // Emoji and Pictograph
		(cp >= 0x2600 && cp <= 0x27bf) || // Misc symbols, dingbats
		segment.includes("\uFE0F") // VS16 (emoji presentation selector)
	);
}

const zeroWidthRegex = /^(?:\p{Default_Ignorable_Code_Point}|\p{Control}|\p{Mark}|\p{Surrogate})+$/u;
const leadingNonPrintingRegex = /^[\p{Default_Ignorable_Code_Point}\p{Control}\p{Format}\p{Mark}\p{Surrogate}]+/u;

// Cache for non-ASCII strings
const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/**
 * Calculate the terminal width of a single grapheme cluster.
 */
function graphemeWidth(segment: string): number {
	if (zeroWidthRegex.test(segment)) {
		return 0;
	}

	if (couldBeEmoji(segment)) {
		return 2;
	}

	const base = segment.replace(leadingNonPrintingRegex, "");
	const cp = base.codePointAt(0);
	if (cp === undefined) {
		return 0;
	}

	return eastAsianWidth(cp);
}

/**
 * Fold line breaks to spaces and expand tabs, so the text takes exactly one
 * terminal row and its width matches `visibleWidth`.
 */
export function toSingleLine(text: string): string {
	if (!/[\r\n\t]/.test(text)) return text;
	return text.replace(/\r\n|[\r\n]/g, " ").replace(/\t/g, "   ");
}

/**
 * Calculate the visible width of a string in terminal columns.
 * ANSI styling and the cursor marker do not count.
 */
export function visibleWidth(str: string): number {
	if (str.length === 0) {
		return 0;
	}

	// Fast path: pure ASCII printable
	let isPureAscii = true;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	if (isPureAscii) {
		return str.length;
	}

	const cached = widthCache.get(str);
	if (cached !== undefined) {
		return cached;
	}

	let clean = str;
	if (str.includes("\t")) {
		clean = clean.replace(/\t/g, "   ");
	}
	if (clean.includes("\x1b")) {
		// SGR and cursor codes
		clean = clean.replace(/\x1b\[[0-9;]*[mGKHJ]/g, "");
		// APC sequences (cursor marker)
		clean = clean.replace(/\x1b_[^\x07\x1b]*(?:\x07|\x1b\\)/g, "");
	}

	let width = 0;
	for (const { segment } of segmenter.segment(clean)) {
		width += graphemeWidth(segment);
	}

	if (widthCache.size >= WIDTH_CACHE_SIZE) {
		const firstKey = widthCache.keys().next().value;
		if (firstKey !== undefined) {
			widthCache.delete(firstKey);
		}
	}
	widthCache.set(str, width);

	return width;
}

/**
 * Extract the ANSI escape sequence starting at `pos`, if any.
 */
function extractAnsiCode(str: string, pos: number): { code: string; length: number } | null {
	if (pos >= str.length || str[pos] !== "\x1b") return null;

	const next = str[pos + 1];

	// CSI sequence: ESC [ ... m/G/K/H/J
	if (next === "[") {
		let j = pos + 2;
		while (j < str.length && !/[mGKHJ]/.test(str.charAt(j))) j++;
		if (j < str.length) return { code: str.substring(pos, j + 1), length: j + 1 - pos };
		return null;
	}

	// APC sequence: ESC _ ... BEL or ESC _ ... ST (ESC \)
	if (next === "_") {
		let j = pos + 2;
		while (j < str.length) {
			if (str[j] === "\x07") return { code: str.substring(pos, j + 1), length: j + 1 - pos };
			if (str[j] === "\x1b" && str[j + 1] === "\\") return { code: str.substring(pos, j + 2), length: j + 2 - pos };
			j++;
		}
		return null;
	}

	return null;
}

const PUNCTUATION_REGEX = /[(){}[\]<>.,;:'"!?+\-=*/\\|&%^$#@~`]/;

/**
 * Check if a character is whitespace.
 */
export function isWhitespaceChar(char: string): boolean {
	return /\s/.test(char);
}

/**
 * Check if a character is punctuation.
 */
export function isPunctuationChar(char: string): boolean {
	return PUNCTUATION_REGEX.test(char);
}

/**
 * Truncate text to fit within a maximum visible width, adding an ellipsis if needed.
 * ANSI escape codes are kept and do not count toward the width.
 */
export function truncateToWidth(text: string, maxWidth: number, ellipsis: string = "…"): string {
	if (visibleWidth(text) <= maxWidth) {
		return text;
	}

	const ellipsisWidth = visibleWidth(ellipsis);
	const targetWidth = maxWidth - ellipsisWidth;

	if (targetWidth <= 0) {
		return ellipsis.substring(0, Math.max(0, maxWidth));
	}

	let result = "";
	let currentWidth = 0;
	let i = 0;
	let done = false;

	while (i < text.length && !done) {
		const ansiResult = extractAnsiCode(text, i);
		if (ansiResult) {
			result += ansiResult.code;
			i += ansiResult.length;
			continue;
		}

		let end = i;
		while (end < text.length && !extractAnsiCode(text, end)) end++;

		for (const { segment } of segmenter.segment(text.slice(i, end))) {
			const w = graphemeWidth(segment);
			if (currentWidth + w > targetWidth) {
				done = true;
				break;
			}
			result += segment;
			currentWidth += w;
		}
		i = end;
	}

	// Reset before the ellipsis so styling does not leak into it
	return result.includes("\x1b") ? `${result}\x1b[0m${ellipsis}` : `${result}${ellipsis}`;
}

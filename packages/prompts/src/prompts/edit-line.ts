import { CURSOR_MARKER } from "../renderer.js";
import { toGraphemes, visibleWidth } from "../utils.js";

function takeHead(text: string, maxWidth: number): string {
	let result = "";
	let width = 0;
	for (const grapheme of toGraphemes(text)) {
		const w = visibleWidth(grapheme);
		if (width + w > maxWidth) break;
		result += grapheme;
		width += w;
	}
	return result;
}

function takeTail(text: string, maxWidth: number): string {
	const graphemes = toGraphemes(text);
	let result = "";
	let width = 0;
	for (let i = graphemes.length - 1; i >= 0; i--) {
		const grapheme = graphemes[i] ?? "";
		const w = visibleWidth(grapheme);
		if (width + w > maxWidth) break;
		result = grapheme + result;
		width += w;
	}
	return result;
}

/**
 * One editable line: `prefix`, then the value with the cursor marker between
 * `before` and `after`. A value wider than the room after the prefix scrolls
 * horizontally to keep the cursor in view: the tail when the cursor is near
 * the end, the head when it is near the start, centered otherwise.
 */
export function renderEditLine(prefix: string, before: string, after: string, width: number): string {
	const room = width - visibleWidth(prefix);
	if (room <= 0) {
		return `${prefix}${CURSOR_MARKER}`;
	}

	const beforeWidth = visibleWidth(before);
	const afterWidth = visibleWidth(after);
	// Everything fits (leave room for cursor at end)
	if (beforeWidth + afterWidth < room) {
		return `${prefix}${before}${CURSOR_MARKER}${after}`;
	}

	// Reserve one column for the cursor if it's at the end
	const scrollWidth = afterWidth === 0 ? room - 1 : room;
	const halfWidth = Math.floor(scrollWidth / 2);
	const beforeBudget = Math.min(beforeWidth, Math.max(halfWidth, scrollWidth - afterWidth));
	const shownBefore = takeTail(before, beforeBudget);
	const shownAfter = takeHead(after, scrollWidth - visibleWidth(shownBefore));
	return `${prefix}${shownBefore}${CURSOR_MARKER}${shownAfter}`;
}

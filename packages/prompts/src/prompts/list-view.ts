import { loadSettings } from "../config.js";
import type { PromptKeybindingsManager } from "../keybindings.js";
import { computeListLayout, type ListNavigator } from "../list-navigator.js";
import type { ItemDisplay, PromptTheme } from "../theme.js";

/**
 * Options shared by Select, MultiSelect and Sort.
 */
export interface ListPromptOptions {
	prompt?: string;
	items: readonly string[];
	/** Upper bound on item rows shown at once */
	maxLength?: number;
	/** Wrap the highlight at the ends; defaults to TERMPICK_NO_WRAP unset */
	wrap?: boolean;
	/** Erase the list when done (default: true) */
	clear?: boolean;
	/** Leave a summary line after confirming (default: true) */
	report?: boolean;
	showHelp?: boolean;
	theme?: PromptTheme;
}

export function resolveWrap(wrap: boolean | undefined): boolean {
	return wrap ?? loadSettings().wrap;
}

export interface ListFrameParts {
	header: string[];
	footer: string[];
	kind: ItemDisplay["kind"];
	grabbed?: boolean;
	maxLength?: number;
	/** Pass fuzzy match positions to the theme (default: false) */
	highlightMatches?: boolean;
}

/**
 * Build a list frame: header lines, the visible rows with scroll indicators
 * when paging, then footer lines. The page size is recomputed from the
 * terminal height on every call, and the frame never outgrows that height
 * unless a single row does not fit.
 */
export function renderListFrame(
	navigator: ListNavigator,
	theme: PromptTheme,
	height: number,
	parts: ListFrameParts,
): string[] {
	// Too short for the whole frame: the footer goes first, then the header
	const footer = height - parts.header.length - parts.footer.length >= 1 ? parts.footer : [];
	const header = height - parts.header.length >= 1 ? parts.header : [];
	// One spare row keeps the last line off the bottom edge
	const reserved = header.length + footer.length + 1;
	const layout = computeListLayout(navigator.count(), height, reserved, parts.maxLength);
	navigator.setPageSize(layout.pageSize);

	const lines = [...header];
	if (navigator.count() === 0) {
		lines.push(theme.noMatches());
		lines.push(...footer);
		return lines;
	}

	if (layout.indicators) {
		lines.push(navigator.hasMoreAbove() ? theme.scrollIndicator("up") : "");
	}
	for (const row of navigator.currentVisible()) {
		lines.push(
			theme.item({
				label: row.item.label,
				positions: parts.highlightMatches ? row.positions : [],
				highlighted: row.isHighlighted,
				kind: parts.kind,
				checked: row.isChecked,
				grabbed: row.isHighlighted && parts.grabbed === true,
			}),
		);
	}
	if (layout.indicators) {
		lines.push(navigator.hasMoreBelow() ? theme.scrollIndicator("down") : "");
	}
	lines.push(...footer);
	return lines;
}

/**
 * Navigation keys common to the list prompts. Returns true when handled.
 * `listKeys` enables the vi-style and Left/Right aliases of prompts without
 * a query line.
 */
export function applyNavigationKey(
	navigator: ListNavigator,
	data: string,
	kb: PromptKeybindingsManager,
	listKeys: boolean,
): boolean {
	if (kb.matches(data, "selectUp") || (listKeys && kb.matches(data, "listUp"))) {
		navigator.moveHighlight("up");
		return true;
	}
	if (kb.matches(data, "selectDown") || (listKeys && kb.matches(data, "listDown"))) {
		navigator.moveHighlight("down");
		return true;
	}
	if (kb.matches(data, "selectPageUp") || (listKeys && kb.matches(data, "listPageUp"))) {
		navigator.movePage("up");
		return true;
	}
	if (kb.matches(data, "selectPageDown") || (listKeys && kb.matches(data, "listPageDown"))) {
		navigator.movePage("down");
		return true;
	}
	return false;
}

export function isCancelKey(data: string, kb: PromptKeybindingsManager, listKeys: boolean): boolean {
	return kb.matches(data, "cancel") || (listKeys && kb.matches(data, "listCancel"));
}

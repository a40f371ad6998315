import { type FuzzyOptions, fuzzyFilter } from "./fuzzy.js";

/**
 * A candidate with its position in the caller's item list.
 */
export interface CandidateItem {
	index: number;
	label: string;
}

export interface VisibleRow {
	item: CandidateItem;
	/** Matched grapheme offsets in the label, empty without a query */
	positions: number[];
	isHighlighted: boolean;
	isChecked: boolean;
}

export interface Viewport {
	firstVisibleRow: number;
	pageSize: number;
}

export type Direction = "up" | "down";

export interface ListNavigatorOptions extends FuzzyOptions {
	/** Wrap highlight movement at the ends of the list (default: true) */
	wrap?: boolean;
	/** Original indices checked at start */
	checked?: Iterable<number>;
}

interface ViewEntry {
	item: CandidateItem;
	score: number;
	positions: number[];
}

/** Rows taken by the "more above"/"more below" indicators while paging */
export const SCROLL_INDICATOR_ROWS = 2;

export interface ListLayout {
	/** Item rows shown at once */
	pageSize: number;
	/** Whether the "more above"/"more below" rows are drawn */
	indicators: boolean;
}

/**
 * Item rows that fit on screen, and whether the scroll indicators fit too.
 *
 * `reservedRows` covers the rows the prompt draws besides the list (prompt
 * line, error or help line, one spare row so the last line never scrolls the
 * terminal). When the items do not fit, the indicator rows come out of the
 * budget too. A terminal too short for them gets no indicators and every
 * row, the spare one included, goes to items.
 */
export function computeListLayout(
	itemCount: number,
	terminalRows: number,
	reservedRows: number,
	maxLength?: number,
): ListLayout {
	const budget = terminalRows - reservedRows;
	const cap = maxLength !== undefined && maxLength > 0 ? maxLength : Number.POSITIVE_INFINITY;
	if (itemCount <= budget && itemCount <= cap) {
		return { pageSize: Math.max(1, itemCount), indicators: false };
	}
	if (budget - SCROLL_INDICATOR_ROWS >= 1) {
		return { pageSize: Math.min(budget - SCROLL_INDICATOR_ROWS, cap), indicators: true };
	}
	return { pageSize: Math.max(1, Math.min(budget + 1, cap)), indicators: false };
}

/**
 * Candidate list state shared by the list prompts: display order, filter view,
 * highlight, checked set and viewport. The caller's items are never reordered;
 * order and filtering are derived views over them.
 */
export class ListNavigator {
	private readonly items: CandidateItem[];
	private readonly wrap: boolean;
	private readonly fuzzyOptions: FuzzyOptions;
	private permutation: number[];
	private checked: Set<number>;
	private query = "";
	private view: ViewEntry[] = [];
	private highlight: number | undefined;
	private viewport: Viewport;

	constructor(labels: readonly string[], options: ListNavigatorOptions = {}) {
		this.items = labels.map((label, index) => ({ index, label }));
		this.wrap = options.wrap ?? true;
		this.fuzzyOptions = { caseSensitive: options.caseSensitive };
		this.permutation = this.items.map((item) => item.index);
		this.checked = new Set(options.checked ?? []);
		this.viewport = { firstVisibleRow: 0, pageSize: Math.max(1, this.items.length) };
		this.rebuildView();
	}

	/** Number of rows in the current view */
	count(): number {
		return this.view.length;
	}

	isFiltered(): boolean {
		return this.query.length > 0;
	}

	getViewport(): Viewport {
		return { ...this.viewport };
	}

	/** Highlighted position in the view, undefined when the view is empty */
	highlightedPosition(): number | undefined {
		return this.highlight;
	}

	/** Highlighted item, undefined when the view is empty */
	highlighted(): CandidateItem | undefined {
		return this.highlight === undefined ? undefined : this.view[this.highlight]?.item;
	}

	/** Checked original indices, ascending */
	checkedIndices(): number[] {
		return [...this.checked].sort((a, b) => a - b);
	}

	/** Original indices in display order */
	order(): number[] {
		return [...this.permutation];
	}

	/**
	 * Highlight the row holding the given original index. Returns false when
	 * the item is not in the view.
	 */
	highlightIndex(originalIndex: number): boolean {
		const position = this.view.findIndex((entry) => entry.item.index === originalIndex);
		if (position === -1) return false;
		this.highlight = position;
		this.scrollToHighlight();
		return true;
	}

	moveHighlight(direction: Direction): void {
		if (this.highlight === undefined) return;
		const last = this.view.length - 1;
		if (direction === "down") {
			this.highlight = this.highlight < last ? this.highlight + 1 : this.wrap ? 0 : last;
		} else {
			this.highlight = this.highlight > 0 ? this.highlight - 1 : this.wrap ? last : 0;
		}
		this.scrollToHighlight();
	}

	movePage(direction: Direction): void {
		if (this.highlight === undefined) return;
		const last = this.view.length - 1;
		const step = this.viewport.pageSize;
		if (direction === "down") {
			if (this.highlight === last) {
				this.highlight = this.wrap ? 0 : last;
			} else {
				this.highlight = Math.min(last, this.highlight + step);
			}
		} else if (this.highlight === 0) {
			this.highlight = this.wrap ? last : 0;
		} else {
			this.highlight = Math.max(0, this.highlight - step);
		}
		this.scrollToHighlight();
	}

	toggleCheckedAtHighlight(): void {
		const item = this.highlighted();
		if (!item) return;
		if (this.checked.has(item.index)) {
			this.checked.delete(item.index);
		} else {
			this.checked.add(item.index);
		}
	}

	/** Check every item, or uncheck them all when every item is already checked */
	toggleAll(): void {
		if (this.checked.size === this.items.length) {
			this.checked.clear();
		} else {
			this.checked = new Set(this.items.map((item) => item.index));
		}
	}

	/**
	 * Swap the highlighted item with its neighbor in the display order; the
	 * highlight follows it. Does nothing at the ends or while filtered.
	 */
	moveItem(direction: Direction): void {
		if (this.highlight === undefined || this.isFiltered()) return;
		const from = this.highlight;
		const to = direction === "down" ? from + 1 : from - 1;
		if (to < 0 || to >= this.permutation.length) return;

		const moving = this.permutation[from];
		const neighbor = this.permutation[to];
		if (moving === undefined || neighbor === undefined) return;
		this.permutation[from] = neighbor;
		this.permutation[to] = moving;

		this.rebuildView();
		this.highlight = to;
		this.scrollToHighlight();
	}

	/**
	 * Refilter against a new query. The highlight goes back to the top.
	 */
	setFilter(query: string): void {
		this.query = query;
		this.rebuildView();
		this.highlight = this.view.length > 0 ? 0 : undefined;
		this.viewport.firstVisibleRow = 0;
	}

	setPageSize(rows: number): void {
		this.viewport.pageSize = Math.max(1, rows);
		this.scrollToHighlight();
	}

	hasMoreAbove(): boolean {
		return this.viewport.firstVisibleRow > 0;
	}

	hasMoreBelow(): boolean {
		return this.viewport.firstVisibleRow + this.viewport.pageSize < this.view.length;
	}

	currentVisible(): VisibleRow[] {
		const { firstVisibleRow, pageSize } = this.viewport;
		return this.view.slice(firstVisibleRow, firstVisibleRow + pageSize).map((entry, offset) => ({
			item: entry.item,
			positions: entry.positions,
			isHighlighted: firstVisibleRow + offset === this.highlight,
			isChecked: this.checked.has(entry.item.index),
		}));
	}

	private rebuildView(): void {
		const ordered: CandidateItem[] = [];
		for (const index of this.permutation) {
			const item = this.items[index];
			if (item) ordered.push(item);
		}
		this.view = fuzzyFilter(ordered, this.query, (item) => item.label, this.fuzzyOptions).map((entry) => ({
			item: entry.item,
			score: entry.score,
			positions: entry.positions,
		}));
		if (this.highlight === undefined && this.view.length > 0) {
			this.highlight = 0;
		} else if (this.highlight !== undefined && this.highlight >= this.view.length) {
			this.highlight = this.view.length > 0 ? this.view.length - 1 : undefined;
		}
	}

	// Minimal scroll: shift the viewport just enough to show the highlight
	private scrollToHighlight(): void {
		const { pageSize } = this.viewport;
		let first = this.viewport.firstVisibleRow;
		if (this.highlight !== undefined) {
			if (this.highlight < first) {
				first = this.highlight;
			} else if (this.highlight >= first + pageSize) {
				first = this.highlight - pageSize + 1;
			}
		}
		const maxFirst = Math.max(0, this.view.length - pageSize);
		this.viewport.firstVisibleRow = Math.min(Math.max(0, first), maxFirst);
	}
}

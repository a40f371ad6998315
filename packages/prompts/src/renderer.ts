import { debugLog } from "./debug-log.js";
import type { Terminal } from "./terminal.js";
import { toSingleLine, truncateToWidth, visibleWidth } from "./utils.js";

/**
 * Cursor position marker - APC (Application Program Command) sequence.
 * This is a zero-width escape sequence that terminals ignore.
 * A prompt emits this at the text cursor position when editing a line.
 * The renderer finds and strips this marker, then positions the hardware cursor there.
 */
export const CURSOR_MARKER = "\x1b_tp:c\x07";

const SYNC_BEGIN = "\x1b[?2026h";
const SYNC_END = "\x1b[?2026l";

interface CursorPosition {
	row: number;
	col: number;
}

// One frame line must take exactly one terminal row
function fitLine(line: string, width: number): string {
	const single = toSingleLine(line);
	return visibleWidth(single) > width ? truncateToWidth(single, width) : single;
}

function moveRows(delta: number): string {
	if (delta > 0) return `\x1b[${delta}B`;
	if (delta < 0) return `\x1b[${-delta}A`;
	return "";
}

/**
 * Draws a prompt's frame in place below the current cursor line and redraws
 * only the lines that changed between two frames.
 *
 * Rows are counted from the first line of the drawn region. The hardware
 * cursor row is tracked so every update starts with a relative move.
 */
export class Renderer {
	private previousLines: string[] = [];
	private previousWidth = 0;
	private previousCursor: CursorPosition | null = null;
	private hardwareCursorRow = 0;
	private cursorVisible: boolean | undefined;

	constructor(private readonly terminal: Terminal) {}

	/** Lines currently on screen, cursor marker stripped */
	get frame(): readonly string[] {
		return this.previousLines;
	}

	/**
	 * Find the cursor marker, strip it and return its position.
	 */
	private extractCursorPosition(lines: string[]): CursorPosition | null {
		for (let row = 0; row < lines.length; row++) {
			const line = lines[row] ?? "";
			const markerIndex = line.indexOf(CURSOR_MARKER);
			if (markerIndex !== -1) {
				const before = line.slice(0, markerIndex);
				lines[row] = before + line.slice(markerIndex + CURSOR_MARKER.length);
				return { row, col: visibleWidth(toSingleLine(before)) };
			}
		}
		return null;
	}

	render(frameLines: readonly string[]): void {
		const width = this.terminal.columns;
		const height = this.terminal.rows;

		// Rows above the region cannot be reached with relative moves
		const lines = frameLines.slice(0, Math.max(1, height));
		const cursorPos = this.extractCursorPosition(lines);
		const newLines = lines.map((line) => fitLine(line, width));

		if (this.previousLines.length > 0 && this.previousWidth !== width) {
			debugLog("render", `width changed (${this.previousWidth} -> ${width}), redrawing region`);
			this.clear();
		}

		if (newLines.length === 0) {
			this.clear();
			this.updateCursorVisibility(null);
			return;
		}

		if (this.previousLines.length === 0) {
			this.fullRender(newLines, width, cursorPos);
			return;
		}

		let firstChanged = -1;
		let lastChanged = -1;
		const maxLines = Math.max(newLines.length, this.previousLines.length);
		for (let i = 0; i < maxLines; i++) {
			const oldLine = this.previousLines[i] ?? "";
			const newLine = newLines[i] ?? "";
			if (oldLine !== newLine) {
				if (firstChanged === -1) firstChanged = i;
				lastChanged = i;
			}
		}
		if (newLines.length > this.previousLines.length) {
			if (firstChanged === -1) firstChanged = this.previousLines.length;
			lastChanged = newLines.length - 1;
		}

		if (firstChanged === -1) {
			// Same text; only the cursor may have moved
			if (!sameCursor(cursorPos, this.previousCursor)) {
				const buffer = this.cursorMove(cursorPos, newLines.length);
				if (buffer) this.terminal.write(buffer);
				this.previousCursor = cursorPos;
			}
			this.updateCursorVisibility(cursorPos);
			return;
		}

		debugLog(
			"render",
			`diff firstChanged=${firstChanged} lastChanged=${lastChanged} prev=${this.previousLines.length} new=${newLines.length}`,
		);

		let buffer = SYNC_BEGIN;

		if (firstChanged >= newLines.length) {
			// Only deletions: go to the new last line and clear what follows
			const targetRow = Math.max(0, newLines.length - 1);
			buffer += moveRows(targetRow - this.hardwareCursorRow);
			buffer += "\r";
			this.hardwareCursorRow = targetRow;
		} else {
			// Rows past the previous region do not exist yet; they are created with \r\n
			const appendStart = firstChanged === this.previousLines.length;
			const moveTarget = appendStart ? firstChanged - 1 : firstChanged;
			buffer += moveRows(moveTarget - this.hardwareCursorRow);
			buffer += appendStart ? "\r\n" : "\r";

			const renderEnd = Math.min(lastChanged, newLines.length - 1);
			for (let i = firstChanged; i <= renderEnd; i++) {
				if (i > firstChanged) buffer += "\r\n";
				buffer += `\x1b[2K${newLines[i] ?? ""}`;
			}
			this.hardwareCursorRow = renderEnd;
		}

		if (this.previousLines.length > newLines.length) {
			const lastRow = newLines.length - 1;
			buffer += moveRows(lastRow - this.hardwareCursorRow);
			const extraLines = this.previousLines.length - newLines.length;
			for (let i = 0; i < extraLines; i++) {
				buffer += "\r\n\x1b[2K";
			}
			buffer += `\x1b[${extraLines}A`;
			this.hardwareCursorRow = lastRow;
		}

		buffer += this.cursorMove(cursorPos, newLines.length);
		buffer += SYNC_END;
		this.terminal.write(buffer);

		this.previousLines = newLines;
		this.previousWidth = width;
		this.previousCursor = cursorPos;
		this.updateCursorVisibility(cursorPos);
	}

	private fullRender(newLines: string[], width: number, cursorPos: CursorPosition | null): void {
		debugLog("render", `full render lines=${newLines.length}`);
		let buffer = SYNC_BEGIN;
		buffer += "\r";
		buffer += newLines.map((line) => `\x1b[2K${line}`).join("\r\n");
		this.hardwareCursorRow = Math.max(0, newLines.length - 1);
		buffer += this.cursorMove(cursorPos, newLines.length);
		buffer += SYNC_END;
		this.terminal.write(buffer);

		this.previousLines = newLines;
		this.previousWidth = width;
		this.previousCursor = cursorPos;
		this.updateCursorVisibility(cursorPos);
	}

	/**
	 * Escape sequence moving the hardware cursor to the marker position.
	 * Without a marker the cursor is parked at the start of the last line.
	 */
	private cursorMove(cursorPos: CursorPosition | null, totalLines: number): string {
		if (totalLines <= 0) return "";
		const targetRow = cursorPos ? Math.min(cursorPos.row, totalLines - 1) : totalLines - 1;
		const targetCol = cursorPos ? Math.max(0, cursorPos.col) : 0;
		const buffer = `${moveRows(targetRow - this.hardwareCursorRow)}\x1b[${targetCol + 1}G`;
		this.hardwareCursorRow = targetRow;
		return buffer;
	}

	private updateCursorVisibility(cursorPos: CursorPosition | null): void {
		const visible = cursorPos !== null;
		if (this.cursorVisible === visible) return;
		this.cursorVisible = visible;
		if (visible) {
			this.terminal.showCursor();
		} else {
			this.terminal.hideCursor();
		}
	}

	/**
	 * Erase the drawn region. The cursor is left at the region's first row.
	 */
	clear(): void {
		if (this.previousLines.length === 0) return;
		this.terminal.write(`${moveRows(-this.hardwareCursorRow)}\r\x1b[J`);
		this.reset();
	}

	/**
	 * Replace the region with the summary lines and move below them.
	 * With no lines, the region is erased and the cursor stays at its start.
	 */
	finish(summaryLines: readonly string[] = []): void {
		const width = this.terminal.columns;
		this.clear();
		if (summaryLines.length > 0) {
			const lines = summaryLines.map((line) => fitLine(line, width));
			this.terminal.write(`${lines.join("\r\n")}\r\n`);
		}
		this.restoreCursor();
	}

	/**
	 * Leave the last frame on screen, write the summary lines below it and
	 * move below them.
	 */
	keep(summaryLines: readonly string[] = []): void {
		const width = this.terminal.columns;
		let buffer = "";
		if (this.previousLines.length > 0) {
			const lastRow = this.previousLines.length - 1;
			buffer += `${moveRows(lastRow - this.hardwareCursorRow)}\r\n`;
		}
		for (const line of summaryLines) {
			buffer += `\x1b[2K${fitLine(line, width)}\r\n`;
		}
		if (buffer) this.terminal.write(buffer);
		this.reset();
		this.restoreCursor();
	}

	private restoreCursor(): void {
		if (this.cursorVisible !== true) {
			this.terminal.showCursor();
		}
		this.cursorVisible = undefined;
	}

	private reset(): void {
		this.previousLines = [];
		this.previousWidth = 0;
		this.previousCursor = null;
		this.hardwareCursorRow = 0;
	}
}

function sameCursor(a: CursorPosition | null, b: CursorPosition | null): boolean {
	if (a === null || b === null) return a === b;
	return a.row === b.row && a.col === b.col;
}

import { isPunctuationChar, isWhitespaceChar, toGraphemes } from "./utils.js";

export type CursorMovement = "left" | "right" | "home" | "end" | "wordLeft" | "wordRight";

type CharClass = "space" | "punct" | "word";

function classify(grapheme: string): CharClass {
	if (isWhitespaceChar(grapheme)) return "space";
	if (isPunctuationChar(grapheme)) return "punct";
	return "word";
}

/**
 * Single-line text buffer with a cursor, addressed in grapheme clusters so a
 * cursor step never splits an emoji or a combining sequence.
 */
export class LineEditor {
	private graphemes: string[];
	private cursorIndex: number;

	constructor(initialText: string = "") {
		this.graphemes = toGraphemes(initialText);
		this.cursorIndex = this.graphemes.length;
	}

	currentText(): string {
		return this.graphemes.join("");
	}

	/** Cursor offset in graphemes, in [0, length] */
	cursor(): number {
		return this.cursorIndex;
	}

	length(): number {
		return this.graphemes.length;
	}

	isEmpty(): boolean {
		return this.graphemes.length === 0;
	}

	textBeforeCursor(): string {
		return this.graphemes.slice(0, this.cursorIndex).join("");
	}

	textAfterCursor(): string {
		return this.graphemes.slice(this.cursorIndex).join("");
	}

	insert(text: string): void {
		if (text.length === 0) return;
		// Re-segment around the insertion so combining marks join their base
		const before = this.textBeforeCursor() + text;
		const after = this.textAfterCursor();
		const beforeGraphemes = toGraphemes(before);
		this.graphemes = toGraphemes(before + after);
		this.cursorIndex = Math.min(beforeGraphemes.length, this.graphemes.length);
	}

	deleteBackward(): boolean {
		if (this.cursorIndex === 0) return false;
		this.graphemes.splice(this.cursorIndex - 1, 1);
		this.cursorIndex--;
		return true;
	}

	deleteForward(): boolean {
		if (this.cursorIndex >= this.graphemes.length) return false;
		this.graphemes.splice(this.cursorIndex, 1);
		return true;
	}

	deleteWordBackward(): boolean {
		const end = this.cursorIndex;
		this.moveCursor("wordLeft");
		if (this.cursorIndex === end) return false;
		this.graphemes.splice(this.cursorIndex, end - this.cursorIndex);
		return true;
	}

	deleteToStart(): boolean {
		if (this.cursorIndex === 0) return false;
		this.graphemes.splice(0, this.cursorIndex);
		this.cursorIndex = 0;
		return true;
	}

	deleteToEnd(): boolean {
		if (this.cursorIndex >= this.graphemes.length) return false;
		this.graphemes.splice(this.cursorIndex);
		return true;
	}

	moveCursor(movement: CursorMovement): void {
		switch (movement) {
			case "left":
				this.cursorIndex = Math.max(0, this.cursorIndex - 1);
				break;
			case "right":
				this.cursorIndex = Math.min(this.graphemes.length, this.cursorIndex + 1);
				break;
			case "home":
				this.cursorIndex = 0;
				break;
			case "end":
				this.cursorIndex = this.graphemes.length;
				break;
			case "wordLeft":
				this.cursorIndex = this.wordLeftOf(this.cursorIndex);
				break;
			case "wordRight":
				this.cursorIndex = this.wordRightOf(this.cursorIndex);
				break;
		}
	}

	/** Replace the buffer with a recalled entry, cursor at the end */
	setFromHistory(text: string): void {
		this.setText(text);
	}

	setText(text: string): void {
		this.graphemes = toGraphemes(text);
		this.cursorIndex = this.graphemes.length;
	}

	private classAt(i: number): CharClass {
		return classify(this.graphemes[i] ?? "");
	}

	private wordLeftOf(start: number): number {
		let i = start;
		// Skip trailing whitespace
		while (i > 0 && this.classAt(i - 1) === "space") i--;
		if (i === 0) return 0;
		const runClass = this.classAt(i - 1);
		while (i > 0 && this.classAt(i - 1) === runClass) i--;
		return i;
	}

	private wordRightOf(start: number): number {
		const len = this.graphemes.length;
		let i = start;
		// Skip leading whitespace
		while (i < len && this.classAt(i) === "space") i++;
		if (i >= len) return len;
		const runClass = this.classAt(i);
		while (i < len && this.classAt(i) === runClass) i++;
		return i;
	}
}

import type { PromptKeybindingsManager } from "../keybindings.js";
import { printableText } from "../keys.js";
import type { LineEditor } from "../line-editor.js";

export type EditResult = "unhandled" | "moved" | "edited";

export interface EditKeyOptions {
	/** Word-wise movement and deletion (off for masked input) */
	words?: boolean;
}

/**
 * Apply a line-editing key to the editor. Cursor moves report "moved",
 * buffer changes "edited"; a key bound to a delete that had nothing to
 * delete reports "moved" since the buffer is unchanged.
 */
export function applyEditKey(
	editor: LineEditor,
	data: string,
	kb: PromptKeybindingsManager,
	options: EditKeyOptions = {},
): EditResult {
	const words = options.words ?? true;

	if (kb.matches(data, "deleteCharBackward")) {
		return editor.deleteBackward() ? "edited" : "moved";
	}
	if (kb.matches(data, "deleteCharForward")) {
		return editor.deleteForward() ? "edited" : "moved";
	}
	if (kb.matches(data, "deleteToLineStart")) {
		return editor.deleteToStart() ? "edited" : "moved";
	}
	if (kb.matches(data, "deleteToLineEnd")) {
		return editor.deleteToEnd() ? "edited" : "moved";
	}
	if (kb.matches(data, "deleteWordBackward")) {
		if (!words) return editor.deleteToStart() ? "edited" : "moved";
		return editor.deleteWordBackward() ? "edited" : "moved";
	}

	if (kb.matches(data, "cursorLeft")) {
		editor.moveCursor("left");
		return "moved";
	}
	if (kb.matches(data, "cursorRight")) {
		editor.moveCursor("right");
		return "moved";
	}
	if (kb.matches(data, "cursorLineStart")) {
		editor.moveCursor("home");
		return "moved";
	}
	if (kb.matches(data, "cursorLineEnd")) {
		editor.moveCursor("end");
		return "moved";
	}
	if (kb.matches(data, "cursorWordLeft")) {
		editor.moveCursor(words ? "wordLeft" : "home");
		return "moved";
	}
	if (kb.matches(data, "cursorWordRight")) {
		editor.moveCursor(words ? "wordRight" : "end");
		return "moved";
	}

	const text = printableText(data);
	if (text !== undefined) {
		editor.insert(text);
		return "edited";
	}

	return "unhandled";
}

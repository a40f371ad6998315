import assert from "node:assert";
import { describe, it } from "node:test";
import { renderEditLine } from "../src/prompts/edit-line.js";
import { CURSOR_MARKER } from "../src/renderer.js";

describe("renderEditLine", () => {
	it("shows the whole value when it fits", () => {
		assert.strictEqual(renderEditLine("> ", "ab", "c", 20), `> ab${CURSOR_MARKER}c`);
	});

	it("shows the tail when the cursor is at the end", () => {
		assert.strictEqual(renderEditLine("> ", "abcdefghijkl", "", 12), `> defghijkl${CURSOR_MARKER}`);
	});

	it("shows the head when the cursor is at the start", () => {
		assert.strictEqual(renderEditLine("> ", "", "abcdefghijkl", 12), `> ${CURSOR_MARKER}abcdefghij`);
	});

	it("centers the cursor in the middle of a long value", () => {
		assert.strictEqual(renderEditLine("> ", "abcdefghij", "klmnopqrst", 12), `> fghij${CURSOR_MARKER}klmno`);
	});

	it("does not split wide characters", () => {
		assert.strictEqual(renderEditLine("", "日本語", "", 6), `本語${CURSOR_MARKER}`);
	});

	it("keeps only the prefix when it fills the width", () => {
		assert.strictEqual(renderEditLine("Name: ", "a", "", 4), `Name: ${CURSOR_MARKER}`);
	});
});

import assert from "node:assert";
import { describe, it } from "node:test";
import { CURSOR_MARKER } from "../src/renderer.js";
import { isPunctuationChar, toGraphemes, toSingleLine, truncateToWidth, visibleWidth } from "../src/utils.js";

describe("visibleWidth", () => {
	it("counts ASCII characters one column each", () => {
		assert.strictEqual(visibleWidth("hello"), 5);
		assert.strictEqual(visibleWidth(""), 0);
	});

	it("ignores SGR escape codes", () => {
		assert.strictEqual(visibleWidth("\x1b[31mred\x1b[0m"), 3);
	});

	it("ignores the cursor marker", () => {
		assert.strictEqual(visibleWidth(`ab${CURSOR_MARKER}cd`), 4);
	});

	it("counts wide characters as two columns", () => {
		assert.strictEqual(visibleWidth("日本"), 4);
		assert.strictEqual(visibleWidth("👍"), 2);
	});

	it("gives combining marks no width", () => {
		assert.strictEqual(visibleWidth("e\u0301"), 1);
	});
});

describe("truncateToWidth", () => {
	it("returns text that fits unchanged", () => {
		assert.strictEqual(truncateToWidth("abc", 5), "abc");
	});

	it("cuts and appends an ellipsis", () => {
		assert.strictEqual(truncateToWidth("hello world", 8), "hello w…");
	});

	it("keeps escape codes and resets before the ellipsis", () => {
		assert.strictEqual(truncateToWidth("\x1b[31mhello world\x1b[0m", 6), "\x1b[31mhello\x1b[0m…");
	});

	it("does not split a wide character", () => {
		// Target width 4 fits two wide characters, the third would need 6
		assert.strictEqual(truncateToWidth("日本語です", 5), "日本…");
	});
});

describe("toGraphemes", () => {
	it("keeps combining sequences together", () => {
		assert.deepStrictEqual(toGraphemes("e\u0301x"), ["e\u0301", "x"]);
	});
});

describe("toSingleLine", () => {
	it("folds line breaks to spaces", () => {
		assert.strictEqual(toSingleLine("one\ntwo\r\nthree\rfour"), "one two three four");
	});

	it("expands tabs to the width visibleWidth counts", () => {
		assert.strictEqual(toSingleLine("a\tb"), "a   b");
		assert.strictEqual(visibleWidth(toSingleLine("a\tb")), visibleWidth("a\tb"));
	});

	it("returns plain text unchanged", () => {
		assert.strictEqual(toSingleLine("plain"), "plain");
	});
});

describe("isPunctuationChar", () => {
	it("recognizes separators used for word movement", () => {
		assert.strictEqual(isPunctuationChar("."), true);
		assert.strictEqual(isPunctuationChar("-"), true);
		assert.strictEqual(isPunctuationChar("a"), false);
	});
});

import assert from "node:assert";
import { describe, it } from "node:test";
import { fuzzyFilter, fuzzyMatch } from "../src/fuzzy.js";

describe("fuzzyMatch", () => {
	it("matches everything with an empty query", () => {
		assert.deepStrictEqual(fuzzyMatch("", "anything"), { score: 0, positions: [] });
	});

	it("rejects a query that is not a subsequence", () => {
		assert.strictEqual(fuzzyMatch("xyz", "apple"), undefined);
		assert.strictEqual(fuzzyMatch("longquery", "short"), undefined);
	});

	it("scores consecutive matches", () => {
		assert.deepStrictEqual(fuzzyMatch("an", "Banana"), { score: 40954, positions: [1, 2] });
	});

	it("rewards word starts after separators", () => {
		assert.deepStrictEqual(fuzzyMatch("fb", "foo-bar"), { score: 51193, positions: [0, 4] });
	});

	it("rewards camelCase humps", () => {
		assert.deepStrictEqual(fuzzyMatch("fb", "fooBar"), { score: 53242, positions: [0, 3] });
	});

	it("ignores case unless asked not to", () => {
		assert.ok(fuzzyMatch("A", "apple"));
		assert.strictEqual(fuzzyMatch("A", "apple", { caseSensitive: true }), undefined);
	});

	it("prefers the shorter candidate on equal points", () => {
		const short = fuzzyMatch("ab", "ab");
		const long = fuzzyMatch("ab", "abc");
		assert.ok(short && long && short.score > long.score);
	});
});

describe("fuzzyFilter", () => {
	const fruits = ["Apple", "Banana", "Cherry"];

	it("keeps only matching items", () => {
		const result = fuzzyFilter(fruits, "an", (item) => item);
		assert.deepStrictEqual(result, [{ item: "Banana", index: 1, score: 40954, positions: [1, 2] }]);
	});

	it("keeps every item in input order for an empty query", () => {
		const result = fuzzyFilter(fruits, "", (item) => item);
		assert.deepStrictEqual(
			result.map((entry) => entry.index),
			[0, 1, 2],
		);
	});

	it("sorts better matches first", () => {
		const result = fuzzyFilter(["xaxb", "ab"], "ab", (item) => item);
		assert.deepStrictEqual(
			result.map((entry) => entry.item),
			["ab", "xaxb"],
		);
	});

	it("breaks ties by input position", () => {
		const result = fuzzyFilter(["ab", "ab"], "ab", (item) => item);
		assert.deepStrictEqual(
			result.map((entry) => entry.index),
			[0, 1],
		);
	});
});

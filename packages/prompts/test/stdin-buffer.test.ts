/**
 * Tests for StdinBuffer
 */

import assert from "node:assert";
import { afterEach, beforeEach, describe, it } from "node:test";
import { StdinBuffer } from "../src/stdin-buffer.js";

describe("StdinBuffer", () => {
	let buffer: StdinBuffer;
	let emittedSequences: string[];
	let pastes: string[];

	beforeEach(() => {
		buffer = new StdinBuffer({ timeout: 10 });

		emittedSequences = [];
		pastes = [];
		buffer.on("data", (sequence) => {
			emittedSequences.push(sequence);
		});
		buffer.on("paste", (content) => {
			pastes.push(content);
		});
	});

	afterEach(() => {
		buffer.destroy();
	});

	// Helper to wait for async operations
	async function wait(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}

	describe("Regular Characters", () => {
		it("should pass through multiple regular characters one by one", () => {
			buffer.process("abc");
			assert.deepStrictEqual(emittedSequences, ["a", "b", "c"]);
		});

		it("should keep surrogate pairs together", () => {
			buffer.process("a😀b");
			assert.deepStrictEqual(emittedSequences, ["a", "😀", "b"]);
		});
	});

	describe("Escape Sequences", () => {
		it("should split batched arrow keys", () => {
			buffer.process("\x1b[A\x1b[B");
			assert.deepStrictEqual(emittedSequences, ["\x1b[A", "\x1b[B"]);
		});

		it("should reassemble a sequence split across chunks", () => {
			buffer.process("\x1b[1;");
			assert.deepStrictEqual(emittedSequences, []);
			buffer.process("5A");
			assert.deepStrictEqual(emittedSequences, ["\x1b[1;5A"]);
		});

		it("should handle SS3 sequences", () => {
			buffer.process("\x1bOA");
			assert.deepStrictEqual(emittedSequences, ["\x1bOA"]);
		});

		it("should emit meta key sequences whole", () => {
			buffer.process("\x1bbx");
			assert.deepStrictEqual(emittedSequences, ["\x1bb", "x"]);
		});

		it("should handle Linux console function keys", () => {
			buffer.process("\x1b[[5~");
			assert.deepStrictEqual(emittedSequences, ["\x1b[[5~"]);
		});

		it("should flush a lone escape after the timeout", async () => {
			buffer.process("\x1b");
			assert.deepStrictEqual(emittedSequences, []);
			await wait(30);
			assert.deepStrictEqual(emittedSequences, ["\x1b"]);
		});

		it("should convert a single high byte to a meta sequence", () => {
			buffer.process(Buffer.from([0xe1]));
			assert.deepStrictEqual(emittedSequences, ["\x1ba"]);
		});
	});

	describe("Bracketed Paste", () => {
		it("should emit pasted content as one event", () => {
			buffer.process("\x1b[200~hello world\x1b[201~");
			assert.deepStrictEqual(pastes, ["hello world"]);
			assert.deepStrictEqual(emittedSequences, []);
		});

		it("should collect a paste split across chunks", () => {
			buffer.process("\x1b[200~one ");
			buffer.process("two\x1b[201~x");
			assert.deepStrictEqual(pastes, ["one two"]);
			assert.deepStrictEqual(emittedSequences, ["x"]);
		});

		it("should emit keys typed before the paste first", () => {
			buffer.process("a\x1b[200~b\x1b[201~");
			assert.deepStrictEqual(emittedSequences, ["a"]);
			assert.deepStrictEqual(pastes, ["b"]);
		});
	});

	describe("flush and clear", () => {
		it("should return and drop buffered data", () => {
			buffer.process("\x1b[");
			assert.strictEqual(buffer.getBuffer(), "\x1b[");
			assert.deepStrictEqual(buffer.flush(), ["\x1b["]);
			assert.strictEqual(buffer.getBuffer(), "");
		});

		it("should forget a partial paste on clear", () => {
			buffer.process("\x1b[200~partial");
			buffer.clear();
			buffer.process("z");
			assert.deepStrictEqual(emittedSequences, ["z"]);
			assert.deepStrictEqual(pastes, []);
		});
	});
});

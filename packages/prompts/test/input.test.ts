import assert from "node:assert";
import { describe, it } from "node:test";
import { PromptCancelledError, TerminalIOError, ValidationError } from "../src/errors.js";
import { MemoryHistory } from "../src/history.js";
import { Input, runValidators, type ValidationResult } from "../src/prompts/input.js";
import { VirtualTerminal } from "./virtual-terminal.js";

const UP = "\x1b[A";
const DOWN = "\x1b[B";
const LEFT = "\x1b[D";
const BACKSPACE = "\x7f";
const ENTER = "\r";
const ESC = "\x1b";
const HOME = "\x1b[H";

function parseNumber(text: string): ValidationResult<number> {
	const value = Number(text);
	return Number.isNaN(value) ? { ok: false, error: "not a number" } : { ok: true, value };
}

describe("Input", () => {
	it("reads typed text and leaves a summary", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Name" }).interact(terminal);

		terminal.sendInput("A", "d", "a");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: Ada"]);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 9, y: 0 });

		terminal.sendInput(ENTER);
		assert.strictEqual(await pending, "Ada");
		assert.deepStrictEqual(await terminal.screen(), ["Name: Ada"]);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 0, y: 1 });
	});

	it("inserts at the cursor", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Name" }).interact(terminal);

		terminal.sendInput("a", "c", LEFT, "b", ENTER);
		assert.strictEqual(await pending, "abc");
	});

	it("scrolls a long value to keep the cursor in view", async () => {
		const terminal = new VirtualTerminal(20, 5);
		const pending = Input.text({ prompt: "Name" }).interact(terminal);

		terminal.sendInput(..."abcdefghijklmnopqrstuvwxyz");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: nopqrstuvwxyz"]);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 19, y: 0 });

		terminal.sendInput(HOME);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: abcdefghijklmn"]);
		assert.deepStrictEqual(terminal.getCursorPosition(), { x: 6, y: 0 });

		terminal.sendInput(ENTER);
		assert.strictEqual(await pending, "abcdefghijklmnopqrstuvwxyz");
	});

	it("uses the post-completion text in the summary", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Name", postCompletionText: "Saved name" }).interact(terminal);

		terminal.sendInput("a", "b", ENTER);
		assert.strictEqual(await pending, "ab");
		assert.deepStrictEqual(await terminal.screen(), ["Saved name: ab"]);
	});

	it("inserts pasted text in one piece", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Path" }).interact(terminal);

		terminal.sendInput("/tmp/a b", ENTER);
		assert.strictEqual(await pending, "/tmp/a b");
	});

	it("starts from the initial text", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Name", initialText: "Ad" }).interact(terminal);

		terminal.sendInput("a", ENTER);
		assert.strictEqual(await pending, "Ada");
	});

	it("shows parse errors until the next edit", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = new Input<number>({ prompt: "Port", parse: parseNumber }).interact(terminal);

		terminal.sendInput("x", ENTER);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Port: x", "error: not a number"]);

		terminal.sendInput(BACKSPACE);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Port:"]);

		terminal.sendInput("8", ENTER);
		assert.strictEqual(await pending, 8);
	});

	it("turns a ValidationError thrown by the parser into an error line", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const parse = (text: string): ValidationResult<string> => {
			if (text.includes(" ")) throw new ValidationError("no spaces");
			return { ok: true, value: text };
		};
		const pending = new Input<string>({ prompt: "Tag", parse }).interact(terminal);

		terminal.sendInput("a b", ENTER);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Tag: a b", "error: no spaces"]);

		terminal.sendInput(ESC);
		await assert.rejects(pending, PromptCancelledError);
	});

	it("uses the default for an empty buffer", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "User", default: "guest" }).interact(terminal);

		assert.deepStrictEqual(await terminal.screen(), ["User [guest]:"]);

		terminal.sendInput(ENTER);
		assert.strictEqual(await pending, "guest");
		assert.deepStrictEqual(await terminal.screen(), ["User: guest"]);
	});

	it("runs the validators on the default", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = new Input<number>({
			prompt: "Port",
			parse: parseNumber,
			default: 0,
			validate: (value) => (value > 0 ? undefined : "must be positive"),
		}).interact(terminal);

		terminal.sendInput(ENTER);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Port [0]:", "error: must be positive"]);

		terminal.sendInput("5", ENTER);
		assert.strictEqual(await pending, 5);
	});

	it("formats and hides the default", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = new Input<number>({
			prompt: "Count",
			parse: parseNumber,
			default: 3,
			formatDefault: (value) => `${value} items`,
		}).interact(terminal);

		assert.deepStrictEqual(await terminal.screen(), ["Count [3 items]:"]);
		terminal.sendInput(ENTER);
		assert.strictEqual(await pending, 3);
		assert.deepStrictEqual(await terminal.screen(), ["Count: 3 items"]);

		const hidden = new VirtualTerminal(40, 10);
		const second = Input.text({ prompt: "User", default: "guest", showDefault: false }).interact(hidden);
		assert.deepStrictEqual(await hidden.screen(), ["User:"]);
		hidden.sendInput(ENTER);
		assert.strictEqual(await second, "guest");
	});

	it("ignores enter on an empty buffer without a default", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Name" }).interact(terminal);

		terminal.sendInput(ENTER);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name:"]);

		terminal.sendInput("b", ENTER);
		assert.strictEqual(await pending, "b");
	});

	it("confirms an empty buffer when allowed", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Note", allowEmpty: true }).interact(terminal);

		terminal.sendInput(ENTER);
		assert.strictEqual(await pending, "");
	});

	it("reports the first failing validator", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({
			prompt: "Name",
			validate: [
				(value) => (value.length >= 2 ? undefined : "too short"),
				(value) => {
					if (value !== value.toLowerCase()) throw new ValidationError("lowercase only");
					return undefined;
				},
			],
		}).interact(terminal);

		terminal.sendInput("A", ENTER);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: A", "error: too short"]);

		terminal.sendInput("B", ENTER);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: AB", "error: lowercase only"]);

		terminal.sendInput(ESC);
		await assert.rejects(pending, PromptCancelledError);
	});

	it("validates on every keystroke when asked to", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({
			prompt: "Name",
			validate: (value) => (value.length >= 3 ? undefined : "too short"),
			validateOnKeystroke: true,
		}).interact(terminal);

		terminal.sendInput("a");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: a", "error: too short"]);

		terminal.sendInput("b", "c");
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Name: abc"]);

		terminal.sendInput(ENTER);
		assert.strictEqual(await pending, "abc");
	});

	it("walks the history and records confirmed values", async () => {
		const history = new MemoryHistory(["first", "second"]);
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Cmd", history }).interact(terminal);

		terminal.sendInput("dr", UP);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Cmd: second"]);

		terminal.sendInput(UP, UP);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Cmd: first"]);

		terminal.sendInput(DOWN, DOWN);
		await terminal.settle();
		assert.deepStrictEqual(await terminal.screen(), ["Cmd: dr"]);

		terminal.sendInput("y", ENTER);
		assert.strictEqual(await pending, "dry");
		assert.deepStrictEqual(history.entries(), ["first", "second", "dry"]);
	});

	it("shows the help line on request", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Name", showHelp: true }).interactOpt(terminal);

		assert.deepStrictEqual(await terminal.screen(), ["Name:", "enter confirm, esc cancel"]);

		terminal.sendInput(ESC);
		assert.strictEqual(await pending, undefined);
		assert.deepStrictEqual(await terminal.screen(), []);
	});

	it("leaves no summary when reporting is off", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Name", report: false }).interact(terminal);

		terminal.sendInput("x", ENTER);
		assert.strictEqual(await pending, "x");
		assert.deepStrictEqual(await terminal.screen(), []);
	});

	it("propagates a closed input stream", async () => {
		const terminal = new VirtualTerminal(40, 10);
		const pending = Input.text({ prompt: "Name" }).interact(terminal);

		terminal.sendInput("a");
		await terminal.settle();
		terminal.endInput();

		await assert.rejects(pending, TerminalIOError);
		assert.strictEqual(terminal.startCount, 1);
		assert.strictEqual(terminal.stopCount, 1);
		assert.deepStrictEqual(await terminal.screen(), []);
	});
});

describe("runValidators", () => {
	it("returns undefined when every validator passes", () => {
		assert.strictEqual(runValidators(5, [(value) => (value > 0 ? undefined : "negative")]), undefined);
	});

	it("rethrows errors other than ValidationError", () => {
		const boom = () => {
			throw new RangeError("boom");
		};
		assert.throws(() => runValidators(1, [boom]), RangeError);
	});
});

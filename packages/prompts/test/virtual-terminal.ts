import type { Terminal as XtermTerminalType } from "@xterm/headless";
import xterm from "@xterm/headless";
import { TerminalIOError } from "../src/errors.js";
import type { Terminal } from "../src/terminal.js";

// Extract Terminal class from the module
const XtermTerminal = xterm.Terminal;

type KeyWaiter = {
	resolve: (key: string) => void;
	reject: (err: TerminalIOError) => void;
};

/**
 * Virtual terminal for testing using xterm.js for accurate terminal emulation.
 *
 * Keys are fed with `sendInput`. After `endInput`, reads past the queued keys
 * reject with TerminalIOError the way a closed stdin does.
 */
export class VirtualTerminal implements Terminal {
	private xterm: XtermTerminalType;
	private _columns: number;
	private _rows: number;
	private readonly keys: string[] = [];
	private readonly waiters: KeyWaiter[] = [];
	private inputEnded = false;

	/** Every chunk passed to write(), in order */
	readonly writes: string[] = [];
	startCount = 0;
	stopCount = 0;
	cursorVisible = true;

	constructor(columns = 80, rows = 24) {
		this._columns = columns;
		this._rows = rows;

		this.xterm = new XtermTerminal({
			cols: columns,
			rows: rows,
			// Disable all interactive features for testing
			disableStdin: true,
			allowProposedApi: true,
		});
	}

	start(): void {
		this.startCount++;
	}

	stop(): void {
		this.stopCount++;
	}

	readKey(): Promise<string> {
		const key = this.keys.shift();
		if (key !== undefined) return Promise.resolve(key);
		if (this.inputEnded) return Promise.reject(new TerminalIOError("Input stream ended"));
		return new Promise((resolve, reject) => {
			this.waiters.push({ resolve, reject });
		});
	}

	write(data: string): void {
		this.writes.push(data);
		this.xterm.write(data);
	}

	get columns(): number {
		return this._columns;
	}

	get rows(): number {
		return this._rows;
	}

	hideCursor(): void {
		this.cursorVisible = false;
		this.write("\x1b[?25l");
	}

	showCursor(): void {
		this.cursorVisible = true;
		this.write("\x1b[?25h");
	}

	// Test-specific methods not in Terminal interface

	/**
	 * Queue key sequences for the prompt, in order.
	 */
	sendInput(...keys: string[]): void {
		for (const key of keys) {
			const waiter = this.waiters.shift();
			if (waiter) {
				waiter.resolve(key);
			} else {
				this.keys.push(key);
			}
		}
	}

	/**
	 * Make reads past the queued keys fail.
	 */
	endInput(): void {
		this.inputEnded = true;
		const err = new TerminalIOError("Input stream ended");
		for (const waiter of this.waiters.splice(0)) {
			waiter.reject(err);
		}
	}

	/**
	 * Resize the terminal
	 */
	resize(columns: number, rows: number): void {
		this._columns = columns;
		this._rows = rows;
		this.xterm.resize(columns, rows);
	}

	/**
	 * Wait for all pending writes to complete. Viewport and scroll buffer will be updated.
	 */
	async flush(): Promise<void> {
		return new Promise<void>((resolve) => {
			this.xterm.write("", () => resolve());
		});
	}

	/**
	 * Let the prompt loop consume the queued keys, then flush.
	 */
	async settle(): Promise<void> {
		await new Promise<void>((resolve) => setImmediate(resolve));
		await this.flush();
	}

	/**
	 * Flush and get viewport - convenience method for tests
	 */
	async flushAndGetViewport(): Promise<string[]> {
		await this.flush();
		return this.getViewport();
	}

	/**
	 * Get the visible viewport (what's currently on screen)
	 */
	getViewport(): string[] {
		const lines: string[] = [];
		const buffer = this.xterm.buffer.active;

		for (let i = 0; i < this.xterm.rows; i++) {
			const line = buffer.getLine(buffer.viewportY + i);
			lines.push(line ? line.translateToString(true) : "");
		}

		return lines;
	}

	/**
	 * Viewport rows up to the last non-empty one
	 */
	async screen(): Promise<string[]> {
		const lines = await this.flushAndGetViewport();
		while (lines.length > 0 && lines[lines.length - 1] === "") {
			lines.pop();
		}
		return lines;
	}

	/**
	 * Get cursor position
	 */
	getCursorPosition(): { x: number; y: number } {
		const buffer = this.xterm.buffer.active;
		return {
			x: buffer.cursorX,
			y: buffer.cursorY,
		};
	}
}

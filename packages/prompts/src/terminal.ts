import * as fs from "node:fs";
import { loadSettings } from "./config.js";
import { debugLog } from "./debug-log.js";
import { TerminalIOError } from "./errors.js";
import { StdinBuffer } from "./stdin-buffer.js";

/**
 * Minimal terminal interface for prompts
 */
export interface Terminal {
	// Enter raw mode and start collecting keys
	start(): void;

	// Stop the terminal and restore state
	stop(): void;

	/**
	 * Resolve with the next key sequence, or a whole bracketed paste.
	 * Rejects with TerminalIOError once input has ended or failed.
	 */
	readKey(): Promise<string>;

	// Write output to terminal
	write(data: string): void;

	// Get terminal dimensions
	get columns(): number;
	get rows(): number;

	// Cursor visibility
	hideCursor(): void;
	showCursor(): void;
}

type KeyWaiter = {
	resolve: (key: string) => void;
	reject: (err: TerminalIOError) => void;
};

/**
 * Real terminal using process.stdin/stdout
 */
export class ProcessTerminal implements Terminal {
	private wasRaw = false;
	private started = false;
	private stdinBuffer?: StdinBuffer;
	private readonly keys: string[] = [];
	private readonly waiters: KeyWaiter[] = [];
	private failure?: TerminalIOError;
	private writeLogPath = loadSettings().writeLogPath;

	private readonly onStdinData = (data: string) => {
		this.stdinBuffer?.process(data);
	};

	private readonly onStdinEnd = () => {
		this.fail(new TerminalIOError("Input stream ended"));
	};

	private readonly onStreamError = (err: Error) => {
		this.fail(new TerminalIOError(`Terminal stream failed: ${err.message}`, { cause: err }));
	};

	start(): void {
		if (this.started) return;
		this.started = true;
		this.failure = undefined;

		// Save previous state and enable raw mode
		this.wasRaw = process.stdin.isRaw || false;
		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(true);
		}
		process.stdin.setEncoding("utf8");

		this.stdinBuffer = new StdinBuffer({ timeout: 10 });
		this.stdinBuffer.on("data", (sequence) => this.push(sequence));
		this.stdinBuffer.on("paste", (content) => this.push(content));

		process.stdin.on("data", this.onStdinData);
		process.stdin.on("end", this.onStdinEnd);
		process.stdin.on("error", this.onStreamError);
		process.stdout.on("error", this.onStreamError);
		process.stdin.resume();

		// Enable bracketed paste mode - terminal will wrap pastes in \x1b[200~ ... \x1b[201~
		this.write("\x1b[?2004h");
	}

	stop(): void {
		if (!this.started) return;
		this.started = false;

		if (this.stdinBuffer) {
			this.stdinBuffer.destroy();
			this.stdinBuffer = undefined;
		}

		process.stdin.removeListener("data", this.onStdinData);
		process.stdin.removeListener("end", this.onStdinEnd);
		process.stdin.removeListener("error", this.onStreamError);

		// Pause stdin so buffered input is not re-read after raw mode is disabled
		process.stdin.pause();

		// Restore raw mode state
		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(this.wasRaw);
		}

		this.keys.length = 0;
		this.fail(new TerminalIOError("Terminal stopped"));

		// Disable bracketed paste mode. Input is already restored if this fails.
		try {
			this.write("\x1b[?2004l");
		} catch (err) {
			debugLog("terminal", `disabling bracketed paste failed: ${err instanceof Error ? err.message : String(err)}`);
		}
		process.stdout.removeListener("error", this.onStreamError);
	}

	readKey(): Promise<string> {
		const key = this.keys.shift();
		if (key !== undefined) return Promise.resolve(key);
		if (this.failure) return Promise.reject(this.failure);
		return new Promise((resolve, reject) => {
			this.waiters.push({ resolve, reject });
		});
	}

	private push(key: string): void {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve(key);
		} else {
			this.keys.push(key);
		}
	}

	private fail(err: TerminalIOError): void {
		this.failure ??= err;
		for (const waiter of this.waiters.splice(0)) {
			waiter.reject(err);
		}
	}

	write(data: string): void {
		try {
			process.stdout.write(data);
		} catch (err) {
			throw new TerminalIOError("Failed to write to terminal", { cause: err });
		}
		if (this.writeLogPath) {
			try {
				fs.appendFileSync(this.writeLogPath, data, { encoding: "utf8" });
			} catch {
				// Ignore logging errors
			}
		}
	}

	get columns(): number {
		return process.stdout.columns || 80;
	}

	get rows(): number {
		return process.stdout.rows || 24;
	}

	hideCursor(): void {
		this.write("\x1b[?25l");
	}

	showCursor(): void {
		this.write("\x1b[?25h");
	}
}

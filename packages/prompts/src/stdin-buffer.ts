/**
 * StdinBuffer splits raw stdin chunks into single key sequences.
 *
 * A keypress such as `\x1b[1;5A` (Ctrl+Up) can arrive split over several data
 * events. The buffer accumulates escape sequences until their final byte is
 * seen; a lone ESC is flushed as the Escape key once `timeout` elapses with no
 * continuation. Bracketed paste content is emitted whole through `paste`.
 */

import { EventEmitter } from "events";

const ESC = "\x1b";
const BRACKETED_PASTE_START = "\x1b[200~";
const BRACKETED_PASTE_END = "\x1b[201~";

type SequenceStatus = "complete" | "incomplete";

/**
 * Check if a string starting with ESC is a complete sequence or needs more data
 */
function escapeSequenceStatus(data: string): SequenceStatus {
	if (data.length === 1) {
		return "incomplete";
	}

	const introducer = data[1];

	// CSI: ESC [ params final, where the final byte is in 0x40-0x7E.
	// ESC [ [ A is the Linux console form of F1-F5 and PageUp/PageDown.
	if (introducer === "[") {
		const payload = data.slice(2);
		if (payload.length === 0 || payload === "[") return "incomplete";
		const lastCode = payload.charCodeAt(payload.length - 1);
		return lastCode >= 0x40 && lastCode <= 0x7e ? "complete" : "incomplete";
	}

	// SS3: ESC O followed by a single character
	if (introducer === "O") {
		return data.length >= 3 ? "complete" : "incomplete";
	}

	// Meta key: ESC followed by one character
	return "complete";
}

/**
 * Split accumulated buffer into complete sequences
 */
function extractCompleteSequences(buffer: string): { sequences: string[]; remainder: string } {
	const sequences: string[] = [];
	let pos = 0;

	while (pos < buffer.length) {
		const remaining = buffer.slice(pos);

		if (remaining.startsWith(ESC)) {
			let seqEnd = 1;
			while (seqEnd <= remaining.length && escapeSequenceStatus(remaining.slice(0, seqEnd)) === "incomplete") {
				seqEnd++;
			}
			if (seqEnd > remaining.length) {
				return { sequences, remainder: remaining };
			}
			sequences.push(remaining.slice(0, seqEnd));
			pos += seqEnd;
		} else {
			// One code point, so surrogate pairs stay together
			const codePoint = remaining.codePointAt(0) ?? 0;
			const char = String.fromCodePoint(codePoint);
			sequences.push(char);
			pos += char.length;
		}
	}

	return { sequences, remainder: "" };
}

export type StdinBufferOptions = {
	/**
	 * Maximum time to wait for sequence completion (default: 10ms)
	 * After this time, the buffer is flushed even if incomplete
	 */
	timeout?: number;
};

export type StdinBufferEventMap = {
	data: [string];
	paste: [string];
};

/**
 * Buffers stdin input and emits complete sequences via the 'data' event.
 */
export class StdinBuffer extends EventEmitter<StdinBufferEventMap> {
	private buffer: string = "";
	private timeout: ReturnType<typeof setTimeout> | null = null;
	private readonly timeoutMs: number;
	private pasteMode: boolean = false;
	private pasteBuffer: string = "";

	constructor(options: StdinBufferOptions = {}) {
		super();
		this.timeoutMs = options.timeout ?? 10;
	}

	public process(data: string | Buffer): void {
		this.cancelTimeout();

		// A single high byte is the 8-bit meta encoding of ESC + (byte - 128)
		let str: string;
		if (Buffer.isBuffer(data)) {
			const first = data[0];
			str = data.length === 1 && first !== undefined && first > 127 ? `${ESC}${String.fromCharCode(first - 128)}` : data.toString();
		} else {
			str = data;
		}

		if (str.length === 0) {
			return;
		}

		if (this.pasteMode) {
			this.pasteBuffer += str;
			this.finishPasteIfComplete();
			return;
		}

		this.buffer += str;

		const startIndex = this.buffer.indexOf(BRACKETED_PASTE_START);
		if (startIndex !== -1) {
			const result = extractCompleteSequences(this.buffer.slice(0, startIndex));
			for (const sequence of [...result.sequences, ...(result.remainder ? [result.remainder] : [])]) {
				this.emit("data", sequence);
			}

			this.pasteMode = true;
			this.pasteBuffer = this.buffer.slice(startIndex + BRACKETED_PASTE_START.length);
			this.buffer = "";
			this.finishPasteIfComplete();
			return;
		}

		const result = extractCompleteSequences(this.buffer);
		this.buffer = result.remainder;

		for (const sequence of result.sequences) {
			this.emit("data", sequence);
		}

		if (this.buffer.length > 0) {
			this.timeout = setTimeout(() => {
				for (const sequence of this.flush()) {
					this.emit("data", sequence);
				}
			}, this.timeoutMs);
		}
	}

	private finishPasteIfComplete(): void {
		const endIndex = this.pasteBuffer.indexOf(BRACKETED_PASTE_END);
		if (endIndex === -1) return;

		const pastedContent = this.pasteBuffer.slice(0, endIndex);
		const remaining = this.pasteBuffer.slice(endIndex + BRACKETED_PASTE_END.length);

		this.pasteMode = false;
		this.pasteBuffer = "";

		this.emit("paste", pastedContent);

		if (remaining.length > 0) {
			this.process(remaining);
		}
	}

	private cancelTimeout(): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
	}

	/**
	 * Emit whatever is buffered as-is. A lone ESC becomes the Escape key.
	 */
	flush(): string[] {
		this.cancelTimeout();

		if (this.buffer.length === 0) {
			return [];
		}

		const sequences = [this.buffer];
		this.buffer = "";
		return sequences;
	}

	clear(): void {
		this.cancelTimeout();
		this.buffer = "";
		this.pasteMode = false;
		this.pasteBuffer = "";
	}

	getBuffer(): string {
		return this.buffer;
	}

	destroy(): void {
		this.clear();
		this.removeAllListeners();
	}
}

/**
 * A value rejected by a parser or validator. Shown on the prompt's error line;
 * never escapes a prompt.
 */
export class ValidationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ValidationError";
	}
}

/**
 * The terminal could not be read or written. The prompt is aborted after the
 * terminal state is restored.
 */
export class TerminalIOError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "TerminalIOError";
	}
}

export class PromptCancelledError extends Error {
	constructor(message: string = "Prompt cancelled") {
		super(message);
		this.name = "PromptCancelledError";
	}
}

/**
 * Invalid prompt options, reported before the terminal is touched.
 */
export class PromptConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "PromptConfigError";
	}
}

export function isPromptCancelled(err: unknown): err is PromptCancelledError {
	return err instanceof PromptCancelledError;
}

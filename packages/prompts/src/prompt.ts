import { debugLog } from "./debug-log.js";
import { PromptCancelledError } from "./errors.js";
import { Renderer } from "./renderer.js";
import { ProcessTerminal, type Terminal } from "./terminal.js";

/**
 * Result of handling one key.
 */
export type Transition<T> =
	| { type: "continue" }
	| { type: "confirm"; value: T; summary: string[] }
	| { type: "cancel" };

export const CONTINUE: Transition<never> = { type: "continue" };
export const CANCEL: Transition<never> = { type: "cancel" };

export function confirmWith<T>(value: T, summary: string[]): Transition<T> {
	return { type: "confirm", value, summary };
}

/**
 * State machine of one prompt. Both methods are synchronous; the run loop
 * owns all terminal I/O.
 */
export interface PromptController<T> {
	/** Frame for the current state. May contain CURSOR_MARKER once. */
	render(width: number, height: number): string[];
	handleKey(data: string): Transition<T>;
}

/**
 * Wrap a controller so its confirmed value goes through `map`.
 */
export function mapController<A, B>(controller: PromptController<A>, map: (value: A) => B): PromptController<B> {
	return {
		render: (width, height) => controller.render(width, height),
		handleKey: (data) => {
			const transition = controller.handleKey(data);
			return transition.type === "confirm" ? confirmWith(map(transition.value), transition.summary) : transition;
		},
	};
}

export type PromptOutcome<T> = { status: "confirmed"; value: T } | { status: "cancelled" };

export interface RunPromptOptions {
	/** Erase the prompt when done, leaving only the summary (default: true) */
	clear?: boolean;
}

/**
 * Drive a controller until it confirms or cancels. The terminal is started
 * here and stopped on every exit path, including I/O errors.
 */
export async function runPrompt<T>(
	controller: PromptController<T>,
	terminal: Terminal,
	options: RunPromptOptions = {},
): Promise<PromptOutcome<T>> {
	const clear = options.clear ?? true;
	const renderer = new Renderer(terminal);
	const redraw = () => renderer.render(controller.render(terminal.columns, terminal.rows));
	const leave = (summary: string[]) => {
		if (clear) {
			renderer.finish(summary);
		} else {
			renderer.keep(summary);
		}
	};

	terminal.start();
	let settled = false;
	try {
		redraw();
		while (true) {
			const key = await terminal.readKey();
			const transition = controller.handleKey(key);

			if (transition.type === "continue") {
				redraw();
				continue;
			}

			debugLog("prompt", transition.type);
			if (transition.type === "confirm") {
				leave(transition.summary);
				settled = true;
				return { status: "confirmed", value: transition.value };
			}
			leave([]);
			settled = true;
			return { status: "cancelled" };
		}
	} finally {
		if (!settled) {
			try {
				renderer.finish();
			} catch (err) {
				debugLog("prompt", `cleanup after failure: ${err instanceof Error ? err.message : String(err)}`);
			}
		}
		terminal.stop();
	}
}

/**
 * Base of every prompt: builds a controller from the options and runs it.
 */
export abstract class Prompt<T> {
	/**
	 * Validate the options and build a fresh controller.
	 * Throws PromptConfigError before the terminal is touched.
	 */
	protected abstract createController(): PromptController<T>;

	protected clearOnExit(): boolean {
		return true;
	}

	/**
	 * Run the prompt. Rejects with PromptCancelledError when the user cancels.
	 */
	async interact(terminal: Terminal = new ProcessTerminal()): Promise<T> {
		const outcome = await this.run(terminal);
		if (outcome.status === "cancelled") {
			throw new PromptCancelledError();
		}
		return outcome.value;
	}

	/**
	 * Run the prompt. Resolves undefined when the user cancels.
	 */
	async interactOpt(terminal: Terminal = new ProcessTerminal()): Promise<T | undefined> {
		const outcome = await this.run(terminal);
		return outcome.status === "confirmed" ? outcome.value : undefined;
	}

	private run(terminal: Terminal): Promise<PromptOutcome<T>> {
		const controller = this.createController();
		return runPrompt(controller, terminal, { clear: this.clearOnExit() });
	}
}

import { ValidationError } from "../errors.js";
import { type History, HistoryCursor } from "../history.js";
import { getPromptKeybindings } from "../keybindings.js";
import { LineEditor } from "../line-editor.js";
import { CANCEL, CONTINUE, confirmWith, Prompt, type PromptController, type Transition } from "../prompt.js";
import { plainTheme, type PromptTheme } from "../theme.js";
import { applyEditKey } from "./edit-keys.js";
import { renderEditLine } from "./edit-line.js";

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Returns an error message, or undefined when the value is acceptable.
 * Throwing a ValidationError works the same as returning its message.
 */
export type Validator<T> = (value: T) => string | undefined;

export interface InputOptions<T> {
	prompt: string;
	parse: (text: string) => ValidationResult<T>;
	/** Used when the buffer is empty on confirm; still validated */
	default?: T;
	/** Renders the default in the prompt (default: String) */
	formatDefault?: (value: T) => string;
	showDefault?: boolean;
	initialText?: string;
	/** Confirm an empty buffer when there is no default (default: false) */
	allowEmpty?: boolean;
	validate?: Validator<T> | readonly Validator<T>[];
	/** Re-check after every edit and show the result on the error line */
	validateOnKeystroke?: boolean;
	history?: History;
	/** Shown in place of the prompt in the summary line */
	postCompletionText?: string;
	report?: boolean;
	showHelp?: boolean;
	theme?: PromptTheme;
}

export type TextInputOptions = Omit<InputOptions<string>, "parse">;

const HELP = "enter confirm, esc cancel";

/**
 * Run validators in order; the first error wins.
 */
export function runValidators<T>(value: T, validators: readonly Validator<T>[]): string | undefined {
	for (const validator of validators) {
		const error = rejectionMessage(() => validator(value));
		if (error !== undefined) return error;
	}
	return undefined;
}

function rejectionMessage(check: () => string | undefined): string | undefined {
	try {
		return check();
	} catch (err) {
		if (err instanceof ValidationError) return err.message;
		throw err;
	}
}

type CheckResult<T> = { kind: "ignore" } | { kind: "error"; message: string } | { kind: "ok"; value: T; text: string };

class InputController<T> implements PromptController<T> {
	private readonly editor: LineEditor;
	private readonly theme: PromptTheme;
	private readonly validators: readonly Validator<T>[];
	private readonly historyCursor?: HistoryCursor;
	private error: string | undefined;

	constructor(private readonly options: InputOptions<T>) {
		this.theme = options.theme ?? plainTheme;
		this.editor = new LineEditor(options.initialText ?? "");
		const { validate } = options;
		this.validators = validate === undefined ? [] : typeof validate === "function" ? [validate] : validate;
		if (options.history) {
			this.historyCursor = new HistoryCursor(options.history);
		}
	}

	private formatDefault(value: T): string {
		return this.options.formatDefault ? this.options.formatDefault(value) : String(value);
	}

	render(width: number, _height: number): string[] {
		const { prompt, showDefault, showHelp } = this.options;
		const defaultValue = this.options.default;
		const shownDefault =
			defaultValue !== undefined && (showDefault ?? true) ? this.formatDefault(defaultValue) : undefined;
		const lines = [
			renderEditLine(
				this.theme.inputPrompt(prompt, shownDefault),
				this.editor.textBeforeCursor(),
				this.editor.textAfterCursor(),
				width,
			),
		];
		if (this.error !== undefined) {
			lines.push(this.theme.error(this.error));
		} else if (showHelp) {
			lines.push(this.theme.help(HELP));
		}
		return lines;
	}

	/**
	 * Resolve the buffer to a value following the empty-buffer rules, then
	 * run the validators.
	 */
	private check(): CheckResult<T> {
		const text = this.editor.currentText();
		if (text.length === 0) {
			const defaultValue = this.options.default;
			if (defaultValue !== undefined) {
				// Defaults skip the parser but not the validators
				const message = runValidators(defaultValue, this.validators);
				if (message !== undefined) return { kind: "error", message };
				return { kind: "ok", value: defaultValue, text: this.formatDefault(defaultValue) };
			}
			if (!this.options.allowEmpty) {
				return { kind: "ignore" };
			}
		}

		let parsed: ValidationResult<T>;
		try {
			parsed = this.options.parse(text);
		} catch (err) {
			if (!(err instanceof ValidationError)) throw err;
			parsed = { ok: false, error: err.message };
		}
		if (!parsed.ok) return { kind: "error", message: parsed.error };
		const message = runValidators(parsed.value, this.validators);
		if (message !== undefined) return { kind: "error", message };
		return { kind: "ok", value: parsed.value, text };
	}

	handleKey(data: string): Transition<T> {
		const kb = getPromptKeybindings();

		if (kb.matches(data, "cancel")) {
			return CANCEL;
		}

		if (kb.matches(data, "submit")) {
			const result = this.check();
			if (result.kind === "ignore") return CONTINUE;
			if (result.kind === "error") {
				this.error = result.message;
				return CONTINUE;
			}
			this.error = undefined;
			this.options.history?.append(result.text);
			const { prompt, postCompletionText, report } = this.options;
			const summary = this.theme.selection(postCompletionText ?? prompt, result.text);
			return confirmWith(result.value, (report ?? true) ? [summary] : []);
		}

		if (this.historyCursor) {
			if (kb.matches(data, "historyPrev")) {
				const entry = this.historyCursor.older(this.editor.currentText());
				if (entry !== undefined) this.editor.setFromHistory(entry);
				this.afterEdit();
				return CONTINUE;
			}
			if (kb.matches(data, "historyNext")) {
				const entry = this.historyCursor.newer();
				if (entry !== undefined) this.editor.setFromHistory(entry);
				this.afterEdit();
				return CONTINUE;
			}
		}

		if (applyEditKey(this.editor, data, kb) === "edited") {
			this.afterEdit();
		}
		return CONTINUE;
	}

	private afterEdit(): void {
		if (!this.options.validateOnKeystroke) {
			this.error = undefined;
			return;
		}
		const result = this.check();
		this.error = result.kind === "error" ? result.message : undefined;
	}
}

/**
 * Read one line of text and parse it into a value.
 */
export class Input<T> extends Prompt<T> {
	constructor(private readonly options: InputOptions<T>) {
		super();
	}

	/**
	 * Input that resolves the text as typed.
	 */
	static text(options: TextInputOptions): Input<string> {
		return new Input<string>({ ...options, parse: (text) => ({ ok: true, value: text }) });
	}

	protected createController(): PromptController<T> {
		return new InputController(this.options);
	}
}

import { getPromptKeybindings } from "../keybindings.js";
import { LineEditor } from "../line-editor.js";
import { CANCEL, CONTINUE, confirmWith, Prompt, type PromptController, type Transition } from "../prompt.js";
import { plainTheme, type PromptTheme } from "../theme.js";
import { applyEditKey } from "./edit-keys.js";
import { renderEditLine } from "./edit-line.js";
import { runValidators, type Validator } from "./input.js";

export interface PasswordConfirmation {
	/** Prompt for the second entry */
	prompt: string;
	/** Shown when the two entries differ; the user starts over */
	mismatchError: string;
}

export interface PasswordOptions {
	prompt: string;
	allowEmpty?: boolean;
	confirmation?: PasswordConfirmation;
	validate?: Validator<string> | readonly Validator<string>[];
	/** Shown once per typed character; "" shows nothing (default: "*") */
	mask?: string;
	report?: boolean;
	theme?: PromptTheme;
}

class PasswordController implements PromptController<string> {
	private editor = new LineEditor();
	private readonly theme: PromptTheme;
	private readonly validators: readonly Validator<string>[];
	private firstEntry: string | undefined;
	private error: string | undefined;

	constructor(private readonly options: PasswordOptions) {
		this.theme = options.theme ?? plainTheme;
		const { validate } = options;
		this.validators = validate === undefined ? [] : typeof validate === "function" ? [validate] : validate;
	}

	private currentPrompt(): string {
		const { confirmation } = this.options;
		return this.firstEntry !== undefined && confirmation ? confirmation.prompt : this.options.prompt;
	}

	render(width: number, _height: number): string[] {
		const maskChar = this.options.mask ?? "*";
		const before = this.theme.mask(this.editor.cursor(), maskChar);
		const after = this.theme.mask(this.editor.length() - this.editor.cursor(), maskChar);
		const lines = [renderEditLine(this.theme.inputPrompt(this.currentPrompt()), before, after, width)];
		if (this.error !== undefined) {
			lines.push(this.theme.error(this.error));
		}
		return lines;
	}

	handleKey(data: string): Transition<string> {
		const kb = getPromptKeybindings();

		if (kb.matches(data, "cancel")) {
			return CANCEL;
		}

		if (kb.matches(data, "submit")) {
			return this.submit();
		}

		// No word-wise editing on masked input
		if (applyEditKey(this.editor, data, kb, { words: false }) === "edited") {
			this.error = undefined;
		}
		return CONTINUE;
	}

	private submit(): Transition<string> {
		const text = this.editor.currentText();
		if (text.length === 0 && !this.options.allowEmpty) {
			return CONTINUE;
		}

		const { confirmation, prompt, report } = this.options;
		if (this.firstEntry === undefined) {
			const message = runValidators(text, this.validators);
			if (message !== undefined) {
				this.error = message;
				return CONTINUE;
			}
			if (confirmation) {
				this.firstEntry = text;
				this.editor = new LineEditor();
				this.error = undefined;
				return CONTINUE;
			}
		} else if (this.firstEntry !== text) {
			this.firstEntry = undefined;
			this.editor = new LineEditor();
			this.error = confirmation?.mismatchError;
			return CONTINUE;
		}

		return confirmWith(text, (report ?? true) ? [this.theme.passwordSelection(prompt)] : []);
	}
}

/**
 * Read a secret without echoing it. The summary never shows the value.
 */
export class Password extends Prompt<string> {
	constructor(private readonly options: PasswordOptions) {
		super();
	}

	protected createController(): PromptController<string> {
		return new PasswordController(this.options);
	}
}

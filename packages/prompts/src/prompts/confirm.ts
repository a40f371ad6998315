import { getPromptKeybindings } from "../keybindings.js";
import { CANCEL, CONTINUE, confirmWith, Prompt, type PromptController, type Transition } from "../prompt.js";
import { plainTheme, type PromptTheme } from "../theme.js";

export interface ConfirmOptions {
	prompt: string;
	/** Answer taken by Enter; without one Enter is ignored */
	default?: boolean;
	showDefault?: boolean;
	/** y/n only preselect the answer; Enter confirms it */
	waitForNewline?: boolean;
	report?: boolean;
	theme?: PromptTheme;
}

function answerFor(data: string): boolean | undefined {
	if (data === "y" || data === "Y") return true;
	if (data === "n" || data === "N") return false;
	return undefined;
}

class ConfirmController implements PromptController<boolean> {
	private readonly theme: PromptTheme;
	private pending: boolean | undefined;

	constructor(private readonly options: ConfirmOptions) {
		this.theme = options.theme ?? plainTheme;
	}

	render(_width: number, _height: number): string[] {
		const { prompt, showDefault } = this.options;
		const shown = this.pending ?? ((showDefault ?? true) ? this.options.default : undefined);
		return [this.theme.confirmPrompt(prompt, shown)];
	}

	handleKey(data: string): Transition<boolean> {
		const kb = getPromptKeybindings();

		if (kb.matches(data, "cancel")) {
			return CANCEL;
		}

		const answer = answerFor(data);
		if (answer !== undefined) {
			if (this.options.waitForNewline) {
				this.pending = answer;
				return CONTINUE;
			}
			return this.finish(answer);
		}

		if (kb.matches(data, "submit")) {
			const value = this.pending ?? this.options.default;
			return value === undefined ? CONTINUE : this.finish(value);
		}
		return CONTINUE;
	}

	private finish(value: boolean): Transition<boolean> {
		const { prompt, report } = this.options;
		return confirmWith(value, (report ?? true) ? [this.theme.confirmSelection(prompt, value)] : []);
	}
}

/**
 * Ask a yes/no question.
 */
export class Confirm extends Prompt<boolean> {
	constructor(private readonly options: ConfirmOptions) {
		super();
	}

	protected createController(): PromptController<boolean> {
		return new ConfirmController(this.options);
	}
}

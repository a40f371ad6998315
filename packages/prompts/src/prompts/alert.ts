import { getPromptKeybindings } from "../keybindings.js";
import { CANCEL, CONTINUE, confirmWith, Prompt, type PromptController, type Transition } from "../prompt.js";
import { plainTheme, type PromptTheme } from "../theme.js";

export interface AlertOptions {
	text: string;
	/** Hint under the text (default: "Press enter to continue") */
	prompt?: string;
	report?: boolean;
	theme?: PromptTheme;
}

class AlertController implements PromptController<void> {
	private readonly theme: PromptTheme;

	constructor(private readonly options: AlertOptions) {
		this.theme = options.theme ?? plainTheme;
	}

	render(_width: number, _height: number): string[] {
		return [this.theme.alert(this.options.text), this.theme.help(this.options.prompt ?? "Press enter to continue")];
	}

	handleKey(data: string): Transition<void> {
		const kb = getPromptKeybindings();
		if (kb.matches(data, "cancel")) {
			return CANCEL;
		}
		if (kb.matches(data, "submit")) {
			return confirmWith(undefined, (this.options.report ?? true) ? [this.theme.alert(this.options.text)] : []);
		}
		return CONTINUE;
	}
}

/**
 * Show a message and wait for Enter.
 */
export class Alert extends Prompt<void> {
	constructor(private readonly options: AlertOptions) {
		super();
	}

	protected createController(): PromptController<void> {
		return new AlertController(this.options);
	}
}

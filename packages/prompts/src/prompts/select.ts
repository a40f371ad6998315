import { PromptConfigError } from "../errors.js";
import { getPromptKeybindings } from "../keybindings.js";
import { type KeyId, matchesKey } from "../keys.js";
import { ListNavigator } from "../list-navigator.js";
import {
	CANCEL,
	CONTINUE,
	confirmWith,
	mapController,
	Prompt,
	type PromptController,
	runPrompt,
	type Transition,
} from "../prompt.js";
import { ProcessTerminal, type Terminal } from "../terminal.js";
import { plainTheme, type PromptTheme } from "../theme.js";
import { applyNavigationKey, isCancelKey, type ListPromptOptions, renderListFrame, resolveWrap } from "./list-view.js";

export interface SelectOptions extends ListPromptOptions {
	/** Index of the item highlighted at start (default: 0) */
	default?: number;
}

/**
 * Outcome of `Select.interactOptWithKeys`.
 */
export interface SelectResult {
	/** Highlighted item when the prompt ended */
	index: number;
	/** Set when one of the extra keys ended the prompt */
	key?: KeyId;
}

const HELP = "↑/↓ move, enter select, esc cancel";

class SelectController implements PromptController<SelectResult> {
	private readonly navigator: ListNavigator;
	private readonly theme: PromptTheme;

	constructor(
		private readonly options: SelectOptions,
		private readonly extraKeys: readonly KeyId[],
	) {
		this.theme = options.theme ?? plainTheme;
		this.navigator = new ListNavigator(options.items, { wrap: resolveWrap(options.wrap) });
		this.navigator.highlightIndex(options.default ?? 0);
	}

	render(_width: number, height: number): string[] {
		const { prompt, showHelp, maxLength } = this.options;
		return renderListFrame(this.navigator, this.theme, height, {
			header: prompt !== undefined ? [this.theme.prompt(prompt)] : [],
			footer: showHelp ? [this.theme.help(HELP)] : [],
			kind: "menu",
			maxLength,
		});
	}

	handleKey(data: string): Transition<SelectResult> {
		const kb = getPromptKeybindings();

		// Extra keys take precedence over every binding
		const key = this.extraKeys.find((keyId) => matchesKey(data, keyId));
		if (key !== undefined) {
			const item = this.navigator.highlighted();
			return item ? confirmWith({ index: item.index, key }, []) : CONTINUE;
		}
		if (isCancelKey(data, kb, true)) {
			return CANCEL;
		}
		if (applyNavigationKey(this.navigator, data, kb, true)) {
			return CONTINUE;
		}
		if (kb.matches(data, "submit")) {
			const item = this.navigator.highlighted();
			if (!item) return CONTINUE;
			const { prompt, report } = this.options;
			const summary = prompt !== undefined && (report ?? true) ? [this.theme.selection(prompt, item.label)] : [];
			return confirmWith({ index: item.index }, summary);
		}
		return CONTINUE;
	}
}

/**
 * Pick one item from a list. Resolves the index of the chosen item.
 */
export class Select extends Prompt<number> {
	constructor(private readonly options: SelectOptions) {
		super();
	}

	protected createController(): PromptController<number> {
		return mapController(this.buildController([]), (result) => result.index);
	}

	/**
	 * Like `interactOpt`, but any of `keys` also ends the prompt. The region
	 * is erased without a summary and the result carries the key together
	 * with the item highlighted at that moment. Resolves undefined on cancel.
	 */
	async interactOptWithKeys(
		keys: readonly KeyId[],
		terminal: Terminal = new ProcessTerminal(),
	): Promise<SelectResult | undefined> {
		const outcome = await runPrompt(this.buildController(keys), terminal, { clear: this.clearOnExit() });
		return outcome.status === "confirmed" ? outcome.value : undefined;
	}

	private buildController(extraKeys: readonly KeyId[]): PromptController<SelectResult> {
		const { items, default: defaultIndex } = this.options;
		if (items.length === 0) {
			throw new PromptConfigError("Select needs at least one item");
		}
		if (defaultIndex !== undefined && (defaultIndex < 0 || defaultIndex >= items.length)) {
			throw new PromptConfigError(`Default index ${defaultIndex} is out of range for ${items.length} items`);
		}
		return new SelectController(this.options, extraKeys);
	}

	protected clearOnExit(): boolean {
		return this.options.clear ?? true;
	}
}

import { PromptConfigError } from "../errors.js";
import { getPromptKeybindings } from "../keybindings.js";
import { ListNavigator } from "../list-navigator.js";
import { CANCEL, CONTINUE, confirmWith, Prompt, type PromptController, type Transition } from "../prompt.js";
import { plainTheme, type PromptTheme } from "../theme.js";
import { applyNavigationKey, isCancelKey, type ListPromptOptions, renderListFrame, resolveWrap } from "./list-view.js";

export interface MultiSelectOptions extends ListPromptOptions {
	/** Checked state per item at start */
	defaults?: readonly boolean[];
}

/**
 * Item of MultiSelectPlus: the row shows `label`, the summary `summaryText`.
 */
export interface MultiSelectPlusItem {
	label: string;
	summaryText: string;
	checked?: boolean;
}

export interface MultiSelectPlusOptions extends Omit<ListPromptOptions, "items"> {
	items: readonly MultiSelectPlusItem[];
}

const HELP = "↑/↓ move, space toggle, enter confirm, esc cancel";
const HELP_WITH_TOGGLE_ALL = "↑/↓ move, space toggle, a toggle all, enter confirm, esc cancel";

interface MultiSelectBehavior {
	/** Summary text per item */
	summaries: readonly string[];
	toggleAll: boolean;
}

class MultiSelectController implements PromptController<number[]> {
	private readonly navigator: ListNavigator;
	private readonly theme: PromptTheme;

	constructor(
		private readonly options: MultiSelectOptions,
		private readonly behavior: MultiSelectBehavior,
	) {
		this.theme = options.theme ?? plainTheme;
		const checked: number[] = [];
		(options.defaults ?? []).forEach((isChecked, index) => {
			if (isChecked && index < options.items.length) checked.push(index);
		});
		this.navigator = new ListNavigator(options.items, { wrap: resolveWrap(options.wrap), checked });
	}

	render(_width: number, height: number): string[] {
		const { prompt, showHelp, maxLength } = this.options;
		return renderListFrame(this.navigator, this.theme, height, {
			header: prompt !== undefined ? [this.theme.prompt(prompt)] : [],
			footer: showHelp ? [this.theme.help(this.behavior.toggleAll ? HELP_WITH_TOGGLE_ALL : HELP)] : [],
			kind: "checkbox",
			maxLength,
		});
	}

	handleKey(data: string): Transition<number[]> {
		const kb = getPromptKeybindings();

		if (isCancelKey(data, kb, true)) {
			return CANCEL;
		}
		if (applyNavigationKey(this.navigator, data, kb, true)) {
			return CONTINUE;
		}
		if (kb.matches(data, "selectToggle")) {
			this.navigator.toggleCheckedAtHighlight();
			return CONTINUE;
		}
		if (this.behavior.toggleAll && kb.matches(data, "listToggleAll")) {
			this.navigator.toggleAll();
			return CONTINUE;
		}
		if (kb.matches(data, "submit")) {
			const indices = this.navigator.checkedIndices();
			const { prompt, report } = this.options;
			const labels = indices.map((index) => this.behavior.summaries[index] ?? "");
			const summary = prompt !== undefined && (report ?? true) ? [this.theme.multiSelection(prompt, labels)] : [];
			return confirmWith(indices, summary);
		}
		return CONTINUE;
	}
}

/**
 * Check any number of items. Resolves the checked indices, ascending.
 */
export class MultiSelect extends Prompt<number[]> {
	constructor(private readonly options: MultiSelectOptions) {
		super();
	}

	protected createController(): PromptController<number[]> {
		if (this.options.items.length === 0) {
			throw new PromptConfigError("MultiSelect needs at least one item");
		}
		return new MultiSelectController(this.options, { summaries: this.options.items, toggleAll: false });
	}

	protected clearOnExit(): boolean {
		return this.options.clear ?? true;
	}
}

/**
 * MultiSelect whose items carry their own summary text and checked state.
 * `a` checks every item, or unchecks them all when all are checked.
 */
export class MultiSelectPlus extends Prompt<number[]> {
	constructor(private readonly options: MultiSelectPlusOptions) {
		super();
	}

	protected createController(): PromptController<number[]> {
		const { items } = this.options;
		if (items.length === 0) {
			throw new PromptConfigError("MultiSelectPlus needs at least one item");
		}
		const listOptions: MultiSelectOptions = {
			...this.options,
			items: items.map((item) => item.label),
			defaults: items.map((item) => item.checked ?? false),
		};
		return new MultiSelectController(listOptions, {
			summaries: items.map((item) => item.summaryText),
			toggleAll: true,
		});
	}

	protected clearOnExit(): boolean {
		return this.options.clear ?? true;
	}
}

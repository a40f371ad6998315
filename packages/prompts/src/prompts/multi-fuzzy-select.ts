import { PromptConfigError } from "../errors.js";
import { getPromptKeybindings } from "../keybindings.js";
import { LineEditor } from "../line-editor.js";
import { ListNavigator } from "../list-navigator.js";
import { CANCEL, CONTINUE, confirmWith, Prompt, type PromptController, type Transition } from "../prompt.js";
import { plainTheme, type PromptTheme } from "../theme.js";
import { applyEditKey } from "./edit-keys.js";
import { renderEditLine } from "./edit-line.js";
import { applyNavigationKey, renderListFrame, resolveWrap } from "./list-view.js";

export interface MultiFuzzySelectOptions {
	prompt: string;
	items: readonly string[];
	/** Checked state per item at start */
	defaults?: readonly boolean[];
	maxLength?: number;
	/** Style the matched characters of each row (default: true) */
	highlightMatches?: boolean;
	caseSensitive?: boolean;
	wrap?: boolean;
	clear?: boolean;
	report?: boolean;
	showHelp?: boolean;
	theme?: PromptTheme;
}

const HELP = "type to filter, ↑/↓ move, space toggle, enter confirm, esc cancel";

class MultiFuzzySelectController implements PromptController<number[]> {
	private readonly navigator: ListNavigator;
	private readonly query = new LineEditor();
	private readonly theme: PromptTheme;

	constructor(private readonly options: MultiFuzzySelectOptions) {
		this.theme = options.theme ?? plainTheme;
		const checked: number[] = [];
		(options.defaults ?? []).forEach((isChecked, index) => {
			if (isChecked && index < options.items.length) checked.push(index);
		});
		this.navigator = new ListNavigator(options.items, {
			wrap: resolveWrap(options.wrap),
			caseSensitive: options.caseSensitive,
			checked,
		});
	}

	render(width: number, height: number): string[] {
		const { prompt, showHelp, maxLength, highlightMatches } = this.options;
		const queryLine = renderEditLine(
			this.theme.inputPrompt(prompt),
			this.query.textBeforeCursor(),
			this.query.textAfterCursor(),
			width,
		);
		return renderListFrame(this.navigator, this.theme, height, {
			header: [queryLine],
			footer: showHelp ? [this.theme.help(HELP)] : [],
			kind: "checkbox",
			maxLength,
			highlightMatches: highlightMatches ?? true,
		});
	}

	handleKey(data: string): Transition<number[]> {
		const kb = getPromptKeybindings();

		if (kb.matches(data, "cancel")) {
			return CANCEL;
		}
		if (kb.matches(data, "submit")) {
			// Nothing to confirm from while the filter matches nothing
			if (this.navigator.count() === 0) return CONTINUE;
			const indices = this.navigator.checkedIndices();
			const { prompt, report, items } = this.options;
			const labels = indices.map((index) => items[index] ?? "");
			return confirmWith(indices, (report ?? true) ? [this.theme.multiSelection(prompt, labels)] : []);
		}
		if (kb.matches(data, "selectToggle")) {
			this.toggleAndResetQuery();
			return CONTINUE;
		}
		if (applyNavigationKey(this.navigator, data, kb, false)) {
			return CONTINUE;
		}

		const before = this.query.currentText();
		if (applyEditKey(this.query, data, kb) === "edited" && this.query.currentText() !== before) {
			this.navigator.setFilter(this.query.currentText());
		}
		return CONTINUE;
	}

	// The query is cleared so the next item can be searched from scratch;
	// the toggled item stays highlighted in the full list
	private toggleAndResetQuery(): void {
		const item = this.navigator.highlighted();
		this.navigator.toggleCheckedAtHighlight();
		this.query.setText("");
		this.navigator.setFilter("");
		if (item) this.navigator.highlightIndex(item.index);
	}
}

/**
 * Check any number of items, filtering the list by typing. Space toggles the
 * highlighted item and clears the query. Resolves the checked indices,
 * ascending.
 */
export class MultiFuzzySelect extends Prompt<number[]> {
	constructor(private readonly options: MultiFuzzySelectOptions) {
		super();
	}

	protected createController(): PromptController<number[]> {
		if (this.options.items.length === 0) {
			throw new PromptConfigError("MultiFuzzySelect needs at least one item");
		}
		return new MultiFuzzySelectController(this.options);
	}

	protected clearOnExit(): boolean {
		return this.options.clear ?? true;
	}
}

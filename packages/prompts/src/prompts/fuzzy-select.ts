import { PromptConfigError } from "../errors.js";
import { getPromptKeybindings } from "../keybindings.js";
import { LineEditor } from "../line-editor.js";
import { ListNavigator } from "../list-navigator.js";
import { CANCEL, CONTINUE, confirmWith, Prompt, type PromptController, type Transition } from "../prompt.js";
import { plainTheme, type PromptTheme } from "../theme.js";
import { applyEditKey } from "./edit-keys.js";
import { renderEditLine } from "./edit-line.js";
import { applyNavigationKey, renderListFrame, resolveWrap } from "./list-view.js";

export interface FuzzySelectOptions {
	prompt: string;
	items: readonly string[];
	/** Index of the item highlighted at start */
	default?: number;
	initialQuery?: string;
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

const HELP = "type to filter, ↑/↓ move, enter select, esc cancel";

class FuzzySelectController implements PromptController<number> {
	private readonly navigator: ListNavigator;
	private readonly query: LineEditor;
	private readonly theme: PromptTheme;

	constructor(private readonly options: FuzzySelectOptions) {
		this.theme = options.theme ?? plainTheme;
		this.navigator = new ListNavigator(options.items, {
			wrap: resolveWrap(options.wrap),
			caseSensitive: options.caseSensitive,
		});
		this.query = new LineEditor(options.initialQuery ?? "");
		this.navigator.setFilter(this.query.currentText());
		if (options.default !== undefined) {
			this.navigator.highlightIndex(options.default);
		}
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
			kind: "menu",
			maxLength,
			highlightMatches: highlightMatches ?? true,
		});
	}

	handleKey(data: string): Transition<number> {
		const kb = getPromptKeybindings();

		if (kb.matches(data, "cancel")) {
			return CANCEL;
		}
		if (kb.matches(data, "submit")) {
			const item = this.navigator.highlighted();
			// Nothing to pick while the filter matches nothing
			if (!item) return CONTINUE;
			const { prompt, report } = this.options;
			return confirmWith(item.index, (report ?? true) ? [this.theme.selection(prompt, item.label)] : []);
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
}

/**
 * Pick one item by typing part of it. Resolves the index of the chosen item.
 */
export class FuzzySelect extends Prompt<number> {
	constructor(private readonly options: FuzzySelectOptions) {
		super();
	}

	protected createController(): PromptController<number> {
		const { items, default: defaultIndex } = this.options;
		if (items.length === 0) {
			throw new PromptConfigError("FuzzySelect needs at least one item");
		}
		if (defaultIndex !== undefined && (defaultIndex < 0 || defaultIndex >= items.length)) {
			throw new PromptConfigError(`Default index ${defaultIndex} is out of range for ${items.length} items`);
		}
		return new FuzzySelectController(this.options);
	}

	protected clearOnExit(): boolean {
		return this.options.clear ?? true;
	}
}

import { PromptConfigError } from "../errors.js";
import { getPromptKeybindings } from "../keybindings.js";
import { ListNavigator } from "../list-navigator.js";
import { CANCEL, CONTINUE, confirmWith, Prompt, type PromptController, type Transition } from "../prompt.js";
import { plainTheme, type PromptTheme } from "../theme.js";
import { applyNavigationKey, isCancelKey, type ListPromptOptions, renderListFrame, resolveWrap } from "./list-view.js";

export type SortOptions = ListPromptOptions;

const HELP = "↑/↓ move, space grab/release, enter confirm, esc cancel";

class SortController implements PromptController<number[]> {
	private readonly navigator: ListNavigator;
	private readonly theme: PromptTheme;
	private grabbed = false;

	constructor(private readonly options: SortOptions) {
		this.theme = options.theme ?? plainTheme;
		this.navigator = new ListNavigator(options.items, { wrap: resolveWrap(options.wrap) });
	}

	render(_width: number, height: number): string[] {
		const { prompt, showHelp, maxLength } = this.options;
		return renderListFrame(this.navigator, this.theme, height, {
			header: prompt !== undefined ? [this.theme.prompt(prompt)] : [],
			footer: showHelp ? [this.theme.help(HELP)] : [],
			kind: "sort",
			grabbed: this.grabbed,
			maxLength,
		});
	}

	handleKey(data: string): Transition<number[]> {
		const kb = getPromptKeybindings();

		if (isCancelKey(data, kb, true)) {
			return CANCEL;
		}
		if (kb.matches(data, "selectToggle")) {
			this.grabbed = !this.grabbed;
			return CONTINUE;
		}
		if (this.grabbed) {
			// A grabbed item travels with the arrows; it never wraps
			if (kb.matches(data, "selectUp") || kb.matches(data, "listUp")) {
				this.navigator.moveItem("up");
				return CONTINUE;
			}
			if (kb.matches(data, "selectDown") || kb.matches(data, "listDown")) {
				this.navigator.moveItem("down");
				return CONTINUE;
			}
		} else if (applyNavigationKey(this.navigator, data, kb, true)) {
			return CONTINUE;
		}
		if (kb.matches(data, "submit")) {
			const order = this.navigator.order();
			const { prompt, report, items } = this.options;
			const labels = order.map((index) => items[index] ?? "");
			const summary = prompt !== undefined && (report ?? true) ? [this.theme.multiSelection(prompt, labels)] : [];
			return confirmWith(order, summary);
		}
		return CONTINUE;
	}
}

/**
 * Reorder items. Resolves the original indices in their new order.
 */
export class Sort extends Prompt<number[]> {
	constructor(private readonly options: SortOptions) {
		super();
	}

	protected createController(): PromptController<number[]> {
		if (this.options.items.length === 0) {
			throw new PromptConfigError("Sort needs at least one item");
		}
		return new SortController(this.options);
	}

	protected clearOnExit(): boolean {
		return this.options.clear ?? true;
	}
}

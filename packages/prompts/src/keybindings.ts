import { type KeyId, matchesKey } from "./keys.js";

/**
 * Prompt actions that can be bound to keys.
 */
export type PromptAction =
	// Line editing
	| "cursorLeft"
	| "cursorRight"
	| "cursorWordLeft"
	| "cursorWordRight"
	| "cursorLineStart"
	| "cursorLineEnd"
	| "deleteCharBackward"
	| "deleteCharForward"
	| "deleteWordBackward"
	| "deleteToLineStart"
	| "deleteToLineEnd"
	| "historyPrev"
	| "historyNext"
	// Selection
	| "selectUp"
	| "selectDown"
	| "selectPageUp"
	| "selectPageDown"
	| "selectToggle"
	| "submit"
	| "cancel"
	// Extra keys of list prompts without a query line
	| "listUp"
	| "listDown"
	| "listPageUp"
	| "listPageDown"
	| "listCancel"
	| "listToggleAll";

// Re-export KeyId from keys.ts
export type { KeyId };

/**
 * Prompt keybindings configuration.
 */
export type PromptKeybindingsConfig = {
	[K in PromptAction]?: KeyId | KeyId[];
};

/**
 * Default prompt keybindings.
 */
export const DEFAULT_PROMPT_KEYBINDINGS: Required<PromptKeybindingsConfig> = {
	// Line editing
	cursorLeft: ["left", "ctrl+b"],
	cursorRight: ["right", "ctrl+f"],
	cursorWordLeft: ["alt+left", "ctrl+left", "alt+b"],
	cursorWordRight: ["alt+right", "ctrl+right", "alt+f"],
	cursorLineStart: ["home", "ctrl+a"],
	cursorLineEnd: ["end", "ctrl+e"],
	deleteCharBackward: "backspace",
	deleteCharForward: ["delete", "ctrl+d"],
	deleteWordBackward: ["ctrl+w", "alt+backspace"],
	deleteToLineStart: "ctrl+u",
	deleteToLineEnd: "ctrl+k",
	historyPrev: "up",
	historyNext: "down",
	// Selection
	selectUp: ["up", "ctrl+p"],
	selectDown: ["down", "ctrl+n"],
	selectPageUp: "pageUp",
	selectPageDown: "pageDown",
	selectToggle: "space",
	submit: "enter",
	cancel: ["escape", "ctrl+c"],
	// List prompts
	listUp: "k",
	listDown: "j",
	listPageUp: ["left", "h"],
	listPageDown: ["right", "l"],
	listCancel: "q",
	listToggleAll: "a",
};

const PROMPT_ACTIONS: readonly PromptAction[] = [
	"cursorLeft",
	"cursorRight",
	"cursorWordLeft",
	"cursorWordRight",
	"cursorLineStart",
	"cursorLineEnd",
	"deleteCharBackward",
	"deleteCharForward",
	"deleteWordBackward",
	"deleteToLineStart",
	"deleteToLineEnd",
	"historyPrev",
	"historyNext",
	"selectUp",
	"selectDown",
	"selectPageUp",
	"selectPageDown",
	"selectToggle",
	"submit",
	"cancel",
	"listUp",
	"listDown",
	"listPageUp",
	"listPageDown",
	"listCancel",
	"listToggleAll",
];

function toKeyArray(keys: KeyId | KeyId[]): KeyId[] {
	return Array.isArray(keys) ? [...keys] : [keys];
}

/**
 * Manages keybindings for prompts.
 */
export class PromptKeybindingsManager {
	private actionToKeys: Map<PromptAction, KeyId[]>;

	constructor(config: PromptKeybindingsConfig = {}) {
		this.actionToKeys = new Map();
		this.buildMaps(config);
	}

	private buildMaps(config: PromptKeybindingsConfig): void {
		this.actionToKeys.clear();

		for (const action of PROMPT_ACTIONS) {
			// User config overrides the defaults per action
			const keys = config[action] ?? DEFAULT_PROMPT_KEYBINDINGS[action];
			this.actionToKeys.set(action, toKeyArray(keys));
		}
	}

	/**
	 * Check if input matches a specific action.
	 */
	matches(data: string, action: PromptAction): boolean {
		const keys = this.actionToKeys.get(action);
		if (!keys) return false;
		for (const key of keys) {
			if (matchesKey(data, key)) return true;
		}
		return false;
	}

	/**
	 * Get keys bound to an action.
	 */
	getKeys(action: PromptAction): KeyId[] {
		return this.actionToKeys.get(action) ?? [];
	}

	/**
	 * Update configuration.
	 */
	setConfig(config: PromptKeybindingsConfig): void {
		this.buildMaps(config);
	}
}

// Global instance
let globalPromptKeybindings: PromptKeybindingsManager | null = null;

export function getPromptKeybindings(): PromptKeybindingsManager {
	if (!globalPromptKeybindings) {
		globalPromptKeybindings = new PromptKeybindingsManager();
	}
	return globalPromptKeybindings;
}

export function setPromptKeybindings(manager: PromptKeybindingsManager): void {
	globalPromptKeybindings = manager;
}

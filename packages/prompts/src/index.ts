// Prompts
export { type AlertOptions, Alert } from "./prompts/alert.js";
export { type ConfirmOptions, Confirm } from "./prompts/confirm.js";
export { type FuzzySelectOptions, FuzzySelect } from "./prompts/fuzzy-select.js";
export {
	Input,
	type InputOptions,
	runValidators,
	type TextInputOptions,
	type ValidationResult,
	type Validator,
} from "./prompts/input.js";
export type { ListPromptOptions } from "./prompts/list-view.js";
export { type MultiFuzzySelectOptions, MultiFuzzySelect } from "./prompts/multi-fuzzy-select.js";
export {
	type MultiSelectOptions,
	MultiSelect,
	type MultiSelectPlusItem,
	type MultiSelectPlusOptions,
	MultiSelectPlus,
} from "./prompts/multi-select.js";
export { type PasswordConfirmation, type PasswordOptions, Password } from "./prompts/password.js";
export { type SelectOptions, type SelectResult, Select } from "./prompts/select.js";
export { type SortOptions, Sort } from "./prompts/sort.js";
// Run loop
export {
	CANCEL,
	CONTINUE,
	confirmWith,
	mapController,
	Prompt,
	type PromptController,
	type PromptOutcome,
	type RunPromptOptions,
	runPrompt,
	type Transition,
} from "./prompt.js";
// Errors
export {
	isPromptCancelled,
	PromptCancelledError,
	PromptConfigError,
	TerminalIOError,
	ValidationError,
} from "./errors.js";
// Building blocks
export { type FuzzyFilterEntry, type FuzzyMatch, type FuzzyOptions, fuzzyFilter, fuzzyMatch } from "./fuzzy.js";
export { type History, HistoryCursor, MemoryHistory, type MemoryHistoryOptions } from "./history.js";
export { type CursorMovement, LineEditor } from "./line-editor.js";
export {
	type CandidateItem,
	computeListLayout,
	type Direction,
	type ListLayout,
	ListNavigator,
	type ListNavigatorOptions,
	type Viewport,
	type VisibleRow,
} from "./list-navigator.js";
export { CURSOR_MARKER, Renderer } from "./renderer.js";
// Themes
export {
	colorfulTheme,
	createColorfulTheme,
	type ItemDisplay,
	plainTheme,
	type PromptTheme,
	promptCharacterTheme,
	styleMatches,
} from "./theme.js";
// Keyboard input
export {
	DEFAULT_PROMPT_KEYBINDINGS,
	getPromptKeybindings,
	type PromptAction,
	type PromptKeybindingsConfig,
	PromptKeybindingsManager,
	setPromptKeybindings,
} from "./keybindings.js";
export { Key, type KeyId, matchesKey, parseKey, printableText } from "./keys.js";
export { StdinBuffer, type StdinBufferEventMap, type StdinBufferOptions } from "./stdin-buffer.js";
// Terminal
export { ProcessTerminal, type Terminal } from "./terminal.js";
// Configuration
export { loadSettings, type PromptSettings } from "./config.js";
export { debugLog } from "./debug-log.js";
// Utilities
export { toSingleLine, truncateToWidth, visibleWidth } from "./utils.js";

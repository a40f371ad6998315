import chalk, { type ChalkInstance } from "chalk";
import { toGraphemes } from "./utils.js";

/**
 * One list row as the theme sees it.
 */
export interface ItemDisplay {
	label: string;
	/** Grapheme offsets matched by the fuzzy query */
	positions: readonly number[];
	highlighted: boolean;
	/** "menu" for Select and FuzzySelect, "checkbox" for MultiSelect, "sort" for Sort */
	kind: "menu" | "checkbox" | "sort";
	checked?: boolean;
	/** Sort: the highlighted item is picked up and moves with the arrows */
	grabbed?: boolean;
}

export interface PromptTheme {
	/** Header line of list prompts */
	prompt: (prompt: string) => string;
	/** Text in front of the input buffer */
	inputPrompt: (prompt: string, defaultText?: string) => string;
	confirmPrompt: (prompt: string, defaultValue?: boolean) => string;
	item: (row: ItemDisplay) => string;
	scrollIndicator: (direction: "up" | "down") => string;
	noMatches: () => string;
	error: (message: string) => string;
	help: (text: string) => string;
	/** Masked rendering of a password of `length` graphemes */
	mask: (length: number, maskChar: string) => string;
	/** Summary lines left after a confirmed prompt */
	selection: (prompt: string, value: string) => string;
	multiSelection: (prompt: string, values: readonly string[]) => string;
	confirmSelection: (prompt: string, value: boolean) => string;
	passwordSelection: (prompt: string) => string;
	alert: (text: string) => string;
}

function itemPrefix(row: ItemDisplay): string {
	const pointer = row.highlighted ? ">" : " ";
	switch (row.kind) {
		case "checkbox":
			return `${pointer} [${row.checked ? "x" : " "}] `;
		case "sort":
			return row.highlighted && row.grabbed ? "* " : `${pointer} `;
		case "menu":
			return `${pointer} `;
	}
}

/**
 * Apply `style` to the graphemes at `positions`, leaving the rest as-is.
 */
export function styleMatches(label: string, positions: readonly number[], style: (text: string) => string): string {
	if (positions.length === 0) return label;
	const matched = new Set(positions);
	return toGraphemes(label)
		.map((grapheme, i) => (matched.has(i) ? style(grapheme) : grapheme))
		.join("");
}

/**
 * Uncolored theme.
 */
export const plainTheme: PromptTheme = {
	prompt: (prompt) => `${prompt}:`,
	inputPrompt: (prompt, defaultText) => (defaultText !== undefined ? `${prompt} [${defaultText}]: ` : `${prompt}: `),
	confirmPrompt: (prompt, defaultValue) => {
		if (defaultValue === undefined) return `${prompt} `;
		return `${prompt}${defaultValue ? " [Y/n] " : " [y/N] "}`;
	},
	item: (row) => `${itemPrefix(row)}${row.label}`,
	scrollIndicator: (direction) => (direction === "up" ? "  ↑ more" : "  ↓ more"),
	noMatches: () => "  No matches",
	error: (message) => `error: ${message}`,
	help: (text) => text,
	mask: (length, maskChar) => maskChar.repeat(length),
	selection: (prompt, value) => `${prompt}: ${value}`,
	multiSelection: (prompt, values) => `${prompt}: ${values.join(", ")}`,
	confirmSelection: (prompt, value) => `${prompt} ${value ? "yes" : "no"}`,
	passwordSelection: (prompt) => `${prompt}: [hidden]`,
	alert: (text) => text,
};

/**
 * Theme with colors. Pass a chalk instance to force a color level.
 */
export function createColorfulTheme(c: ChalkInstance = chalk): PromptTheme {
	const indicator = (text: string) => c.cyan.bold(text);
	return {
		prompt: (prompt) => `${c.bold(prompt)}:`,
		inputPrompt: (prompt, defaultText) =>
			defaultText !== undefined ? `${c.bold(prompt)} ${c.dim(`[${defaultText}]`)}: ` : `${c.bold(prompt)}: `,
		confirmPrompt: (prompt, defaultValue) => {
			if (defaultValue === undefined) return `${c.bold(prompt)} `;
			return `${c.bold(prompt)} ${c.dim(defaultValue ? "[Y/n]" : "[y/N]")} `;
		},
		item: (row) => {
			const label = styleMatches(row.label, row.positions, (text) => c.yellow.bold(text));
			if (row.kind === "checkbox") {
				const box = row.checked ? `[${indicator("x")}]` : "[ ]";
				return row.highlighted ? `${indicator(">")} ${box} ${label}` : `  ${box} ${c.dim(label)}`;
			}
			if (row.kind === "sort" && row.highlighted && row.grabbed) {
				return `${indicator("*")} ${c.underline(label)}`;
			}
			return row.highlighted ? `${indicator(">")} ${label}` : `  ${c.dim(label)}`;
		},
		scrollIndicator: (direction) => c.dim(direction === "up" ? "  ↑ more" : "  ↓ more"),
		noMatches: () => c.dim("  No matches"),
		error: (message) => `${c.red("error")}: ${message}`,
		help: (text) => c.dim(text),
		mask: (length, maskChar) => maskChar.repeat(length),
		selection: (prompt, value) => `${c.bold(prompt)}: ${c.cyan(value)}`,
		multiSelection: (prompt, values) => `${c.bold(prompt)}: ${values.map((value) => c.cyan(value)).join(", ")}`,
		confirmSelection: (prompt, value) => `${c.bold(prompt)} ${c.green(value ? "yes" : "no")}`,
		passwordSelection: (prompt) => `${c.bold(prompt)}: ${c.cyan("[hidden]")}`,
		alert: (text) => `${c.yellow.bold("!")} ${text}`,
	};
}

export const colorfulTheme: PromptTheme = createColorfulTheme();

/**
 * Plain theme with a custom prompt character in place of ":".
 */
export function promptCharacterTheme(character: string): PromptTheme {
	return {
		...plainTheme,
		prompt: (prompt) => `${prompt}${character}`,
		inputPrompt: (prompt, defaultText) =>
			defaultText !== undefined ? `${prompt} [${defaultText}]${character} ` : `${prompt}${character} `,
		selection: (prompt, value) => `${prompt}${character} ${value}`,
		multiSelection: (prompt, values) => `${prompt}${character} ${values.join(", ")}`,
		passwordSelection: (prompt) => `${prompt}${character} [hidden]`,
	};
}

/**
 * Keyboard input handling for prompts.
 *
 * Decodes the legacy sequences terminals send in raw mode, including the
 * xterm `CSI 1;<mod>` form for modified arrows and navigation keys.
 *
 * API:
 * - parseKey(data) - Parse input and return the key identifier
 * - matchesKey(data, keyId) - Check if input matches a key identifier
 * - printableText(data) - Text to insert for a printable keystroke or paste
 */

// =============================================================================
// Type-Safe Key Identifiers
// =============================================================================

type Letter =
	| "a"
	| "b"
	| "c"
	| "d"
	| "e"
	| "f"
	| "g"
	| "h"
	| "i"
	| "j"
	| "k"
	| "l"
	| "m"
	| "n"
	| "o"
	| "p"
	| "q"
	| "r"
	| "s"
	| "t"
	| "u"
	| "v"
	| "w"
	| "x"
	| "y"
	| "z";

type SymbolKey = "`" | "-" | "=" | "[" | "]" | "\\" | ";" | "'" | "," | "." | "/";

type SpecialKey =
	| "escape"
	| "enter"
	| "tab"
	| "space"
	| "backspace"
	| "delete"
	| "insert"
	| "home"
	| "end"
	| "pageUp"
	| "pageDown"
	| "up"
	| "down"
	| "left"
	| "right";

type BaseKey = Letter | SymbolKey | SpecialKey;

/**
 * Union type of all valid key identifiers.
 * Modifiers are written in the order shift, ctrl, alt.
 */
export type KeyId =
	| BaseKey
	| `ctrl+${BaseKey}`
	| `shift+${BaseKey}`
	| `alt+${BaseKey}`
	| `shift+ctrl+${BaseKey}`
	| `ctrl+alt+${BaseKey}`
	| `shift+alt+${BaseKey}`;

/**
 * Helper object for creating typed key identifiers.
 */
export const Key = {
	escape: "escape" as const,
	enter: "enter" as const,
	tab: "tab" as const,
	space: "space" as const,
	backspace: "backspace" as const,
	delete: "delete" as const,
	home: "home" as const,
	end: "end" as const,
	pageUp: "pageUp" as const,
	pageDown: "pageDown" as const,
	up: "up" as const,
	down: "down" as const,
	left: "left" as const,
	right: "right" as const,

	ctrl: <K extends BaseKey>(key: K): `ctrl+${K}` => `ctrl+${key}`,
	shift: <K extends BaseKey>(key: K): `shift+${K}` => `shift+${key}`,
	alt: <K extends BaseKey>(key: K): `alt+${K}` => `alt+${key}`,
} as const;

// =============================================================================
// Sequence tables
// =============================================================================

const MODIFIERS = {
	shift: 1,
	alt: 2,
	ctrl: 4,
} as const;

const LEGACY_SEQUENCE_KEY_IDS: Record<string, KeyId> = {
	"\x1b[A": "up",
	"\x1b[B": "down",
	"\x1b[C": "right",
	"\x1b[D": "left",
	"\x1bOA": "up",
	"\x1bOB": "down",
	"\x1bOC": "right",
	"\x1bOD": "left",
	"\x1b[H": "home",
	"\x1bOH": "home",
	"\x1b[1~": "home",
	"\x1b[7~": "home",
	"\x1b[F": "end",
	"\x1bOF": "end",
	"\x1b[4~": "end",
	"\x1b[8~": "end",
	"\x1b[2~": "insert",
	"\x1b[3~": "delete",
	"\x1b[5~": "pageUp",
	"\x1b[6~": "pageDown",
	"\x1b[[5~": "pageUp",
	"\x1b[[6~": "pageDown",
	"\x1b[Z": "shift+tab",
	"\x1b[a": "shift+up",
	"\x1b[b": "shift+down",
	"\x1b[c": "shift+right",
	"\x1b[d": "shift+left",
	"\x1bOa": "ctrl+up",
	"\x1bOb": "ctrl+down",
	"\x1bOc": "ctrl+right",
	"\x1bOd": "ctrl+left",
	"\x1bb": "alt+left",
	"\x1bf": "alt+right",
	"\x1b\x7f": "alt+backspace",
	"\x1b\b": "alt+backspace",
	"\x1bOM": "enter",
};

// Final byte of `CSI 1 ; <mod> <final>` sequences
const CSI_FINAL_KEYS: Record<string, BaseKey> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
};

// Number of `CSI <n> ; <mod> ~` sequences
const CSI_TILDE_KEYS: Record<string, BaseKey> = {
	"2": "insert",
	"3": "delete",
	"5": "pageUp",
	"6": "pageDown",
};

function withModifiers(key: BaseKey, modifierParam: number): string {
	// xterm encodes modifiers as 1 + bitmask
	const mask = modifierParam - 1;
	const mods: string[] = [];
	if (mask & MODIFIERS.shift) mods.push("shift");
	if (mask & MODIFIERS.ctrl) mods.push("ctrl");
	if (mask & MODIFIERS.alt) mods.push("alt");
	return mods.length > 0 ? `${mods.join("+")}+${key}` : key;
}

function parseModifiedCsi(data: string): string | undefined {
	const letterMatch = data.match(/^\x1b\[1;(\d+)([A-Z])$/);
	if (letterMatch) {
		const key = CSI_FINAL_KEYS[letterMatch[2] ?? ""];
		if (key) return withModifiers(key, Number.parseInt(letterMatch[1] ?? "1", 10));
		return undefined;
	}
	const tildeMatch = data.match(/^\x1b\[(\d+);(\d+)~$/);
	if (tildeMatch) {
		const key = CSI_TILDE_KEYS[tildeMatch[1] ?? ""];
		if (key) return withModifiers(key, Number.parseInt(tildeMatch[2] ?? "1", 10));
	}
	return undefined;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse input data and return the key identifier if recognized.
 *
 * @param data - Raw input data from terminal (one sequence)
 * @returns Key identifier string (e.g., "ctrl+c") or undefined
 */
export function parseKey(data: string): string | undefined {
	const legacy = LEGACY_SEQUENCE_KEY_IDS[data];
	if (legacy) return legacy;

	if (data.startsWith("\x1b[")) {
		return parseModifiedCsi(data);
	}

	if (data === "\x1b") return "escape";
	if (data === "\t") return "tab";
	if (data === "\r" || data === "\n") return "enter";
	if (data === "\x00") return "ctrl+space";
	if (data === " ") return "space";
	if (data === "\x7f" || data === "\x08") return "backspace";
	if (data === "\x1b\r") return "alt+enter";
	if (data === "\x1f") return "ctrl+-";

	if (data.length === 2 && data[0] === "\x1b") {
		const code = data.charCodeAt(1);
		if (code >= 1 && code <= 26) {
			return `ctrl+alt+${String.fromCharCode(code + 96)}`;
		}
		if (code >= 97 && code <= 122) {
			return `alt+${String.fromCharCode(code)}`;
		}
	}

	// Raw Ctrl+letter
	if (data.length === 1) {
		const code = data.charCodeAt(0);
		if (code >= 1 && code <= 26) {
			return `ctrl+${String.fromCharCode(code + 96)}`;
		}
		if (code >= 32 && code <= 126) {
			return data;
		}
	}

	return undefined;
}

/**
 * Match input data against a key identifier string.
 *
 * Supported key identifiers:
 * - Single keys: "escape", "tab", "enter", "backspace", "delete", "home", "end", "space"
 * - Arrow keys: "up", "down", "left", "right"
 * - Ctrl combinations: "ctrl+c", "ctrl+p"
 * - Modified navigation: "shift+up", "ctrl+left", "alt+backspace"
 *
 * Printable letters match case-sensitively: "j" does not match "J".
 */
export function matchesKey(data: string, keyId: KeyId): boolean {
	return parseKey(data) === keyId;
}

/**
 * Return the text a keystroke inserts, or undefined for control keys and
 * escape sequences. Pasted chunks are accepted with line breaks folded to
 * spaces; other control characters are dropped.
 */
export function printableText(data: string): string | undefined {
	if (data.length === 0 || data.startsWith("\x1b")) return undefined;
	if (data.length === 1 && data.charCodeAt(0) < 0x20) return undefined;
	if (data === "\x7f") return undefined;

	const text = data.replace(/\r\n|\r|\n/g, " ").replace(/[\x00-\x1f\x7f]/g, "");
	return text.length > 0 ? text : undefined;
}

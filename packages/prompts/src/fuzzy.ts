/**
 * Fuzzy matching utilities.
 * Matches if all query characters appear in order (not necessarily consecutive).
 * Higher score = better match.
 */

import { toGraphemes } from "./utils.js";

export interface FuzzyMatch {
	score: number;
	/** Grapheme indices of the matched characters in the candidate */
	positions: number[];
}

export interface FuzzyOptions {
	caseSensitive?: boolean;
}

export interface FuzzyFilterEntry<T> {
	item: T;
	/** Position of the item in the input sequence */
	index: number;
	score: number;
	positions: number[];
}

const MATCH_POINTS = 16;
const CONSECUTIVE_BONUS = 8;
const WORD_START_BONUS = 12;
const GAP_PENALTY = 2;
const LENGTH_SCALE = 1024;
const SEPARATOR = /^[\s\-_./:]$/u;

function isWordStart(graphemes: string[], i: number): boolean {
	if (i === 0) return true;
	const prev = graphemes[i - 1] ?? "";
	if (SEPARATOR.test(prev)) return true;
	const current = graphemes[i] ?? "";
	// camelCase hump
	return /^\p{Lu}$/u.test(current) && /^\p{Ll}$/u.test(prev);
}

/**
 * Score `text` against `query`. Returns undefined when the query is not a
 * subsequence of the text.
 */
export function fuzzyMatch(query: string, text: string, options: FuzzyOptions = {}): FuzzyMatch | undefined {
	if (query.length === 0) {
		return { score: 0, positions: [] };
	}

	const fold = (s: string) => (options.caseSensitive ? s : s.toLowerCase());
	const queryChars = toGraphemes(fold(query));
	const original = toGraphemes(text);
	const folded = original.map(fold);

	if (queryChars.length > folded.length) {
		return undefined;
	}

	const positions: number[] = [];
	let points = 0;
	let run = 0;
	let queryIndex = 0;

	for (let i = 0; i < folded.length && queryIndex < queryChars.length; i++) {
		if (folded[i] !== queryChars[queryIndex]) continue;

		points += MATCH_POINTS;
		const last = positions[positions.length - 1];
		if (last !== undefined && last === i - 1) {
			run++;
			points += CONSECUTIVE_BONUS * run;
		} else {
			run = 0;
			if (last !== undefined) {
				points -= (i - last - 1) * GAP_PENALTY;
			}
		}
		if (isWordStart(original, i)) {
			points += WORD_START_BONUS;
		}

		positions.push(i);
		queryIndex++;
	}

	if (queryIndex < queryChars.length) {
		return undefined;
	}

	// Shorter candidates win ties on points
	return { score: points * LENGTH_SCALE - Math.min(original.length, LENGTH_SCALE - 1), positions };
}

/**
 * Filter and sort items by fuzzy match quality (best matches first).
 * Ties keep the input order. An empty query keeps every item in input order.
 */
export function fuzzyFilter<T>(
	items: readonly T[],
	query: string,
	getText: (item: T) => string,
	options: FuzzyOptions = {},
): FuzzyFilterEntry<T>[] {
	const results: FuzzyFilterEntry<T>[] = [];

	items.forEach((item, index) => {
		const match = fuzzyMatch(query, getText(item), options);
		if (match) {
			results.push({ item, index, score: match.score, positions: match.positions });
		}
	});

	if (query.length > 0) {
		results.sort((a, b) => b.score - a.score || a.index - b.index);
	}
	return results;
}

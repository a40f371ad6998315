/**
 * Store of previously submitted input lines.
 */
export interface History {
	append(text: string): void;
	/** Entries in submission order, most recent last */
	entries(): readonly string[];
}

export interface MemoryHistoryOptions {
	/** Maximum number of entries kept; the oldest are dropped first */
	capacity?: number;
	/** Skip an entry equal to the most recent one (default: true) */
	skipConsecutiveDuplicates?: boolean;
}

export class MemoryHistory implements History {
	private readonly items: string[];
	private readonly capacity: number;
	private readonly skipConsecutiveDuplicates: boolean;

	constructor(initial: readonly string[] = [], options: MemoryHistoryOptions = {}) {
		this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
		this.skipConsecutiveDuplicates = options.skipConsecutiveDuplicates ?? true;
		this.items = [];
		for (const entry of initial) {
			this.append(entry);
		}
	}

	append(text: string): void {
		if (this.capacity <= 0) return;
		if (this.skipConsecutiveDuplicates && this.items[this.items.length - 1] === text) return;
		this.items.push(text);
		if (this.items.length > this.capacity) {
			this.items.splice(0, this.items.length - this.capacity);
		}
	}

	entries(): readonly string[] {
		return this.items;
	}
}

/**
 * Walks a history from newest to oldest while a prompt is open. Position -1
 * is the draft being typed; it is restored when moving back past the newest
 * entry.
 */
export class HistoryCursor {
	private position = -1;
	private draft = "";

	constructor(private readonly history: History) {}

	/** Step to an older entry. Returns the text to show, or undefined at the oldest */
	older(currentText: string): string | undefined {
		const entries = this.history.entries();
		if (this.position + 1 >= entries.length) return undefined;
		if (this.position === -1) this.draft = currentText;
		this.position++;
		return entries[entries.length - 1 - this.position];
	}

	/** Step to a newer entry, or back to the draft. Undefined when already at the draft */
	newer(): string | undefined {
		if (this.position === -1) return undefined;
		this.position--;
		if (this.position === -1) return this.draft;
		const entries = this.history.entries();
		return entries[entries.length - 1 - this.position];
	}
}

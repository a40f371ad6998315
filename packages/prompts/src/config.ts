/**
 * Settings read from the environment.
 */
export interface PromptSettings {
	/** File receiving render and transition debug lines (TERMPICK_DEBUG_LOG) */
	debugLogPath: string | undefined;
	/** File receiving every byte written to the terminal (TERMPICK_WRITE_LOG) */
	writeLogPath: string | undefined;
	/** Default for list wraparound; TERMPICK_NO_WRAP=1 turns it off */
	wrap: boolean;
}

function nonEmpty(value: string | undefined): string | undefined {
	return value && value.length > 0 ? value : undefined;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): PromptSettings {
	const noWrap = env.TERMPICK_NO_WRAP;
	return {
		debugLogPath: nonEmpty(env.TERMPICK_DEBUG_LOG),
		writeLogPath: nonEmpty(env.TERMPICK_WRITE_LOG),
		wrap: !(noWrap === "1" || noWrap === "true"),
	};
}

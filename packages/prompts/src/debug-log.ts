import * as fs from "node:fs";
import { loadSettings } from "./config.js";

/**
 * Append one timestamped line to the TERMPICK_DEBUG_LOG file, if set.
 */
export function debugLog(scope: string, message: string, env: NodeJS.ProcessEnv = process.env): void {
	const logPath = loadSettings(env).debugLogPath;
	if (!logPath) return;
	try {
		fs.appendFileSync(logPath, `[${new Date().toISOString()}] ${scope}: ${message}\n`, { encoding: "utf8" });
	} catch {
		// Ignore logging errors
	}
}

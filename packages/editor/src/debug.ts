import * as fs from "node:fs";
import * as path from "node:path";

/** Environment variable naming the file diagnostic records are appended to. */
export const DEBUG_LOG_ENV = "LINEWEAVE_DEBUG_LOG";

let reportedFailure = false;

/**
 * Append a diagnostic record to the file named by LINEWEAVE_DEBUG_LOG.
 * Does nothing when the variable is unset.
 */
export function debugLog(scope: string, message: string): void {
	const logPath = process.env[DEBUG_LOG_ENV];
	if (!logPath) return;

	try {
		fs.mkdirSync(path.dirname(logPath), { recursive: true });
		fs.appendFileSync(logPath, `[${new Date().toISOString()}] ${scope}: ${message}\n`);
	} catch (error) {
		// Reported once per process
		if (!reportedFailure) {
			reportedFailure = true;
			const reason = error instanceof Error ? error.message : String(error);
			process.stderr.write(`lineweave: cannot write debug log ${logPath}: ${reason}\n`);
		}
	}
}

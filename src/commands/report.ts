import pc from "picocolors";
import { extractErrorMessage, ModlockError } from "../errors";

/**
 * Format bytes to human readable string
 */
export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes}B`;
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}kB`;
	return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

/**
 * Print a command failure and exit with status 1
 */
export function exitWithError(error: unknown): never {
	console.error(`${pc.red("Error:")} ${extractErrorMessage(error)}`);
	if (process.env.MODLOCK_DEBUG) {
		if (error instanceof ModlockError) {
			console.error(`[error] code: ${error.code}`);
		}
		if (error instanceof Error && error.stack) {
			console.error(error.stack);
		}
	}
	process.exit(1);
}

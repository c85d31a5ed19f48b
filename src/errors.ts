export type ModlockErrorCode =
	| "UNRESOLVED_SPECIFIER"
	| "UNMAPPED_SPECIFIER"
	| "VERSION_NOT_FOUND"
	| "NOT_CACHED"
	| "INTEGRITY_MISMATCH"
	| "UNTRACKED_DEPENDENCY"
	| "FETCH_TIMEOUT"
	| "FETCH_FAILED"
	| "CONFIG_ERROR"
	| "MODULE_PARSE_ERROR";

/**
 * Base class for every error modlock reports to the user
 */
export class ModlockError extends Error {
	constructor(
		message: string,
		public readonly code: ModlockErrorCode,
	) {
		super(message);
		this.name = "ModlockError";
	}
}

/**
 * Error thrown when the project or user configuration is invalid
 */
export class ConfigError extends ModlockError {
	constructor(message: string) {
		super(message, "CONFIG_ERROR");
		this.name = "ConfigError";
	}
}

/**
 * Error thrown when a specifier cannot be turned into a module location,
 * e.g. a local import without a file extension or a file that doesn't exist.
 */
export class UnresolvedSpecifierError extends ModlockError {
	constructor(
		public readonly specifier: string,
		reason: string,
		referrer?: string,
	) {
		const from = referrer ? ` (imported from ${referrer})` : "";
		super(
			`Unable to resolve "${specifier}"${from}: ${reason}`,
			"UNRESOLVED_SPECIFIER",
		);
		this.name = "UnresolvedSpecifierError";
	}
}

/**
 * Error thrown when a bare name has no entry in the import map or its scopes
 */
export class UnmappedSpecifierError extends ModlockError {
	constructor(
		public readonly specifier: string,
		referrer?: string,
	) {
		const from = referrer ? ` from ${referrer}` : "";
		super(
			`Bare specifier "${specifier}"${from} is not mapped in the import map. Add it to "imports" in modlock.json.`,
			"UNMAPPED_SPECIFIER",
		);
		this.name = "UnmappedSpecifierError";
	}
}

/**
 * Error thrown when no published version satisfies a range
 */
export class VersionNotFoundError extends ModlockError {
	constructor(
		public readonly specifier: string,
		public readonly expected: string,
		public readonly available: string[],
	) {
		const published =
			available.length > 0 ? available.join(", ") : "(no published versions)";
		super(
			`No version of ${specifier} matches "${expected}". Available: ${published}`,
			"VERSION_NOT_FOUND",
		);
		this.name = "VersionNotFoundError";
	}
}

/**
 * Error thrown in cached-only mode when an entry is missing from the cache
 */
export class NotCachedError extends ModlockError {
	constructor(public readonly specifier: string) {
		super(
			`${specifier} is not in the cache and network access is disabled (--cached-only)`,
			"NOT_CACHED",
		);
		this.name = "NotCachedError";
	}
}

/**
 * Error thrown when fetched content does not match the lock file.
 * Always fatal for the run.
 */
export class IntegrityMismatchError extends ModlockError {
	constructor(
		public readonly specifier: string,
		public readonly expected: string,
		public readonly actual: string,
	) {
		super(
			`Integrity check failed for ${specifier}\n  expected: ${expected}\n  actual:   ${actual}\nThe content changed since it was locked. Run with --lock-write to accept the new content.`,
			"INTEGRITY_MISMATCH",
		);
		this.name = "IntegrityMismatchError";
	}
}

/**
 * Error thrown in frozen lock mode for a dependency the lock file doesn't record
 */
export class UntrackedDependencyError extends ModlockError {
	constructor(
		public readonly specifier: string,
		detail?: string,
	) {
		const suffix = detail ? ` (${detail})` : "";
		super(
			`${specifier} is not in the lock file and the lock file is frozen${suffix}`,
			"UNTRACKED_DEPENDENCY",
		);
		this.name = "UntrackedDependencyError";
	}
}

/**
 * Error thrown when a network request exceeds the configured timeout
 */
export class FetchTimeoutError extends ModlockError {
	readonly retriable = true;

	constructor(
		public readonly url: string,
		public readonly timeoutMs: number,
	) {
		super(`Timed out after ${timeoutMs}ms fetching ${url}`, "FETCH_TIMEOUT");
		this.name = "FetchTimeoutError";
	}
}

/**
 * Error thrown for network failures and unexpected HTTP responses
 */
export class FetchError extends ModlockError {
	constructor(
		public readonly url: string,
		message: string,
		public readonly status?: number,
		public readonly retriable = false,
	) {
		super(`Failed to fetch ${url}: ${message}`, "FETCH_FAILED");
		this.name = "FetchError";
	}
}

/**
 * Error thrown when module source can't be scanned for imports
 */
export class ModuleParseError extends ModlockError {
	constructor(
		public readonly specifier: string,
		reason: string,
	) {
		super(`Could not parse imports of ${specifier}: ${reason}`, "MODULE_PARSE_ERROR");
		this.name = "ModuleParseError";
	}
}

/**
 * Whether an error is worth retrying at the fetch boundary
 */
export function isRetriable(error: unknown): boolean {
	if (error instanceof FetchTimeoutError) return true;
	if (error instanceof FetchError) return error.retriable;
	return false;
}

/**
 * Get a human-readable message from anything thrown
 */
export function extractErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return typeof error === "string" ? error : "Unknown error";
}

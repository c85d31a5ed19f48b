import { ConfigError } from "@/errors";

/**
 * Current lock file format version
 */
export const LOCKFILE_VERSION = "1";

/**
 * Default lock file name, created next to modlock.json
 */
export const DEFAULT_LOCKFILE_NAME = "modlock.lock";

/**
 * Lock file format (modlock.lock)
 *
 * @example
 * ```json
 * {
 *   "version": "1",
 *   "specifiers": { "jsr:@x/y@^1.2.0": "1.3.0" },
 *   "modules": { "jsr:@x/y@1.3.0/mod.ts": "sha256-..." }
 * }
 * ```
 */
export interface Lockfile {
	version: typeof LOCKFILE_VERSION;
	/** Registry specifier with range -> version it was resolved to */
	specifiers: Record<string, string>;
	/** Resolved module key -> integrity hash of its content */
	modules: Record<string, string>;
}

/**
 * Create a new empty lockfile
 */
export function createEmptyLockfile(): Lockfile {
	return { version: LOCKFILE_VERSION, specifiers: {}, modules: {} };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
	return (
		isPlainObject(value) &&
		Object.values(value).every((v) => typeof v === "string")
	);
}

/**
 * Entry recorded under a key. Inherited properties such as "constructor"
 * never count as entries.
 */
export function getEntry(record: Record<string, string>, key: string): string | undefined {
	return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Record an entry as an own property, including keys like "__proto__"
 */
export function setEntry(record: Record<string, string>, key: string, value: string): void {
	Object.defineProperty(record, key, {
		value,
		enumerable: true,
		writable: true,
		configurable: true,
	});
}

/**
 * Parse lock file content.
 *
 * @param content - Raw file content
 * @param source - Path used in error messages
 * @throws ConfigError if the content is not a lock file this version understands
 */
export function parseLockfile(content: string, source: string): Lockfile {
	let data: unknown;
	try {
		data = JSON.parse(content);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Lock file ${source} is not valid JSON: ${message}`);
	}

	if (!isPlainObject(data)) {
		throw new ConfigError(`Lock file ${source} must contain a JSON object`);
	}

	const { version, specifiers, modules } = data;
	if (version !== LOCKFILE_VERSION) {
		throw new ConfigError(
			`Unsupported lock file version ${JSON.stringify(version)} in ${source} (expected "${LOCKFILE_VERSION}")`,
		);
	}
	const specifierMap = specifiers ?? {};
	if (!isStringRecord(specifierMap)) {
		throw new ConfigError(`"specifiers" in ${source} must map strings to strings`);
	}
	const moduleMap = modules ?? {};
	if (!isStringRecord(moduleMap)) {
		throw new ConfigError(`"modules" in ${source} must map strings to strings`);
	}

	return {
		version: LOCKFILE_VERSION,
		specifiers: { ...specifierMap },
		modules: { ...moduleMap },
	};
}

function sortRecord(record: Record<string, string>): Record<string, string> {
	return Object.fromEntries(
		Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
	);
}

/**
 * Serialize a lock file with sorted keys so diffs stay small
 */
export function serializeLockfile(lockfile: Lockfile): string {
	const normalized: Lockfile = {
		version: LOCKFILE_VERSION,
		specifiers: sortRecord(lockfile.specifiers),
		modules: sortRecord(lockfile.modules),
	};
	return `${JSON.stringify(normalized, null, 2)}\n`;
}

import * as semver from "semver";
import { VersionNotFoundError } from "@/errors";

/**
 * Version range accepted in registry specifiers.
 *
 * Only the subset used by import specifiers is supported:
 * exact ("1.2.3"), caret ("^1.2.3"), tilde ("~1.2.3") and latest.
 */
export type VersionRange =
	| { kind: "exact"; version: string }
	| { kind: "caret"; version: string }
	| { kind: "tilde"; version: string }
	| { kind: "latest" };

export const LATEST: VersionRange = { kind: "latest" };

/**
 * Parse a version range expression.
 *
 * @returns The parsed range or null if the expression is outside the supported subset
 *
 * @example
 * ```typescript
 * parseVersionRange("^1.2.0") // => { kind: "caret", version: "1.2.0" }
 * parseVersionRange("")       // => { kind: "latest" }
 * parseVersionRange(">=1.0")  // => null
 * ```
 */
export function parseVersionRange(text: string | undefined): VersionRange | null {
	const trimmed = text?.trim() ?? "";
	if (trimmed === "" || trimmed === "latest" || trimmed === "*") {
		return LATEST;
	}

	const operator = trimmed[0];
	if (operator === "^" || operator === "~") {
		const version = semver.valid(trimmed.slice(1));
		if (!version) return null;
		return { kind: operator === "^" ? "caret" : "tilde", version };
	}

	const version = semver.valid(trimmed);
	return version ? { kind: "exact", version } : null;
}

/**
 * Render a range back to its specifier form. Latest renders as an empty string.
 */
export function formatVersionRange(range: VersionRange): string {
	switch (range.kind) {
		case "exact":
			return range.version;
		case "caret":
			return `^${range.version}`;
		case "tilde":
			return `~${range.version}`;
		case "latest":
			return "";
	}
}

/**
 * Check if a version satisfies a range.
 *
 * Pre-releases are ordered by semver precedence like any other version, so
 * `1.3.0-beta.1` satisfies `^1.2.0` and `1.2.0-beta.1` does not.
 */
export function versionSatisfies(version: string, range: VersionRange): boolean {
	const candidate = semver.parse(version);
	if (!candidate) return false;

	if (range.kind === "latest") return true;

	const base = semver.parse(range.version);
	if (!base) return false;

	if (range.kind === "exact") {
		return semver.eq(candidate, base);
	}

	if (semver.lt(candidate, base)) return false;
	if (candidate.major !== base.major) return false;

	if (range.kind === "caret") {
		return base.major !== 0 || candidate.minor === base.minor;
	}

	return candidate.minor === base.minor;
}

/**
 * Resolve the best matching version from a list of available versions.
 *
 * @param range - The version range to match
 * @param availableVersions - Published versions, in any order
 * @returns The highest qualifying version or null if none found
 */
export function resolveVersion(
	range: VersionRange,
	availableVersions: string[],
): string | null {
	const sorted = availableVersions
		.filter((v) => semver.valid(v))
		.sort((a, b) => semver.rcompare(a, b));

	return sorted.find((v) => versionSatisfies(v, range)) ?? null;
}

/**
 * Resolve a version and throw when nothing qualifies.
 *
 * @param pkg - Package display name used in the error (e.g. "jsr:@std/path")
 */
export function selectVersion(
	pkg: string,
	range: VersionRange,
	availableVersions: string[],
): string {
	const resolved = resolveVersion(range, availableVersions);
	if (!resolved) {
		throw new VersionNotFoundError(
			pkg,
			formatVersionRange(range) || "latest",
			[...availableVersions].filter((v) => semver.valid(v)).sort(semver.compare),
		);
	}
	return resolved;
}

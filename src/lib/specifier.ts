import { fileURLToPath, pathToFileURL } from "node:url";
import { posix } from "node:path";
import { UnmappedSpecifierError, UnresolvedSpecifierError } from "@/errors";
import {
	formatVersionRange,
	parseVersionRange,
	type VersionRange,
} from "./version";

export type RegistryKind = "jsr" | "npm";

/**
 * Parsed import specifier.
 *
 * - local: absolute path of a file on disk
 * - bare: a name to look up in the import map
 * - registry: a `jsr:` or `npm:` package reference
 * - url: an absolute http(s) URL
 */
export type Specifier =
	| { kind: "local"; path: string }
	| { kind: "bare"; name: string }
	| RegistrySpecifier
	| { kind: "url"; url: string };

export interface RegistrySpecifier {
	kind: "registry";
	registry: RegistryKind;
	/** Package name, e.g. "@std/path" or "lodash" */
	name: string;
	range: VersionRange;
	/** "" for the package root, otherwise "/sub/path" */
	subpath: string;
	/**
	 * How the subpath is looked up: through the package's exports, or as a
	 * file path inside the package (relative imports between package files).
	 */
	target: "export" | "file";
}

/**
 * Concrete location of a module once every range has been resolved.
 * This is what gets fetched, cached and locked.
 */
export type ModuleLocation =
	| { kind: "local"; path: string }
	| { kind: "url"; url: string }
	| { kind: "jsr"; name: string; version: string; path: string }
	| { kind: "npm"; name: string; version: string; subpath: string };

/**
 * Extensions a local module must end with. Nothing is appended or
 * defaulted, so "./calc" never resolves to "./calc.ts" or "./calc/index.ts".
 */
export const MODULE_EXTENSIONS = [
	".ts",
	".tsx",
	".mts",
	".cts",
	".js",
	".jsx",
	".mjs",
	".cjs",
	".json",
] as const;

/**
 * Registry specifier pattern
 * Matches: jsr:@scope/name[@range][/subpath] and npm:[@scope/]name[@range][/subpath]
 *
 * Group 1: registry prefix
 * Group 2: package name
 * Group 3: optional range
 * Group 4: optional /subpath (with leading slash)
 */
const REGISTRY_SPECIFIER_PATTERN =
	/^(jsr|npm):\/?((?:@[^/@\s]+\/)?[^/@\s]+)(?:@([^/\s]*))?(\/[^\s]*)?$/;

const URL_SCHEME_PATTERN = /^https?:\/\//i;

/**
 * Anything that can answer whether a bare name has an import map entry
 */
export interface MappedNames {
	has(name: string): boolean;
}

/**
 * Check if a path ends with a recognized module extension
 */
export function hasModuleExtension(path: string): boolean {
	const lower = path.toLowerCase();
	return MODULE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Check if a string is a `jsr:` or `npm:` specifier
 */
export function isRegistrySpecifier(raw: string): boolean {
	return raw.startsWith("jsr:") || raw.startsWith("npm:");
}

function isRelativeOrAbsolutePath(raw: string): boolean {
	return (
		raw.startsWith("./") ||
		raw.startsWith("../") ||
		raw.startsWith("/") ||
		raw.startsWith("file:")
	);
}

/**
 * Parse a `jsr:` or `npm:` specifier.
 *
 * @example
 * ```typescript
 * parseRegistrySpecifier("jsr:@std/path@^1.0.0/posix")
 * // => { kind: "registry", registry: "jsr", name: "@std/path",
 * //      range: { kind: "caret", version: "1.0.0" }, subpath: "/posix", target: "export" }
 * ```
 */
export function parseRegistrySpecifier(raw: string): RegistrySpecifier {
	const match = raw.match(REGISTRY_SPECIFIER_PATTERN);
	if (!match) {
		throw new UnresolvedSpecifierError(raw, "invalid registry specifier");
	}

	const [, prefix, name, rangeText, subpath] = match;
	if ((prefix !== "jsr" && prefix !== "npm") || !name) {
		throw new UnresolvedSpecifierError(raw, "invalid registry specifier");
	}
	if (prefix === "jsr" && !name.startsWith("@")) {
		throw new UnresolvedSpecifierError(
			raw,
			"JSR package names must be scoped (jsr:@scope/name)",
		);
	}

	const range = parseVersionRange(rangeText);
	if (!range) {
		throw new UnresolvedSpecifierError(
			raw,
			`unsupported version range "${rangeText}" (use an exact version, ^, ~ or latest)`,
		);
	}

	return {
		kind: "registry",
		registry: prefix,
		name,
		range,
		subpath: subpath && subpath !== "/" ? subpath : "",
		target: "export",
	};
}

function resolveLocal(raw: string, base: URL, referrer: string): Specifier {
	let resolved: URL;
	try {
		resolved = new URL(raw, base);
	} catch {
		throw new UnresolvedSpecifierError(raw, "invalid path", referrer);
	}

	if (resolved.protocol !== "file:") {
		return { kind: "url", url: resolved.href };
	}

	const path = fileURLToPath(resolved);
	if (!hasModuleExtension(path)) {
		throw new UnresolvedSpecifierError(
			raw,
			`local imports must name a file with an extension (${MODULE_EXTENSIONS.join(", ")})`,
			referrer,
		);
	}
	return { kind: "local", path };
}

/**
 * Resolve a path against the importing module
 */
function resolveRelative(raw: string, referrer: ModuleLocation): Specifier {
	const referrerKey = moduleKey(referrer);
	switch (referrer.kind) {
		case "local":
			return resolveLocal(raw, pathToFileURL(referrer.path), referrerKey);
		case "url":
			if (raw.startsWith("file:")) {
				throw new UnresolvedSpecifierError(
					raw,
					"remote modules cannot import local files",
					referrerKey,
				);
			}
			return { kind: "url", url: new URL(raw, referrer.url).href };
		case "jsr": {
			if (raw.startsWith("file:")) {
				throw new UnresolvedSpecifierError(
					raw,
					"registry modules cannot import local files",
					referrerKey,
				);
			}
			const path = posix.resolve(posix.dirname(referrer.path), raw);
			if (!hasModuleExtension(path)) {
				throw new UnresolvedSpecifierError(
					raw,
					`package imports must name a file with an extension (${MODULE_EXTENSIONS.join(", ")})`,
					referrerKey,
				);
			}
			return {
				kind: "registry",
				registry: "jsr",
				name: referrer.name,
				range: { kind: "exact", version: referrer.version },
				subpath: path,
				target: "file",
			};
		}
		case "npm":
			throw new UnresolvedSpecifierError(
				raw,
				"npm packages are resolved as a whole and are not traversed",
				referrerKey,
			);
	}
}

/**
 * Parse an import string into a Specifier, relative to the importing module.
 *
 * Order of checks:
 * 1. `jsr:` / `npm:` prefix
 * 2. an import map entry for the string
 * 3. http(s) URL
 * 4. anything else is a path relative to the referrer (`calc.ts` is
 *    `./calc.ts`); a name with no module extension that reaches this point
 *    is an unmapped bare name
 *
 * @param raw - The import string as written
 * @param referrer - Location of the importing module (a directory path ending
 *   in a separator is accepted for top-level entries)
 * @param mapped - Import map used to route mapped names to `bare`
 */
export function parseSpecifier(
	raw: string,
	referrer: ModuleLocation,
	mapped?: MappedNames,
): Specifier {
	if (isRegistrySpecifier(raw)) {
		return parseRegistrySpecifier(raw);
	}

	if (mapped?.has(raw)) {
		return { kind: "bare", name: raw };
	}

	if (URL_SCHEME_PATTERN.test(raw)) {
		try {
			return { kind: "url", url: new URL(raw).href };
		} catch {
			throw new UnresolvedSpecifierError(raw, "invalid URL");
		}
	}

	if (!isRelativeOrAbsolutePath(raw) && !hasModuleExtension(raw)) {
		throw new UnmappedSpecifierError(raw, moduleKey(referrer));
	}

	return resolveRelative(raw, referrer);
}

/**
 * Format a Specifier back to string format.
 */
export function formatSpecifier(spec: Specifier): string {
	switch (spec.kind) {
		case "local":
			return pathToFileURL(spec.path).href;
		case "bare":
			return spec.name;
		case "url":
			return spec.url;
		case "registry": {
			const range = formatVersionRange(spec.range);
			return `${spec.registry}:${spec.name}${range ? `@${range}` : ""}${spec.subpath}`;
		}
	}
}

/**
 * Stable key of a resolved module, used for the cache and the lock file.
 *
 * @example
 * ```typescript
 * moduleKey({ kind: "jsr", name: "@std/path", version: "1.0.0", path: "/mod.ts" })
 * // => "jsr:@std/path@1.0.0/mod.ts"
 * moduleKey({ kind: "npm", name: "chalk", version: "4.1.2", subpath: "" })
 * // => "npm:chalk@4.1.2"
 * ```
 */
export function moduleKey(location: ModuleLocation): string {
	switch (location.kind) {
		case "local":
			return pathToFileURL(location.path).href;
		case "url":
			return location.url;
		case "jsr":
			return `jsr:${location.name}@${location.version}${location.path}`;
		case "npm":
			// npm packages are fetched and locked as a whole tarball
			return `npm:${location.name}@${location.version}`;
	}
}

/**
 * Whether a location needs the network (or the cache) to be loaded
 */
export function isRemote(location: ModuleLocation): boolean {
	return location.kind !== "local";
}

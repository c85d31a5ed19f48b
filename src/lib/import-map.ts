import { UnmappedSpecifierError, UnresolvedSpecifierError } from "@/errors";
import {
	type MappedNames,
	type ModuleLocation,
	moduleKey,
	parseSpecifier,
	type Specifier,
} from "./specifier";

/**
 * Maps module specifiers to their targets, e.g. `{ "@x/y": "jsr:@x/y@^1.2.0" }`.
 * Keys ending in "/" map every specifier with that prefix.
 */
export type Imports = Record<string, string>;

/**
 * Maps a referrer prefix to mappings that take precedence for modules under it
 */
export type Scopes = Record<string, Imports>;

export interface ImportMapJson {
	imports?: Imports;
	scopes?: Scopes;
}

/**
 * Import map of the root project.
 *
 * Loaded once when the project is loaded and never modified afterwards.
 * Import maps found in fetched remote content are never merged in.
 */
export class ImportMap implements MappedNames {
	private readonly imports: Readonly<Imports>;
	private readonly scopes: ReadonlyArray<readonly [string, Readonly<Imports>]>;
	private readonly base: ModuleLocation;

	/**
	 * @param json - `imports` and `scopes` from the project configuration
	 * @param configPath - Path of the configuration file; relative targets and
	 *   scope keys resolve against its directory
	 */
	constructor(json: ImportMapJson, configPath: string) {
		this.base = { kind: "local", path: configPath };
		this.imports = Object.freeze({ ...(json.imports ?? {}) });

		const baseUrl = moduleKey(this.base);
		this.scopes = Object.entries(json.scopes ?? {})
			.map(([prefix, mappings]) => {
				const normalized = normalizeScopePrefix(prefix, baseUrl);
				return [normalized, Object.freeze({ ...mappings })] as const;
			})
			// Longest prefix first, so the first match is the most specific scope
			.sort((a, b) => b[0].length - a[0].length);
	}

	/**
	 * An empty import map (projects without configuration)
	 */
	static empty(configPath: string): ImportMap {
		return new ImportMap({}, configPath);
	}

	/**
	 * Check if any mapping (root or scoped) could apply to a name
	 */
	has(name: string): boolean {
		if (findMapping(this.imports, name)) return true;
		return this.scopes.some(([, mappings]) => findMapping(mappings, name));
	}

	/**
	 * Resolve a bare name for a requesting module.
	 *
	 * The longest scope prefix matching the referrer is consulted first; if
	 * it has no entry for the name the root mapping is used.
	 *
	 * @param name - The bare name as written in the import
	 * @param referrer - Key of the requesting module (file URL, URL or registry key)
	 * @throws UnmappedSpecifierError if neither the scope nor the root maps the name
	 */
	resolve(name: string, referrer: string): Specifier {
		const scope = this.scopes.find(([prefix]) => referrer.startsWith(prefix));
		const target =
			(scope ? findMapping(scope[1], name) : undefined) ??
			findMapping(this.imports, name);

		if (target === undefined) {
			throw new UnmappedSpecifierError(name, referrer);
		}

		try {
			return parseSpecifier(target, this.base);
		} catch (error) {
			if (error instanceof UnmappedSpecifierError) {
				throw new UnresolvedSpecifierError(
					name,
					`import map target "${target}" is itself a bare specifier`,
					referrer,
				);
			}
			throw error;
		}
	}

	/**
	 * Serializable form, e.g. for `info --json`
	 */
	toJSON(): ImportMapJson {
		return {
			imports: { ...this.imports },
			scopes: Object.fromEntries(
				this.scopes.map(([prefix, mappings]) => [prefix, { ...mappings }]),
			),
		};
	}
}

/**
 * Look up a name in one mapping: exact key first, then the longest
 * trailing-slash prefix key with the remainder appended to its target.
 */
function findMapping(
	mappings: Readonly<Imports>,
	name: string,
): string | undefined {
	if (Object.prototype.hasOwnProperty.call(mappings, name)) {
		return mappings[name];
	}

	let bestKey: string | undefined;
	for (const key of Object.keys(mappings)) {
		if (!key.endsWith("/") || !name.startsWith(key)) continue;
		if (!bestKey || key.length > bestKey.length) bestKey = key;
	}
	if (!bestKey) return undefined;

	const target = mappings[bestKey];
	return target === undefined ? undefined : target + name.slice(bestKey.length);
}

/**
 * Scope keys may be URLs, registry prefixes or paths relative to the config file
 */
function normalizeScopePrefix(prefix: string, baseUrl: string): string {
	if (prefix.startsWith("jsr:") || prefix.startsWith("npm:")) {
		return prefix;
	}
	try {
		return new URL(prefix, baseUrl).href;
	} catch {
		return prefix;
	}
}

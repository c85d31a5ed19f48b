import { init, parse } from "es-module-lexer";
import { ModuleParseError } from "@/errors";

export interface ImportReference {
	/** The import string as written */
	specifier: string;
	/** True for `import("...")` with a string literal */
	dynamic: boolean;
}

/**
 * List the imports of a module's source.
 *
 * Static imports, re-exports and dynamic imports with a string literal
 * argument are returned once each, in source order. Dynamic imports with
 * computed arguments and `import.meta` are skipped. JSON modules have no
 * imports.
 *
 * @param source - Module source text
 * @param key - Module key, used for error messages and to detect JSON
 * @throws ModuleParseError if the lexer can't tokenize the source
 */
export async function scanImports(
	source: string,
	key: string,
): Promise<ImportReference[]> {
	if (key.toLowerCase().endsWith(".json")) {
		return [];
	}

	await init;

	let imports: ReturnType<typeof parse>[0];
	try {
		[imports] = parse(source, key);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ModuleParseError(key, message);
	}

	const seen = new Set<string>();
	const references: ImportReference[] = [];
	for (const entry of imports) {
		// d === -2 is import.meta; an undefined name is a computed dynamic import
		if (entry.d === -2 || entry.n === undefined) continue;
		if (seen.has(entry.n)) continue;
		seen.add(entry.n);
		references.push({ specifier: entry.n, dynamic: entry.d > -1 });
	}
	return references;
}

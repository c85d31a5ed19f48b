import { readFile } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import { writeFileAtomic } from "./cache";
import type { GraphModule, ModuleGraph } from "./graph";
import { hashKey } from "./lib/integrity";
import { type ModuleLocation, moduleKey } from "./lib/specifier";

export const VENDOR_IMPORT_MAP = "import_map.json";

function safeSegment(segment: string): string {
	const cleaned = segment.replace(/[\\/:*?"<>|]/g, "_");
	return cleaned === "." || cleaned === ".." || cleaned === "" ? "_" : cleaned;
}

/**
 * Where a remote module lives inside the vendor directory.
 *
 * - `https://host:8080/a/b.ts` -> `<dir>/host_8080/a/b.ts`
 * - `jsr:@x/y@1.3.0/mod.ts`   -> `<dir>/jsr.io/@x/y/1.3.0/mod.ts`
 * - `npm:@a/b@1.0.0`          -> `<dir>/npm/@a__b@1.0.0.tgz`
 *
 * @returns null for local modules, which are never vendored
 */
export function vendorPath(location: ModuleLocation, dir: string): string | null {
	switch (location.kind) {
		case "local":
			return null;
		case "url": {
			const url = new URL(location.url);
			const host = url.port ? `${url.hostname}_${url.port}` : url.hostname;
			const segments = url.pathname
				.split("/")
				.filter(Boolean)
				.map((segment) => safeSegment(decodeURIComponent(segment)));
			if (segments.length === 0 || url.pathname.endsWith("/")) {
				segments.push("index");
			}
			if (url.search) {
				const last = segments.pop() ?? "index";
				segments.push(`${last}_${hashKey(url.search).slice(0, 8)}`);
			}
			return join(dir, safeSegment(host), ...segments);
		}
		case "jsr":
			return join(
				dir,
				"jsr.io",
				...location.name.split("/").map(safeSegment),
				safeSegment(location.version),
				...location.path.split("/").filter(Boolean).map(safeSegment),
			);
		case "npm":
			return join(
				dir,
				"npm",
				`${safeSegment(location.name.replace("/", "__"))}@${safeSegment(location.version)}.tgz`,
			);
	}
}

/**
 * Read-through source for vendored modules, consulted before the cache
 */
export class VendorSource {
	constructor(readonly dir: string) {}

	async read(location: ModuleLocation): Promise<Buffer | null> {
		const path = vendorPath(location, this.dir);
		if (!path) return null;
		try {
			return await readFile(path);
		} catch {
			return null;
		}
	}
}

export interface VendorResult {
	/** Number of module files written */
	written: number;
	importMapPath: string;
}

/**
 * Copy every remote module of a graph into the vendor directory and write
 * `import_map.json` mapping module keys to the vendored files.
 *
 * @param load - Returns the content the graph checked for a module
 */
export async function vendorGraph(
	graph: ModuleGraph,
	load: (module: GraphModule) => Promise<Buffer>,
	dir: string,
): Promise<VendorResult> {
	const imports: Record<string, string> = {};
	let written = 0;

	for (const entry of graph.modules.values()) {
		const path = vendorPath(entry.location, dir);
		if (!path) continue;

		const content = await load(entry);
		await writeFileAtomic(path, content);
		imports[moduleKey(entry.location)] = `./${relative(dir, path).split(sep).join("/")}`;
		written++;
	}

	const sorted = Object.fromEntries(
		Object.entries(imports).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
	);
	const importMapPath = join(dir, VENDOR_IMPORT_MAP);
	await writeFileAtomic(importMapPath, `${JSON.stringify({ imports: sorted }, null, 2)}\n`);

	if (process.env.MODLOCK_DEBUG) {
		console.log(`[vendor] Wrote ${written} module(s) to ${dir}`);
	}

	return { written, importMapPath };
}

import { relative } from "node:path";
import type { GraphModule, ModuleGraph } from "../graph";
import type { ModuleLocation } from "../lib/specifier";
import { loadProject, type ResolutionOptions } from "../project";
import { resolveEntries } from "./cache";
import { exitWithError, formatBytes } from "./report";

export interface InfoOptions extends ResolutionOptions {
	json?: boolean;
}

function displayName(location: ModuleLocation, key: string, cwd: string): string {
	if (location.kind !== "local") return key;
	const path = relative(cwd, location.path);
	return path.startsWith("..") ? location.path : path;
}

/**
 * Render the dependency tree of a graph.
 * A module already shown higher up is marked with `*` and not expanded again.
 *
 * @example
 * ```
 * main.ts (120B)
 * ├── jsr:@x/y@1.3.0/mod.ts (2.1kB)
 * │   └── jsr:@x/y@1.3.0/util.ts (512B)
 * └── util.ts (64B)
 * ```
 */
export function renderModuleTree(graph: ModuleGraph, cwd: string): string[] {
	const lines: string[] = [];
	const shown = new Set<string>();

	const label = (module: GraphModule) =>
		`${displayName(module.location, module.key, cwd)} (${formatBytes(module.size)})`;

	const walk = (module: GraphModule, prefix: string) => {
		const children = [...new Set(module.dependencies.map((dependency) => dependency.key))];
		children.forEach((key, index) => {
			const last = index === children.length - 1;
			const child = graph.modules.get(key);
			if (!child) return;

			const branch = last ? "└── " : "├── ";
			if (shown.has(key)) {
				lines.push(`${prefix}${branch}${displayName(child.location, key, cwd)} *`);
				return;
			}
			shown.add(key);
			lines.push(`${prefix}${branch}${label(child)}`);
			walk(child, `${prefix}${last ? "    " : "│   "}`);
		});
	};

	for (const root of graph.roots) {
		const module = graph.modules.get(root);
		if (!module) continue;
		shown.add(root);
		lines.push(label(module));
		walk(module, "");
	}
	return lines;
}

/**
 * JSON form of a graph for `info --json`
 */
export function graphToJson(graph: ModuleGraph) {
	return {
		roots: graph.roots,
		modules: [...graph.modules.values()]
			.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
			.map((module) => ({
				specifier: module.key,
				kind: module.location.kind,
				size: module.size,
				integrity: module.integrity,
				dependencies: module.dependencies,
			})),
	};
}

/**
 * Show the resolved module graph of an entry
 */
export async function info(entry: string, options: InfoOptions): Promise<void> {
	try {
		const context = await loadProject(options);
		const { graph } = await resolveEntries(context, [entry], { vendor: false });

		if (options.json) {
			console.log(JSON.stringify(graphToJson(graph), null, 2));
			return;
		}

		let total = 0;
		for (const module of graph.modules.values()) total += module.size;

		console.log(`modules: ${graph.modules.size}`);
		console.log(`size:    ${formatBytes(total)}`);
		console.log(`lock:    ${context.lock?.path ?? "(disabled)"}`);
		console.log("");
		for (const line of renderModuleTree(graph, context.config.cwd)) {
			console.log(line);
		}
	} catch (error) {
		exitWithError(error);
	}
}

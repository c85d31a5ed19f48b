import pc from "picocolors";
import { IntegrityMismatchError } from "../errors";
import { type GraphModule, type ModuleGraph, ModuleGraphBuilder } from "../graph";
import { calculateIntegrity, verifyIntegrity } from "../lib/integrity";
import { isRemote } from "../lib/specifier";
import { loadProject, type ProjectContext, type ResolutionOptions } from "../project";
import { VendorSource, vendorGraph } from "../vendor";
import { exitWithError } from "./report";

export type CacheOptions = ResolutionOptions;

export interface ResolvedEntries {
	graph: ModuleGraph;
	/** Whether the lock file was written */
	lockSaved: boolean;
}

export interface ResolveEntriesOptions {
	/** Refresh ./vendor when the project has vendoring enabled (default true) */
	vendor?: boolean;
}

/**
 * Build the module graph of some entries, then refresh the vendor directory
 * and save the lock file. Nothing is persisted when the graph fails.
 */
export async function resolveEntries(
	context: ProjectContext,
	entries: string[],
	options: ResolveEntriesOptions = {},
): Promise<ResolvedEntries> {
	const builder = new ModuleGraphBuilder({
		importMap: context.importMap,
		fetcher: context.fetcher,
		lock: context.lock,
		lockWrite: context.lockWrite,
		controller: context.controller,
		cwd: context.config.cwd,
	});
	const graph = await builder.build(entries);

	if (context.config.vendor && options.vendor !== false) {
		await vendorGraph(graph, (module) => readResolved(context, module), context.config.vendorDir);
	}

	const lockSaved = context.lock ? await context.lock.save() : false;
	return { graph, lockSaved };
}

/**
 * The exact bytes the graph checked for a module: the vendored copy or the
 * cache entry, whichever matches the module's integrity.
 *
 * @throws IntegrityMismatchError when no candidate holds the checked content
 */
export async function readResolved(
	context: ProjectContext,
	module: GraphModule,
): Promise<Buffer> {
	const vendored = await new VendorSource(context.config.vendorDir).read(module.location);
	const cached = await context.cache.get(module.key);
	const candidates = [vendored, cached?.content ?? null];

	for (const content of candidates) {
		if (content && verifyIntegrity(content, module.integrity)) return content;
	}

	// Neither copy survived (e.g. the cache write failed); fetch again
	const content = await context.fetcher.fetch(module.location);
	if (!verifyIntegrity(content, module.integrity)) {
		throw new IntegrityMismatchError(module.key, module.integrity, calculateIntegrity(content));
	}
	return content;
}

/**
 * Download and cache the dependencies of one or more entry modules
 */
export async function cache(entries: string[], options: CacheOptions): Promise<void> {
	try {
		const context = await loadProject(options);
		const { graph, lockSaved } = await resolveEntries(context, entries);

		let remote = 0;
		for (const module of graph.modules.values()) {
			if (isRemote(module.location)) remote++;
		}
		console.log(
			`${pc.green("Ok:")} ${graph.modules.size} module(s) resolved, ${remote} remote`,
		);
		if (lockSaved && context.lock) {
			console.log(`Updated ${context.lock.path}`);
		}
	} catch (error) {
		exitWithError(error);
	}
}

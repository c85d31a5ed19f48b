import { resolve, sep } from "node:path";
import { ModlockError, UntrackedDependencyError } from "./errors";
import type { Fetcher } from "./fetcher";
import type { LockfileManager } from "./lockfile";
import type { ImportMap } from "./lib/import-map";
import { scanImports } from "./lib/imports";
import { calculateIntegrity } from "./lib/integrity";
import {
	formatSpecifier,
	isRemote,
	type ModuleLocation,
	moduleKey,
	parseSpecifier,
	type RegistrySpecifier,
	type Specifier,
} from "./lib/specifier";
import { selectVersion, versionSatisfies } from "./lib/version";
import { resolveExportPath } from "./registries/index";

export interface GraphDependency {
	/** The import string as written in the source */
	specifier: string;
	/** Key of the module it resolved to */
	key: string;
	dynamic: boolean;
}

export interface GraphModule {
	key: string;
	location: ModuleLocation;
	/** Content size in bytes */
	size: number;
	integrity: string;
	dependencies: GraphDependency[];
}

export interface ModuleGraph {
	/** Keys of the entry modules, in the order they were given */
	roots: string[];
	modules: Map<string, GraphModule>;
}

export interface ModuleGraphBuilderOptions {
	importMap: ImportMap;
	fetcher: Fetcher;
	/** null when locking is disabled */
	lock: LockfileManager | null;
	/** Record fetched content in the lock file instead of verifying it */
	lockWrite?: boolean;
	/** Aborted on the first fatal error; the fetcher should share its signal */
	controller?: AbortController;
	/** Directory that relative entry paths resolve against */
	cwd: string;
}

/**
 * Walks the import graph from a set of entry modules.
 *
 * Modules are processed concurrently, each at most once. The first error
 * aborts the controller so in-flight fetches are cancelled, and is the one
 * `build` rejects with.
 */
export class ModuleGraphBuilder {
	private readonly modules = new Map<string, GraphModule>();
	private readonly scheduled = new Set<string>();
	private tasks: Promise<void>[] = [];
	private failure: { error: unknown } | null = null;
	private readonly controller: AbortController;

	constructor(private readonly options: ModuleGraphBuilderOptions) {
		this.controller = options.controller ?? new AbortController();
	}

	async build(entries: string[]): Promise<ModuleGraph> {
		const base: ModuleLocation = {
			kind: "local",
			path: `${resolve(this.options.cwd)}${sep}`,
		};
		const baseKey = moduleKey(base);

		let roots: string[] = [];
		try {
			const locations = await Promise.all(
				entries.map((entry) => this.resolve(entry, base, baseKey)),
			);
			roots = locations.map((location) => {
				const key = moduleKey(location);
				this.schedule(key, location);
				return key;
			});
		} catch (error) {
			this.fail(error);
		}

		while (this.tasks.length > 0) {
			await Promise.all(this.tasks.splice(0));
		}

		if (this.failure) {
			throw this.failure.error;
		}

		if (process.env.MODLOCK_DEBUG) {
			console.log(`[graph] ${this.modules.size} module(s) from ${roots.length} entr(ies)`);
		}
		return { roots, modules: this.modules };
	}

	private fail(error: unknown): void {
		if (this.failure) return;
		this.failure = { error };
		this.controller.abort(error);
		if (process.env.MODLOCK_DEBUG) {
			const message = error instanceof Error ? error.message : String(error);
			console.log(`[graph] Aborting: ${message}`);
		}
	}

	private schedule(key: string, location: ModuleLocation): void {
		if (this.scheduled.has(key)) return;
		this.scheduled.add(key);
		this.tasks.push(this.visit(key, location).catch((error: unknown) => this.fail(error)));
	}

	private async visit(key: string, location: ModuleLocation): Promise<void> {
		if (this.failure) return;

		const content = await this.options.fetcher.fetch(location);
		if (this.failure) return;

		const { lock, lockWrite } = this.options;
		if (lock && isRemote(location)) {
			if (lockWrite) {
				lock.write(key, content);
			} else {
				lock.verify(key, content);
			}
		}

		const module: GraphModule = {
			key,
			location,
			size: content.byteLength,
			integrity: calculateIntegrity(content),
			dependencies: [],
		};
		this.modules.set(key, module);

		// npm packages are locked as a whole and not traversed
		if (location.kind === "npm") return;

		const references = await scanImports(content.toString("utf-8"), key);
		module.dependencies = await Promise.all(
			references.map(async (reference) => {
				const child = await this.resolve(reference.specifier, location, key);
				const childKey = moduleKey(child);
				this.schedule(childKey, child);
				return { specifier: reference.specifier, key: childKey, dynamic: reference.dynamic };
			}),
		);
	}

	/**
	 * Turn an import string into a concrete module location
	 */
	private async resolve(
		raw: string,
		referrer: ModuleLocation,
		referrerKey: string,
	): Promise<ModuleLocation> {
		let specifier: Specifier = parseSpecifier(raw, referrer, this.options.importMap);
		if (specifier.kind === "bare") {
			specifier = this.options.importMap.resolve(specifier.name, referrerKey);
		}

		switch (specifier.kind) {
			case "local":
				return { kind: "local", path: specifier.path };
			case "url":
				return { kind: "url", url: specifier.url };
			case "registry":
				return this.resolveRegistry(specifier);
			case "bare":
				// ImportMap.resolve never returns a bare specifier
				throw new ModlockError(`Unexpected bare specifier "${raw}"`, "UNRESOLVED_SPECIFIER");
		}
	}

	private async resolveRegistry(specifier: RegistrySpecifier): Promise<ModuleLocation> {
		const { registry, name, range } = specifier;
		const version =
			range.kind === "exact" ? range.version : await this.pinnedVersion(specifier);

		if (registry === "npm") {
			return { kind: "npm", name, version, subpath: specifier.subpath };
		}

		if (specifier.target === "file") {
			return { kind: "jsr", name, version, path: specifier.subpath };
		}

		const exports = await this.options.fetcher.getExports("jsr", name, version);
		const path = resolveExportPath(exports, specifier.subpath, `jsr:${name}@${version}`);
		return { kind: "jsr", name, version, path };
	}

	/**
	 * Version for a range, reusing the lock file's pin when it still
	 * satisfies the range. Lock-write runs always resolve afresh.
	 */
	private async pinnedVersion(specifier: RegistrySpecifier): Promise<string> {
		const { lock, lockWrite } = this.options;
		const rangeKey = formatSpecifier({ ...specifier, subpath: "" });

		const pinned = lock?.lockedVersion(rangeKey);
		if (pinned !== undefined && !lockWrite && versionSatisfies(pinned, specifier.range)) {
			return pinned;
		}
		if (pinned === undefined && lock?.mode === "frozen") {
			throw new UntrackedDependencyError(rangeKey);
		}

		const versions = await this.options.fetcher.listVersions(specifier.registry, specifier.name);
		const version = selectVersion(
			`${specifier.registry}:${specifier.name}`,
			specifier.range,
			versions,
		);
		lock?.pinVersion(rangeKey, version, lockWrite);
		return version;
	}
}

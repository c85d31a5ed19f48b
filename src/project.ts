import { join, resolve } from "node:path";
import { ModuleCache } from "./cache";
import {
	PROJECT_CONFIG_NAME,
	type ResolvedConfig,
	type ResolveConfigOptions,
	resolveConfig,
} from "./config";
import { ConfigError } from "./errors";
import { Fetcher, type FetchMode } from "./fetcher";
import { type HttpClient, NodeHttpClient } from "./http";
import { ImportMap } from "./lib/import-map";
import { DEFAULT_LOCKFILE_NAME } from "./lib/lockfile";
import { EnvProxyConfig } from "./lib/proxy";
import { LockfileManager } from "./lockfile";
import { createRegistries, type Registries } from "./registries/index";
import { VendorSource } from "./vendor";

/**
 * Options shared by commands that resolve a module graph
 */
export interface ResolutionOptions {
	/** true reloads everything, a comma separated list reloads matching keys */
	reload?: boolean | string;
	/** Lock file path, or false to disable locking (`--no-lock`) */
	lock?: string | false;
	lockWrite?: boolean;
	frozen?: boolean;
	cachedOnly?: boolean;
}

/**
 * Everything a command needs, assembled once per invocation
 */
export interface ProjectContext {
	config: ResolvedConfig;
	importMap: ImportMap;
	lock: LockfileManager | null;
	lockWrite: boolean;
	cache: ModuleCache;
	http: HttpClient;
	registries: Registries;
	fetcher: Fetcher;
	/** Aborted when the run fails */
	controller: AbortController;
}

export interface LoadProjectOptions extends ResolveConfigOptions {
	/** Replaces the proxy-aware node-fetch client (tests) */
	http?: HttpClient;
}

/**
 * Translate the reload / cached-only flags into a fetch mode
 *
 * @throws ConfigError when both are given
 */
export function fetchModeFromOptions(options: ResolutionOptions): FetchMode {
	if (options.cachedOnly && options.reload) {
		throw new ConfigError("--cached-only cannot be combined with --reload");
	}
	if (options.cachedOnly) return { kind: "cached-only" };
	if (options.reload === true || options.reload === "") return { kind: "reload" };
	if (typeof options.reload === "string") {
		const targets = options.reload
			.split(",")
			.map((target) => target.trim())
			.filter(Boolean);
		return targets.length > 0 ? { kind: "reload-specific", targets } : { kind: "reload" };
	}
	return { kind: "normal" };
}

function lockPathFor(config: ResolvedConfig, options: ResolutionOptions): string | null {
	if (options.lock === false) return null;
	if (typeof options.lock === "string") return resolve(config.cwd, options.lock);
	if (config.lockPath) return config.lockPath;
	// Asking to write a lock without a project still needs somewhere to put it
	return options.lockWrite ? join(config.cwd, DEFAULT_LOCKFILE_NAME) : null;
}

/**
 * Resolve configuration and build the objects shared by a run
 *
 * @throws ConfigError for contradictory flags or invalid configuration
 */
export async function loadProject(
	options: ResolutionOptions = {},
	loadOptions: LoadProjectOptions = {},
): Promise<ProjectContext> {
	if (options.frozen && options.lockWrite) {
		throw new ConfigError("--frozen cannot be combined with --lock-write");
	}
	const mode = fetchModeFromOptions(options);

	const config = await resolveConfig(loadOptions);
	const lockPath = lockPathFor(config, options);
	if (options.frozen && !lockPath) {
		throw new ConfigError("--frozen requires a lock file");
	}

	const importMap = config.projectConfigPath
		? new ImportMap(config.importMap, config.projectConfigPath)
		: ImportMap.empty(join(config.cwd, PROJECT_CONFIG_NAME));

	const lock = lockPath
		? await LockfileManager.load(lockPath, options.frozen ? "frozen" : "additive")
		: null;

	const controller = new AbortController();
	const cache = new ModuleCache(config.cacheDir);
	const http =
		loadOptions.http ??
		new NodeHttpClient({
			proxy: new EnvProxyConfig(config.proxy),
			timeoutMs: config.timeoutMs,
		});
	const registries = createRegistries(http, config);
	const fetcher = new Fetcher({
		cache,
		http,
		registries,
		mode,
		retries: config.retries,
		vendor: config.vendor ? new VendorSource(config.vendorDir) : null,
		signal: controller.signal,
	});

	return {
		config,
		importMap,
		lock,
		lockWrite: options.lockWrite ?? false,
		cache,
		http,
		registries,
		fetcher,
		controller,
	};
}

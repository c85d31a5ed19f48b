import { readFile, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import * as ini from "ini";
import { ConfigError } from "./errors";
import type { ImportMapJson, Imports, Scopes } from "./lib/import-map";
import { DEFAULT_LOCKFILE_NAME } from "./lib/lockfile";
import { type ProxyEnvironment, readProxyEnvironment } from "./lib/proxy";

// =============================================================================
// Types
// =============================================================================

/**
 * User config stored in ~/.modlockrc (INI format)
 *
 * ```ini
 * cacheDir = /var/cache/modlock
 * jsrUrl = https://jsr.io
 * npmUrl = https://registry.npmjs.org
 * timeout = 30000
 * retries = 2
 * ```
 */
export interface UserConfig {
	cacheDir?: string;
	jsrUrl?: string;
	npmUrl?: string;
	timeout?: number;
	retries?: number;
}

/**
 * Project config stored in modlock.json
 */
export interface ProjectConfig {
	imports?: Imports;
	scopes?: Scopes;
	/** Materialize remote modules into ./vendor */
	vendor?: boolean;
	/** false disables the lock file, a string overrides its path */
	lock?: boolean | string;
	/** Command used by `modlock run`, e.g. ["node", "--enable-source-maps"] */
	runtime?: string[];
}

/**
 * A project config together with where it was found
 */
export interface LocatedProjectConfig {
	path: string;
	config: ProjectConfig;
}

/**
 * Fully resolved configuration (after cascade)
 */
export interface ResolvedConfig {
	/** Directory the command was started in */
	cwd: string;
	/** modlock.json path, or null when the project has none */
	projectConfigPath: string | null;
	/** Directory of modlock.json, or cwd without one */
	projectDir: string;
	importMap: ImportMapJson;
	vendor: boolean;
	vendorDir: string;
	/** Lock file path, or null when locking is off */
	lockPath: string | null;
	runtime: string[];
	cacheDir: string;
	jsrUrl: string;
	npmUrl: string;
	timeoutMs: number;
	retries: number;
	proxy: ProxyEnvironment;
}

// =============================================================================
// Constants
// =============================================================================

export const PROJECT_CONFIG_NAME = "modlock.json";

export const DEFAULT_JSR_URL = "https://jsr.io";
export const DEFAULT_NPM_URL = "https://registry.npmjs.org";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRIES = 2;
const DEFAULT_RUNTIME = ["node"];

/**
 * Get the user config file path (~/.modlockrc)
 */
export function getConfigPath(): string {
	return join(homedir(), ".modlockrc");
}

/**
 * Get the default global cache directory (~/.cache/modlock)
 */
export function getDefaultCacheDir(): string {
	return join(homedir(), ".cache", "modlock");
}

// =============================================================================
// User Config (INI)
// =============================================================================

function parseNumber(value: unknown, key: string, source: string): number | undefined {
	if (value === undefined || value === "") return undefined;
	const parsed = typeof value === "number" ? value : Number(value);
	if (!Number.isInteger(parsed) || parsed < 0) {
		throw new ConfigError(
			`"${key}" in ${source} must be a non-negative integer, got ${JSON.stringify(value)}`,
		);
	}
	return parsed;
}

function optionalString(value: unknown): string | undefined {
	return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Read the user config file (~/.modlockrc, INI format).
 * A missing file is an empty config.
 */
export async function readUserConfig(
	configPath: string = getConfigPath(),
): Promise<UserConfig> {
	let content: string;
	try {
		content = await readFile(configPath, "utf-8");
	} catch {
		if (process.env.MODLOCK_DEBUG) {
			console.log(`[config] No user config at ${configPath}`);
		}
		return {};
	}

	const parsed = ini.parse(content);
	if (process.env.MODLOCK_DEBUG) {
		console.log(`[config] Parsed ${configPath}:`, JSON.stringify(parsed, null, 2));
	}

	return {
		cacheDir: optionalString(parsed.cacheDir),
		jsrUrl: optionalString(parsed.jsrUrl),
		npmUrl: optionalString(parsed.npmUrl),
		timeout: parseNumber(parsed.timeout, "timeout", configPath),
		retries: parseNumber(parsed.retries, "retries", configPath),
	};
}

// =============================================================================
// Project Config (modlock.json)
// =============================================================================

function isStringMap(value: unknown): value is Record<string, string> {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		Object.values(value).every((v) => typeof v === "string")
	);
}

/**
 * Validate the parsed content of modlock.json.
 *
 * @throws ConfigError naming the first invalid key
 */
export function validateProjectConfig(data: unknown, source: string): ProjectConfig {
	if (typeof data !== "object" || data === null || Array.isArray(data)) {
		throw new ConfigError(`${source} must contain a JSON object`);
	}

	const config: ProjectConfig = {};
	const entries = new Map(Object.entries(data));

	const imports = entries.get("imports");
	if (imports !== undefined) {
		if (!isStringMap(imports)) {
			throw new ConfigError(`"imports" in ${source} must map names to specifier strings`);
		}
		config.imports = imports;
	}

	const scopes = entries.get("scopes");
	if (scopes !== undefined) {
		if (typeof scopes !== "object" || scopes === null || Array.isArray(scopes)) {
			throw new ConfigError(`"scopes" in ${source} must be an object`);
		}
		const validated: Scopes = {};
		for (const [prefix, mappings] of Object.entries(scopes)) {
			if (!isStringMap(mappings)) {
				throw new ConfigError(
					`"scopes.${prefix}" in ${source} must map names to specifier strings`,
				);
			}
			validated[prefix] = mappings;
		}
		config.scopes = validated;
	}

	const vendor = entries.get("vendor");
	if (vendor !== undefined) {
		if (typeof vendor !== "boolean") {
			throw new ConfigError(`"vendor" in ${source} must be true or false`);
		}
		config.vendor = vendor;
	}

	const lock = entries.get("lock");
	if (lock !== undefined) {
		if (typeof lock !== "boolean" && typeof lock !== "string") {
			throw new ConfigError(`"lock" in ${source} must be a boolean or a path`);
		}
		config.lock = lock;
	}

	const runtime = entries.get("runtime");
	if (runtime !== undefined) {
		if (
			!Array.isArray(runtime) ||
			runtime.length === 0 ||
			!runtime.every((part) => typeof part === "string")
		) {
			throw new ConfigError(`"runtime" in ${source} must be a non-empty array of strings`);
		}
		config.runtime = runtime;
	}

	return config;
}

/**
 * Find and read the project config (modlock.json) by searching up the directory tree
 */
export async function findProjectConfig(
	cwd: string = process.cwd(),
): Promise<LocatedProjectConfig | null> {
	let currentDir = resolve(cwd);

	while (true) {
		const configPath = join(currentDir, PROJECT_CONFIG_NAME);
		let isFile = false;
		try {
			isFile = (await stat(configPath)).isFile();
		} catch {
			// Not here, keep searching
		}

		if (isFile) {
			const content = await readFile(configPath, "utf-8");
			let parsed: unknown;
			try {
				parsed = JSON.parse(content);
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				throw new ConfigError(`${configPath} is not valid JSON: ${message}`);
			}
			if (process.env.MODLOCK_DEBUG) {
				console.log(`[config] Found project config at ${configPath}`);
			}
			return { path: configPath, config: validateProjectConfig(parsed, configPath) };
		}

		const parent = dirname(currentDir);
		if (parent === currentDir) return null;
		currentDir = parent;
	}
}

// =============================================================================
// Resolution
// =============================================================================

export interface ResolveConfigOptions {
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	userConfigPath?: string;
}

function resolveLockPath(project: LocatedProjectConfig | null): string | null {
	if (!project) return null;
	const projectDir = dirname(project.path);
	const lock = project.config.lock;
	if (lock === false) return null;
	if (typeof lock === "string") return resolve(projectDir, lock);
	return join(projectDir, DEFAULT_LOCKFILE_NAME);
}

/**
 * Resolve the full configuration using cascade priority:
 * 1. Environment variables (MODLOCK_CACHE_DIR, MODLOCK_JSR_URL, ...)
 * 2. Project config (modlock.json in the project directory or above)
 * 3. User config (~/.modlockrc)
 * 4. Defaults
 */
export async function resolveConfig(
	options: ResolveConfigOptions = {},
): Promise<ResolvedConfig> {
	const cwd = resolve(options.cwd ?? process.cwd());
	const env = options.env ?? process.env;

	const userConfig = await readUserConfig(options.userConfigPath);
	const project = await findProjectConfig(cwd);
	const projectDir = project ? dirname(project.path) : cwd;

	const cacheDir = env.MODLOCK_CACHE_DIR || userConfig.cacheDir || getDefaultCacheDir();
	const jsrUrl = env.MODLOCK_JSR_URL || userConfig.jsrUrl || DEFAULT_JSR_URL;
	const npmUrl = env.MODLOCK_NPM_URL || userConfig.npmUrl || DEFAULT_NPM_URL;
	const timeoutMs =
		parseNumber(env.MODLOCK_TIMEOUT, "MODLOCK_TIMEOUT", "the environment") ??
		userConfig.timeout ??
		DEFAULT_TIMEOUT_MS;
	const retries =
		parseNumber(env.MODLOCK_RETRIES, "MODLOCK_RETRIES", "the environment") ??
		userConfig.retries ??
		DEFAULT_RETRIES;

	const resolved: ResolvedConfig = {
		cwd,
		projectConfigPath: project?.path ?? null,
		projectDir,
		importMap: {
			imports: project?.config.imports ?? {},
			scopes: project?.config.scopes ?? {},
		},
		vendor: project?.config.vendor ?? false,
		vendorDir: join(projectDir, "vendor"),
		lockPath: resolveLockPath(project),
		runtime: project?.config.runtime ?? DEFAULT_RUNTIME,
		cacheDir: resolve(cacheDir),
		jsrUrl: jsrUrl.replace(/\/+$/, ""),
		npmUrl: npmUrl.replace(/\/+$/, ""),
		timeoutMs,
		retries,
		proxy: readProxyEnvironment(env),
	};

	if (env.MODLOCK_DEBUG) {
		console.log("[config] Resolved config:");
		console.log(`[config]   project:  ${resolved.projectConfigPath ?? "(none)"}`);
		console.log(`[config]   lock:     ${resolved.lockPath ?? "(disabled)"}`);
		console.log(`[config]   cacheDir: ${resolved.cacheDir}`);
		console.log(`[config]   jsrUrl:   ${resolved.jsrUrl}`);
		console.log(`[config]   npmUrl:   ${resolved.npmUrl}`);
		console.log(`[config]   timeout:  ${resolved.timeoutMs}ms, retries: ${resolved.retries}`);
	}

	return resolved;
}

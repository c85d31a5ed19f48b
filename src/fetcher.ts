import { readFile } from "node:fs/promises";
import type { ModuleCache } from "./cache";
import {
	FetchError,
	isRetriable,
	NotCachedError,
	UnresolvedSpecifierError,
} from "./errors";
import type { HttpClient } from "./http";
import {
	type ModuleLocation,
	moduleKey,
	type RegistryKind,
} from "./lib/specifier";
import type { Registries } from "./registries/index";
import type { VendorSource } from "./vendor";

/**
 * How the cache is used for a retrieval.
 *
 * - normal: cached content if present, otherwise the network
 * - reload: always the network, replacing the cache entry
 * - reload-specific: reload for keys starting with one of `targets`, normal otherwise
 * - cached-only: never the network; missing entries fail with NotCachedError
 */
export type FetchMode =
	| { kind: "normal" }
	| { kind: "reload" }
	| { kind: "reload-specific"; targets: string[] }
	| { kind: "cached-only" };

export const NORMAL: FetchMode = { kind: "normal" };

export interface FetcherOptions {
	cache: ModuleCache;
	http: HttpClient;
	registries: Registries;
	/** Default mode for calls that don't pass one */
	mode?: FetchMode;
	/** Extra attempts for retriable network failures */
	retries?: number;
	/** Vendored modules, consulted before the cache */
	vendor?: VendorSource | null;
	/** Cancels in-flight network requests when the run aborts */
	signal?: AbortSignal;
}

const META_PREFIX = "meta:";

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isStringMap(value: unknown): value is Record<string, string> {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		Object.values(value).every((v) => typeof v === "string")
	);
}

/**
 * Retrieves module content and registry metadata through the cache.
 *
 * At most one retrieval per key is in flight; concurrent callers for the
 * same key await the same promise. A key is reloaded at most once per
 * Fetcher, so a module reached twice during a reload run is downloaded once.
 */
export class Fetcher {
	private readonly inFlight = new Map<string, Promise<Buffer>>();
	private readonly reloaded = new Set<string>();
	private readonly cache: ModuleCache;
	private readonly http: HttpClient;
	private readonly registries: Registries;
	private readonly vendor: VendorSource | null;
	private readonly retries: number;
	private readonly signal?: AbortSignal;
	readonly mode: FetchMode;

	constructor(options: FetcherOptions) {
		this.cache = options.cache;
		this.http = options.http;
		this.registries = options.registries;
		this.vendor = options.vendor ?? null;
		this.retries = options.retries ?? 0;
		this.signal = options.signal;
		this.mode = options.mode ?? NORMAL;
	}

	/**
	 * Get the content of a module.
	 *
	 * Local files are always read from disk. Remote modules follow `mode`.
	 *
	 * @throws NotCachedError in cached-only mode when the module isn't cached
	 * @throws UnresolvedSpecifierError when a local file doesn't exist
	 */
	fetch(location: ModuleLocation, mode: FetchMode = this.mode): Promise<Buffer> {
		const key = moduleKey(location);
		if (location.kind === "local") {
			const { path } = location;
			return this.dedupe(key, () => readLocal(path, key));
		}
		const remote = location;
		return this.dedupe(key, () =>
			this.load(key, mode, () => this.retrieve(remote), () => this.vendor?.read(remote)),
		);
	}

	/**
	 * Published versions of a registry package, cached under a `meta:` key so
	 * cached-only runs can still resolve ranges.
	 */
	async listVersions(
		registry: RegistryKind,
		name: string,
		mode: FetchMode = this.mode,
	): Promise<string[]> {
		const key = `${META_PREFIX}${registry}:${name}`;
		const content = await this.dedupe(key, () =>
			this.load(key, mode, async () => {
				const versions = await this.registries[registry].listVersions(name, this.signal);
				return Buffer.from(JSON.stringify(versions));
			}),
		);
		const versions: unknown = JSON.parse(content.toString("utf-8"));
		if (!isStringArray(versions)) {
			throw new FetchError(key, "cached version list is malformed");
		}
		return versions;
	}

	/**
	 * Export map of a registry package version
	 */
	async getExports(
		registry: RegistryKind,
		name: string,
		version: string,
		mode: FetchMode = this.mode,
	): Promise<Record<string, string>> {
		const key = `${META_PREFIX}${registry}:${name}@${version}`;
		const content = await this.dedupe(key, () =>
			this.load(key, mode, async () => {
				const exports = await this.registries[registry].getExports(name, version, this.signal);
				return Buffer.from(JSON.stringify(exports));
			}),
		);
		const exports: unknown = JSON.parse(content.toString("utf-8"));
		if (!isStringMap(exports)) {
			throw new FetchError(key, "cached export map is malformed");
		}
		return exports;
	}

	private dedupe(key: string, start: () => Promise<Buffer>): Promise<Buffer> {
		const existing = this.inFlight.get(key);
		if (existing) return existing;

		const pending = start().finally(() => this.inFlight.delete(key));
		this.inFlight.set(key, pending);
		return pending;
	}

	/**
	 * Which mode applies to one key
	 */
	effectiveMode(key: string, mode: FetchMode): FetchMode["kind"] {
		if (mode.kind === "reload-specific") {
			const target = key.startsWith(META_PREFIX) ? key.slice(META_PREFIX.length) : key;
			return mode.targets.some((t) => target.startsWith(t)) ? "reload" : "normal";
		}
		return mode.kind;
	}

	private async load(
		key: string,
		mode: FetchMode,
		retrieve: () => Promise<Buffer>,
		readVendored?: () => Promise<Buffer | null> | undefined,
	): Promise<Buffer> {
		let effective = this.effectiveMode(key, mode);
		if (effective === "reload" && this.reloaded.has(key)) {
			effective = "normal";
		}

		if (effective !== "reload") {
			const vendored = await readVendored?.();
			if (vendored) return vendored;

			const cached = await this.cache.get(key);
			if (cached) {
				if (process.env.MODLOCK_DEBUG) {
					console.log(`[fetch] cache hit ${key}`);
				}
				return cached.content;
			}
		}

		if (effective === "cached-only") {
			throw new NotCachedError(key);
		}

		const content = await this.withRetry(key, retrieve);
		this.reloaded.add(key);
		try {
			await this.cache.put(key, content);
		} catch (error) {
			// The content is still usable for this run
			const message = error instanceof Error ? error.message : String(error);
			console.warn(`Warning: could not cache ${key}: ${message}`);
		}
		return content;
	}

	private async withRetry(key: string, operation: () => Promise<Buffer>): Promise<Buffer> {
		for (let attempt = 0; ; attempt++) {
			try {
				if (process.env.MODLOCK_DEBUG) {
					console.log(`[fetch] ${key}${attempt > 0 ? ` (retry ${attempt})` : ""}`);
				}
				return await operation();
			} catch (error) {
				if (attempt >= this.retries || !isRetriable(error) || this.signal?.aborted) {
					throw error;
				}
			}
		}
	}

	private retrieve(location: Exclude<ModuleLocation, { kind: "local" }>): Promise<Buffer> {
		switch (location.kind) {
			case "url":
				return this.http
					.get(location.url, { signal: this.signal })
					.then((response) => response.body);
			case "jsr":
			case "npm":
				return this.registries[location.kind].fetchContent(
					location.name,
					location.version,
					location.kind === "jsr" ? location.path : location.subpath,
					this.signal,
				);
		}
	}
}

async function readLocal(path: string, key: string): Promise<Buffer> {
	try {
		return await readFile(path);
	} catch (error) {
		const code =
			error instanceof Error && "code" in error ? String(error.code) : "";
		if (code === "ENOENT" || code === "EISDIR") {
			throw new UnresolvedSpecifierError(key, "module not found");
		}
		throw error;
	}
}

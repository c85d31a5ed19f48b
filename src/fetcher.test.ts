import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ModuleCache } from "./cache";
import { FetchError, NotCachedError, UnresolvedSpecifierError } from "./errors";
import { Fetcher, type FetcherOptions, type FetchMode } from "./fetcher";
import type { ModuleLocation } from "./lib/specifier";
import { FakeHttpClient, type FakeRegistries, fakeRegistries } from "./testing/fakes";
import { VendorSource } from "./vendor";

const MOD: ModuleLocation = { kind: "jsr", name: "@x/y", version: "1.3.0", path: "/mod.ts" };
const OTHER: ModuleLocation = { kind: "jsr", name: "@a/b", version: "1.0.0", path: "/mod.ts" };

describe("Fetcher", () => {
	let dir: string;
	let cache: ModuleCache;
	let registries: FakeRegistries;
	let http: FakeHttpClient;

	const createFetcher = (options: Partial<FetcherOptions> = {}) =>
		new Fetcher({ cache, http, registries, ...options });

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "modlock-fetch-"));
		cache = new ModuleCache(join(dir, "cache"));
		http = new FakeHttpClient({ "https://example.com/lib.ts": "export const lib = 1;\n" });
		registries = fakeRegistries({
			"@x/y": {
				"1.2.0": { files: { "/mod.ts": "v1.2.0" } },
				"1.3.0": { exports: { ".": "./mod.ts" }, files: { "/mod.ts": "v1.3.0" } },
			},
			"@a/b": { "1.0.0": { files: { "/mod.ts": "a/b" } } },
		});
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	describe("normal mode", () => {
		it("should fetch once and then serve from the cache", async () => {
			const fetcher = createFetcher();

			expect((await fetcher.fetch(MOD)).toString()).toBe("v1.3.0");
			expect((await fetcher.fetch(MOD)).toString()).toBe("v1.3.0");
			expect(registries.jsr.calls.fetchContent).toBe(1);
			expect((await cache.get("jsr:@x/y@1.3.0/mod.ts"))?.content.toString()).toBe("v1.3.0");
		});

		it("should share one retrieval between concurrent callers", async () => {
			const fetcher = createFetcher();

			const results = await Promise.all([fetcher.fetch(MOD), fetcher.fetch(MOD), fetcher.fetch(MOD)]);

			expect(results.map((content) => content.toString())).toEqual(["v1.3.0", "v1.3.0", "v1.3.0"]);
			expect(registries.jsr.calls.fetchContent).toBe(1);
		});

		it("should fetch URLs through the HTTP client", async () => {
			const fetcher = createFetcher();

			const content = await fetcher.fetch({ kind: "url", url: "https://example.com/lib.ts" });

			expect(content.toString()).toBe("export const lib = 1;\n");
			expect(http.requests).toEqual(["https://example.com/lib.ts"]);
		});
	});

	describe("reload mode", () => {
		it("should replace cached content and reload each key only once", async () => {
			await cache.put("jsr:@x/y@1.3.0/mod.ts", Buffer.from("stale"));
			const fetcher = createFetcher({ mode: { kind: "reload" } });

			expect((await fetcher.fetch(MOD)).toString()).toBe("v1.3.0");
			expect((await fetcher.fetch(MOD)).toString()).toBe("v1.3.0");
			expect(registries.jsr.calls.fetchContent).toBe(1);
			expect((await cache.get("jsr:@x/y@1.3.0/mod.ts"))?.content.toString()).toBe("v1.3.0");
		});

		it("should only reload keys matching a target", async () => {
			await cache.put("jsr:@x/y@1.3.0/mod.ts", Buffer.from("stale x"));
			await cache.put("jsr:@a/b@1.0.0/mod.ts", Buffer.from("stale a"));
			const fetcher = createFetcher({ mode: { kind: "reload-specific", targets: ["jsr:@x/y"] } });

			expect((await fetcher.fetch(MOD)).toString()).toBe("v1.3.0");
			expect((await fetcher.fetch(OTHER)).toString()).toBe("stale a");
			expect(registries.jsr.calls.fetchContent).toBe(1);
		});

		it("should match version lists of reload targets", () => {
			const fetcher = createFetcher();
			const mode: FetchMode = { kind: "reload-specific", targets: ["jsr:@x/y"] };

			expect(fetcher.effectiveMode("meta:jsr:@x/y", mode)).toBe("reload");
			expect(fetcher.effectiveMode("meta:jsr:@x/y@1.3.0", mode)).toBe("reload");
			expect(fetcher.effectiveMode("jsr:@a/b@1.0.0/mod.ts", mode)).toBe("normal");
		});
	});

	describe("cached-only mode", () => {
		it("should fail with NotCachedError without touching the network", async () => {
			const fetcher = createFetcher({ mode: { kind: "cached-only" } });

			await expect(fetcher.fetch(MOD)).rejects.toThrow(NotCachedError);
			expect(registries.jsr.calls.fetchContent).toBe(0);
		});

		it("should serve cached modules and version lists", async () => {
			const warm = createFetcher();
			await warm.fetch(MOD);
			await warm.listVersions("jsr", "@x/y");

			const offline = createFetcher({ mode: { kind: "cached-only" } });

			expect((await offline.fetch(MOD)).toString()).toBe("v1.3.0");
			expect(await offline.listVersions("jsr", "@x/y")).toEqual(["1.2.0", "1.3.0"]);
			expect(registries.jsr.calls.listVersions).toBe(1);
			expect(registries.jsr.calls.fetchContent).toBe(1);
		});
	});

	describe("metadata", () => {
		it("should cache export maps per version", async () => {
			const fetcher = createFetcher();

			expect(await fetcher.getExports("jsr", "@x/y", "1.3.0")).toEqual({ ".": "./mod.ts" });
			expect(await fetcher.getExports("jsr", "@x/y", "1.3.0")).toEqual({ ".": "./mod.ts" });
			expect(registries.jsr.calls.getExports).toBe(1);
		});
	});

	describe("retries", () => {
		it("should retry retriable failures", async () => {
			registries.jsr.failures.push(
				new FetchError("https://jsr.example/x", "HTTP 503", 503, true),
			);
			const fetcher = createFetcher({ retries: 1 });

			expect((await fetcher.fetch(MOD)).toString()).toBe("v1.3.0");
			expect(registries.jsr.calls.fetchContent).toBe(2);
		});

		it("should not retry other failures", async () => {
			registries.jsr.failures.push(new FetchError("https://jsr.example/x", "HTTP 404", 404));
			const fetcher = createFetcher({ retries: 3 });

			await expect(fetcher.fetch(MOD)).rejects.toThrow("Failed to fetch https://jsr.example/x: HTTP 404");
			expect(registries.jsr.calls.fetchContent).toBe(1);
		});

		it("should give up after the configured attempts", async () => {
			const failure = new FetchError("https://jsr.example/x", "HTTP 503", 503, true);
			registries.jsr.failures.push(failure, failure, failure);
			const fetcher = createFetcher({ retries: 1 });

			await expect(fetcher.fetch(MOD)).rejects.toBe(failure);
			expect(registries.jsr.calls.fetchContent).toBe(2);
		});
	});

	describe("local modules", () => {
		it("should read local files in every mode", async () => {
			const path = join(dir, "main.ts");
			await writeFile(path, "console.log(1);\n");
			const fetcher = createFetcher({ mode: { kind: "cached-only" } });

			expect((await fetcher.fetch({ kind: "local", path })).toString()).toBe("console.log(1);\n");
		});

		it("should report missing files as unresolved", async () => {
			const fetcher = createFetcher();

			await expect(fetcher.fetch({ kind: "local", path: join(dir, "missing.ts") })).rejects.toThrow(
				UnresolvedSpecifierError,
			);
		});
	});

	describe("vendor", () => {
		it("should prefer vendored content over the network", async () => {
			const vendorDir = join(dir, "vendor");
			await mkdir(join(vendorDir, "jsr.io", "@x", "y", "1.3.0"), { recursive: true });
			await writeFile(join(vendorDir, "jsr.io", "@x", "y", "1.3.0", "mod.ts"), "vendored");
			const fetcher = createFetcher({ vendor: new VendorSource(vendorDir) });

			expect((await fetcher.fetch(MOD)).toString()).toBe("vendored");
			expect(registries.jsr.calls.fetchContent).toBe(0);
		});
	});
});

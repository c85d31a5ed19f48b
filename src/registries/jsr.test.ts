import { describe, expect, it } from "vitest";
import { FetchError, UnresolvedSpecifierError } from "@/errors";
import { FakeHttpClient } from "@/testing/fakes";
import { JsrRegistry, resolveExportPath } from "./jsr";

const BASE = "https://jsr.example";

describe("JsrRegistry", () => {
	const http = new FakeHttpClient({
		[`${BASE}/@x/y/meta.json`]: JSON.stringify({
			scope: "x",
			name: "y",
			versions: { "1.2.0": {}, "1.3.0": {}, "1.3.1": { yanked: true } },
		}),
		[`${BASE}/@x/y/1.3.0_meta.json`]: JSON.stringify({
			manifest: {},
			exports: { ".": "./mod.ts", "./util": "./src/util.ts" },
		}),
		[`${BASE}/@x/y/1.3.0/mod.ts`]: "export {};\n",
		[`${BASE}/@bad/meta/meta.json`]: JSON.stringify({ versions: "nope" }),
	});
	const registry = new JsrRegistry(http, BASE);

	it("should list versions without yanked ones", async () => {
		expect(await registry.listVersions("@x/y")).toEqual(["1.2.0", "1.3.0"]);
	});

	it("should read the export map of a version", async () => {
		expect(await registry.getExports("@x/y", "1.3.0")).toEqual({
			".": "./mod.ts",
			"./util": "./src/util.ts",
		});
	});

	it("should fetch module files", async () => {
		expect((await registry.fetchContent("@x/y", "1.3.0", "/mod.ts")).toString()).toBe(
			"export {};\n",
		);
	});

	it("should reject unexpected metadata", async () => {
		await expect(registry.listVersions("@bad/meta")).rejects.toThrow(FetchError);
	});
});

describe("resolveExportPath", () => {
	const exports = { ".": "./mod.ts", "./posix": "./posix/mod.ts" };

	it("should map the package root", () => {
		expect(resolveExportPath(exports, "", "jsr:@std/path@1.0.0")).toBe("/mod.ts");
	});

	it("should map subpath exports", () => {
		expect(resolveExportPath(exports, "/posix", "jsr:@std/path@1.0.0")).toBe("/posix/mod.ts");
	});

	it("should reject subpaths that aren't exported", () => {
		expect(() => resolveExportPath(exports, "/windows", "jsr:@std/path@1.0.0")).toThrow(
			UnresolvedSpecifierError,
		);
	});
});

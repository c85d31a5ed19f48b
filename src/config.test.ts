import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	DEFAULT_JSR_URL,
	DEFAULT_NPM_URL,
	DEFAULT_RETRIES,
	DEFAULT_TIMEOUT_MS,
	findProjectConfig,
	getDefaultCacheDir,
	readUserConfig,
	resolveConfig,
	validateProjectConfig,
} from "./config";
import { ConfigError } from "./errors";

describe("config", () => {
	let dir: string;
	let userConfigPath: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "modlock-config-"));
		userConfigPath = join(dir, ".modlockrc");
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	describe("readUserConfig", () => {
		it("should return an empty config when the file is missing", async () => {
			expect(await readUserConfig(userConfigPath)).toEqual({});
		});

		it("should parse INI values", async () => {
			await writeFile(
				userConfigPath,
				"cacheDir = /var/cache/modlock\njsrUrl = https://jsr.example\ntimeout = 5000\nretries = 0\n",
			);

			expect(await readUserConfig(userConfigPath)).toEqual({
				cacheDir: "/var/cache/modlock",
				jsrUrl: "https://jsr.example",
				npmUrl: undefined,
				timeout: 5000,
				retries: 0,
			});
		});

		it("should reject non-numeric timeouts", async () => {
			await writeFile(userConfigPath, "timeout = soon\n");

			await expect(readUserConfig(userConfigPath)).rejects.toThrow(ConfigError);
		});
	});

	describe("validateProjectConfig", () => {
		it("should accept a complete config", () => {
			const config = {
				imports: { "@x/y": "jsr:@x/y@^1.2.0" },
				scopes: { "./legacy/": { "@x/y": "jsr:@x/y@1.0.0" } },
				vendor: true,
				lock: "locks/modlock.lock",
				runtime: ["node", "--enable-source-maps"],
			};

			expect(validateProjectConfig(config, "modlock.json")).toEqual(config);
		});

		it("should name the invalid key", () => {
			expect(() => validateProjectConfig({ imports: { a: 1 } }, "modlock.json")).toThrow(
				'"imports" in modlock.json must map names to specifier strings',
			);
			expect(() => validateProjectConfig({ scopes: { "./x/": [] } }, "modlock.json")).toThrow(
				'"scopes../x/" in modlock.json must map names to specifier strings',
			);
			expect(() => validateProjectConfig({ runtime: [] }, "modlock.json")).toThrow(
				'"runtime" in modlock.json must be a non-empty array of strings',
			);
		});

		it("should reject non-objects", () => {
			expect(() => validateProjectConfig([], "modlock.json")).toThrow(
				"modlock.json must contain a JSON object",
			);
		});
	});

	describe("findProjectConfig", () => {
		it("should search parent directories", async () => {
			await writeFile(join(dir, "modlock.json"), JSON.stringify({ imports: {} }));
			const nested = join(dir, "src", "deep");
			await mkdir(nested, { recursive: true });

			expect(await findProjectConfig(nested)).toEqual({
				path: join(dir, "modlock.json"),
				config: { imports: {} },
			});
		});

		it("should report invalid JSON", async () => {
			await writeFile(join(dir, "modlock.json"), "{ imports");

			await expect(findProjectConfig(dir)).rejects.toThrow(ConfigError);
		});
	});

	describe("resolveConfig", () => {
		it("should fall back to defaults", async () => {
			const config = await resolveConfig({ cwd: dir, env: {}, userConfigPath });

			expect(config).toMatchObject({
				cwd: dir,
				projectConfigPath: null,
				projectDir: dir,
				vendor: false,
				vendorDir: join(dir, "vendor"),
				lockPath: null,
				runtime: ["node"],
				cacheDir: getDefaultCacheDir(),
				jsrUrl: DEFAULT_JSR_URL,
				npmUrl: DEFAULT_NPM_URL,
				timeoutMs: DEFAULT_TIMEOUT_MS,
				retries: DEFAULT_RETRIES,
			});
		});

		it("should let the environment override the user config", async () => {
			await writeFile(userConfigPath, "jsrUrl = https://user.example\nretries = 1\n");

			const config = await resolveConfig({
				cwd: dir,
				env: { MODLOCK_JSR_URL: "https://env.example/", MODLOCK_RETRIES: "4" },
				userConfigPath,
			});

			expect(config.jsrUrl).toBe("https://env.example");
			expect(config.retries).toBe(4);
		});

		it("should place the lock file next to modlock.json", async () => {
			await writeFile(
				join(dir, "modlock.json"),
				JSON.stringify({ imports: { "@x/y": "jsr:@x/y@^1.2.0" } }),
			);
			const nested = join(dir, "src");
			await mkdir(nested);

			const config = await resolveConfig({ cwd: nested, env: {}, userConfigPath });

			expect(config.projectConfigPath).toBe(join(dir, "modlock.json"));
			expect(config.projectDir).toBe(dir);
			expect(config.lockPath).toBe(join(dir, "modlock.lock"));
			expect(config.importMap.imports).toEqual({ "@x/y": "jsr:@x/y@^1.2.0" });
		});

		it("should honor a custom or disabled lock file", async () => {
			await writeFile(join(dir, "modlock.json"), JSON.stringify({ lock: "locks/dev.lock" }));
			expect((await resolveConfig({ cwd: dir, env: {}, userConfigPath })).lockPath).toBe(
				join(dir, "locks", "dev.lock"),
			);

			await writeFile(join(dir, "modlock.json"), JSON.stringify({ lock: false }));
			expect((await resolveConfig({ cwd: dir, env: {}, userConfigPath })).lockPath).toBeNull();
		});

		it("should read proxy settings from the environment", async () => {
			const config = await resolveConfig({
				cwd: dir,
				env: { HTTPS_PROXY: "http://proxy.example:3128", NO_PROXY: "internal.example" },
				userConfigPath,
			});

			expect(config.proxy).toEqual({
				httpProxy: undefined,
				httpsProxy: "http://proxy.example:3128",
				noProxy: "internal.example",
			});
		});
	});
});

import { describe, expect, it } from "vitest";
import { ConfigError } from "@/errors";
import {
	createEmptyLockfile,
	type Lockfile,
	parseLockfile,
	serializeLockfile,
} from "./lockfile";

describe("lockfile format", () => {
	describe("parseLockfile", () => {
		it("should parse a version 1 lock file", () => {
			const content = JSON.stringify({
				version: "1",
				specifiers: { "jsr:@x/y@^1.2.0": "1.3.0" },
				modules: { "jsr:@x/y@1.3.0/mod.ts": "sha256-abc123" },
			});

			expect(parseLockfile(content, "modlock.lock")).toEqual({
				version: "1",
				specifiers: { "jsr:@x/y@^1.2.0": "1.3.0" },
				modules: { "jsr:@x/y@1.3.0/mod.ts": "sha256-abc123" },
			});
		});

		it("should default missing sections to empty maps", () => {
			expect(parseLockfile('{ "version": "1" }', "modlock.lock")).toEqual(
				createEmptyLockfile(),
			);
		});

		it("should reject invalid JSON", () => {
			expect(() => parseLockfile("{", "modlock.lock")).toThrow(ConfigError);
		});

		it("should reject unknown versions", () => {
			expect(() => parseLockfile('{ "version": "2" }', "modlock.lock")).toThrow(
				'Unsupported lock file version "2" in modlock.lock (expected "1")',
			);
		});

		it("should reject non-string integrity values", () => {
			const content = JSON.stringify({ version: "1", modules: { a: 1 } });
			expect(() => parseLockfile(content, "modlock.lock")).toThrow(
				'"modules" in modlock.lock must map strings to strings',
			);
		});

		it("should reject arrays", () => {
			expect(() => parseLockfile("[]", "modlock.lock")).toThrow(
				"Lock file modlock.lock must contain a JSON object",
			);
		});
	});

	describe("serializeLockfile", () => {
		it("should sort keys and end with a newline", () => {
			const lockfile: Lockfile = {
				version: "1",
				specifiers: { "npm:b@^1.0.0": "1.0.1", "jsr:@a/a@^2.0.0": "2.0.0" },
				modules: { "npm:b@1.0.1": "sha256-b", "jsr:@a/a@2.0.0/mod.ts": "sha256-a" },
			};

			expect(serializeLockfile(lockfile)).toBe(
				`${[
					"{",
					'  "version": "1",',
					'  "specifiers": {',
					'    "jsr:@a/a@^2.0.0": "2.0.0",',
					'    "npm:b@^1.0.0": "1.0.1"',
					"  },",
					'  "modules": {',
					'    "jsr:@a/a@2.0.0/mod.ts": "sha256-a",',
					'    "npm:b@1.0.1": "sha256-b"',
					"  }",
					"}",
				].join("\n")}\n`,
			);
		});

		it("should read back what it writes", () => {
			const lockfile: Lockfile = {
				version: "1",
				specifiers: { "jsr:@x/y@^1.2.0": "1.3.0" },
				modules: { "https://example.com/mod.ts": "sha256-abc123" },
			};
			expect(parseLockfile(serializeLockfile(lockfile), "modlock.lock")).toEqual(lockfile);
		});
	});
});

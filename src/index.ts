#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import {
	type CacheOptions,
	cache,
	clean,
	configInit,
	configShow,
	type InfoOptions,
	info,
	type RunOptions,
	run,
	type VendorOptions,
	vendor,
} from "./commands/index";

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: { version: string } = JSON.parse(
	readFileSync(join(__dirname, "..", "package.json"), "utf-8"),
);

/**
 * Flags shared by every command that resolves a module graph
 */
function withResolutionOptions(command: Command): Command {
	return command
		.option(
			"-r, --reload [targets]",
			"Reload remote modules, or only those whose specifier starts with one of the comma separated targets",
		)
		.option("--lock <path>", "Lock file to check (default: modlock.lock next to modlock.json)")
		.option("--no-lock", "Disable the lock file")
		.option("--lock-write", "Write the current content of every module to the lock file")
		.option("--frozen", "Fail on dependencies the lock file doesn't record")
		.option("--cached-only", "Never use the network; fail on modules missing from the cache");
}

const program = new Command();

program
	.name("modlock")
	.description("Resolve, cache and lock remote ES module dependencies")
	.version(packageJson.version)
	.enablePositionalOptions();

// =============================================================================
// Config commands
// =============================================================================

const configCmd = program
	.command("config")
	.description("Manage modlock configuration");

configCmd
	.command("show")
	.description("Show resolved configuration")
	.action(async () => {
		await configShow();
	});

configCmd
	.command("init")
	.description("Create a modlock.json file in the current directory")
	.option("--vendor", "Resolve remote modules from ./vendor")
	.option("--no-lock", "Disable the lock file")
	.action(async (options: { vendor?: boolean; lock: boolean }) => {
		await configInit({ vendor: options.vendor, noLock: !options.lock });
	});

// =============================================================================
// Module commands
// =============================================================================

withResolutionOptions(
	program
		.command("cache <entries...>")
		.description("Download and cache the dependencies of entry modules"),
).action(async (entries: string[], options: CacheOptions) => {
	await cache(entries, options);
});

withResolutionOptions(
	program
		.command("run <entry> [args...]")
		.description("Verify an entry's dependencies and run it")
		.passThroughOptions(),
).action(async (entry: string, args: string[], options: RunOptions) => {
	await run(entry, args, options);
});

withResolutionOptions(
	program
		.command("info <entry>")
		.description("Show the resolved module graph of an entry")
		.option("--json", "Output as JSON"),
).action(async (entry: string, options: InfoOptions) => {
	await info(entry, options);
});

withResolutionOptions(
	program
		.command("vendor <entries...>")
		.description("Copy remote dependencies into ./vendor"),
).action(async (entries: string[], options: VendorOptions) => {
	await vendor(entries, options);
});

program
	.command("clean")
	.description("Remove all cached modules")
	.action(async () => {
		await clean();
	});

await program.parseAsync();

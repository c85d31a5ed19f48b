import { spawn } from "node:child_process";
import { ConfigError } from "../errors";
import { loadProject, type ResolutionOptions } from "../project";
import { vendorPath } from "../vendor";
import { resolveEntries } from "./cache";
import { exitWithError } from "./report";

export type RunOptions = ResolutionOptions;

/**
 * Spawn a command with inherited stdio and resolve with its exit code
 */
export function runProcess(command: string, args: string[]): Promise<number> {
	return new Promise<number>((resolve, reject) => {
		spawn(command, args, { stdio: "inherit" })
			.on("close", (code, signal) => resolve(code ?? (signal ? 1 : 0)))
			.on("error", reject);
	});
}

/**
 * Resolve and verify the graph of an entry, then run it with the
 * project's runtime (`runtime` in modlock.json, default `node`).
 */
export async function run(entry: string, args: string[], options: RunOptions): Promise<void> {
	try {
		const context = await loadProject(options);
		const { graph } = await resolveEntries(context, [entry]);

		const [rootKey] = graph.roots;
		const root = rootKey === undefined ? undefined : graph.modules.get(rootKey);
		if (!root) {
			throw new ConfigError(`Nothing to run for "${entry}"`);
		}

		let script: string | null;
		if (root.location.kind === "local") {
			script = root.location.path;
		} else if (context.config.vendor) {
			script = vendorPath(root.location, context.config.vendorDir);
		} else {
			script = null;
		}
		if (!script) {
			throw new ConfigError(
				`${root.key} is remote; enable "vendor" in modlock.json to run remote entries`,
			);
		}

		const [command, ...runtimeArgs] = context.config.runtime;
		if (!command) {
			throw new ConfigError('"runtime" in modlock.json must name a command');
		}
		if (process.env.MODLOCK_DEBUG) {
			console.log(`[run] ${[command, ...runtimeArgs, script, ...args].join(" ")}`);
		}

		process.exitCode = await runProcess(command, [...runtimeArgs, script, ...args]);
	} catch (error) {
		exitWithError(error);
	}
}

import pc from "picocolors";
import { ModuleCache } from "../cache";
import { resolveConfig } from "../config";
import { exitWithError } from "./report";

/**
 * Remove every module from the global cache
 */
export async function clean(): Promise<void> {
	try {
		const config = await resolveConfig();
		await new ModuleCache(config.cacheDir).clear();
		console.log(`${pc.green("Ok:")} Cleared ${config.cacheDir}`);
	} catch (error) {
		exitWithError(error);
	}
}

import { stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import pc from "picocolors";
import { PROJECT_CONFIG_NAME, type ProjectConfig } from "../../config";
import { ConfigError } from "../../errors";
import { exitWithError } from "../report";

export interface ConfigInitOptions {
	/** Write `"vendor": true` */
	vendor?: boolean;
	/** Disable the lock file (`"lock": false`) */
	noLock?: boolean;
}

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch {
		return false;
	}
}

/**
 * Create a modlock.json file in the current directory
 */
export async function configInit(options: ConfigInitOptions): Promise<void> {
	try {
		const configPath = join(process.cwd(), PROJECT_CONFIG_NAME);
		if (await exists(configPath)) {
			throw new ConfigError(`${PROJECT_CONFIG_NAME} already exists in this directory.`);
		}

		const config: ProjectConfig = { imports: {} };
		if (options.vendor) config.vendor = true;
		if (options.noLock) config.lock = false;

		const content = `${JSON.stringify(config, null, 2)}\n`;
		await writeFile(configPath, content);

		console.log(`${pc.green("Ok:")} Created ${PROJECT_CONFIG_NAME}`);
		console.log("");
		console.log(content);
		console.log('Map bare names under "imports", e.g. "@std/path": "jsr:@std/path@^1.0.0".');
	} catch (error) {
		exitWithError(error);
	}
}

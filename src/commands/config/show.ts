import { getConfigPath, resolveConfig } from "../../config";
import { exitWithError } from "../report";

/**
 * Show resolved configuration
 */
export async function configShow(): Promise<void> {
	try {
		const resolved = await resolveConfig();
		const imports = Object.keys(resolved.importMap.imports ?? {}).length;
		const scopes = Object.keys(resolved.importMap.scopes ?? {}).length;

		console.log("Resolved Configuration:\n");
		console.log(`  Cache dir:      ${resolved.cacheDir}`);
		console.log(`  JSR URL:        ${resolved.jsrUrl}`);
		console.log(`  npm URL:        ${resolved.npmUrl}`);
		console.log(`  Timeout:        ${resolved.timeoutMs}ms`);
		console.log(`  Retries:        ${resolved.retries}`);
		console.log(`  Lock file:      ${resolved.lockPath ?? "(disabled)"}`);
		console.log(`  Vendor:         ${resolved.vendor ? resolved.vendorDir : "(off)"}`);
		console.log(`  Runtime:        ${resolved.runtime.join(" ")}`);
		console.log(`  Import map:     ${imports} import(s), ${scopes} scope(s)`);
		console.log("");
		console.log("Config Locations:");
		console.log(`  User config:    ${getConfigPath()}`);
		console.log(`  Project config: ${resolved.projectConfigPath ?? "(none)"}`);
		console.log("");
		console.log("Proxy:");
		console.log(`  HTTPS_PROXY:    ${resolved.proxy.httpsProxy ?? "(not set)"}`);
		console.log(`  HTTP_PROXY:     ${resolved.proxy.httpProxy ?? "(not set)"}`);
		console.log(`  NO_PROXY:       ${resolved.proxy.noProxy ?? "(not set)"}`);
	} catch (error) {
		exitWithError(error);
	}
}

import { relative } from "node:path";
import pc from "picocolors";
import { loadProject, type ResolutionOptions } from "../project";
import { vendorGraph } from "../vendor";
import { readResolved, resolveEntries } from "./cache";
import { exitWithError } from "./report";

export type VendorOptions = ResolutionOptions;

/**
 * Copy every remote module an entry depends on into ./vendor
 */
export async function vendor(entries: string[], options: VendorOptions): Promise<void> {
	try {
		const context = await loadProject(options);
		const { graph } = await resolveEntries(context, entries, { vendor: false });
		const dir = context.config.vendorDir;
		const result = await vendorGraph(graph, (module) => readResolved(context, module), dir);

		console.log(
			`${pc.green("Ok:")} Vendored ${result.written} module(s) into ${relative(context.config.cwd, dir) || "."}`,
		);
		if (!context.config.vendor) {
			console.log('Set "vendor": true in modlock.json to resolve from the vendor directory.');
		}
	} catch (error) {
		exitWithError(error);
	}
}

import type { HttpClient } from "@/http";
import type { RegistryKind } from "@/lib/specifier";
import { JsrRegistry } from "./jsr";
import { NpmRegistry } from "./npm";

/**
 * What modlock needs from a package registry. One implementation per
 * registry kind; the wire protocol stays behind this interface.
 */
export interface RegistryClient {
	readonly kind: RegistryKind;
	/** Published, installable versions of a package */
	listVersions(name: string, signal?: AbortSignal): Promise<string[]>;
	/** Export map of one version ("." and "./sub" keys to "./file.ts" paths) */
	getExports(
		name: string,
		version: string,
		signal?: AbortSignal,
	): Promise<Record<string, string>>;
	/** Raw bytes of one file of a version (or the whole tarball for npm) */
	fetchContent(
		name: string,
		version: string,
		path: string,
		signal?: AbortSignal,
	): Promise<Buffer>;
}

export type Registries = Record<RegistryKind, RegistryClient>;

export interface RegistryUrls {
	jsrUrl: string;
	npmUrl: string;
}

/**
 * Create the JSR and npm clients on one HTTP client
 */
export function createRegistries(http: HttpClient, urls: RegistryUrls): Registries {
	return {
		jsr: new JsrRegistry(http, urls.jsrUrl),
		npm: new NpmRegistry(http, urls.npmUrl),
	};
}

export { JsrRegistry, resolveExportPath } from "./jsr";
export { NpmRegistry } from "./npm";

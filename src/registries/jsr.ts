/**
 * JSR registry client.
 *
 * Endpoints:
 * - Package meta: `<registry>/@<scope>/<name>/meta.json`
 * - Version meta: `<registry>/@<scope>/<name>/<version>_meta.json`
 * - Module file:  `<registry>/@<scope>/<name>/<version><path>`
 */

import { FetchError, UnresolvedSpecifierError } from "@/errors";
import { type HttpClient, parseJsonBody } from "@/http";
import type { RegistryClient } from "./index";

/**
 * Package metadata from `meta.json`
 *
 * @example
 * ```json
 * { "scope": "std", "name": "path",
 *   "versions": { "1.0.0": {}, "1.0.1": { "yanked": true } } }
 * ```
 */
interface JsrPackageMeta {
	versions: Record<string, { yanked?: boolean }>;
}

/**
 * Version metadata from `<version>_meta.json`
 */
interface JsrVersionMeta {
	exports: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPackageMeta(value: unknown): value is JsrPackageMeta {
	return isRecord(value) && isRecord(value.versions);
}

function isVersionMeta(value: unknown): value is JsrVersionMeta {
	return (
		isRecord(value) &&
		isRecord(value.exports) &&
		Object.values(value.exports).every((v) => typeof v === "string")
	);
}

/**
 * Map a subpath ("" or "/sub") to a file path through an export map.
 *
 * @example
 * ```typescript
 * resolveExportPath({ ".": "./mod.ts", "./posix": "./posix/mod.ts" }, "/posix", "jsr:@std/path@1.0.0")
 * // => "/posix/mod.ts"
 * ```
 */
export function resolveExportPath(
	exports: Record<string, string>,
	subpath: string,
	display: string,
): string {
	const exportKey = subpath ? `.${subpath}` : ".";
	const target = exports[exportKey];
	if (!target) {
		const available = Object.keys(exports).join(", ") || "(none)";
		throw new UnresolvedSpecifierError(
			`${display}${subpath}`,
			`package does not export "${exportKey}" (exports: ${available})`,
		);
	}
	return target.startsWith("./") ? target.slice(1) : `/${target.replace(/^\/+/, "")}`;
}

export class JsrRegistry implements RegistryClient {
	readonly kind = "jsr" as const;

	constructor(
		private readonly http: HttpClient,
		private readonly baseUrl: string,
	) {}

	private packageUrl(name: string): string {
		return `${this.baseUrl}/${name}`;
	}

	async listVersions(name: string, signal?: AbortSignal): Promise<string[]> {
		const url = `${this.packageUrl(name)}/meta.json`;
		const meta = parseJsonBody(await this.http.get(url, { signal, accept: "application/json" }));
		if (!isPackageMeta(meta)) {
			throw new FetchError(url, "unexpected package metadata format");
		}
		return Object.entries(meta.versions)
			.filter(([, info]) => !(isRecord(info) && info.yanked === true))
			.map(([version]) => version);
	}

	async getExports(
		name: string,
		version: string,
		signal?: AbortSignal,
	): Promise<Record<string, string>> {
		const url = `${this.packageUrl(name)}/${version}_meta.json`;
		const meta = parseJsonBody(await this.http.get(url, { signal, accept: "application/json" }));
		if (!isVersionMeta(meta)) {
			throw new FetchError(url, "unexpected version metadata format");
		}
		return meta.exports;
	}

	async fetchContent(
		name: string,
		version: string,
		path: string,
		signal?: AbortSignal,
	): Promise<Buffer> {
		const response = await this.http.get(`${this.packageUrl(name)}/${version}${path}`, {
			signal,
		});
		return response.body;
	}
}

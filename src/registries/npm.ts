/**
 * npm registry client.
 *
 * Versions come from the abbreviated packument (`<registry>/<name>`); the
 * content of a version is its tarball. npm packages are leaves of the module
 * graph: they are fetched, cached and locked as one unit.
 */

import { FetchError } from "@/errors";
import { type HttpClient, parseJsonBody } from "@/http";
import type { RegistryClient } from "./index";

interface Packument {
	versions: Record<string, { dist?: { tarball?: string } }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPackument(value: unknown): value is Packument {
	return isRecord(value) && isRecord(value.versions);
}

/**
 * Scoped names keep the "@" but escape the slash: @scope%2fname
 */
export function encodePackageName(name: string): string {
	return name.startsWith("@") ? `@${encodeURIComponent(name.slice(1))}` : encodeURIComponent(name);
}

export class NpmRegistry implements RegistryClient {
	readonly kind = "npm" as const;
	private readonly packuments = new Map<string, Promise<Packument>>();

	constructor(
		private readonly http: HttpClient,
		private readonly baseUrl: string,
	) {}

	private getPackument(name: string, signal?: AbortSignal): Promise<Packument> {
		let pending = this.packuments.get(name);
		if (!pending) {
			const url = `${this.baseUrl}/${encodePackageName(name)}`;
			pending = this.http
				.get(url, { signal, accept: "application/vnd.npm.install-v1+json" })
				.then((response) => {
					const data = parseJsonBody(response);
					if (!isPackument(data)) {
						throw new FetchError(url, "unexpected packument format");
					}
					return data;
				});
			// A failed request must not poison later attempts
			pending.catch(() => this.packuments.delete(name));
			this.packuments.set(name, pending);
		}
		return pending;
	}

	async listVersions(name: string, signal?: AbortSignal): Promise<string[]> {
		const packument = await this.getPackument(name, signal);
		return Object.keys(packument.versions);
	}

	async getExports(): Promise<Record<string, string>> {
		// npm packages are not traversed, so their exports are never consulted
		return {};
	}

	async fetchContent(
		name: string,
		version: string,
		_path: string,
		signal?: AbortSignal,
	): Promise<Buffer> {
		const packument = await this.getPackument(name, signal);
		const tarball = packument.versions[version]?.dist?.tarball;
		if (!tarball) {
			throw new FetchError(
				`${this.baseUrl}/${encodePackageName(name)}`,
				`no tarball published for ${name}@${version}`,
				404,
			);
		}
		const response = await this.http.get(tarball, { signal });
		return response.body;
	}
}

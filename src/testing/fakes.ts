import { FetchError } from "@/errors";
import type { HttpClient, HttpResponse } from "@/http";
import type { RegistryKind } from "@/lib/specifier";
import type { Registries, RegistryClient } from "@/registries/index";

export interface FakeVersion {
	exports?: Record<string, string>;
	/** Path ("/mod.ts", or "" for an npm tarball) -> content */
	files: Record<string, string>;
}

export type FakePackages = Record<string, Record<string, FakeVersion>>;

/**
 * In-memory registry that counts what was asked of it
 */
export class FakeRegistry implements RegistryClient {
	readonly calls = { listVersions: 0, getExports: 0, fetchContent: 0 };
	/** Errors thrown by the next fetchContent calls, in order */
	readonly failures: Error[] = [];

	constructor(
		readonly kind: RegistryKind,
		private readonly packages: FakePackages = {},
	) {}

	publish(name: string, version: string, value: FakeVersion): void {
		this.packages[name] = { ...this.packages[name], [version]: value };
	}

	private lookup(name: string, version: string): FakeVersion {
		const found = this.packages[name]?.[version];
		if (!found) {
			throw new FetchError(`${this.kind}:${name}@${version}`, "HTTP 404", 404);
		}
		return found;
	}

	async listVersions(name: string): Promise<string[]> {
		this.calls.listVersions++;
		await Promise.resolve();
		const versions = this.packages[name];
		if (!versions) {
			throw new FetchError(`${this.kind}:${name}`, "HTTP 404", 404);
		}
		return Object.keys(versions);
	}

	async getExports(name: string, version: string): Promise<Record<string, string>> {
		this.calls.getExports++;
		await Promise.resolve();
		return this.lookup(name, version).exports ?? {};
	}

	async fetchContent(name: string, version: string, path: string): Promise<Buffer> {
		this.calls.fetchContent++;
		await Promise.resolve();
		const failure = this.failures.shift();
		if (failure) throw failure;

		const content = this.lookup(name, version).files[path];
		if (content === undefined) {
			throw new FetchError(`${this.kind}:${name}@${version}${path}`, "HTTP 404", 404);
		}
		return Buffer.from(content);
	}
}

/**
 * HTTP client serving a fixed set of URLs
 */
export class FakeHttpClient implements HttpClient {
	readonly requests: string[] = [];

	constructor(readonly routes: Record<string, string> = {}) {}

	async get(url: string): Promise<HttpResponse> {
		this.requests.push(url);
		await Promise.resolve();
		const body = this.routes[url];
		if (body === undefined) {
			throw new FetchError(url, "HTTP 404", 404);
		}
		return { url, status: 200, body: Buffer.from(body) };
	}
}

export interface FakeRegistries extends Registries {
	jsr: FakeRegistry;
	npm: FakeRegistry;
}

export function fakeRegistries(jsr: FakePackages = {}, npm: FakePackages = {}): FakeRegistries {
	return { jsr: new FakeRegistry("jsr", jsr), npm: new FakeRegistry("npm", npm) };
}

import type { Agent } from "node:http";
import { HttpProxyAgent } from "http-proxy-agent";
import { HttpsProxyAgent } from "https-proxy-agent";
import fetch from "node-fetch";
import { FetchError, FetchTimeoutError } from "./errors";
import type { ProxyConfig } from "./lib/proxy";

export interface HttpResponse {
	/** Final URL after redirects */
	url: string;
	status: number;
	body: Buffer;
}

export interface HttpRequestOptions {
	/** Aborts the request when the run is cancelled */
	signal?: AbortSignal;
	accept?: string;
}

/**
 * Minimal GET-only client. Everything that talks to the network goes through it.
 */
export interface HttpClient {
	/**
	 * @throws FetchError for network failures and non-2xx responses
	 * @throws FetchTimeoutError when the configured timeout elapses
	 */
	get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export interface NodeHttpClientOptions {
	proxy: ProxyConfig;
	timeoutMs: number;
	userAgent?: string;
}

/**
 * HTTP client on node-fetch, routing through HTTP(S) proxies when configured
 */
export class NodeHttpClient implements HttpClient {
	private readonly agents = new Map<string, Agent>();

	constructor(private readonly options: NodeHttpClientOptions) {}

	private agentFor(url: URL): Agent | undefined {
		const proxyUrl = this.options.proxy.proxyFor(url);
		if (!proxyUrl) return undefined;

		const cacheKey = `${url.protocol}${proxyUrl}`;
		let agent = this.agents.get(cacheKey);
		if (!agent) {
			agent =
				url.protocol === "https:"
					? new HttpsProxyAgent(proxyUrl)
					: new HttpProxyAgent(proxyUrl);
			this.agents.set(cacheKey, agent);
		}
		if (process.env.MODLOCK_DEBUG) {
			console.log(`[fetch] ${url.host} via proxy ${proxyUrl}`);
		}
		return agent;
	}

	async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
		const target = new URL(url);
		const controller = new AbortController();
		let timedOut = false;

		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, this.options.timeoutMs);
		const onAbort = () => controller.abort();
		options.signal?.addEventListener("abort", onAbort, { once: true });

		try {
			if (options.signal?.aborted) {
				throw options.signal.reason;
			}

			const response = await fetch(target.href, {
				headers: {
					Accept: options.accept ?? "*/*",
					"User-Agent": this.options.userAgent ?? "modlock",
				},
				redirect: "follow",
				agent: this.agentFor(target),
				signal: controller.signal,
			});

			if (!response.ok) {
				const retriable = response.status >= 500 || response.status === 429;
				throw new FetchError(url, `HTTP ${response.status}`, response.status, retriable);
			}

			const body = Buffer.from(await response.arrayBuffer());
			return { url: response.url || target.href, status: response.status, body };
		} catch (error) {
			if (timedOut) {
				throw new FetchTimeoutError(url, this.options.timeoutMs);
			}
			if (options.signal?.aborted) {
				throw options.signal.reason;
			}
			if (error instanceof FetchError) {
				throw error;
			}
			const message = error instanceof Error ? error.message : String(error);
			throw new FetchError(url, message, undefined, true);
		} finally {
			clearTimeout(timer);
			options.signal?.removeEventListener("abort", onAbort);
		}
	}
}

/**
 * Parse a JSON response body
 *
 * @throws FetchError if the body isn't JSON
 */
export function parseJsonBody(response: HttpResponse): unknown {
	try {
		return JSON.parse(response.body.toString("utf-8"));
	} catch {
		throw new FetchError(response.url, "response is not valid JSON", response.status);
	}
}

/**
 * Decides which proxy, if any, an outbound request goes through.
 * Core code only talks to this interface and never inspects the platform.
 */
export interface ProxyConfig {
	proxyFor(url: URL): string | null;
}

/**
 * Proxy settings as read from the environment
 */
export interface ProxyEnvironment {
	httpProxy?: string;
	httpsProxy?: string;
	noProxy?: string;
}

/**
 * Read HTTP_PROXY, HTTPS_PROXY and NO_PROXY (upper case wins over lower case)
 */
export function readProxyEnvironment(
	env: NodeJS.ProcessEnv = process.env,
): ProxyEnvironment {
	return {
		httpProxy: env.HTTP_PROXY || env.http_proxy || undefined,
		httpsProxy: env.HTTPS_PROXY || env.https_proxy || undefined,
		noProxy: env.NO_PROXY || env.no_proxy || undefined,
	};
}

function defaultPort(protocol: string): string {
	return protocol === "https:" ? "443" : "80";
}

/**
 * Check a URL against a NO_PROXY list.
 *
 * Entries are comma or space separated and may be:
 * - `*` to bypass the proxy for everything
 * - a host name, matching the host and its subdomains
 * - `.example.com`, matching subdomains only
 * - `host:port`, matching only that port
 */
export function isProxyBypassed(url: URL, noProxy: string | undefined): boolean {
	if (!noProxy) return false;

	const host = url.hostname.toLowerCase();
	const port = url.port || defaultPort(url.protocol);

	for (const rawEntry of noProxy.split(/[\s,]+/)) {
		const entry = rawEntry.trim().toLowerCase();
		if (!entry) continue;
		if (entry === "*") return true;

		const portSeparator = entry.lastIndexOf(":");
		const entryHost = portSeparator > 0 ? entry.slice(0, portSeparator) : entry;
		const entryPort = portSeparator > 0 ? entry.slice(portSeparator + 1) : null;
		if (entryPort && entryPort !== port) continue;

		if (entryHost.startsWith(".")) {
			if (host.endsWith(entryHost)) return true;
			continue;
		}
		if (host === entryHost || host.endsWith(`.${entryHost}`)) return true;
	}

	return false;
}

/**
 * Proxy configuration from environment variables
 */
export class EnvProxyConfig implements ProxyConfig {
	constructor(private readonly settings: ProxyEnvironment = readProxyEnvironment()) {}

	proxyFor(url: URL): string | null {
		if (isProxyBypassed(url, this.settings.noProxy)) return null;
		if (url.protocol === "https:") return this.settings.httpsProxy ?? null;
		if (url.protocol === "http:") return this.settings.httpProxy ?? null;
		return null;
	}
}

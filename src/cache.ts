import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { calculateIntegrity, hashKey, verifyIntegrity } from "./lib/integrity";

/**
 * A cached module or metadata document
 */
export interface CacheEntry {
	/** Resolved key, e.g. "jsr:@x/y@1.3.0/mod.ts" or "meta:jsr:@x/y" */
	key: string;
	content: Buffer;
	/** Integrity of content (sha256-...) */
	integrity: string;
	/** ISO timestamp of the network retrieval */
	fetchedAt: string;
}

/**
 * Sidecar stored next to each content file
 */
interface EntryMetadata {
	key: string;
	integrity: string;
	fetchedAt: string;
}

function isEntryMetadata(value: unknown): value is EntryMetadata {
	if (typeof value !== "object" || value === null) return false;
	const record = new Map(Object.entries(value));
	return (
		typeof record.get("key") === "string" &&
		typeof record.get("integrity") === "string" &&
		typeof record.get("fetchedAt") === "string"
	);
}

/**
 * Write a file so that readers see either the old content or the new one,
 * never a partial write.
 */
export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
	const tempPath = `${path}.${process.pid}.${randomUUID()}.tmp`;
	try {
		await writeFile(tempPath, data);
		await rename(tempPath, path);
	} catch (error) {
		await rm(tempPath, { force: true });
		throw error;
	}
}

/**
 * Content-addressable module cache.
 *
 * Layout: `<dir>/modules/<aa>/<sha256(key)>` for content and
 * `<sha256(key)>.json` for its sidecar. Entries are replaced as a whole,
 * never edited in place. Content is published before its sidecar and an
 * entry only counts when the sidecar's key and integrity match the content,
 * so an interrupted write is simply a miss.
 */
export class ModuleCache {
	constructor(readonly dir: string) {}

	private pathsFor(key: string): { content: string; metadata: string } {
		const hash = hashKey(key);
		const base = join(this.dir, "modules", hash.slice(0, 2), hash);
		return { content: base, metadata: `${base}.json` };
	}

	/**
	 * Read an entry. Missing, partial or corrupted entries read as null.
	 */
	async get(key: string): Promise<CacheEntry | null> {
		const paths = this.pathsFor(key);

		let metadata: unknown;
		let content: Buffer;
		try {
			metadata = JSON.parse(await readFile(paths.metadata, "utf-8"));
			content = await readFile(paths.content);
		} catch {
			return null;
		}

		if (!isEntryMetadata(metadata) || metadata.key !== key) {
			return null;
		}

		if (!verifyIntegrity(content, metadata.integrity)) {
			if (process.env.MODLOCK_DEBUG) {
				console.log(`[cache] Ignoring stale or corrupted entry for ${key}`);
			}
			return null;
		}

		return { key, content, integrity: metadata.integrity, fetchedAt: metadata.fetchedAt };
	}

	/**
	 * Store (or replace) an entry
	 */
	async put(key: string, content: Buffer): Promise<CacheEntry> {
		const paths = this.pathsFor(key);
		const entry: CacheEntry = {
			key,
			content,
			integrity: calculateIntegrity(content),
			fetchedAt: new Date().toISOString(),
		};
		const metadata: EntryMetadata = {
			key,
			integrity: entry.integrity,
			fetchedAt: entry.fetchedAt,
		};

		await writeFileAtomic(paths.content, content);
		await writeFileAtomic(paths.metadata, `${JSON.stringify(metadata, null, 2)}\n`);
		return entry;
	}

	/**
	 * Remove every cached entry
	 */
	async clear(): Promise<void> {
		await rm(join(this.dir, "modules"), { recursive: true, force: true });
	}
}

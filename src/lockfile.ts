import { readFile } from "node:fs/promises";
import { writeFileAtomic } from "./cache";
import {
	IntegrityMismatchError,
	UntrackedDependencyError,
	VersionNotFoundError,
} from "./errors";
import { calculateIntegrity } from "./lib/integrity";
import {
	createEmptyLockfile,
	getEntry,
	type Lockfile,
	parseLockfile,
	serializeLockfile,
	setEntry,
} from "./lib/lockfile";

/**
 * - additive: unseen dependencies are added to the lock file
 * - frozen: unseen dependencies fail with UntrackedDependencyError
 */
export type LockMode = "additive" | "frozen";

/**
 * Lock status of one dependency during a run.
 * "fatal" means its content failed verification; a later write re-locks it.
 */
export type LockStatus = "unlocked" | "locked" | "fatal";

export type VerifyResult = "matched" | "inserted";

/**
 * In-memory view of the lock file with single-writer persistence.
 *
 * verify/write/pin are synchronous and run to completion one at a time, so
 * concurrent graph traversal can't interleave them. Saves are queued so that
 * only one write of the file is ever in progress.
 */
export class LockfileManager {
	private dirty = false;
	private readonly failed = new Set<string>();
	private writeQueue: Promise<void> = Promise.resolve();

	constructor(
		readonly path: string,
		readonly mode: LockMode,
		private readonly data: Lockfile = createEmptyLockfile(),
	) {}

	/**
	 * Read the lock file at `path`, or start an empty one if it doesn't exist
	 *
	 * @throws ConfigError if the file exists but can't be parsed
	 */
	static async load(path: string, mode: LockMode): Promise<LockfileManager> {
		let content: string;
		try {
			content = await readFile(path, "utf-8");
		} catch {
			if (process.env.MODLOCK_DEBUG) {
				console.log(`[lock] No lock file at ${path}, starting empty`);
			}
			return new LockfileManager(path, mode);
		}
		return new LockfileManager(path, mode, parseLockfile(content, path));
	}

	/**
	 * Check content against the lock file.
	 *
	 * @returns "matched" when the recorded hash matches, "inserted" when the
	 *   entry was new and got added (additive mode)
	 * @throws IntegrityMismatchError when the recorded hash differs
	 * @throws UntrackedDependencyError in frozen mode for unrecorded specifiers
	 */
	verify(specifier: string, content: Uint8Array): VerifyResult {
		const actual = calculateIntegrity(content);
		const expected = getEntry(this.data.modules, specifier);

		if (expected !== undefined) {
			if (expected !== actual) {
				this.failed.add(specifier);
				throw new IntegrityMismatchError(specifier, expected, actual);
			}
			return "matched";
		}

		if (this.mode === "frozen") {
			throw new UntrackedDependencyError(specifier);
		}

		setEntry(this.data.modules, specifier, actual);
		this.dirty = true;
		if (process.env.MODLOCK_DEBUG) {
			console.log(`[lock] + ${specifier} ${actual}`);
		}
		return "inserted";
	}

	/**
	 * Record content for a specifier, replacing any existing entry
	 */
	write(specifier: string, content: Uint8Array): void {
		const integrity = calculateIntegrity(content);
		this.failed.delete(specifier);
		if (getEntry(this.data.modules, specifier) === integrity) return;

		setEntry(this.data.modules, specifier, integrity);
		this.dirty = true;
		if (process.env.MODLOCK_DEBUG) {
			console.log(`[lock] = ${specifier} ${integrity}`);
		}
	}

	status(specifier: string): LockStatus {
		if (this.failed.has(specifier)) return "fatal";
		return getEntry(this.data.modules, specifier) === undefined ? "unlocked" : "locked";
	}

	/**
	 * Integrity recorded for a module, if any
	 */
	integrityOf(specifier: string): string | undefined {
		return getEntry(this.data.modules, specifier);
	}

	/**
	 * Version a range specifier (e.g. "jsr:@x/y@^1.2.0") was pinned to
	 */
	lockedVersion(rangeSpecifier: string): string | undefined {
		return getEntry(this.data.specifiers, rangeSpecifier);
	}

	/**
	 * Pin a range specifier to a version.
	 *
	 * @param overwrite - Replace an existing pin (lock-write runs)
	 * @throws UntrackedDependencyError in frozen mode when the range isn't pinned yet
	 * @throws VersionNotFoundError in frozen mode when it is pinned to another version
	 */
	pinVersion(rangeSpecifier: string, version: string, overwrite = false): void {
		const existing = getEntry(this.data.specifiers, rangeSpecifier);
		if (existing === version) return;

		if (this.mode === "frozen") {
			if (existing === undefined) {
				throw new UntrackedDependencyError(rangeSpecifier, `would resolve to ${version}`);
			}
			throw new VersionNotFoundError(rangeSpecifier, existing, [version]);
		}
		if (existing !== undefined && !overwrite) return;

		setEntry(this.data.specifiers, rangeSpecifier, version);
		this.dirty = true;
	}

	get isDirty(): boolean {
		return this.dirty;
	}

	/**
	 * Copy of the current lock file contents
	 */
	snapshot(): Lockfile {
		return {
			version: this.data.version,
			specifiers: { ...this.data.specifiers },
			modules: { ...this.data.modules },
		};
	}

	/**
	 * Persist pending changes. Saves run one after another; a save with
	 * nothing new to write is a no-op.
	 *
	 * @returns true if the file was written
	 */
	save(): Promise<boolean> {
		const run = this.writeQueue.then(() => this.persist());
		// Keep the queue alive after a failed save; the failure reaches the caller through `run`
		this.writeQueue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	private async persist(): Promise<boolean> {
		if (!this.dirty) return false;
		const content = serializeLockfile(this.data);
		this.dirty = false;
		try {
			await writeFileAtomic(this.path, content);
		} catch (error) {
			this.dirty = true;
			throw error;
		}
		if (process.env.MODLOCK_DEBUG) {
			console.log(`[lock] Wrote ${this.path}`);
		}
		return true;
	}
}

/**
 * Advisory, exclusive, non-blocking lock on a conversation directory.
 *
 * The lock is taken on an empty `.lock` marker file inside the directory.
 * While held, proper-lockfile keeps a `.lock.lock` directory next to it and
 * refreshes its mtime from a timer; a lock whose owner died goes stale and
 * can be taken over. Cooperating processes only: nothing stops other writers.
 *
 * Within one process a held directory is never handed out again, whatever
 * the lock's age. Across processes a lock is stale after LOCK_STALE_MS
 * without a refresh.
 */

import lockfile from "proper-lockfile";
import { closeSync, mkdirSync, openSync } from "fs";
import { join, resolve } from "path";
import { LockConflictError } from "./errors.js";
import { getLogger } from "../utils/logger.js";

export const LOCK_FILE_NAME = ".lock";
/** Directory proper-lockfile creates beside the marker while the lock is held */
export const LOCK_ARTIFACT_NAME = `${LOCK_FILE_NAME}.lock`;

/** Age after which another process may take over an unrefreshed lock */
export const LOCK_STALE_MS = 10 * 60 * 1000;
const LOCK_UPDATE_MS = 60 * 1000;

const logger = getLogger("lock");

/** Directories locked by this process */
const heldDirs = new Set<string>();

function isLockedError(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ELOCKED";
}

export class DirectoryLock {
	readonly dir: string;
	readonly markerPath: string;
	private _release: (() => void) | null = null;

	private constructor(dir: string, markerPath: string) {
		this.dir = dir;
		this.markerPath = markerPath;
	}

	/**
	 * Take the lock on `dir`, creating the directory and marker file if needed.
	 * Throws LockConflictError at once when someone else holds it.
	 */
	static acquire(dir: string): DirectoryLock {
		const lockDir = resolve(dir);
		if (heldDirs.has(lockDir)) {
			throw new LockConflictError(dir);
		}

		mkdirSync(lockDir, { recursive: true });
		const markerPath = join(lockDir, LOCK_FILE_NAME);
		closeSync(openSync(markerPath, "a"));

		const lock = new DirectoryLock(lockDir, markerPath);
		try {
			lock._release = lockfile.lockSync(markerPath, {
				realpath: false,
				stale: LOCK_STALE_MS,
				update: LOCK_UPDATE_MS,
				onCompromised: (err) => lock.compromised(err),
			});
		} catch (error) {
			if (isLockedError(error)) {
				throw new LockConflictError(dir);
			}
			throw error;
		}

		heldDirs.add(lockDir);
		logger.debug({ dir: lockDir }, "Acquired lock");
		return lock;
	}

	get held(): boolean {
		return this._release !== null;
	}

	/** proper-lockfile lost the lock; it has already stopped refreshing it. */
	private compromised(err: Error): void {
		logger.error({ err, dir: this.dir }, "Lock on conversation directory was compromised");
		this._release = null;
		heldDirs.delete(this.dir);
	}

	/** Release the lock. Safe to call more than once; failures are logged. */
	release(): void {
		const release = this._release;
		if (!release) return;
		this._release = null;
		heldDirs.delete(this.dir);

		try {
			release();
			logger.debug({ dir: this.dir }, "Released lock");
		} catch (err) {
			logger.warn({ err, dir: this.dir }, "Error releasing lock");
		}
	}
}

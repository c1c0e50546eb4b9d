/**
 * Error types raised by the conversation store.
 */

import { APP_NAME } from "../config.js";

export type ThreadlogErrorCode =
	| "LOCK_CONFLICT"
	| "NOT_FOUND"
	| "DECODE_FAILED"
	| "ALREADY_EXISTS"
	| "INVALID_NAME";

/** Base class for every error the store raises on purpose. */
export class ThreadlogError extends Error {
	readonly code: ThreadlogErrorCode;
	readonly context: Record<string, unknown>;

	constructor(message: string, code: ThreadlogErrorCode, context: Record<string, unknown> = {}) {
		super(message);
		this.name = new.target.name;
		this.code = code;
		this.context = context;
	}

	toJSON(): { name: string; message: string; code: ThreadlogErrorCode; context: Record<string, unknown> } {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			context: this.context,
		};
	}
}

/** Another holder owns the conversation directory's lock. */
export class LockConflictError extends ThreadlogError {
	readonly dir: string;

	constructor(dir: string) {
		super(`Another ${APP_NAME} instance is using ${dir}`, "LOCK_CONFLICT", { dir });
		this.dir = dir;
	}
}

/** A requested log file does not exist and creation was not requested. */
export class ConversationNotFoundError extends ThreadlogError {
	readonly path: string;

	constructor(path: string) {
		super(`Could not find logfile ${path}`, "NOT_FOUND", { path });
		this.path = path;
	}
}

/** A record in a log file could not be decoded. The whole read fails. */
export class LogDecodeError extends ThreadlogError {
	readonly file: string;
	readonly line: number;

	constructor(file: string, line: number, reason: string) {
		super(`Invalid record at ${file}:${line}: ${reason}`, "DECODE_FAILED", { file, line, reason });
		this.file = file;
		this.line = line;
	}
}

/** A fork target directory is already taken. */
export class ConversationExistsError extends ThreadlogError {
	readonly path: string;

	constructor(path: string) {
		super(`Conversation directory already exists: ${path}`, "ALREADY_EXISTS", { path });
		this.path = path;
	}
}

/** A branch or conversation name that cannot be used as a file or directory name. */
export class InvalidNameError extends ThreadlogError {
	readonly value: string;

	constructor(kind: "branch" | "conversation", value: string) {
		super(`Invalid ${kind} name '${value}'`, "INVALID_NAME", { kind, value });
		this.value = value;
	}
}

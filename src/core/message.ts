import { isDeepStrictEqual } from "util";

export type Role = "user" | "assistant" | "system";

export const ROLES: readonly Role[] = ["user", "assistant", "system"];

/** Content prefix that marks a message as a command rather than conversation. */
export const COMMAND_PREFIX = "/";
export const UNDO_COMMAND = `${COMMAND_PREFIX}undo`;

export interface Message {
	readonly role: Role;
	readonly content: string;
	readonly timestamp: Date;
	/** Paths of files attached to the message, in order */
	readonly files: readonly string[];
	readonly pinned?: boolean;
	/** Hidden from display unless explicitly requested */
	readonly hide?: boolean;
	/** Stored, but not echoed when appended */
	readonly quiet?: boolean;
	/** Fields read from storage that this module does not model, kept verbatim */
	readonly extra?: Readonly<Record<string, unknown>>;
}

export interface MessageOptions {
	timestamp?: Date;
	files?: readonly string[];
	pinned?: boolean;
	hide?: boolean;
	quiet?: boolean;
	extra?: Readonly<Record<string, unknown>>;
}

/** On-disk shape of a message: one of these per JSONL line. */
export interface MessageRecord {
	role: Role;
	content: string;
	timestamp: string;
	files: string[];
	pinned?: boolean;
	hide?: boolean;
	quiet?: boolean;
	[key: string]: unknown;
}

export const RECORD_FIELDS: readonly string[] = ["role", "content", "timestamp", "files", "pinned", "hide", "quiet"];

/** Build a frozen message. Arrays and extra fields are copied, never shared with the caller. */
export function createMessage(role: Role, content: string, options: MessageOptions = {}): Message {
	const hasExtra = options.extra !== undefined && Object.keys(options.extra).length > 0;
	return Object.freeze({
		role,
		content,
		timestamp: options.timestamp ?? new Date(),
		files: Object.freeze(options.files ? [...options.files] : []),
		...(options.pinned ? { pinned: true } : {}),
		...(options.hide ? { hide: true } : {}),
		...(options.quiet ? { quiet: true } : {}),
		...(hasExtra ? { extra: Object.freeze({ ...options.extra }) } : {}),
	});
}

/** The message itself when already frozen, otherwise a frozen copy. */
export function freezeMessage(message: Message): Message {
	if (Object.isFrozen(message) && Object.isFrozen(message.files)) {
		return message;
	}
	return createMessage(message.role, message.content, message);
}

export function isCommand(message: Message): boolean {
	return message.content.startsWith(COMMAND_PREFIX);
}

/**
 * Structural equality over every field. Timestamps compare by instant,
 * absent flags equal false, extra fields compare deeply.
 */
export function messagesEqual(a: Message | undefined, b: Message | undefined): boolean {
	if (a === b) return true;
	if (!a || !b) return false;
	return (
		a.role === b.role &&
		a.content === b.content &&
		a.timestamp.getTime() === b.timestamp.getTime() &&
		a.files.length === b.files.length &&
		a.files.every((file, i) => file === b.files[i]) &&
		Boolean(a.pinned) === Boolean(b.pinned) &&
		Boolean(a.hide) === Boolean(b.hide) &&
		Boolean(a.quiet) === Boolean(b.quiet) &&
		isDeepStrictEqual(a.extra ?? {}, b.extra ?? {})
	);
}

export function formatMessage(message: Message): string {
	return `${message.role}: ${message.content}`;
}

export function messageToRecord(message: Message): MessageRecord {
	const record: MessageRecord = {
		...message.extra,
		role: message.role,
		content: message.content,
		timestamp: message.timestamp.toISOString(),
		files: [...message.files],
	};
	if (message.pinned) record.pinned = true;
	if (message.hide) record.hide = true;
	if (message.quiet) record.quiet = true;
	return record;
}

/**
 * JSONL codec for conversation logs.
 *
 * One JSON object per line, UTF-8, newline-terminated. Records are validated
 * against a TypeBox schema; unknown fields are carried through in
 * `Message.extra`. A single bad line fails the whole read.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readFileSync, writeFileSync } from "fs";
import { LogDecodeError } from "./errors.js";
import { createMessage, messageToRecord, RECORD_FIELDS, type Message } from "./message.js";

export const MessageRecordSchema = Type.Object(
	{
		role: Type.Union([Type.Literal("user"), Type.Literal("assistant"), Type.Literal("system")]),
		content: Type.String(),
		timestamp: Type.Optional(Type.String()),
		files: Type.Optional(Type.Array(Type.String())),
		pinned: Type.Optional(Type.Boolean()),
		hide: Type.Optional(Type.Boolean()),
		quiet: Type.Optional(Type.Boolean()),
	},
	{ additionalProperties: true },
);

function describeSchemaError(value: unknown): string {
	const error = Value.Errors(MessageRecordSchema, value).First();
	if (!error) return "record does not match schema";
	return `${error.path || "/"}: ${error.message}`;
}

export function encodeRecord(message: Message): string {
	return JSON.stringify(messageToRecord(message));
}

/**
 * Decode one line. `source` and `lineNumber` only feed the error message.
 * A record without a timestamp is stamped with the current time.
 */
export function decodeRecord(line: string, source: string, lineNumber: number): Message {
	let parsed: unknown;
	try {
		parsed = JSON.parse(line);
	} catch (error) {
		throw new LogDecodeError(source, lineNumber, error instanceof Error ? error.message : String(error));
	}

	if (!Value.Check(MessageRecordSchema, parsed)) {
		throw new LogDecodeError(source, lineNumber, describeSchemaError(parsed));
	}

	let timestamp = new Date();
	if (parsed.timestamp !== undefined) {
		timestamp = new Date(parsed.timestamp);
		if (Number.isNaN(timestamp.getTime())) {
			throw new LogDecodeError(source, lineNumber, `invalid timestamp '${parsed.timestamp}'`);
		}
	}

	// fromEntries defines keys such as "__proto__" as own fields
	const extra = Object.fromEntries(Object.entries(parsed).filter(([key]) => !RECORD_FIELDS.includes(key)));

	return createMessage(parsed.role, parsed.content, {
		timestamp,
		files: parsed.files,
		pinned: parsed.pinned,
		hide: parsed.hide,
		quiet: parsed.quiet,
		extra,
	});
}

/**
 * Decode JSONL content. Blank lines are skipped. With a `limit`, decoding
 * stops once that many records are read and later lines are never parsed.
 */
export function parseJsonl(content: string, source: string, limit?: number): Message[] {
	const messages: Message[] = [];
	const lines = content.split("\n");

	for (let i = 0; i < lines.length; i++) {
		if (limit && messages.length >= limit) break;
		const line = lines[i];
		if (!line.trim()) continue;
		messages.push(decodeRecord(line, source, i + 1));
	}

	return messages;
}

export function serializeJsonl(messages: Iterable<Message>): string {
	let out = "";
	for (const message of messages) {
		out += `${encodeRecord(message)}\n`;
	}
	return out;
}

export function readJsonlFile(path: string, limit?: number): Message[] {
	return parseJsonl(readFileSync(path, "utf-8"), path, limit);
}

export function writeJsonlFile(path: string, messages: Iterable<Message>): void {
	writeFileSync(path, serializeJsonl(messages), "utf-8");
}

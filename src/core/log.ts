import { readJsonlFile, writeJsonlFile } from "./jsonl.js";
import { freezeMessage, messagesEqual, type Message } from "./message.js";
import type { Display } from "../modes/print.js";

/**
 * An immutable, ordered sequence of messages.
 *
 * Every mutation returns a new Log; the backing array is a frozen copy and
 * is never shared with a caller-owned array. Messages are frozen too, so
 * branches that share a message cannot change it for each other.
 */
export class Log implements Iterable<Message> {
	private readonly _messages: readonly Message[];

	constructor(messages: Iterable<Message> = []) {
		this._messages = Object.freeze(Array.from(messages, freezeMessage));
	}

	get messages(): readonly Message[] {
		return this._messages;
	}

	get length(): number {
		return this._messages.length;
	}

	/** Message at `index`; negative indices count from the end. */
	at(index: number): Message | undefined {
		return this._messages.at(index);
	}

	last(): Message | undefined {
		return this._messages.at(-1);
	}

	slice(start?: number, end?: number): Log {
		return new Log(this._messages.slice(start, end));
	}

	[Symbol.iterator](): Iterator<Message> {
		return this._messages[Symbol.iterator]();
	}

	append(message: Message): Log {
		return new Log([...this._messages, message]);
	}

	/** Drop the last message. Popping an empty log returns an empty log. */
	pop(): Log {
		return new Log(this._messages.slice(0, -1));
	}

	equals(other: Log): boolean {
		return (
			this.length === other.length &&
			this._messages.every((message, i) => messagesEqual(message, other._messages[i]))
		);
	}

	/** Read a log from a JSONL file. A `limit` of 0 or undefined reads everything. */
	static readJsonl(path: string, limit?: number): Log {
		return new Log(readJsonlFile(path, limit));
	}

	writeJsonl(path: string): void {
		writeJsonlFile(path, this._messages);
	}

	print(display: Display, showHidden: boolean = false): void {
		for (const message of this._messages) {
			if (message.hide && !showHidden) continue;
			display.printMessage(message);
		}
	}
}

import { mkdirSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createMessage, type Message, type MessageOptions, type Role } from '../src/core/message.js';
import type { Display, NoticeTone } from '../src/modes/print.js';

/** Display that keeps everything it is asked to show. */
export class RecordingDisplay implements Display {
	messages: Message[] = [];
	notices: { text: string; tone: NoticeTone }[] = [];

	printMessage(message: Message): void {
		this.messages.push(message);
	}

	printNotice(text: string, tone: NoticeTone = 'info'): void {
		this.notices.push({ text, tone });
	}
}

const BASE_TIME = Date.UTC(2024, 0, 1, 12, 0, 0);

/** Message with a fixed timestamp, `minute` minutes after 2024-01-01T12:00:00Z. */
export function msg(role: Role, content: string, minute: number = 0, options: MessageOptions = {}): Message {
	return createMessage(role, content, { timestamp: new Date(BASE_TIME + minute * 60_000), ...options });
}

export function makeTestDir(prefix: string): string {
	const dir = join(tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
	mkdirSync(dir, { recursive: true });
	return dir;
}

import chalk from "chalk";
import type { Message, Role } from "../core/message.js";

export type NoticeTone = "info" | "warning" | "removed";

/**
 * Where messages and user-facing notices go. The console implementation is
 * the default; tests and embedders supply their own.
 */
export interface Display {
	printMessage(message: Message): void;
	printNotice(text: string, tone?: NoticeTone): void;
}

const ROLE_STYLES: Record<Role, (text: string) => string> = {
	user: chalk.bold.green,
	assistant: chalk.bold.cyan,
	system: chalk.bold.gray,
};

const NOTICE_STYLES: Record<NoticeTone, (text: string) => string> = {
	info: (text) => text,
	warning: chalk.yellow,
	removed: chalk.red,
};

export interface RenderOptions {
	/** Collapse the content onto a single line */
	oneline?: boolean;
}

export function renderMessage(message: Message, options: RenderOptions = {}): string {
	const content = options.oneline ? message.content.replace(/\s*\n\s*/g, " ").trim() : message.content;
	let rendered = `${ROLE_STYLES[message.role](message.role)}: ${content}`;
	if (message.files.length > 0) {
		rendered += chalk.dim(`\n  files: ${message.files.join(", ")}`);
	}
	return rendered;
}

export class ConsoleDisplay implements Display {
	private out: NodeJS.WritableStream;
	private options: RenderOptions;

	constructor(out: NodeJS.WritableStream = process.stdout, options: RenderOptions = {}) {
		this.out = out;
		this.options = options;
	}

	printMessage(message: Message): void {
		this.out.write(`${renderMessage(message, this.options)}\n`);
	}

	printNotice(text: string, tone: NoticeTone = "info"): void {
		this.out.write(`${NOTICE_STYLES[tone](text)}\n`);
	}
}

import { existsSync, readdirSync, readFileSync, realpathSync, statSync } from "fs";
import { join } from "path";
import { getLogsDir } from "../config.js";
import { ChatConfig } from "./chat-config.js";
import { BRANCHES_DIR, MAIN_LOG_FILE, WORKSPACE_LINK } from "./conversation-manager.js";
import { parseJsonl } from "./jsonl.js";

export interface ConversationMeta {
	id: string;
	/** Display name, or the id when none is configured */
	name: string;
	/** Path of the main log file */
	path: string;
	/** Epoch ms of the first message, or of the last modification for empty logs */
	created: number;
	/** Epoch ms */
	modified: number;
	messages: number;
	/** Main branch included */
	branches: number;
	workspace: string;
}

export interface ListConversationsOptions {
	limit?: number;
	includeTest?: boolean;
	logsDir?: string;
}

const TEST_ID_PREFIXES = ["tmp", "test-"];
const TEST_ID_MARKERS = ["-evals-"];

export function formatConversationMeta(meta: ConversationMeta, withMetadata: boolean = false): string {
	let output = `${meta.name} (id: ${meta.id})`;
	if (withMetadata) {
		output += `\nMessages: ${meta.messages}`;
		output += `\nCreated:  ${new Date(meta.created).toISOString()}`;
		output += `\nModified: ${new Date(meta.modified).toISOString()}`;
		if (meta.branches > 1) {
			output += `\n(${meta.branches} branches)`;
		}
	}
	return output;
}

/** Main log files under the logs root, most recently modified first. */
function conversationFiles(logsDir: string): { id: string; path: string; mtime: number }[] {
	if (!existsSync(logsDir)) return [];

	return readdirSync(logsDir, { withFileTypes: true })
		.filter((entry) => entry.isDirectory())
		.map((entry) => ({ id: entry.name, path: join(logsDir, entry.name, MAIN_LOG_FILE) }))
		.filter((file) => existsSync(file.path))
		.map((file) => ({ ...file, mtime: statSync(file.path).mtimeMs }))
		.sort((a, b) => b.mtime - a.mtime);
}

function countBranchFiles(logdir: string): number {
	const branchesDir = join(logdir, BRANCHES_DIR);
	if (!existsSync(branchesDir)) return 0;
	return readdirSync(branchesDir).filter((file) => file.endsWith(".jsonl")).length;
}

function resolveWorkspace(logdir: string, config: ChatConfig): string {
	const configured = config.getWorkspace();
	if (configured) return configured;
	const link = join(logdir, WORKSPACE_LINK);
	return existsSync(link) ? realpathSync(link) : "";
}

/** Every stored conversation, most recently modified first. */
export function* getConversations(logsDir: string = getLogsDir()): Generator<ConversationMeta> {
	for (const file of conversationFiles(logsDir)) {
		const content = readFileSync(file.path, "utf-8");
		const [first] = parseJsonl(content, file.path, 1);
		const logdir = join(logsDir, file.id);
		const config = ChatConfig.fromLogdir(logdir);

		yield {
			id: file.id,
			name: config.getName() || file.id,
			path: file.path,
			created: first ? first.timestamp.getTime() : file.mtime,
			modified: file.mtime,
			messages: content.split("\n").filter((line) => line.trim()).length,
			branches: 1 + countBranchFiles(logdir),
			workspace: resolveWorkspace(logdir, config),
		};
	}
}

export function isTestConversation(id: string): boolean {
	return TEST_ID_PREFIXES.some((prefix) => id.startsWith(prefix)) || TEST_ID_MARKERS.some((marker) => id.includes(marker));
}

/** Stored conversations, leaving out the ones made by tests and evals. */
export function* getUserConversations(logsDir: string = getLogsDir()): Generator<ConversationMeta> {
	for (const conversation of getConversations(logsDir)) {
		if (isTestConversation(conversation.id)) continue;
		yield conversation;
	}
}

export function listConversations(options: ListConversationsOptions = {}): ConversationMeta[] {
	const { limit = 20, includeTest = false, logsDir = getLogsDir() } = options;
	const conversations = includeTest ? getConversations(logsDir) : getUserConversations(logsDir);

	const result: ConversationMeta[] = [];
	for (const conversation of conversations) {
		if (result.length >= limit) break;
		result.push(conversation);
	}
	return result;
}

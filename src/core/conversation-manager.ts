/**
 * ConversationManager - branch registry for one conversation directory.
 *
 * Layout of a conversation directory:
 *   conversation.jsonl        the "main" branch
 *   branches/<name>.jsonl     every other branch
 *   .lock                     marker for the advisory directory lock
 *   workspace                 optional link to the working directory
 *   config.json               optional display name / workspace
 *
 * Edits and undos never destroy history: the content they replace is first
 * saved to a backup branch named `<branch>-<edit|undo>-<n>`.
 */

import { cpSync, existsSync, mkdirSync, mkdtempSync, readdirSync, realpathSync } from "fs";
import { tmpdir } from "os";
import { basename, dirname, isAbsolute, join, resolve } from "path";
import { APP_NAME, getLogsDir, isLockingEnabled } from "../config.js";
import { ChatConfig } from "./chat-config.js";
import { DirectoryLock, LOCK_ARTIFACT_NAME, LOCK_FILE_NAME } from "./directory-lock.js";
import { computeDivergence } from "./divergence.js";
import { ConversationExistsError, ConversationNotFoundError, InvalidNameError } from "./errors.js";
import { Log } from "./log.js";
import { isCommand, messageToRecord, UNDO_COMMAND, type Message, type MessageRecord } from "./message.js";
import { ConsoleDisplay, type Display } from "../modes/print.js";
import { getLogger } from "../utils/logger.js";
import { shorten } from "../utils/text.js";

export const MAIN_BRANCH = "main";
export const MAIN_LOG_FILE = "conversation.jsonl";
export const BRANCHES_DIR = "branches";
export const WORKSPACE_LINK = "workspace";

const UNDO_PREVIEW_WIDTH = 50;

export type BackupType = "edit" | "undo";

export interface ConversationManagerOptions {
	/** Conversation directory. A fresh temporary directory when omitted. */
	logdir?: string;
	/** Branch the initial messages belong to (default: "main") */
	branch?: string;
	/** Take the advisory directory lock (default: isLockingEnabled()) */
	lock?: boolean;
	/** Root holding all conversation directories; used to resolve ids and fork targets */
	logsDir?: string;
	display?: Display;
}

export interface LoadOptions extends Omit<ConversationManagerOptions, "logdir"> {
	/** Seed for the branch when its file is empty */
	initialMessages?: Message[];
	/** Create an empty log file for the branch instead of failing when it is missing */
	create?: boolean;
}

export interface ConversationDict {
	id: string;
	name: string;
	log: MessageRecord[];
	logfile: string;
	branches?: Record<string, MessageRecord[]>;
}

const logger = getLogger("conversation");

function assertValidName(kind: "branch" | "conversation", name: string): void {
	if (!name || name === "." || name === ".." || /[/\\]/.test(name)) {
		throw new InvalidNameError(kind, name);
	}
}

/** Path of a branch's log file inside a conversation directory. */
export function branchLogfile(logdir: string, branch: string): string {
	if (branch === MAIN_BRANCH) {
		return join(logdir, MAIN_LOG_FILE);
	}
	return join(logdir, BRANCHES_DIR, `${branch}.jsonl`);
}

export class ConversationManager {
	private _logdir: string;
	private _logsDir: string;
	private _currentBranch: string;
	private _branches: Map<string, Log>;
	private _lock: DirectoryLock | null = null;
	private _lockEnabled: boolean;
	private _display: Display;

	private constructor(messages: Iterable<Message>, options: ConversationManagerOptions) {
		this._currentBranch = options.branch ?? MAIN_BRANCH;
		assertValidName("branch", this._currentBranch);
		this._logsDir = options.logsDir ?? getLogsDir();
		this._lockEnabled = options.lock ?? isLockingEnabled();
		this._display = options.display ?? new ConsoleDisplay();

		if (options.logdir) {
			this._logdir = resolve(options.logdir);
			mkdirSync(this._logdir, { recursive: true });
		} else {
			this._logdir = mkdtempSync(join(tmpdir(), `${APP_NAME}-`));
			logger.warn({ logdir: this._logdir }, "No logdir specified, using temporary directory");
		}

		if (this._lockEnabled) {
			this._lock = DirectoryLock.acquire(this._logdir);
		}

		try {
			this._branches = this.loadBranches(messages);
		} catch (error) {
			this.close();
			throw error;
		}
	}

	/**
	 * Seed the given branch with `messages`, then pick up "main" and every
	 * branch file already on disk that is not seeded.
	 */
	private loadBranches(messages: Iterable<Message>): Map<string, Log> {
		const branches = new Map<string, Log>([[this._currentBranch, new Log(messages)]]);

		if (!branches.has(MAIN_BRANCH)) {
			const mainFile = join(this._logdir, MAIN_LOG_FILE);
			branches.set(MAIN_BRANCH, existsSync(mainFile) ? Log.readJsonl(mainFile) : new Log());
		}

		const branchesDir = join(this._logdir, BRANCHES_DIR);
		if (existsSync(branchesDir)) {
			const files = readdirSync(branchesDir, { withFileTypes: true })
				.filter((entry) => entry.isFile() && entry.name.endsWith(".jsonl"))
				.map((entry) => entry.name)
				.sort();

			for (const file of files) {
				const name = basename(file, ".jsonl");
				if (name === this.chatId || branches.has(name)) continue;
				branches.set(name, Log.readJsonl(join(branchesDir, file)));
			}
		}

		return branches;
	}

	// =========================================================================
	// Creation
	// =========================================================================

	/** Create a manager from messages held in memory. */
	static create(messages: Message[] = [], options: ConversationManagerOptions = {}): ConversationManager {
		return new ConversationManager(messages, options);
	}

	/**
	 * Load a stored conversation.
	 *
	 * `path` may be a conversation directory, the path of a log file inside one,
	 * or an id / relative path resolved against the logs root.
	 */
	static load(path: string, options: LoadOptions = {}): ConversationManager {
		const { initialMessages, create, ...managerOptions } = options;
		const logsDir = managerOptions.logsDir ?? getLogsDir();
		const branch = managerOptions.branch ?? MAIN_BRANCH;
		assertValidName("branch", branch);

		let logdir = path.endsWith(".jsonl") ? dirname(path) : path;
		if (!isAbsolute(logdir)) {
			logdir = join(logsDir, logdir);
		}

		const logfile = branchLogfile(logdir, branch);
		if (!existsSync(logfile)) {
			if (!create) {
				throw new ConversationNotFoundError(logfile);
			}
			logger.debug({ logfile }, "Creating new logfile");
			mkdirSync(dirname(logfile), { recursive: true });
			new Log().writeJsonl(logfile);
		}

		const log = Log.readJsonl(logfile);
		const messages = log.length > 0 ? log.messages : (initialMessages ?? []);
		return new ConversationManager(messages, { ...managerOptions, logdir, logsDir, branch });
	}

	// =========================================================================
	// Properties
	// =========================================================================

	get chatId(): string {
		return basename(this._logdir);
	}

	get logdir(): string {
		return this._logdir;
	}

	get logsDir(): string {
		return this._logsDir;
	}

	get currentBranch(): string {
		return this._currentBranch;
	}

	get log(): Log {
		const log = this._branches.get(this._currentBranch);
		if (!log) {
			throw new Error(`Branch '${this._currentBranch}' is not loaded`);
		}
		return log;
	}

	set log(value: Log | Message[]) {
		this._branches.set(this._currentBranch, value instanceof Log ? value : new Log(value));
	}

	/** File the current branch is written to */
	get logfile(): string {
		return branchLogfile(this._logdir, this._currentBranch);
	}

	/** Display name from config.json, falling back to the directory id */
	get name(): string {
		return ChatConfig.fromLogdir(this._logdir).getName() || this.chatId;
	}

	/** Workspace path, with the workspace link resolved when it exists */
	get workspace(): string {
		const link = join(this._logdir, WORKSPACE_LINK);
		return existsSync(link) ? realpathSync(link) : resolve(link);
	}

	/** Branch names in insertion order */
	get branchNames(): string[] {
		return Array.from(this._branches.keys());
	}

	getBranch(name: string): Log | undefined {
		return this._branches.get(name);
	}

	isLocked(): boolean {
		return this._lock?.held ?? false;
	}

	// =========================================================================
	// Mutation
	// =========================================================================

	/** Append a message to the current branch, persist, and display it unless quiet. */
	append(message: Message): void {
		this.log = this.log.append(message);
		this.write();
		if (!message.quiet) {
			this._display.printMessage(message);
		}
	}

	/**
	 * Write the current branch to its logfile and, with `includeBranches`,
	 * every branch other than "main" to branches/.
	 *
	 * "main" is only written while it is the current branch.
	 */
	write(includeBranches: boolean = true): void {
		const logfile = this.logfile;
		mkdirSync(dirname(logfile), { recursive: true });
		this.log.writeJsonl(logfile);

		if (includeBranches) {
			const branchesDir = join(this._logdir, BRANCHES_DIR);
			mkdirSync(branchesDir, { recursive: true });
			for (const [name, log] of this._branches) {
				if (name === MAIN_BRANCH) continue;
				log.writeJsonl(join(branchesDir, `${name}.jsonl`));
			}
		}
	}

	/** Save the current branch's content to a new backup branch and persist. */
	private saveBackupBranch(type: BackupType): string {
		const prefix = `${this._currentBranch}-${type}-`;
		let n = this.branchNames.filter((name) => name.startsWith(prefix)).length;
		// branches created out-of-band can occupy the counted slot
		while (this._branches.has(`${prefix}${n}`)) n++;

		const name = `${prefix}${n}`;
		this._branches.set(name, this.log);
		logger.debug({ branch: name }, "Saved backup branch");
		this.write();
		return name;
	}

	/** Replace the current branch's content, keeping the old content in a backup branch. */
	edit(newLog: Log | Message[]): void {
		const next = newLog instanceof Log ? newLog : new Log(newLog);
		this.saveBackupBranch("edit");
		this.log = next;
		this.write();
	}

	/**
	 * Remove the last `n` messages.
	 *
	 * A trailing undo command is dropped first and not counted. The content
	 * before removal is saved to a backup branch, unless the last remaining
	 * message is itself a command.
	 */
	undo(n: number = 1, quiet: boolean = false): void {
		const trailing = this.log.last();
		if (trailing && trailing.content.startsWith(UNDO_COMMAND)) {
			this.log = this.log.pop();
		}

		const last = this.log.last();
		if (!last) {
			this._display.printNotice("Nothing to undo.", "warning");
			return;
		}

		if (!isCommand(last)) {
			this.saveBackupBranch("undo");
		}

		if (!quiet) {
			this._display.printNotice("Undoing messages:", "warning");
		}
		for (let i = 0; i < n; i++) {
			const removed = this.log.last();
			if (!removed) break;
			this.log = this.log.pop();
			if (!quiet) {
				this._display.printNotice(
					`  ${removed.role}: ${shorten(removed.content, UNDO_PREVIEW_WIDTH)}`,
					"removed",
				);
			}
		}

		this.write();
	}

	/** Switch to a branch, creating it from the current branch if it does not exist. */
	branch(name: string): void {
		assertValidName("branch", name);
		this.write();
		if (!this._branches.has(name)) {
			logger.info({ branch: name }, `Creating a new branch '${name}'`);
			this._branches.set(name, this.log);
		}
		this._currentBranch = name;
	}

	/**
	 * Diff the current branch against another: the current branch's messages
	 * after the divergence point as `+` lines, the other's as `-` lines.
	 * Null when they are equal or the branch does not exist.
	 */
	diff(branch: string): string | null {
		const other = this._branches.get(branch);
		if (!other) {
			logger.warn({ branch }, `Branch '${branch}' does not exist.`);
			return null;
		}
		return computeDivergence(this.log, other);
	}

	/**
	 * Copy the whole conversation directory to `<logsDir>/<newId>` and continue
	 * working there. The original directory is left as it was.
	 */
	fork(newId: string): void {
		assertValidName("conversation", newId);
		this.write();

		const source = this._logdir;
		const target = join(this._logsDir, newId);
		if (existsSync(target)) {
			throw new ConversationExistsError(target);
		}

		mkdirSync(dirname(target), { recursive: true });
		cpSync(source, target, {
			recursive: true,
			filter: (src) =>
				!(dirname(src) === source && [LOCK_FILE_NAME, LOCK_ARTIFACT_NAME].includes(basename(src))),
		});

		if (this._lockEnabled) {
			const lock = DirectoryLock.acquire(target);
			this._lock?.release();
			this._lock = lock;
		}

		this._logdir = target;
		logger.info({ from: source, to: target }, "Forked conversation");
		this.write();
	}

	toDict(includeBranches: boolean = false): ConversationDict {
		const dict: ConversationDict = {
			id: this.chatId,
			name: this.name,
			log: this.log.messages.map(messageToRecord),
			logfile: this.logfile,
		};
		if (includeBranches) {
			dict.branches = {};
			for (const [name, log] of this._branches) {
				dict.branches[name] = log.messages.map(messageToRecord);
			}
		}
		return dict;
	}

	/** Release the directory lock. Safe to call more than once. */
	close(): void {
		this._lock?.release();
		this._lock = null;
	}
}

/** Run `fn` with the manager and close it afterwards, whatever happens. */
export function withConversation<T>(manager: ConversationManager, fn: (manager: ConversationManager) => T): T {
	try {
		return fn(manager);
	} finally {
		manager.close();
	}
}

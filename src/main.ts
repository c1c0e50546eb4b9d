import chalk from "chalk";
import { parseArgs, type Args } from "./cli/args.js";
import { APP_NAME, getLogsDir, VERSION } from "./config.js";
import { formatConversationMeta, listConversations } from "./core/catalog.js";
import { ConversationManager, withConversation } from "./core/conversation-manager.js";
import { ConsoleDisplay, type Display } from "./modes/print.js";

export interface MainContext {
	logsDir?: string;
	display?: Display;
}

const USAGE = `Usage: ${APP_NAME} <command> [options]

Commands:
  list [--all] [--limit N]       List stored conversations
  show <id> [--branch NAME]      Print a conversation
  diff <id> <branch>             Diff the main branch against another branch
  undo <id> [N]                  Remove the last N messages (default 1)
  fork <id> <new-id>             Copy a conversation under a new id

Options:
  -h, --help                     Show this help
  -v, --version                  Show the version`;

function requirePositionals(args: Args, count: number, usage: string): string[] {
	if (args.positionals.length < count) {
		throw new Error(`Usage: ${APP_NAME} ${usage}`);
	}
	return args.positionals;
}

function run(args: Args, logsDir: string, display: Display): void {
	switch (args.command) {
		case "list": {
			const conversations = listConversations({ limit: args.limit, includeTest: args.all, logsDir });
			if (conversations.length === 0) {
				console.log(chalk.dim("No conversations found"));
				return;
			}
			for (const conversation of conversations) {
				console.log(formatConversationMeta(conversation));
			}
			return;
		}

		case "show": {
			const [id] = requirePositionals(args, 1, "show <id> [--branch NAME]");
			const manager = ConversationManager.load(id, { logsDir, branch: args.branch, lock: false, display });
			withConversation(manager, (conversation) => {
				console.log(chalk.bold(`${conversation.name} (${conversation.currentBranch})`));
				conversation.log.print(display);
			});
			return;
		}

		case "diff": {
			const [id, branch] = requirePositionals(args, 2, "diff <id> <branch>");
			const manager = ConversationManager.load(id, { logsDir, lock: false, display });
			withConversation(manager, (conversation) => {
				if (!conversation.getBranch(branch)) {
					throw new Error(`Branch '${branch}' does not exist.`);
				}
				console.log(conversation.diff(branch) ?? chalk.dim("No differences"));
			});
			return;
		}

		case "undo": {
			const [id, count] = requirePositionals(args, 1, "undo <id> [N]");
			const n = count === undefined ? 1 : Number.parseInt(count, 10);
			if (!Number.isInteger(n) || n < 1) {
				throw new Error(`Invalid message count '${count}'`);
			}
			withConversation(ConversationManager.load(id, { logsDir, display }), (conversation) => {
				conversation.undo(n);
			});
			return;
		}

		case "fork": {
			const [id, newId] = requirePositionals(args, 2, "fork <id> <new-id>");
			withConversation(ConversationManager.load(id, { logsDir, display }), (conversation) => {
				conversation.fork(newId);
				console.log(`Forked ${id} to ${conversation.logdir}`);
			});
			return;
		}

		case undefined:
			throw new Error(args.unknown ? `Unknown command '${args.unknown}'\n\n${USAGE}` : USAGE);
	}
}

/** Run the CLI. Returns the process exit code. */
export function main(argv: string[], context: MainContext = {}): number {
	const args = parseArgs(argv);

	if (args.version) {
		console.log(VERSION);
		return 0;
	}
	if (args.help) {
		console.log(USAGE);
		return 0;
	}

	try {
		run(args, context.logsDir ?? getLogsDir(), context.display ?? new ConsoleDisplay());
		return 0;
	} catch (error: unknown) {
		const errorMessage = error instanceof Error ? error.message : "Unknown error occurred";
		console.error(chalk.red(errorMessage));
		return 1;
	}
}

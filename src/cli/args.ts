export const COMMANDS = ["list", "show", "diff", "undo", "fork"] as const;

export type Command = (typeof COMMANDS)[number];

export interface Args {
	command?: Command;
	/** Arguments after the command, flags removed */
	positionals: string[];
	/** First token that is neither a flag nor a known command */
	unknown?: string;
	all?: boolean;
	limit?: number;
	branch?: string;
	help?: boolean;
	version?: boolean;
}

function isCommand(value: string): value is Command {
	return COMMANDS.some((command) => command === value);
}

export function parseArgs(args: string[]): Args {
	const result: Args = {
		positionals: [],
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === "--all" || arg === "-a") {
			result.all = true;
		} else if ((arg === "--limit" || arg === "-n") && i + 1 < args.length) {
			const limit = Number.parseInt(args[++i], 10);
			if (Number.isFinite(limit) && limit > 0) {
				result.limit = limit;
			}
		} else if ((arg === "--branch" || arg === "-b") && i + 1 < args.length) {
			result.branch = args[++i];
		} else if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "--version" || arg === "-v") {
			result.version = true;
		} else if (result.command === undefined && result.unknown === undefined) {
			if (isCommand(arg)) {
				result.command = arg;
			} else {
				result.unknown = arg;
			}
		} else {
			result.positionals.push(arg);
		}
	}
	return result;
}

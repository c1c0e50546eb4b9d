import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { getLogger } from "../utils/logger.js";

export const CHAT_CONFIG_FILE = "config.json";

const ChatSettingsSchema = Type.Object(
	{
		/** Display name shown instead of the directory id */
		name: Type.Optional(Type.String()),
		/** Working directory the conversation operates in */
		workspace: Type.Optional(Type.String()),
	},
	{ additionalProperties: true },
);

export type ChatSettings = Static<typeof ChatSettingsSchema>;

const logger = getLogger("chat-config");

/** Per-conversation settings stored as config.json in the conversation directory. */
export class ChatConfig {
	private configPath: string | null;
	private settings: ChatSettings;
	private persist: boolean;

	private constructor(configPath: string | null, settings: ChatSettings, persist: boolean) {
		this.configPath = configPath;
		this.settings = settings;
		this.persist = persist;
	}

	/** Load the config of a conversation directory. A missing file gives an empty config. */
	static fromLogdir(logdir: string): ChatConfig {
		const configPath = join(logdir, CHAT_CONFIG_FILE);
		return new ChatConfig(configPath, ChatConfig.loadFromFile(configPath), true);
	}

	/** Create an in-memory ChatConfig (no file I/O) */
	static inMemory(settings: ChatSettings = {}): ChatConfig {
		return new ChatConfig(null, { ...settings }, false);
	}

	private static loadFromFile(path: string): ChatSettings {
		if (!existsSync(path)) {
			return {};
		}
		try {
			const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
			if (!Value.Check(ChatSettingsSchema, parsed)) {
				const error = Value.Errors(ChatSettingsSchema, parsed).First();
				logger.warn({ path, error: error?.message }, "Ignoring invalid chat config");
				return {};
			}
			return parsed;
		} catch (err) {
			logger.warn({ err, path }, "Could not read chat config");
			return {};
		}
	}

	private save(): void {
		if (!this.persist || !this.configPath) return;

		try {
			const dir = dirname(this.configPath);
			if (!existsSync(dir)) {
				mkdirSync(dir, { recursive: true });
			}

			writeFileSync(this.configPath, JSON.stringify(this.settings, null, 2), "utf-8");
		} catch (err) {
			logger.warn({ err, path: this.configPath }, "Could not save chat config");
		}
	}

	getName(): string | undefined {
		return this.settings.name;
	}

	setName(name: string | undefined): void {
		this.settings.name = name;
		this.save();
	}

	getWorkspace(): string | undefined {
		return this.settings.workspace;
	}

	setWorkspace(path: string | undefined): void {
		this.settings.workspace = path;
		this.save();
	}
}

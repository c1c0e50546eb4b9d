/**
 * Public API exports for threadlog
 *
 * This file defines the public API surface for programmatic usage of the store.
 */

// Conversation store
export {
	ConversationManager,
	withConversation,
	branchLogfile,
	MAIN_BRANCH,
	MAIN_LOG_FILE,
	BRANCHES_DIR,
	WORKSPACE_LINK,
	type BackupType,
	type ConversationDict,
	type ConversationManagerOptions,
	type LoadOptions,
} from "./core/conversation-manager.js";
export { Log } from "./core/log.js";
export {
	createMessage,
	formatMessage,
	freezeMessage,
	isCommand,
	messagesEqual,
	messageToRecord,
	COMMAND_PREFIX,
	ROLES,
	UNDO_COMMAND,
	type Message,
	type MessageOptions,
	type MessageRecord,
	type Role,
} from "./core/message.js";
export {
	decodeRecord,
	encodeRecord,
	parseJsonl,
	readJsonlFile,
	serializeJsonl,
	writeJsonlFile,
	MessageRecordSchema,
} from "./core/jsonl.js";
export { computeDivergence, divergenceIndex } from "./core/divergence.js";
export { DirectoryLock, LOCK_FILE_NAME } from "./core/directory-lock.js";

// Catalog and per-conversation config
export {
	formatConversationMeta,
	getConversations,
	getUserConversations,
	isTestConversation,
	listConversations,
	type ConversationMeta,
	type ListConversationsOptions,
} from "./core/catalog.js";
export { ChatConfig, CHAT_CONFIG_FILE, type ChatSettings } from "./core/chat-config.js";
export { prepareMessages, type PreparePipeline } from "./core/prepare.js";

// Errors
export {
	ThreadlogError,
	LockConflictError,
	ConversationNotFoundError,
	ConversationExistsError,
	LogDecodeError,
	InvalidNameError,
	type ThreadlogErrorCode,
} from "./core/errors.js";

// Display and configuration
export { ConsoleDisplay, renderMessage, type Display, type NoticeTone } from "./modes/print.js";
export { getDataDir, getLogsDir, isLockingEnabled, APP_NAME, VERSION } from "./config.js";
export { getLogger, setLogLevel, type LogLevel } from "./utils/logger.js";

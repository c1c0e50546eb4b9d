import type { Message } from "./message.js";
import { getLogger } from "../utils/logger.js";

/**
 * Collaborators that turn a stored conversation into what gets sent to a
 * model. None of them live in this package.
 */
export interface PreparePipeline {
	/** Model whose context budget and tokenizer apply */
	model: string;
	/** Add context such as file contents */
	enrich(messages: Message[], workspace: string | undefined): Message[];
	/** Shrink oversized messages */
	reduce(messages: Message[]): Message[];
	/** Drop messages until the log fits the model's context window */
	limit(messages: Message[]): Message[];
	countTokens(messages: Message[], model: string): number;
}

const logger = getLogger("prepare");

/** Enrich, then reduce, then limit the stored messages. */
export function prepareMessages(messages: Message[], pipeline: PreparePipeline, workspace?: string): Message[] {
	const enriched = pipeline.enrich(messages, workspace);
	const reduced = pipeline.reduce(enriched);

	const tokensBefore = pipeline.countTokens(enriched, pipeline.model);
	const tokensAfter = pipeline.countTokens(reduced, pipeline.model);
	if (tokensBefore !== tokensAfter) {
		logger.info(`Reduced log from ${tokensBefore} to ${tokensAfter} tokens`);
	}

	const limited = pipeline.limit(reduced);
	if (limited.length !== reduced.length) {
		logger.info(`Limited log from ${reduced.length} to ${limited.length} messages`);
	}

	return limited;
}

import type { Log } from "./log.js";
import { formatMessage, messagesEqual } from "./message.js";

/**
 * First index at which the two logs hold different messages. Positions past
 * the end of the shorter log count as absent, so a strict prefix diverges at
 * its own length. Returns null when the logs are equal.
 */
export function divergenceIndex(a: Log, b: Log): number | null {
	const length = Math.max(a.length, b.length);
	for (let i = 0; i < length; i++) {
		if (!messagesEqual(a.at(i), b.at(i))) {
			return i;
		}
	}
	return null;
}

/**
 * Render where `current` and `other` part ways: the rest of `current` as
 * `+` lines, then the rest of `other` as `-` lines. Null if they are equal.
 */
export function computeDivergence(current: Log, other: Log): string | null {
	const index = divergenceIndex(current, other);
	if (index === null) return null;

	const lines: string[] = [];
	for (const message of current.slice(index)) {
		lines.push(`+ ${formatMessage(message)}`);
	}
	for (const message of other.slice(index)) {
		lines.push(`- ${formatMessage(message)}`);
	}

	return lines.length > 0 ? lines.join("\n") : null;
}

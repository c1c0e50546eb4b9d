/**
 * Collapse runs of whitespace and cut `text` at a word boundary so that the
 * result, placeholder included, is at most `width` characters.
 */
export function shorten(text: string, width: number, placeholder: string = "..."): string {
	const words = text.trim().split(/\s+/).filter(Boolean);
	const collapsed = words.join(" ");
	if (collapsed.length <= width) return collapsed;

	let kept = "";
	for (const word of words) {
		const candidate = kept ? `${kept} ${word}` : word;
		if (candidate.length + placeholder.length > width) break;
		kept = candidate;
	}
	return `${kept}${placeholder}`;
}

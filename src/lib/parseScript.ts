import type { Utterance } from '@/types/podcast';

// Shortest "( … )" run; nested parentheses are not balanced.
const STAGE_DIRECTION = /\(.*?\)/g;

export function stripStageDirections(text: string): string {
	return text.replace(STAGE_DIRECTION, '').trim();
}

/**
 * Returns the configured name a line is tagged with, or null. Names are
 * compared as literal text, case-insensitively, and must be followed
 * directly by a colon.
 */
export function matchSpeakerTag(line: string, speakerNames: readonly string[]): string | null {
	for (const rawName of speakerNames) {
		const name = rawName.trim();
		if (!name || line.length <= name.length || line[name.length] !== ':') continue;

		const tag = line.slice(0, name.length);
		if (tag.toLowerCase() === name.toLowerCase()) return tag;
	}
	return null;
}

/**
 * Splits a "Name: dialogue" script into utterances for the two speakers.
 * Unrecognized lines and lines left empty after removing stage directions
 * are dropped.
 */
export function parseScript(script: string, speakerNames: readonly string[]): Utterance[] {
	const utterances: Utterance[] = [];
	const lines = script.split(/\r?\n/);

	lines.forEach((line, i) => {
		const tag = matchSpeakerTag(line, speakerNames);
		if (tag === null) return;

		const text = stripStageDirections(line.slice(tag.length + 1));
		if (!text) return;

		utterances.push({
			speaker: tag,
			text,
			index: utterances.length,
			lineNumber: i + 1
		});
	});

	return utterances;
}

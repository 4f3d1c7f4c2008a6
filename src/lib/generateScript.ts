import type { SpeakerPair } from '@/types/podcast';
import { serverEnv } from './env';
import { getMistral, messageText } from './mistral';

export const MAX_PROMPT_CONTENT = 4000;

const SYSTEM_PROMPT = 'You are a creative scriptwriter.';

export function buildScriptPrompt(content: string, speakers: SpeakerPair): string {
	const [a, b] = speakers.map((speaker) => speaker.name);

	return [
		'You write scripts for a candid, funny Indian podcast.',
		`Write a conversation between ${a} (energetic, cracks jokes) and ${b} (smart, sarcastic) about the source below.`,
		'',
		'Source:',
		content.slice(0, MAX_PROMPT_CONTENT),
		'',
		'Rules:',
		'1. Language: Hinglish, a natural mix of Hindi and English written in Latin script.',
		'2. Fillers: use words like "Umm...", "Achcha?", "Matlab...", "Arre yaar", "You know?", "Haa correct".',
		'3. Laughter: write "Hahaha" or "Hehe" where it fits.',
		'4. Tone: natural, casual, with interruptions.',
		'5. Length: about 250-300 words in total.',
		'6. Put every line on its own row, starting with the speaker name and a colon. No headings or narration.',
		'',
		'Format:',
		`${a}: Dialogue...`,
		`${b}: Dialogue...`
	].join('\n');
}

/** Asks Mistral for a two-speaker Hinglish script in "Name: dialogue" lines. */
export async function generateScript(content: string, speakers: SpeakerPair): Promise<string> {
	const env = serverEnv();
	const startedAt = Date.now();

	const response = await getMistral().chat.complete({
		model: env.MISTRAL_SCRIPT_MODEL,
		messages: [
			{ role: 'system', content: SYSTEM_PROMPT },
			{ role: 'user', content: buildScriptPrompt(content, speakers) }
		]
	});

	const script = messageText(response.choices?.[0]?.message?.content).trim();
	console.log('[script] Mistral script generated', {
		model: env.MISTRAL_SCRIPT_MODEL,
		contentLength: content.length,
		scriptLength: script.length,
		elapsedMs: Date.now() - startedAt
	});

	if (!script) {
		throw new Error('Mistral returned an empty script.');
	}
	return script;
}

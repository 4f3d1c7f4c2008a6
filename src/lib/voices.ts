import type { SpeakerPair } from '@/types/podcast';

export const VOICE_IDS = ['rachel', 'adam', 'antoni', 'bella', 'josh', 'elli'] as const;

export type VoiceId = (typeof VOICE_IDS)[number];

type VoiceEntry = {
	label: string;
	elevenLabsVoiceId: string;
};

// ElevenLabs premade voices offered in the speaker settings.
export const VOICE_CATALOG = {
	rachel: { label: 'Rachel (calm, female)', elevenLabsVoiceId: '21m00Tcm4TlvDq8ikWAM' },
	adam: { label: 'Adam (deep, male)', elevenLabsVoiceId: 'pNInz6obpgDQGcFmaJgB' },
	antoni: { label: 'Antoni (warm, male)', elevenLabsVoiceId: 'ErXwobaYiN019PkySvjV' },
	bella: { label: 'Bella (soft, female)', elevenLabsVoiceId: 'EXAVITQu4vr4xnSDxMaL' },
	josh: { label: 'Josh (young, male)', elevenLabsVoiceId: 'TxGEqnHWrfWFTfGW9XT5' },
	elli: { label: 'Elli (bright, female)', elevenLabsVoiceId: 'MF3mgrZFBW78L71cTqGT' }
} satisfies Record<VoiceId, VoiceEntry>;

export const DEFAULT_VOICE: VoiceId = 'rachel';

export const DEFAULT_SPEAKERS: SpeakerPair = [
	{ name: 'Rahul', voice: 'adam' },
	{ name: 'Priya', voice: 'bella' }
];

export function isVoiceId(value: string): value is VoiceId {
	return VOICE_IDS.some((id) => id === value);
}

export function sameSpeaker(a: string, b: string): boolean {
	return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Voice for a parsed speaker tag. Speaker A is checked first, so duplicate
 * names resolve to A's voice; unknown tags fall back to the default voice.
 */
export function resolveVoice(speakerTag: string, speakers: SpeakerPair): VoiceId {
	const match = speakers.find((profile) => sameSpeaker(profile.name, speakerTag));
	return match ? match.voice : DEFAULT_VOICE;
}

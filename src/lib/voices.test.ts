import { describe, expect, it } from 'vitest';
import type { SpeakerPair } from '@/types/podcast';
import { DEFAULT_VOICE, isVoiceId, resolveVoice, VOICE_CATALOG, VOICE_IDS } from './voices';

const SPEAKERS: SpeakerPair = [
	{ name: 'Sayan', voice: 'adam' },
	{ name: 'Suchi', voice: 'elli' }
];

describe('resolveVoice', () => {
	it('ignores case when matching a speaker', () => {
		expect(resolveVoice('SAYAN', SPEAKERS)).toBe('adam');
		expect(resolveVoice('sayan', SPEAKERS)).toBe('adam');
		expect(resolveVoice('sUcHi', SPEAKERS)).toBe('elli');
	});

	it('falls back to the default voice for unknown speakers', () => {
		expect(resolveVoice('Narrator', SPEAKERS)).toBe(DEFAULT_VOICE);
	});

	it('gives the first profile the win when names collide', () => {
		const duplicates: SpeakerPair = [
			{ name: 'Rahul', voice: 'josh' },
			{ name: 'rahul', voice: 'bella' }
		];
		expect(resolveVoice('RAHUL', duplicates)).toBe('josh');
	});
});

describe('voice catalog', () => {
	it('has an ElevenLabs voice for every id', () => {
		for (const id of VOICE_IDS) {
			expect(VOICE_CATALOG[id].elevenLabsVoiceId).toMatch(/^[A-Za-z0-9]{20}$/);
		}
	});

	it('recognizes catalog ids only', () => {
		expect(isVoiceId('bella')).toBe(true);
		expect(isVoiceId('onyx')).toBe(false);
	});
});

import type {
	PipelineFailureKind,
	SourceContent,
	SourceType,
	SpeakerPair,
	SpeakerProfile
} from '@/types/podcast';
import { DEFAULT_SPEAKERS, type VoiceId } from './voices';

export const DOWNLOAD_FILE_NAME = 'hinglish_podcast.wav';

export type SessionAudio = {
	url: string;
	chunksGenerated: number;
	failedLines: number;
};

/**
 * Everything one browser session builds up: the source, the script draft and
 * the finished audio. Owned by the page and changed only through
 * `sessionReducer`.
 */
export type PodcastSession = {
	sourceType: SourceType;
	source: SourceContent | null;
	script: string;
	speakers: SpeakerPair;
	audio: SessionAudio | null;
};

export type SessionAction =
	| { type: 'selectSource'; sourceType: SourceType }
	| { type: 'sourceLoaded'; source: SourceContent }
	| { type: 'scriptChanged'; script: string }
	| { type: 'speakerChanged'; slot: 0 | 1; name?: string; voice?: VoiceId }
	| { type: 'audioReady'; audio: SessionAudio }
	| { type: 'audioCleared' };

export function createSession(speakers: SpeakerPair = DEFAULT_SPEAKERS): PodcastSession {
	return {
		sourceType: 'wikipedia',
		source: null,
		script: '',
		speakers: [{ ...speakers[0] }, { ...speakers[1] }],
		audio: null
	};
}

function updateSpeaker(profile: SpeakerProfile, name?: string, voice?: VoiceId): SpeakerProfile {
	return { name: name ?? profile.name, voice: voice ?? profile.voice };
}

export function sessionReducer(session: PodcastSession, action: SessionAction): PodcastSession {
	switch (action.type) {
		case 'selectSource':
			if (action.sourceType === session.sourceType) return session;
			// a different kind of source starts over; speaker settings survive
			return { ...session, sourceType: action.sourceType, source: null, script: '', audio: null };
		case 'sourceLoaded':
			return { ...session, source: action.source, script: '', audio: null };
		case 'scriptChanged':
			return { ...session, script: action.script, audio: null };
		case 'speakerChanged': {
			const speakers: SpeakerPair =
				action.slot === 0
					? [updateSpeaker(session.speakers[0], action.name, action.voice), session.speakers[1]]
					: [session.speakers[0], updateSpeaker(session.speakers[1], action.name, action.voice)];
			return { ...session, speakers, audio: null };
		}
		case 'audioReady':
			return { ...session, audio: action.audio };
		case 'audioCleared':
			return { ...session, audio: null };
	}
}

/** Problem with the speaker settings that would block generation, if any. */
export function speakerProblem(speakers: SpeakerPair): string | null {
	const [a, b] = speakers.map((speaker) => speaker.name.trim());
	if (!a || !b) return 'Both speakers need a name.';
	if (a.toLowerCase() === b.toLowerCase()) return 'The two speakers need different names.';
	if (a.includes(':') || b.includes(':')) return 'Speaker names cannot contain a colon.';
	return null;
}

const FAILURE_HEADLINES: Record<PipelineFailureKind, string> = {
	NoRecognizedDialogue: 'Script format problem',
	EnvironmentFatal: 'Audio service unavailable',
	NoAudioProduced: 'Every line failed to synthesize',
	Cancelled: 'Generation cancelled'
};

export function failureHeadline(kind: PipelineFailureKind): string {
	return FAILURE_HEADLINES[kind];
}

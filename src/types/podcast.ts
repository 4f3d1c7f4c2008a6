// src/types/podcast.ts
import type { VoiceId } from '@/lib/voices';

export type SpeakerProfile = {
	name: string;
	voice: VoiceId;
};

export type SpeakerPair = [SpeakerProfile, SpeakerProfile];

export type Utterance = {
	speaker: string;
	text: string;
	/** Dense playback position, 0-based. */
	index: number;
	/** 1-based line in the source script. */
	lineNumber: number;
};

export type AudioChunk = {
	index: number;
	bytes: Uint8Array;
};

export type ChunkFailure = {
	index: number;
	speaker: string;
	message: string;
};

export type PipelineFailureKind =
	| 'NoRecognizedDialogue'
	| 'EnvironmentFatal'
	| 'NoAudioProduced'
	| 'Cancelled';

export type PipelinePhase =
	| { phase: 'parsing' }
	| { phase: 'synthesizing'; index: number; total: number }
	| { phase: 'assembling' }
	| { phase: 'done' }
	| { phase: 'failed'; reason: PipelineFailureKind };

export type PipelineOutcome =
	| {
			status: 'done';
			audio: Buffer;
			chunksGenerated: number;
			failures: ChunkFailure[];
	  }
	| {
			status: 'failed';
			reason: PipelineFailureKind;
			message: string;
			chunksGenerated: number;
			failures: ChunkFailure[];
	  };

export type PipelineProgress = {
	completed: number;
	total: number;
	fraction: number;
};

export type PodcastJobStatus =
	| 'pending'
	| 'synthesizing'
	| 'assembling'
	| 'complete'
	| 'error';

/** Shape returned by GET /api/podcast/status. */
export type PodcastJobView = {
	status: PodcastJobStatus;
	progress: number;
	totalUtterances: number;
	chunksGenerated: number;
	failures: ChunkFailure[];
	audioAvailable: boolean;
	error: { kind: PipelineFailureKind; message: string } | null;
};

export type SourceType = 'wikipedia' | 'document' | 'image';

export type SourceContent = {
	label: string;
	content: string;
};

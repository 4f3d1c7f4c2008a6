import { setTimeout as sleep } from 'node:timers/promises';
import type {
	AudioChunk,
	ChunkFailure,
	PipelineOutcome,
	PipelinePhase,
	PipelineProgress,
	SpeakerPair,
	Utterance
} from '@/types/podcast';
import {
	assembleAudio,
	DEFAULT_PCM_FORMAT,
	type AssembledAudio,
	type PcmFormat
} from './audioAssembly';
import {
	cancelledError,
	EnvironmentFatalError,
	getErrorMessage,
	noAudioProducedError,
	noRecognizedDialogueError,
	PipelineError,
	SynthesisError
} from './errors';
import { parseScript } from './parseScript';
import type { SpeechSynthesizer } from './synthesizeSpeech';
import { resolveVoice } from './voices';

export type PipelineInput = {
	script: string;
	speakers: SpeakerPair;
};

export type PipelineDeps = {
	synthesizer: SpeechSynthesizer;
	format?: PcmFormat;
};

export type PipelineOptions = {
	signal?: AbortSignal;
	onProgress?: (progress: PipelineProgress) => void;
	onPhase?: (phase: PipelinePhase) => void;
	/** Extra attempts for a retryable SynthesisError. */
	maxRetries?: number;
	/** First backoff delay; doubles on each retry. */
	retryDelayMs?: number;
};

async function synthesizeWithRetry(
	utterance: Utterance,
	speakers: SpeakerPair,
	deps: PipelineDeps,
	options: PipelineOptions
): Promise<Uint8Array> {
	const voice = resolveVoice(utterance.speaker, speakers);
	const maxRetries = options.maxRetries ?? 0;
	const retryDelayMs = options.retryDelayMs ?? 500;

	for (let attempt = 0; ; attempt++) {
		try {
			return await deps.synthesizer.synthesize(utterance.text, voice, { signal: options.signal });
		} catch (err) {
			const canRetry =
				err instanceof SynthesisError &&
				err.retryable &&
				attempt < maxRetries &&
				!options.signal?.aborted;
			if (!canRetry) throw err;

			const delay = retryDelayMs * 2 ** attempt;
			console.warn('[podcast-pipeline] Retrying utterance', {
				index: utterance.index,
				attempt: attempt + 1,
				delay,
				error: getErrorMessage(err)
			});
			if (delay > 0) await sleep(delay, undefined, { signal: options.signal });
		}
	}
}

function failed(
	error: PipelineError,
	chunksGenerated: number,
	failures: ChunkFailure[],
	options: PipelineOptions
): PipelineOutcome {
	options.onPhase?.({ phase: 'failed', reason: error.code });
	return {
		status: 'failed',
		reason: error.code,
		message: error.message,
		chunksGenerated,
		failures
	};
}

/**
 * Turns a speaker-tagged script into one WAV buffer. Utterances are
 * synthesized one at a time in script order; a failed line is skipped and
 * listed in `failures`, an EnvironmentFatalError ends the run without audio.
 */
export async function runPodcastPipeline(
	input: PipelineInput,
	deps: PipelineDeps,
	options: PipelineOptions = {}
): Promise<PipelineOutcome> {
	const names = input.speakers.map((speaker) => speaker.name);
	const failures: ChunkFailure[] = [];

	options.onPhase?.({ phase: 'parsing' });
	const utterances = parseScript(input.script, names);
	if (utterances.length === 0) {
		return failed(noRecognizedDialogueError(names), 0, failures, options);
	}

	const total = utterances.length;
	const chunks: AudioChunk[] = [];

	for (const utterance of utterances) {
		if (options.signal?.aborted) {
			return failed(cancelledError(), chunks.length, failures, options);
		}
		options.onPhase?.({ phase: 'synthesizing', index: utterance.index, total });

		try {
			const bytes = await synthesizeWithRetry(utterance, input.speakers, deps, options);
			chunks.push({ index: utterance.index, bytes });
		} catch (err) {
			if (err instanceof EnvironmentFatalError) {
				console.error('[podcast-pipeline] Environment-fatal error, aborting run', {
					index: utterance.index,
					error: err.message
				});
				return failed(
					new PipelineError('EnvironmentFatal', err.message, { cause: err }),
					chunks.length,
					failures,
					options
				);
			}
			if (options.signal?.aborted) {
				return failed(cancelledError(), chunks.length, failures, options);
			}

			const message = getErrorMessage(err);
			console.warn('[podcast-pipeline] Skipping utterance', {
				index: utterance.index,
				speaker: utterance.speaker,
				error: message
			});
			failures.push({ index: utterance.index, speaker: utterance.speaker, message });
		}

		const completed = utterance.index + 1;
		options.onProgress?.({ completed, total, fraction: completed / total });
	}

	// an abort during the last call still ends the run as cancelled
	if (options.signal?.aborted) {
		return failed(cancelledError(), chunks.length, failures, options);
	}
	if (chunks.length === 0) {
		return failed(noAudioProducedError(total), 0, failures, options);
	}

	options.onPhase?.({ phase: 'assembling' });
	let assembled: AssembledAudio;
	try {
		assembled = assembleAudio(chunks, deps.format ?? DEFAULT_PCM_FORMAT);
	} catch (err) {
		if (!(err instanceof EnvironmentFatalError)) throw err;
		return failed(
			new PipelineError('EnvironmentFatal', err.message, { cause: err }),
			0,
			failures,
			options
		);
	}

	for (const skip of assembled.skipped) {
		const utterance = utterances[skip.index];
		failures.push({ index: skip.index, speaker: utterance.speaker, message: skip.message });
	}
	failures.sort((a, b) => a.index - b.index);

	if (assembled.segments === 0) {
		return failed(noAudioProducedError(total), 0, failures, options);
	}

	options.onPhase?.({ phase: 'done' });
	return {
		status: 'done',
		audio: assembled.audio,
		chunksGenerated: assembled.segments,
		failures
	};
}

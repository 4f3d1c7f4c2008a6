import crypto from 'crypto';
import type {
	ChunkFailure,
	PipelineFailureKind,
	PipelineOutcome,
	PodcastJobStatus,
	PodcastJobView,
	SpeakerPair
} from '@/types/podcast';
import { serverEnv } from './env';
import { EnvironmentFatalError, getErrorMessage } from './errors';
import { runPodcastPipeline } from './podcastPipeline';
import { createSpeechSynthesizer, type SpeechSynthesizer } from './synthesizeSpeech';

const JOB_TTL_MS = 15 * 60 * 1000;

export type PodcastJob = {
	status: PodcastJobStatus;
	progress: number;
	totalUtterances: number;
	chunksGenerated: number;
	failures: ChunkFailure[];
	/** Held until the first download hands it over. */
	audio: Buffer | null;
	error: { kind: PipelineFailureKind; message: string } | null;
	controller: AbortController;
	createdAt: number;
	finishedAt: number | null;
};

// In-memory job store. This lives for the lifetime of the Node process and is
// sufficient for the polling contract of /api/podcast/status.
export const podcastJobs = new Map<string, PodcastJob>();

export type StartJobInput = {
	script: string;
	speakers: SpeakerPair;
};

export type StartJobDeps = {
	createSynthesizer?: () => SpeechSynthesizer;
	retryDelayMs?: number;
};

function applyOutcome(job: PodcastJob, outcome: PipelineOutcome) {
	job.chunksGenerated = outcome.chunksGenerated;
	job.failures = outcome.failures;
	job.finishedAt = Date.now();

	if (outcome.status === 'done') {
		job.status = 'complete';
		job.audio = outcome.audio;
		job.progress = 1;
	} else {
		job.status = 'error';
		job.error = { kind: outcome.reason, message: outcome.message };
	}
}

function failJob(job: PodcastJob, kind: PipelineFailureKind, message: string) {
	job.status = 'error';
	job.error = { kind, message };
	job.finishedAt = Date.now();
}

async function processJob(jobId: string, input: StartJobInput, deps: StartJobDeps) {
	const job = podcastJobs.get(jobId);
	if (!job) return;

	try {
		const synthesizer = (deps.createSynthesizer ?? createSpeechSynthesizer)();

		console.log('[podcast-job] Starting pipeline', {
			jobId,
			scriptLength: input.script.length,
			speakers: input.speakers.map((speaker) => `${speaker.name}:${speaker.voice}`)
		});

		const outcome = await runPodcastPipeline(
			input,
			{ synthesizer },
			{
				signal: job.controller.signal,
				maxRetries: serverEnv().TTS_MAX_RETRIES,
				retryDelayMs: deps.retryDelayMs,
				onPhase: (phase) => {
					if (phase.phase === 'synthesizing') {
						job.status = 'synthesizing';
						job.totalUtterances = phase.total;
					} else if (phase.phase === 'assembling') {
						job.status = 'assembling';
					}
				},
				onProgress: ({ fraction }) => {
					job.progress = fraction;
				}
			}
		);

		applyOutcome(job, outcome);
		console.log('[podcast-job] Pipeline finished', {
			jobId,
			status: outcome.status,
			chunksGenerated: outcome.chunksGenerated,
			failedLines: outcome.failures.length,
			reason: outcome.status === 'failed' ? outcome.reason : undefined
		});
	} catch (err) {
		if (err instanceof EnvironmentFatalError) {
			console.error('[podcast-job] Audio toolchain unavailable', { jobId, error: err.message });
			failJob(job, 'EnvironmentFatal', err.message);
			return;
		}
		console.error('[podcast-job] Unexpected error', { jobId, error: getErrorMessage(err) });
		failJob(job, 'EnvironmentFatal', `Unexpected error: ${getErrorMessage(err)}`);
	}
}

/** Drops finished jobs (and any audio never downloaded) older than the TTL. */
export function pruneFinishedJobs(now: number = Date.now()) {
	for (const [jobId, job] of podcastJobs) {
		if (job.finishedAt !== null && now - job.finishedAt > JOB_TTL_MS) {
			podcastJobs.delete(jobId);
		}
	}
}

/**
 * Registers a job and starts the pipeline in the background. Returns the
 * job id together with the run's completion promise.
 */
export function startPodcastJob(
	input: StartJobInput,
	deps: StartJobDeps = {}
): { jobId: string; done: Promise<void> } {
	pruneFinishedJobs();

	const jobId = `job_${crypto.randomUUID()}`;
	podcastJobs.set(jobId, {
		status: 'pending',
		progress: 0,
		totalUtterances: 0,
		chunksGenerated: 0,
		failures: [],
		audio: null,
		error: null,
		controller: new AbortController(),
		createdAt: Date.now(),
		finishedAt: null
	});

	return { jobId, done: processJob(jobId, input, deps) };
}

export function viewJob(job: PodcastJob): PodcastJobView {
	return {
		status: job.status,
		progress: job.progress,
		totalUtterances: job.totalUtterances,
		chunksGenerated: job.chunksGenerated,
		failures: job.failures,
		audioAvailable: job.audio !== null,
		error: job.error
	};
}

/** Hands the finished audio to the caller; the job keeps no copy. */
export function takeJobAudio(jobId: string): Buffer | null {
	const job = podcastJobs.get(jobId);
	if (!job || !job.audio) return null;

	const audio = job.audio;
	job.audio = null;
	return audio;
}

/** Returns false when the job is unknown, finished, or already assembling its audio. */
export function cancelPodcastJob(jobId: string): boolean {
	const job = podcastJobs.get(jobId);
	if (!job || job.finishedAt !== null || job.status === 'assembling') return false;

	job.controller.abort();
	return true;
}

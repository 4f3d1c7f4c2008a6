import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { PipelinePhase, PipelineProgress, SpeakerPair } from '@/types/podcast';
import { EnvironmentFatalError, SynthesisError } from './errors';
import { runPodcastPipeline } from './podcastPipeline';
import type { SpeechSynthesizer } from './synthesizeSpeech';
import type { VoiceId } from './voices';

const SPEAKERS: SpeakerPair = [
	{ name: 'Sayan', voice: 'adam' },
	{ name: 'Suchi', voice: 'bella' }
];

const GAP_BYTES = 7200;
const CHUNK_BYTES = 4;

type SynthesizeFn = (text: string, voice: VoiceId) => Promise<Uint8Array>;

function fakeSynthesizer(impl?: SynthesizeFn) {
	const synthesize = vi.fn<SynthesizeFn>(
		impl ?? (async () => new Uint8Array([1, 0, 2, 0]))
	);
	const synthesizer: SpeechSynthesizer = { synthesize };
	return { synthesize, synthesizer };
}

function recordPhases() {
	const phases: PipelinePhase[] = [];
	return { phases, onPhase: (phase: PipelinePhase) => phases.push(phase) };
}

beforeEach(() => {
	vi.spyOn(console, 'warn').mockImplementation(() => {});
	vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('runPodcastPipeline', () => {
	it('synthesizes each recognized line with its speaker voice', async () => {
		const { synthesize, synthesizer } = fakeSynthesizer();
		const progress: PipelineProgress[] = [];

		const outcome = await runPodcastPipeline(
			{ script: 'Sayan: Hello (waves) there\nSuchi: Hi!\nNarrator: intro', speakers: SPEAKERS },
			{ synthesizer },
			{ onProgress: (p) => progress.push(p) }
		);

		expect(synthesize.mock.calls.map(([text, voice]) => [text, voice])).toEqual([
			['Hello  there', 'adam'],
			['Hi!', 'bella']
		]);
		expect(progress).toEqual([
			{ completed: 1, total: 2, fraction: 0.5 },
			{ completed: 2, total: 2, fraction: 1 }
		]);
		expect(outcome.status).toBe('done');
		if (outcome.status !== 'done') return;
		expect(outcome.chunksGenerated).toBe(2);
		expect(outcome.failures).toEqual([]);
		expect(outcome.audio.length).toBe(44 + 2 * (CHUNK_BYTES + GAP_BYTES));
	});

	it('resolves voices for tags written in another case', async () => {
		const { synthesize, synthesizer } = fakeSynthesizer();

		await runPodcastPipeline({ script: 'SAYAN: one\nsuchi: two', speakers: SPEAKERS }, { synthesizer });

		expect(synthesize.mock.calls.map(([, voice]) => voice)).toEqual(['adam', 'bella']);
	});

	it('fails with NoRecognizedDialogue for an empty script', async () => {
		const { synthesize, synthesizer } = fakeSynthesizer();
		const { phases, onPhase } = recordPhases();

		const outcome = await runPodcastPipeline({ script: '', speakers: SPEAKERS }, { synthesizer }, { onPhase });

		expect(outcome).toEqual({
			status: 'failed',
			reason: 'NoRecognizedDialogue',
			message:
				'No lines in the script start with "Sayan:" or "Suchi:". Check the speaker names and the "Name: dialogue" format.',
			chunksGenerated: 0,
			failures: []
		});
		expect(phases).toEqual([{ phase: 'parsing' }, { phase: 'failed', reason: 'NoRecognizedDialogue' }]);
		expect(synthesize).not.toHaveBeenCalled();
	});

	it('fails with NoRecognizedDialogue when only unknown speakers talk', async () => {
		const { synthesizer } = fakeSynthesizer();

		const outcome = await runPodcastPipeline(
			{ script: 'Narrator: intro\nGuest: hello', speakers: SPEAKERS },
			{ synthesizer }
		);

		expect(outcome.status === 'failed' && outcome.reason).toBe('NoRecognizedDialogue');
	});

	it('skips lines whose synthesis fails and keeps the rest', async () => {
		const { synthesizer } = fakeSynthesizer(async (text) => {
			if (text === 'two') throw new SynthesisError('voice busy', { retryable: false });
			return new Uint8Array([1, 0, 2, 0]);
		});

		const outcome = await runPodcastPipeline(
			{ script: 'Sayan: one\nSuchi: two\nSayan: three', speakers: SPEAKERS },
			{ synthesizer }
		);

		expect(outcome.status).toBe('done');
		if (outcome.status !== 'done') return;
		expect(outcome.chunksGenerated).toBe(2);
		expect(outcome.failures).toEqual([{ index: 1, speaker: 'Suchi', message: 'voice busy' }]);
		expect(outcome.audio.length).toBe(44 + 2 * (CHUNK_BYTES + GAP_BYTES));
	});

	it('reports NoAudioProduced without a buffer when every line fails', async () => {
		const { synthesizer } = fakeSynthesizer(async () => {
			throw new SynthesisError('quota exceeded', { retryable: false, statusCode: 401 });
		});
		const progress: number[] = [];

		const outcome = await runPodcastPipeline(
			{ script: 'Sayan: one\nSuchi: two', speakers: SPEAKERS },
			{ synthesizer },
			{ onProgress: (p) => progress.push(p.fraction) }
		);

		expect(outcome).toEqual({
			status: 'failed',
			reason: 'NoAudioProduced',
			message: 'Speech synthesis failed for all 2 line(s); no audio was produced.',
			chunksGenerated: 0,
			failures: [
				{ index: 0, speaker: 'Sayan', message: 'quota exceeded' },
				{ index: 1, speaker: 'Suchi', message: 'quota exceeded' }
			]
		});
		expect(progress).toEqual([0.5, 1]);
	});

	it('aborts on an environment-fatal error even after earlier successes', async () => {
		const { synthesize, synthesizer } = fakeSynthesizer(async (text) => {
			if (text === 'two') throw new EnvironmentFatalError('Missing ELEVENLABS_API_KEY configuration.');
			return new Uint8Array([1, 0]);
		});
		const { phases, onPhase } = recordPhases();

		const outcome = await runPodcastPipeline(
			{ script: 'Sayan: one\nSuchi: two\nSayan: three', speakers: SPEAKERS },
			{ synthesizer },
			{ onPhase }
		);

		expect(outcome).toEqual({
			status: 'failed',
			reason: 'EnvironmentFatal',
			message: 'Missing ELEVENLABS_API_KEY configuration.',
			chunksGenerated: 1,
			failures: []
		});
		expect(synthesize).toHaveBeenCalledTimes(2);
		expect(phases.at(-1)).toEqual({ phase: 'failed', reason: 'EnvironmentFatal' });
	});

	it('retries transient failures up to the limit', async () => {
		let calls = 0;
		const { synthesize, synthesizer } = fakeSynthesizer(async () => {
			calls += 1;
			if (calls === 1) throw new SynthesisError('rate limited', { retryable: true, statusCode: 429 });
			return new Uint8Array([1, 0]);
		});

		const outcome = await runPodcastPipeline(
			{ script: 'Sayan: one', speakers: SPEAKERS },
			{ synthesizer },
			{ maxRetries: 1, retryDelayMs: 0 }
		);

		expect(synthesize).toHaveBeenCalledTimes(2);
		expect(outcome.status === 'done' && outcome.chunksGenerated).toBe(1);
	});

	it('gives up after the last retry and records the failure', async () => {
		const { synthesize, synthesizer } = fakeSynthesizer(async (text) => {
			if (text === 'one') throw new SynthesisError('upstream 503', { retryable: true, statusCode: 503 });
			return new Uint8Array([1, 0]);
		});

		const outcome = await runPodcastPipeline(
			{ script: 'Sayan: one\nSuchi: two', speakers: SPEAKERS },
			{ synthesizer },
			{ maxRetries: 2, retryDelayMs: 0 }
		);

		expect(synthesize).toHaveBeenCalledTimes(4);
		expect(outcome.failures).toEqual([{ index: 0, speaker: 'Sayan', message: 'upstream 503' }]);
		expect(outcome.chunksGenerated).toBe(1);
	});

	it('does not retry permanent failures', async () => {
		const { synthesize, synthesizer } = fakeSynthesizer(async () => {
			throw new SynthesisError('invalid voice', { retryable: false, statusCode: 400 });
		});

		await runPodcastPipeline(
			{ script: 'Sayan: one', speakers: SPEAKERS },
			{ synthesizer },
			{ maxRetries: 3, retryDelayMs: 0 }
		);

		expect(synthesize).toHaveBeenCalledTimes(1);
	});

	it('counts chunks that fail to decode as failed lines', async () => {
		const { synthesizer } = fakeSynthesizer(async (text) =>
			text === 'two' ? new Uint8Array([7]) : new Uint8Array([1, 0, 2, 0])
		);

		const outcome = await runPodcastPipeline(
			{ script: 'Sayan: one\nSuchi: two\nSayan: three', speakers: SPEAKERS },
			{ synthesizer }
		);

		expect(outcome.status).toBe('done');
		if (outcome.status !== 'done') return;
		expect(outcome.chunksGenerated).toBe(2);
		expect(outcome.failures).toEqual([
			{
				index: 1,
				speaker: 'Suchi',
				message: 'Audio chunk length 1 is not a whole number of 2-byte frames.'
			}
		]);
	});

	it('reports NoAudioProduced when no chunk decodes', async () => {
		const { synthesizer } = fakeSynthesizer(async () => new Uint8Array(0));

		const outcome = await runPodcastPipeline({ script: 'Sayan: one', speakers: SPEAKERS }, { synthesizer });

		expect(outcome.status === 'failed' && outcome.reason).toBe('NoAudioProduced');
		expect('audio' in outcome).toBe(false);
	});

	it('stops with Cancelled once the signal is aborted', async () => {
		const controller = new AbortController();
		const { synthesize, synthesizer } = fakeSynthesizer(async () => {
			controller.abort();
			return new Uint8Array([1, 0]);
		});

		const outcome = await runPodcastPipeline(
			{ script: 'Sayan: one\nSuchi: two', speakers: SPEAKERS },
			{ synthesizer },
			{ signal: controller.signal }
		);

		expect(synthesize).toHaveBeenCalledTimes(1);
		expect(outcome).toEqual({
			status: 'failed',
			reason: 'Cancelled',
			message: 'Audio generation was cancelled.',
			chunksGenerated: 1,
			failures: []
		});
	});

	it('ends as Cancelled when the abort arrives during the last line', async () => {
		const controller = new AbortController();
		const { synthesize, synthesizer } = fakeSynthesizer(async () => {
			controller.abort();
			return new Uint8Array([1, 0]);
		});
		const { phases, onPhase } = recordPhases();

		const outcome = await runPodcastPipeline(
			{ script: 'Sayan: one', speakers: SPEAKERS },
			{ synthesizer },
			{ signal: controller.signal, onPhase }
		);

		expect(synthesize).toHaveBeenCalledTimes(1);
		expect(outcome).toEqual({
			status: 'failed',
			reason: 'Cancelled',
			message: 'Audio generation was cancelled.',
			chunksGenerated: 1,
			failures: []
		});
		expect(phases).not.toContainEqual({ phase: 'assembling' });
	});

	it('walks through the phases of a successful run', async () => {
		const { synthesizer } = fakeSynthesizer();
		const { phases, onPhase } = recordPhases();

		await runPodcastPipeline({ script: 'Sayan: one\nSuchi: two', speakers: SPEAKERS }, { synthesizer }, { onPhase });

		expect(phases).toEqual([
			{ phase: 'parsing' },
			{ phase: 'synthesizing', index: 0, total: 2 },
			{ phase: 'synthesizing', index: 1, total: 2 },
			{ phase: 'assembling' },
			{ phase: 'done' }
		]);
	});
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { podcastJobs } from '@/lib/podcastJobs';
import { resetServerEnv } from '@/lib/env';
import { GET as getAudio } from './audio/route';
import { POST as cancel } from './cancel/route';
import { POST as start } from './start/route';
import { GET as getStatus } from './status/route';

vi.mock('@/lib/synthesizeSpeech', () => ({
	createSpeechSynthesizer: () => ({ synthesize: async () => new Uint8Array([1, 0, 2, 0]) })
}));

const SPEAKERS = [
	{ name: 'Rahul', voice: 'adam' },
	{ name: 'Priya', voice: 'bella' }
];

function post(url: string, body: unknown) {
	return new Request(url, {
		method: 'POST',
		headers: { 'Content-Type': 'application/json' },
		body: JSON.stringify(body)
	});
}

function statusOf(jobId: string) {
	return getStatus(new Request(`http://localhost/api/podcast/status?jobId=${jobId}`));
}

beforeEach(() => {
	podcastJobs.clear();
	vi.stubEnv('TTS_MAX_RETRIES', '0');
	resetServerEnv();
	vi.spyOn(console, 'log').mockImplementation(() => {});
	vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
	vi.unstubAllEnvs();
	resetServerEnv();
});

describe('podcast routes', () => {
	it('starts a job, reports progress and serves the WAV once', async () => {
		const started = await start(
			post('http://localhost/api/podcast/start', {
				script: 'Rahul: Chai piyoge?\nPriya: Bilkul!',
				speakers: SPEAKERS
			})
		);
		expect(started.status).toBe(200);
		const { jobId } = await started.json();

		await vi.waitFor(async () => {
			const status = await (await statusOf(jobId)).json();
			expect(status.status).toBe('complete');
		});

		const audio = await getAudio(new Request(`http://localhost/api/podcast/audio?jobId=${jobId}`));
		expect(audio.status).toBe(200);
		expect(audio.headers.get('Content-Type')).toBe('audio/wav');
		expect(audio.headers.get('Content-Disposition')).toBe('attachment; filename="hinglish_podcast.wav"');
		const bytes = new Uint8Array(await audio.arrayBuffer());
		expect(bytes.length).toBe(44 + 2 * (4 + 7200));
		expect(new TextDecoder().decode(bytes.subarray(0, 4))).toBe('RIFF');

		const again = await getAudio(new Request(`http://localhost/api/podcast/audio?jobId=${jobId}`));
		expect(again.status).toBe(410);
	});

	it('rejects an empty script', async () => {
		const res = await start(post('http://localhost/api/podcast/start', { script: '  ', speakers: SPEAKERS }));

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: 'script: script is required.' });
	});

	it('rejects speakers that share a name', async () => {
		const res = await start(
			post('http://localhost/api/podcast/start', {
				script: 'Rahul: Hi',
				speakers: [
					{ name: 'Rahul', voice: 'adam' },
					{ name: 'rahul', voice: 'bella' }
				]
			})
		);

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: 'speakers: The two speakers need different names.' });
	});

	it('answers 400 and 404 for missing and unknown jobs', async () => {
		expect((await getStatus(new Request('http://localhost/api/podcast/status'))).status).toBe(400);
		expect((await statusOf('job_00000000-0000-0000-0000-000000000000')).status).toBe(404);
	});

	it('does not cancel an unknown job', async () => {
		const res = await cancel(
			post('http://localhost/api/podcast/cancel', { jobId: 'job_00000000-0000-0000-0000-000000000000' })
		);

		expect(await res.json()).toEqual({ cancelled: false });
	});

	it('validates the cancel job id', async () => {
		const res = await cancel(post('http://localhost/api/podcast/cancel', { jobId: '../etc' }));

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: 'jobId: jobId is invalid.' });
	});
});

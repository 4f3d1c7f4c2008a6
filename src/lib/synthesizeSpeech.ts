import { ElevenLabsClient, ElevenLabsTimeoutError } from '@elevenlabs/elevenlabs-js';
import { serverEnv } from './env';
import { EnvironmentFatalError, SynthesisError, getErrorMessage } from './errors';
import { VOICE_CATALOG, type VoiceId } from './voices';

export type SynthesizeOptions = {
	signal?: AbortSignal;
};

/** One call per utterance; rejects with SynthesisError or EnvironmentFatalError. */
export interface SpeechSynthesizer {
	synthesize(text: string, voice: VoiceId, options?: SynthesizeOptions): Promise<Uint8Array>;
}

export const MAX_TEXT_LENGTH = 2500;

function readProperty(value: unknown, key: string): unknown {
	return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

// Best-effort status lookup across SDK error shapes.
export function upstreamStatus(err: unknown): number | undefined {
	const candidates = [
		readProperty(err, 'statusCode'),
		readProperty(err, 'status'),
		readProperty(readProperty(err, 'response'), 'status')
	];
	return candidates.find((value): value is number => typeof value === 'number');
}

const TRANSIENT_NETWORK_CODES = new Set([
	'ECONNRESET',
	'ECONNREFUSED',
	'ETIMEDOUT',
	'EPIPE',
	'EAI_AGAIN',
	'UND_ERR_SOCKET',
	'UND_ERR_CONNECT_TIMEOUT',
	'UND_ERR_HEADERS_TIMEOUT'
]);

// Timeouts and dropped connections only; fetch wraps the socket error in `cause`.
export function isTransientNetworkError(err: unknown): boolean {
	if (err instanceof ElevenLabsTimeoutError || readProperty(err, 'name') === 'TimeoutError') return true;
	const code = readProperty(err, 'code') ?? readProperty(readProperty(err, 'cause'), 'code');
	return typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code);
}

function isQuotaExceeded(err: unknown): boolean {
	const detail = readProperty(readProperty(err, 'body'), 'detail');
	return readProperty(detail, 'status') === 'quota_exceeded';
}

/**
 * Sorts an upstream failure into "this line failed" or "nothing will work".
 * A rejected API key is fatal; quota, rate limits, 5xx and timeouts are
 * per-line, and only the transient ones are worth retrying.
 */
export function classifySynthesisFailure(err: unknown): SynthesisError | EnvironmentFatalError {
	const statusCode = upstreamStatus(err);
	const message = getErrorMessage(err);

	if ((statusCode === 401 || statusCode === 403) && !isQuotaExceeded(err)) {
		return new EnvironmentFatalError(`ElevenLabs rejected the API key (${statusCode}): ${message}`, {
			cause: err
		});
	}

	const retryable =
		statusCode === undefined
			? isTransientNetworkError(err)
			: statusCode === 408 || statusCode === 429 || statusCode >= 500;
	return new SynthesisError(message, { retryable, statusCode, cause: err });
}

export class ElevenLabsSynthesizer implements SpeechSynthesizer {
	constructor(
		private readonly client: ElevenLabsClient,
		private readonly settings: { modelId: string; timeoutInSeconds: number }
	) {}

	async synthesize(text: string, voice: VoiceId, options: SynthesizeOptions = {}): Promise<Uint8Array> {
		const trimmed = text.trim();
		if (!trimmed) {
			throw new SynthesisError('Cannot synthesize empty text.', { retryable: false });
		}
		if (trimmed.length > MAX_TEXT_LENGTH) {
			throw new SynthesisError(
				`Text exceeds maximum length of ${MAX_TEXT_LENGTH} characters.`,
				{ retryable: false }
			);
		}

		const voiceId = VOICE_CATALOG[voice].elevenLabsVoiceId;
		const startedAt = Date.now();

		try {
			const stream = await this.client.textToSpeech.convert(
				voiceId,
				{
					text: trimmed,
					modelId: this.settings.modelId,
					outputFormat: 'pcm_24000',
					voiceSettings: {
						stability: 0.5,
						similarityBoost: 0.75
					}
				},
				{
					timeoutInSeconds: this.settings.timeoutInSeconds,
					// retries are the pipeline's job
					maxRetries: 0,
					abortSignal: options.signal
				}
			);
			const audio = new Uint8Array(await new Response(stream).arrayBuffer());

			console.log('[tts] ElevenLabs TTS success', {
				voice,
				textLength: trimmed.length,
				audioBytes: audio.byteLength,
				elapsedMs: Date.now() - startedAt
			});
			return audio;
		} catch (err: unknown) {
			console.error('[tts] ElevenLabs TTS error', {
				voice,
				textLength: trimmed.length,
				elapsedMs: Date.now() - startedAt,
				statusCode: upstreamStatus(err),
				error: getErrorMessage(err)
			});
			throw classifySynthesisFailure(err);
		}
	}
}

/** Builds the synthesizer from the environment; a missing key is environment-fatal. */
export function createSpeechSynthesizer(): SpeechSynthesizer {
	const env = serverEnv();
	if (!env.ELEVENLABS_API_KEY) {
		throw new EnvironmentFatalError('Missing ELEVENLABS_API_KEY configuration.');
	}

	return new ElevenLabsSynthesizer(new ElevenLabsClient({ apiKey: env.ELEVENLABS_API_KEY }), {
		modelId: env.ELEVENLABS_MODEL_ID,
		timeoutInSeconds: env.TTS_TIMEOUT_SECONDS
	});
}

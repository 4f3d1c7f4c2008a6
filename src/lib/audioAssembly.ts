import type { AudioChunk } from '@/types/podcast';
import { AudioDecodeError, EnvironmentFatalError } from './errors';

export type PcmFormat = {
	sampleRate: number;
	channels: number;
};

/** What ElevenLabs returns for `pcm_24000`: 16-bit little-endian mono. */
export const DEFAULT_PCM_FORMAT: PcmFormat = { sampleRate: 24000, channels: 1 };

export const GAP_MS = 150;

const BYTES_PER_SAMPLE = 2;
const WAV_HEADER_BYTES = 44;

export type AssembledAudio = {
	audio: Buffer;
	segments: number;
	skipped: { index: number; message: string }[];
};

function assertUsableFormat(format: PcmFormat) {
	if (
		!Number.isInteger(format.sampleRate) ||
		format.sampleRate <= 0 ||
		!Number.isInteger(format.channels) ||
		format.channels <= 0
	) {
		throw new EnvironmentFatalError(
			`Unsupported audio format: ${format.sampleRate} Hz, ${format.channels} channel(s).`
		);
	}
}

export function silence(durationMs: number, format: PcmFormat): Buffer {
	const frames = Math.round((format.sampleRate * durationMs) / 1000);
	return Buffer.alloc(frames * format.channels * BYTES_PER_SAMPLE);
}

function readWavData(bytes: Buffer, format: PcmFormat): Buffer {
	if (bytes.length < 12 || bytes.toString('ascii', 8, 12) !== 'WAVE') {
		throw new AudioDecodeError('RIFF chunk is not a WAVE file.');
	}

	let offset = 12;
	let formatChecked = false;
	while (offset + 8 <= bytes.length) {
		const id = bytes.toString('ascii', offset, offset + 4);
		const size = bytes.readUInt32LE(offset + 4);
		const body = offset + 8;

		if (id === 'fmt ') {
			if (size < 16 || body + 16 > bytes.length) {
				throw new AudioDecodeError('Truncated WAV fmt chunk.');
			}
			const audioFormat = bytes.readUInt16LE(body);
			const channels = bytes.readUInt16LE(body + 2);
			const sampleRate = bytes.readUInt32LE(body + 4);
			const bitsPerSample = bytes.readUInt16LE(body + 14);
			if (
				audioFormat !== 1 ||
				bitsPerSample !== 16 ||
				channels !== format.channels ||
				sampleRate !== format.sampleRate
			) {
				throw new AudioDecodeError(
					`WAV chunk is ${sampleRate} Hz/${channels}ch/${bitsPerSample}-bit, expected ${format.sampleRate} Hz/${format.channels}ch/16-bit PCM.`
				);
			}
			formatChecked = true;
		} else if (id === 'data') {
			if (!formatChecked) throw new AudioDecodeError('WAV data chunk precedes fmt chunk.');
			return bytes.subarray(body, Math.min(body + size, bytes.length));
		}

		// chunks are word-aligned
		offset = body + size + (size % 2);
	}

	throw new AudioDecodeError('WAV file has no data chunk.');
}

/**
 * Decodes one synthesized chunk into PCM frames matching `format`. Accepts
 * raw PCM16LE or a PCM WAV container.
 */
export function decodeChunk(bytes: Uint8Array, format: PcmFormat): Buffer {
	const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	const pcm = buffer.toString('ascii', 0, 4) === 'RIFF' ? readWavData(buffer, format) : buffer;

	const frameBytes = format.channels * BYTES_PER_SAMPLE;
	if (pcm.length === 0) {
		throw new AudioDecodeError('Audio chunk is empty.');
	}
	if (pcm.length % frameBytes !== 0) {
		throw new AudioDecodeError(
			`Audio chunk length ${pcm.length} is not a whole number of ${frameBytes}-byte frames.`
		);
	}
	return pcm;
}

export function encodeWav(pcm: Buffer, format: PcmFormat): Buffer {
	const blockAlign = format.channels * BYTES_PER_SAMPLE;
	const header = Buffer.alloc(WAV_HEADER_BYTES);
	header.write('RIFF', 0, 'ascii');
	header.writeUInt32LE(36 + pcm.length, 4);
	header.write('WAVE', 8, 'ascii');
	header.write('fmt ', 12, 'ascii');
	header.writeUInt32LE(16, 16);
	header.writeUInt16LE(1, 20); // PCM
	header.writeUInt16LE(format.channels, 22);
	header.writeUInt32LE(format.sampleRate, 24);
	header.writeUInt32LE(format.sampleRate * blockAlign, 28);
	header.writeUInt16LE(blockAlign, 32);
	header.writeUInt16LE(16, 34);
	header.write('data', 36, 'ascii');
	header.writeUInt32LE(pcm.length, 40);
	return Buffer.concat([header, pcm]);
}

/**
 * Joins chunks in index order, each followed by a GAP_MS pause, into one WAV
 * buffer. Chunks that fail to decode are skipped and listed in `skipped`;
 * `audio` is empty only when `segments` is 0.
 */
export function assembleAudio(
	chunks: readonly AudioChunk[],
	format: PcmFormat = DEFAULT_PCM_FORMAT,
	gapMs: number = GAP_MS
): AssembledAudio {
	assertUsableFormat(format);

	const gap = silence(gapMs, format);
	const parts: Buffer[] = [];
	const skipped: AssembledAudio['skipped'] = [];
	let segments = 0;

	const ordered = [...chunks].sort((a, b) => a.index - b.index);
	for (const chunk of ordered) {
		try {
			parts.push(decodeChunk(chunk.bytes, format), gap);
			segments += 1;
		} catch (err) {
			if (!(err instanceof AudioDecodeError)) throw err;
			skipped.push({ index: chunk.index, message: err.message });
		}
	}

	if (segments === 0) {
		return { audio: Buffer.alloc(0), segments, skipped };
	}

	return { audio: encodeWav(Buffer.concat(parts), format), segments, skipped };
}

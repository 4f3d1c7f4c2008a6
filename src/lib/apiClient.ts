import { z } from 'zod';
import type { PodcastJobView, SourceContent, SpeakerPair } from '@/types/podcast';

const FAILURE_KINDS = ['NoRecognizedDialogue', 'EnvironmentFatal', 'NoAudioProduced', 'Cancelled'] as const;

const ErrorBodySchema = z.object({ error: z.string() });

const SourceContentSchema: z.ZodType<SourceContent> = z.object({
	label: z.string(),
	content: z.string()
});

const PodcastJobViewSchema: z.ZodType<PodcastJobView> = z.object({
	status: z.enum(['pending', 'synthesizing', 'assembling', 'complete', 'error']),
	progress: z.number(),
	totalUtterances: z.number(),
	chunksGenerated: z.number(),
	failures: z.array(z.object({ index: z.number(), speaker: z.string(), message: z.string() })),
	audioAvailable: z.boolean(),
	error: z.object({ kind: z.enum(FAILURE_KINDS), message: z.string() }).nullable()
});

export class ApiError extends Error {
	constructor(
		message: string,
		public readonly status: number
	) {
		super(message);
		this.name = 'ApiError';
	}
}

async function failure(response: Response): Promise<ApiError> {
	const body = ErrorBodySchema.safeParse(await response.json().catch(() => null));
	return new ApiError(
		body.success ? body.data.error : `Request failed with status ${response.status}.`,
		response.status
	);
}

async function requestJson<S extends z.ZodTypeAny>(
	url: string,
	init: RequestInit,
	schema: S
): Promise<z.infer<S>> {
	const response = await fetch(url, init);
	if (!response.ok) throw await failure(response);

	const parsed = schema.safeParse(await response.json().catch(() => null));
	if (!parsed.success) {
		throw new ApiError('Unexpected response from server.', response.status);
	}
	return parsed.data;
}

function postJson(body: unknown): RequestInit {
	return {
		method: 'POST',
		headers: { 'Content-Type': 'application/json' },
		body: JSON.stringify(body)
	};
}

export function fetchWikipedia(topic: string): Promise<SourceContent> {
	return requestJson('/api/source/wikipedia', postJson({ topic }), SourceContentSchema);
}

export function uploadSource(file: File): Promise<SourceContent> {
	const formData = new FormData();
	formData.append('file', file);
	return requestJson('/api/source/upload', { method: 'POST', body: formData }, SourceContentSchema);
}

export async function requestScript(content: string, speakers: SpeakerPair): Promise<string> {
	const body = await requestJson(
		'/api/script',
		postJson({ content, speakers }),
		z.object({ script: z.string() })
	);
	return body.script;
}

export async function startPodcast(script: string, speakers: SpeakerPair): Promise<string> {
	const body = await requestJson(
		'/api/podcast/start',
		postJson({ script, speakers }),
		z.object({ jobId: z.string() })
	);
	return body.jobId;
}

export function getPodcastStatus(jobId: string): Promise<PodcastJobView> {
	const query = new URLSearchParams({ jobId });
	return requestJson(`/api/podcast/status?${query.toString()}`, { cache: 'no-store' }, PodcastJobViewSchema);
}

export async function cancelPodcast(jobId: string): Promise<boolean> {
	const body = await requestJson('/api/podcast/cancel', postJson({ jobId }), z.object({ cancelled: z.boolean() }));
	return body.cancelled;
}

export async function downloadPodcastAudio(jobId: string): Promise<Blob> {
	const query = new URLSearchParams({ jobId });
	const response = await fetch(`/api/podcast/audio?${query.toString()}`);
	if (!response.ok) throw await failure(response);
	return response.blob();
}

import { z } from 'zod';
import { VOICE_IDS } from './voices';

export const MAX_SCRIPT_LENGTH = 20_000;
export const MAX_SOURCE_LENGTH = 100_000;

export const SpeakerProfileSchema = z.object({
	name: z
		.string()
		.trim()
		.min(1, 'Speaker name is required.')
		.max(40, 'Speaker name must be at most 40 characters.')
		.refine((name) => !name.includes(':') && !/[\r\n]/.test(name), {
			message: 'Speaker name cannot contain a colon or a line break.'
		})
		.describe("The name used to tag this speaker's lines, e.g. 'Rahul'."),
	voice: z.enum(VOICE_IDS).describe('Catalog voice used for every line of this speaker.')
});

export const SpeakerPairSchema = z
	.tuple([SpeakerProfileSchema, SpeakerProfileSchema])
	.refine(([a, b]) => a.name.toLowerCase() !== b.name.toLowerCase(), {
		message: 'The two speakers need different names.'
	});

export const StartPodcastRequestSchema = z.object({
	script: z.string().trim().min(1, 'script is required.').max(MAX_SCRIPT_LENGTH),
	speakers: SpeakerPairSchema
});

export const ScriptRequestSchema = z.object({
	content: z.string().trim().min(1, 'content is required.').max(MAX_SOURCE_LENGTH),
	speakers: SpeakerPairSchema
});

export const WikipediaRequestSchema = z.object({
	topic: z.string().trim().min(1, 'topic is required.').max(200)
});

export const JobRequestSchema = z.object({
	jobId: z.string().regex(/^job_[0-9a-f-]{36}$/, 'jobId is invalid.')
});

/** First issue of a failed parse, phrased for an API error body. */
export function describeIssue(error: z.ZodError): string {
	const issue = error.issues[0];
	if (!issue) return 'Invalid request body.';
	const path = issue.path.join('.');
	return path ? `${path}: ${issue.message}` : issue.message;
}

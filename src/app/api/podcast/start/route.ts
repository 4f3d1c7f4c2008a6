import { NextResponse } from 'next/server';
import { startPodcastJob } from '@/lib/podcastJobs';
import { describeIssue, StartPodcastRequestSchema } from '@/lib/podcastSchema';

export const runtime = 'nodejs';

export async function POST(request: Request) {
	try {
		const body: unknown = await request.json().catch(() => null);
		const parsed = StartPodcastRequestSchema.safeParse(body);

		if (!parsed.success) {
			console.warn('[podcast-start] Invalid request', { issue: describeIssue(parsed.error) });
			return NextResponse.json({ error: describeIssue(parsed.error) }, { status: 400 });
		}

		// Fire-and-forget; clients poll /api/podcast/status.
		const { jobId, done } = startPodcastJob(parsed.data);
		void done;

		return NextResponse.json({ jobId });
	} catch (e) {
		console.error('Unexpected error in podcast-start', e);
		return NextResponse.json({ error: 'Unexpected server error in podcast-start.' }, { status: 500 });
	}
}

import { NextResponse } from 'next/server';
import { cancelPodcastJob } from '@/lib/podcastJobs';
import { describeIssue, JobRequestSchema } from '@/lib/podcastSchema';

export const runtime = 'nodejs';

export async function POST(request: Request) {
	const parsed = JobRequestSchema.safeParse(await request.json().catch(() => null));
	if (!parsed.success) {
		return NextResponse.json({ error: describeIssue(parsed.error) }, { status: 400 });
	}

	const cancelled = cancelPodcastJob(parsed.data.jobId);
	console.log('[podcast-cancel] Cancel requested', { jobId: parsed.data.jobId, cancelled });

	return NextResponse.json({ cancelled });
}

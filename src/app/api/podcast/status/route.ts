import { NextResponse } from 'next/server';
import { podcastJobs, viewJob } from '@/lib/podcastJobs';

export const runtime = 'nodejs';

export async function GET(request: Request) {
	const { searchParams } = new URL(request.url);
	const jobId = searchParams.get('jobId');

	if (!jobId) {
		return NextResponse.json({ error: 'Missing jobId parameter.' }, { status: 400 });
	}

	const job = podcastJobs.get(jobId);
	if (!job) {
		return NextResponse.json({ error: 'Job not found.' }, { status: 404 });
	}

	return NextResponse.json(viewJob(job));
}

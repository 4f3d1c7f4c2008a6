import { NextResponse } from 'next/server';
import { podcastJobs, takeJobAudio } from '@/lib/podcastJobs';
import { DOWNLOAD_FILE_NAME } from '@/lib/podcastSession';

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
	if (job.status !== 'complete') {
		return NextResponse.json({ error: 'Audio is not ready.' }, { status: 409 });
	}

	const audio = takeJobAudio(jobId);
	if (!audio) {
		return NextResponse.json({ error: 'Audio was already downloaded.' }, { status: 410 });
	}

	console.log('[podcast-audio] Handing over audio', { jobId, audioBytes: audio.length });

	return new NextResponse(new Uint8Array(audio), {
		headers: {
			'Content-Type': 'audio/wav',
			'Content-Length': String(audio.length),
			'Content-Disposition': `attachment; filename="${DOWNLOAD_FILE_NAME}"`,
			'Cache-Control': 'no-store'
		}
	});
}

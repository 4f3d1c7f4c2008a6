import { NextResponse } from 'next/server';
import { getErrorMessage, SourceExtractionError } from '@/lib/errors';
import { fetchWikipediaContent } from '@/lib/extractContent';
import { describeIssue, WikipediaRequestSchema } from '@/lib/podcastSchema';

export const runtime = 'nodejs';

export async function POST(request: Request) {
	const parsed = WikipediaRequestSchema.safeParse(await request.json().catch(() => null));
	if (!parsed.success) {
		return NextResponse.json({ error: describeIssue(parsed.error) }, { status: 400 });
	}

	try {
		const source = await fetchWikipediaContent(parsed.data.topic);
		console.log('[source] Wikipedia content found', {
			topic: parsed.data.topic,
			title: source.label,
			contentLength: source.content.length
		});
		return NextResponse.json(source);
	} catch (err) {
		console.error('[source] Wikipedia lookup failed', { topic: parsed.data.topic, error: getErrorMessage(err) });
		const message = err instanceof SourceExtractionError ? err.message : 'Error fetching Wikipedia.';
		return NextResponse.json({ error: message }, { status: 502 });
	}
}

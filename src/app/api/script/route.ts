import { NextResponse } from 'next/server';
import { serverEnv } from '@/lib/env';
import { getErrorMessage } from '@/lib/errors';
import { generateScript } from '@/lib/generateScript';
import { describeIssue, ScriptRequestSchema } from '@/lib/podcastSchema';

export const runtime = 'nodejs';
export const maxDuration = 60;

export async function POST(request: Request) {
	const parsed = ScriptRequestSchema.safeParse(await request.json().catch(() => null));
	if (!parsed.success) {
		return NextResponse.json({ error: describeIssue(parsed.error) }, { status: 400 });
	}

	if (!serverEnv().MISTRAL_API_KEY) {
		return NextResponse.json({ error: 'Missing MISTRAL_API_KEY' }, { status: 500 });
	}

	try {
		const script = await generateScript(parsed.data.content, parsed.data.speakers);
		return NextResponse.json({ script });
	} catch (err) {
		console.error('[script] Script generation failed', { error: getErrorMessage(err) });
		return NextResponse.json({ error: 'Failed to generate the podcast script.' }, { status: 502 });
	}
}

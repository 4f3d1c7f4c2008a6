import { NextResponse } from 'next/server';
import { getErrorMessage, SourceExtractionError } from '@/lib/errors';
import { extractUploadedSource } from '@/lib/extractContent';

export const runtime = 'nodejs';
export const maxDuration = 60;

const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

export async function POST(request: Request) {
	let file: FormDataEntryValue | null;
	try {
		file = (await request.formData()).get('file');
	} catch {
		return NextResponse.json({ error: 'Expected multipart form data.' }, { status: 400 });
	}

	if (!(file instanceof File)) {
		return NextResponse.json({ error: 'file is required' }, { status: 400 });
	}
	if (file.size > MAX_UPLOAD_BYTES) {
		return NextResponse.json({ error: 'File is larger than 20 MB.' }, { status: 413 });
	}

	try {
		const source = await extractUploadedSource(file);
		console.log('[source] Upload extracted', {
			fileName: file.name,
			fileBytes: file.size,
			contentLength: source.content.length
		});
		return NextResponse.json(source);
	} catch (err) {
		if (err instanceof SourceExtractionError) {
			console.warn('[source] Upload rejected', { fileName: file.name, error: err.message });
			return NextResponse.json({ error: err.message }, { status: 422 });
		}
		console.error('[source] Unexpected extraction error', { fileName: file.name, error: getErrorMessage(err) });
		return NextResponse.json({ error: 'Unexpected error while reading the file.' }, { status: 500 });
	}
}

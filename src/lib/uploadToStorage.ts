import { serverEnv } from './env';
import { getSupabaseAdmin } from './supabaseServer';

const SOURCE_PREFIX = 'sources';

export function stagedPath(fileName: string, now: number = Date.now()): string {
	const safeName = (fileName || 'source.pdf').replace(/[^a-zA-Z0-9_.-]/g, '_');
	return `${SOURCE_PREFIX}/${now}-${safeName}`;
}

/**
 * Upload a source document to the staging bucket and return a public URL
 * that Mistral OCR can fetch, along with the storage path for cleanup.
 */
export async function stageSourceFile(file: File): Promise<{ url: string; path: string }> {
	const bucket = serverEnv().SOURCE_UPLOAD_BUCKET;
	const storage = getSupabaseAdmin().storage.from(bucket);
	const buffer = Buffer.from(await file.arrayBuffer());
	const path = stagedPath(file.name);

	const { error: uploadError } = await storage.upload(path, buffer, {
		contentType: file.type || 'application/octet-stream',
		upsert: true
	});

	if (uploadError) {
		console.error('[storage] Source upload error', { bucket, path, error: uploadError.message });
		throw new Error(uploadError.message || 'Failed to upload source to Supabase Storage');
	}

	const {
		data: { publicUrl }
	} = storage.getPublicUrl(path);

	return { url: publicUrl, path };
}

/** Remove a staged source; failures are logged, the extraction result stands. */
export async function removeStagedFile(path: string): Promise<void> {
	const bucket = serverEnv().SOURCE_UPLOAD_BUCKET;
	const { error } = await getSupabaseAdmin().storage.from(bucket).remove([path]);
	if (error) {
		console.error('[storage] Failed to delete staged source', { bucket, path, error: error.message });
	}
}

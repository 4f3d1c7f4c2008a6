// scripts/clear-source-uploads.ts
// Run with: npm run storage:clear
// Removes staged PDF uploads left behind by OCR runs that never cleaned up.

import { createClient } from '@supabase/supabase-js';
import * as dotenv from 'dotenv';
import { serverEnv } from '../src/lib/env';

dotenv.config({ path: '.env' });

const PAGE_SIZE = 1000;

async function main() {
	const env = serverEnv();
	const supabaseUrl = env.NEXT_PUBLIC_SUPABASE_URL;
	const supabaseKey = env.SUPABASE_SECRET_KEY ?? env.SUPABASE_SERVICE_ROLE_KEY;
	const bucket = env.SOURCE_UPLOAD_BUCKET;

	if (!supabaseUrl || !supabaseKey) {
		console.error('Missing NEXT_PUBLIC_SUPABASE_URL or SUPABASE_SECRET_KEY');
		process.exitCode = 1;
		return;
	}

	const storage = createClient(supabaseUrl, supabaseKey).storage.from(bucket);

	console.log(`Clearing staged uploads in bucket: ${bucket}`);

	const paths: string[] = [];
	let offset = 0;
	while (true) {
		const { data: files, error } = await storage.list('sources', { limit: PAGE_SIZE, offset });
		if (error) throw new Error(`Error listing ${bucket}/sources: ${error.message}`);
		if (!files || files.length === 0) break;

		// folders come back with a null id; uploads are never nested
		for (const file of files) {
			if (file.id !== null) paths.push(`sources/${file.name}`);
		}

		if (files.length < PAGE_SIZE) break;
		offset += PAGE_SIZE;
	}

	if (paths.length === 0) {
		console.log('  Nothing to delete');
		return;
	}

	console.log(`  Found ${paths.length} files to delete`);

	for (let i = 0; i < paths.length; i += PAGE_SIZE) {
		const batch = paths.slice(i, i + PAGE_SIZE);
		const { error } = await storage.remove(batch);
		if (error) throw new Error(`Error deleting batch from ${bucket}: ${error.message}`);
		console.log(`  Deleted ${batch.length} files`);
	}

	console.log('✓ Staged uploads cleared');
}

main().catch((err: unknown) => {
	console.error(err instanceof Error ? err.message : err);
	process.exitCode = 1;
});

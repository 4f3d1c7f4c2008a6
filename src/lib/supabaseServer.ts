// src/lib/supabaseServer.ts
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { serverEnv } from './env';

let admin: SupabaseClient | null = null;

/** Service-role client used for staging uploaded sources in Storage. */
export function getSupabaseAdmin(): SupabaseClient {
	if (!admin) {
		const env = serverEnv();
		// Prefer secret key (new format) but fallback to service role key (legacy)
		const serviceKey = env.SUPABASE_SECRET_KEY ?? env.SUPABASE_SERVICE_ROLE_KEY;
		if (!env.NEXT_PUBLIC_SUPABASE_URL || !serviceKey) {
			throw new Error(
				'Missing NEXT_PUBLIC_SUPABASE_URL or SUPABASE_SECRET_KEY / SUPABASE_SERVICE_ROLE_KEY'
			);
		}
		admin = createClient(env.NEXT_PUBLIC_SUPABASE_URL, serviceKey, {
			auth: { persistSession: false }
		});
	}
	return admin;
}

import { z } from 'zod';

const optionalString = z
	.string()
	.optional()
	.transform((value) => (value && value.trim() ? value.trim() : undefined));

const ServerEnvSchema = z.object({
	ELEVENLABS_API_KEY: optionalString,
	ELEVENLABS_MODEL_ID: z.string().default('eleven_flash_v2_5'),
	TTS_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
	TTS_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
	MISTRAL_API_KEY: optionalString,
	MISTRAL_SCRIPT_MODEL: z.string().default('mistral-large-latest'),
	MISTRAL_VISION_MODEL: z.string().default('pixtral-large-latest'),
	NEXT_PUBLIC_SUPABASE_URL: optionalString,
	SUPABASE_SECRET_KEY: optionalString,
	SUPABASE_SERVICE_ROLE_KEY: optionalString,
	SOURCE_UPLOAD_BUCKET: z.string().default('podcast-sources')
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

let cached: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
	if (!cached) {
		const result = ServerEnvSchema.safeParse(process.env);
		if (!result.success) {
			const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
			throw new Error(`Invalid server environment: ${issues.join('; ')}`);
		}
		cached = result.data;
	}
	return cached;
}

/** Drops the cached parse so the next read sees the current process.env. */
export function resetServerEnv() {
	cached = null;
}

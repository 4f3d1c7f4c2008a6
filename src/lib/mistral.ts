import { Mistral } from '@mistralai/mistralai';
import { serverEnv } from './env';

let client: Mistral | null = null;

export function getMistral(): Mistral {
	if (!client) {
		const apiKey = serverEnv().MISTRAL_API_KEY;
		if (!apiKey) {
			console.warn(
				'[mistral] MISTRAL_API_KEY is not set. Calls to Mistral will fail until this env var is configured.'
			);
		}
		client = new Mistral({ apiKey: apiKey ?? '' });
	}
	return client;
}

/** Plain text of a chat message, whether it came back as a string or as chunks. */
export function messageText(content: unknown): string {
	if (typeof content === 'string') return content;
	if (!Array.isArray(content)) return '';

	return content
		.map((chunk: unknown) => {
			const text = typeof chunk === 'object' && chunk !== null ? Reflect.get(chunk, 'text') : undefined;
			return typeof text === 'string' ? text : '';
		})
		.join('');
}

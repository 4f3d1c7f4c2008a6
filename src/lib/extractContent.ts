import * as mammoth from 'mammoth';
import { z } from 'zod';
import type { SourceContent } from '@/types/podcast';
import { serverEnv } from './env';
import { SourceExtractionError, getErrorMessage } from './errors';
import { getMistral, messageText } from './mistral';
import { removeStagedFile, stageSourceFile } from './uploadToStorage';

const WIKIPEDIA_API = 'https://en.wikipedia.org/w/api.php';
const WIKIPEDIA_SENTENCES = 10;
const PDF_PAGE_LIMIT = 10;
// zero-based page indices sent to OCR
const OCR_PAGES = Array.from({ length: PDF_PAGE_LIMIT }, (_, page) => page);
const IMAGE_PROMPT =
	'Extract all the text and summarize the visual content of this image for a podcast script.';

export const DOCUMENT_EXTENSIONS = ['pdf', 'docx', 'txt'] as const;
export const IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png'] as const;

const WikipediaResponseSchema = z.object({
	query: z
		.object({
			pages: z.array(
				z.object({
					title: z.string(),
					index: z.number().optional(),
					extract: z.string().optional()
				})
			)
		})
		.optional()
});

export function fileExtension(fileName: string): string {
	const dot = fileName.lastIndexOf('.');
	return dot === -1 ? '' : fileName.slice(dot + 1).toLowerCase();
}

function requireText(text: string, label: string): SourceContent {
	const content = text.trim();
	if (!content) {
		throw new SourceExtractionError(`No text could be extracted from ${label}.`);
	}
	return { label, content };
}

/** Intro of the best-matching Wikipedia article. */
export async function fetchWikipediaContent(topic: string): Promise<SourceContent> {
	const params = new URLSearchParams({
		action: 'query',
		format: 'json',
		formatversion: '2',
		generator: 'search',
		gsrsearch: topic,
		gsrlimit: '1',
		prop: 'extracts',
		exintro: '1',
		explaintext: '1',
		exsentences: String(WIKIPEDIA_SENTENCES),
		redirects: '1'
	});

	const response = await fetch(`${WIKIPEDIA_API}?${params.toString()}`, {
		headers: { 'User-Agent': 'hinglish-podcast-studio/0.1 (podcast script generator)' }
	});
	if (!response.ok) {
		throw new SourceExtractionError(`Wikipedia request failed with status ${response.status}.`);
	}

	const parsed = WikipediaResponseSchema.safeParse(await response.json());
	if (!parsed.success) {
		throw new SourceExtractionError('Unexpected response from Wikipedia.');
	}

	const page = parsed.data.query?.pages[0];
	if (!page) {
		throw new SourceExtractionError(`No Wikipedia article found for "${topic}".`);
	}
	return requireText(page.extract ?? '', page.title);
}

async function ocrPdf(file: File): Promise<string> {
	const staged = await stageSourceFile(file);
	try {
		const result = await getMistral().ocr.process({
			model: 'mistral-ocr-latest',
			document: { type: 'document_url', documentUrl: staged.url },
			pages: OCR_PAGES
		});
		return result.pages.map((page) => page.markdown).join('\n\n');
	} finally {
		await removeStagedFile(staged.path);
	}
}

async function docxText(file: File): Promise<string> {
	const buffer = Buffer.from(await file.arrayBuffer());
	const result = await mammoth.extractRawText({ buffer });
	return result.value;
}

/** Text of an uploaded .pdf, .docx or .txt file. */
export async function extractDocumentText(file: File): Promise<SourceContent> {
	const ext = fileExtension(file.name);
	try {
		switch (ext) {
			case 'pdf':
				return requireText(await ocrPdf(file), file.name);
			case 'docx':
				return requireText(await docxText(file), file.name);
			case 'txt':
				return requireText(await file.text(), file.name);
			default:
				throw new SourceExtractionError(
					`Unsupported document type ".${ext}". Upload a ${DOCUMENT_EXTENSIONS.join(', ')} file.`
				);
		}
	} catch (err) {
		if (err instanceof SourceExtractionError) throw err;
		console.error('[extract] Document extraction failed', { fileName: file.name, error: getErrorMessage(err) });
		throw new SourceExtractionError(`Error reading ${file.name}: ${getErrorMessage(err)}`, { cause: err });
	}
}

/** Text found in an uploaded image plus a description of what it shows. */
export async function analyzeImage(file: File): Promise<SourceContent> {
	const ext = fileExtension(file.name);
	if (!IMAGE_EXTENSIONS.some((allowed) => allowed === ext)) {
		throw new SourceExtractionError(
			`Unsupported image type ".${ext}". Upload a ${IMAGE_EXTENSIONS.join(', ')} file.`
		);
	}

	const mimeType = ext === 'png' ? 'image/png' : 'image/jpeg';
	const base64 = Buffer.from(await file.arrayBuffer()).toString('base64');

	try {
		const response = await getMistral().chat.complete({
			model: serverEnv().MISTRAL_VISION_MODEL,
			messages: [
				{
					role: 'user',
					content: [
						{ type: 'text', text: IMAGE_PROMPT },
						{ type: 'image_url', imageUrl: `data:${mimeType};base64,${base64}` }
					]
				}
			],
			maxTokens: 500
		});
		return requireText(messageText(response.choices?.[0]?.message?.content), file.name);
	} catch (err) {
		if (err instanceof SourceExtractionError) throw err;
		console.error('[extract] Image analysis failed', { fileName: file.name, error: getErrorMessage(err) });
		throw new SourceExtractionError(`Error analyzing ${file.name}: ${getErrorMessage(err)}`, { cause: err });
	}
}

/** Routes an upload to the document or image extractor by extension. */
export async function extractUploadedSource(file: File): Promise<SourceContent> {
	const ext = fileExtension(file.name);
	return IMAGE_EXTENSIONS.some((allowed) => allowed === ext)
		? analyzeImage(file)
		: extractDocumentText(file);
}

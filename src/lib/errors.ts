import type { PipelineFailureKind } from '@/types/podcast';

export class PipelineError extends Error {
	constructor(
		public readonly code: PipelineFailureKind,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = 'PipelineError';
	}
}

export function noRecognizedDialogueError(speakerNames: readonly string[]): PipelineError {
	return new PipelineError(
		'NoRecognizedDialogue',
		`No lines in the script start with "${speakerNames.join(':" or "')}:". Check the speaker names and the "Name: dialogue" format.`
	);
}

export function noAudioProducedError(attempted: number): PipelineError {
	return new PipelineError(
		'NoAudioProduced',
		`Speech synthesis failed for all ${attempted} line(s); no audio was produced.`
	);
}

export function cancelledError(): PipelineError {
	return new PipelineError('Cancelled', 'Audio generation was cancelled.');
}

/** A single utterance could not be synthesized; the run carries on. */
export class SynthesisError extends Error {
	readonly retryable: boolean;
	readonly statusCode: number | undefined;

	constructor(
		message: string,
		options: { retryable: boolean; statusCode?: number; cause?: unknown }
	) {
		super(message, { cause: options.cause });
		this.name = 'SynthesisError';
		this.retryable = options.retryable;
		this.statusCode = options.statusCode;
	}
}

/** The audio toolchain itself is unusable: missing credentials, rejected key, bad output format. */
export class EnvironmentFatalError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'EnvironmentFatalError';
	}
}

export class AudioDecodeError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'AudioDecodeError';
	}
}

export class SourceExtractionError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'SourceExtractionError';
	}
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

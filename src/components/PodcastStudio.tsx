'use client';

// src/components/PodcastStudio.tsx
import { useCallback, useEffect, useReducer, useState } from 'react';
import { Download, Loader2, Mic, Sparkles } from 'lucide-react';
import type { PodcastJobView, SourceContent } from '@/types/podcast';
import {
	cancelPodcast,
	downloadPodcastAudio,
	fetchWikipedia,
	getPodcastStatus,
	requestScript,
	startPodcast,
	uploadSource
} from '@/lib/apiClient';
import {
	createSession,
	DOWNLOAD_FILE_NAME,
	failureHeadline,
	sessionReducer,
	speakerProblem
} from '@/lib/podcastSession';
import GenerationProgress from './GenerationProgress';
import SourcePicker from './SourcePicker';
import SpeakerSettings from './SpeakerSettings';

const POLL_INTERVAL_MS = 1000;
const PREVIEW_CHARS = 1000;

type Problem = { headline: string; message: string };

type Busy = 'source' | 'script' | null;

function phaseLabel(job: PodcastJobView | null): string {
	if (!job || job.status === 'pending') return 'Starting…';
	if (job.status === 'assembling') return 'Stitching the episode together…';
	return 'Synthesizing audio…';
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : 'Something went wrong.';
}

export default function PodcastStudio() {
	const [session, dispatch] = useReducer(sessionReducer, undefined, () => createSession());
	const [busy, setBusy] = useState<Busy>(null);
	const [problem, setProblem] = useState<Problem | null>(null);
	const [jobId, setJobId] = useState<string | null>(null);
	const [job, setJob] = useState<PodcastJobView | null>(null);

	const audioUrl = session.audio?.url;
	useEffect(() => {
		if (!audioUrl) return;
		return () => URL.revokeObjectURL(audioUrl);
	}, [audioUrl]);

	const finishJob = useCallback(async (id: string, view: PodcastJobView) => {
		if (view.status === 'complete') {
			const blob = await downloadPodcastAudio(id);
			dispatch({
				type: 'audioReady',
				audio: {
					url: URL.createObjectURL(blob),
					chunksGenerated: view.chunksGenerated,
					failedLines: view.failures.length
				}
			});
		} else if (view.error) {
			setProblem({ headline: failureHeadline(view.error.kind), message: view.error.message });
		}
	}, []);

	useEffect(() => {
		if (!jobId) return;
		let stopped = false;

		const timer = setInterval(() => {
			getPodcastStatus(jobId)
				.then(async (view) => {
					if (stopped) return;
					setJob(view);
					if (view.status !== 'complete' && view.status !== 'error') return;

					stopped = true;
					clearInterval(timer);
					await finishJob(jobId, view);
					setJobId(null);
					setJob(null);
				})
				.catch((err: unknown) => {
					stopped = true;
					clearInterval(timer);
					setProblem({ headline: 'Lost track of the audio job', message: errorMessage(err) });
					setJobId(null);
					setJob(null);
				});
		}, POLL_INTERVAL_MS);

		return () => {
			stopped = true;
			clearInterval(timer);
		};
	}, [jobId, finishJob]);

	const loadSource = async (load: () => Promise<SourceContent>) => {
		setBusy('source');
		setProblem(null);
		try {
			dispatch({ type: 'sourceLoaded', source: await load() });
		} catch (err) {
			setProblem({ headline: 'Could not read the source', message: errorMessage(err) });
		} finally {
			setBusy(null);
		}
	};

	const onGenerateScript = async () => {
		if (!session.source) return;
		setBusy('script');
		setProblem(null);
		try {
			const script = await requestScript(session.source.content, session.speakers);
			dispatch({ type: 'scriptChanged', script });
		} catch (err) {
			setProblem({ headline: 'Script generation failed', message: errorMessage(err) });
		} finally {
			setBusy(null);
		}
	};

	const onGenerateAudio = async () => {
		setProblem(null);
		dispatch({ type: 'audioCleared' });
		try {
			setJobId(await startPodcast(session.script, session.speakers));
		} catch (err) {
			setProblem({ headline: 'Could not start audio generation', message: errorMessage(err) });
		}
	};

	const onCancel = async () => {
		if (!jobId) return;
		try {
			await cancelPodcast(jobId);
		} catch (err) {
			setProblem({ headline: 'Could not cancel', message: errorMessage(err) });
		}
	};

	const speakersInvalid = speakerProblem(session.speakers);
	const generating = jobId !== null;
	const locked = busy !== null || generating;

	return (
		<main
			style={{
				minHeight: '100vh',
				backgroundColor: '#F8F5F2',
				color: '#3B2F2F',
				fontFamily: 'var(--font-sans)',
				padding: '40px 16px'
			}}
		>
			<div style={{ maxWidth: 760, margin: '0 auto', display: 'grid', gap: 24 }}>
				<header>
					<h1 style={{ fontSize: '2.2rem', display: 'flex', alignItems: 'center', gap: 10, margin: 0 }}>
						<Mic size={32} />
						Any Doc to Hinglish Podcast
					</h1>
					<p style={{ marginTop: 8 }}>
						Turn a Wikipedia topic, a PDF, a Word document or an image into a short Hinglish conversation.
					</p>
				</header>

				<SourcePicker
					sourceType={session.sourceType}
					busy={locked}
					onSelect={(sourceType) => {
						setProblem(null);
						dispatch({ type: 'selectSource', sourceType });
					}}
					onWikipedia={(topic) => void loadSource(() => fetchWikipedia(topic))}
					onFile={(file) => void loadSource(() => uploadSource(file))}
				/>

				{busy === 'source' && (
					<p style={{ display: 'flex', alignItems: 'center', gap: 6 }}>
						<Loader2 size={16} className="spin" /> Extracting content…
					</p>
				)}

				{session.source && (
					<details style={{ backgroundColor: '#EFE8E1', borderRadius: 12, padding: 12 }}>
						<summary style={{ cursor: 'pointer' }}>Content from {session.source.label}</summary>
						<p style={{ whiteSpace: 'pre-wrap', fontSize: 14 }}>
							{session.source.content.slice(0, PREVIEW_CHARS)}
							{session.source.content.length > PREVIEW_CHARS ? '…' : ''}
						</p>
					</details>
				)}

				<SpeakerSettings
					speakers={session.speakers}
					disabled={locked}
					onChange={(slot, change) => dispatch({ type: 'speakerChanged', slot, ...change })}
				/>
				{speakersInvalid && <p style={{ color: '#A23B2A', margin: 0 }}>{speakersInvalid}</p>}

				<button
					onClick={onGenerateScript}
					disabled={!session.source || locked || speakersInvalid !== null}
					style={{ display: 'flex', alignItems: 'center', justifyContent: 'center', gap: 8, padding: '12px 20px', borderRadius: 30 }}
				>
					{busy === 'script' ? <Loader2 size={16} className="spin" /> : <Sparkles size={16} />}
					{busy === 'script' ? 'Writing Hinglish script…' : 'Generate Script'}
				</button>

				<label style={{ display: 'grid', gap: 6 }}>
					<span style={{ fontWeight: 600 }}>Script</span>
					<textarea
						value={session.script}
						onChange={(e) => dispatch({ type: 'scriptChanged', script: e.target.value })}
						rows={14}
						disabled={locked}
						placeholder={`${session.speakers[0].name}: Arre yaar, suna tumne?\n${session.speakers[1].name}: Haa, bolo!`}
						style={{ padding: 12, borderRadius: 12, border: '1px solid #C9BEB3', fontFamily: 'var(--font-mono)' }}
					/>
				</label>

				{generating ? (
					<GenerationProgress
						progress={job?.progress ?? 0}
						totalUtterances={job?.totalUtterances ?? 0}
						phase={phaseLabel(job)}
						onCancel={onCancel}
					/>
				) : (
					<button
						onClick={onGenerateAudio}
						disabled={!session.script.trim() || locked || speakersInvalid !== null}
						style={{
							padding: '12px 20px',
							borderRadius: 30,
							border: 'none',
							backgroundColor: '#3B2F2F',
							color: '#F8F5F2',
							cursor: 'pointer'
						}}
					>
						Generate Podcast Audio
					</button>
				)}

				{problem && (
					<div role="alert" style={{ backgroundColor: '#F6DDD8', borderRadius: 12, padding: 12 }}>
						<strong>{problem.headline}</strong>
						<p style={{ margin: '4px 0 0' }}>{problem.message}</p>
					</div>
				)}

				{session.audio && (
					<section style={{ display: 'grid', gap: 8 }}>
						<audio controls src={session.audio.url} style={{ width: '100%' }} />
						<p style={{ margin: 0, fontSize: 14 }}>
							{session.audio.chunksGenerated} line(s) voiced
							{session.audio.failedLines > 0 ? `, ${session.audio.failedLines} skipped` : ''}.
						</p>
						<a
							href={session.audio.url}
							download={DOWNLOAD_FILE_NAME}
							style={{ display: 'flex', alignItems: 'center', gap: 6, color: '#3B2F2F' }}
						>
							<Download size={16} />
							Download WAV
						</a>
					</section>
				)}
			</div>
		</main>
	);
}

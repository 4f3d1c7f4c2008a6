'use client';

// src/components/SourcePicker.tsx
import { useState } from 'react';
import { BookOpen, FileText, Image as ImageIcon, Loader2 } from 'lucide-react';
import type { SourceType } from '@/types/podcast';

type Props = {
	sourceType: SourceType;
	busy: boolean;
	onSelect: (sourceType: SourceType) => void;
	onWikipedia: (topic: string) => void;
	onFile: (file: File) => void;
};

const OPTIONS: { type: SourceType; label: string; icon: typeof BookOpen }[] = [
	{ type: 'wikipedia', label: 'Wikipedia Topic', icon: BookOpen },
	{ type: 'document', label: 'Document (PDF/DOCX/TXT)', icon: FileText },
	{ type: 'image', label: 'Image', icon: ImageIcon }
];

const ACCEPT: Record<Exclude<SourceType, 'wikipedia'>, string> = {
	document: '.pdf,.docx,.txt',
	image: '.jpg,.jpeg,.png'
};

export default function SourcePicker({ sourceType, busy, onSelect, onWikipedia, onFile }: Props) {
	const [topic, setTopic] = useState('');

	return (
		<section style={{ display: 'grid', gap: 12 }}>
			<div role="radiogroup" style={{ display: 'flex', gap: 8, flexWrap: 'wrap' }}>
				{OPTIONS.map(({ type, label, icon: Icon }) => {
					const active = type === sourceType;
					return (
						<button
							key={type}
							role="radio"
							aria-checked={active}
							disabled={busy}
							onClick={() => onSelect(type)}
							style={{
								display: 'flex',
								alignItems: 'center',
								gap: 6,
								padding: '8px 14px',
								borderRadius: 30,
								border: '1px solid #3B2F2F',
								backgroundColor: active ? '#3B2F2F' : 'transparent',
								color: active ? '#F8F5F2' : '#3B2F2F',
								cursor: 'pointer'
							}}
						>
							<Icon size={16} />
							{label}
						</button>
					);
				})}
			</div>

			{sourceType === 'wikipedia' ? (
				<form
					style={{ display: 'flex', gap: 8 }}
					onSubmit={(e) => {
						e.preventDefault();
						if (topic.trim()) onWikipedia(topic.trim());
					}}
				>
					<input
						value={topic}
						onChange={(e) => setTopic(e.target.value)}
						placeholder="Enter a topic (e.g., MS Dhoni)"
						style={{ flex: 1, padding: '8px 10px', borderRadius: 8, border: '1px solid #C9BEB3' }}
					/>
					<button type="submit" disabled={busy || !topic.trim()} style={{ padding: '8px 14px', borderRadius: 8 }}>
						{busy ? <Loader2 size={16} className="spin" /> : 'Fetch Wiki Data'}
					</button>
				</form>
			) : (
				<input
					// remount on type change so the previous selection is cleared
					key={sourceType}
					type="file"
					accept={ACCEPT[sourceType]}
					disabled={busy}
					onChange={(e) => {
						const file = e.target.files?.[0];
						if (file) onFile(file);
					}}
				/>
			)}
		</section>
	);
}

'use client';

// src/components/GenerationProgress.tsx
import { Loader2, X } from 'lucide-react';

type Props = {
	progress: number;
	totalUtterances: number;
	phase: string;
	onCancel: () => void;
};

export default function GenerationProgress({ progress, totalUtterances, phase, onCancel }: Props) {
	const percent = Math.round(progress * 100);
	const done = Math.round(progress * totalUtterances);

	return (
		<div style={{ display: 'grid', gap: 8 }}>
			<div style={{ display: 'flex', alignItems: 'center', gap: 8 }}>
				<Loader2 size={16} className="spin" />
				<span>
					{phase}
					{totalUtterances > 0 ? ` (${done}/${totalUtterances} lines)` : ''}
				</span>
				<button
					onClick={onCancel}
					style={{ marginLeft: 'auto', display: 'flex', alignItems: 'center', gap: 4, padding: '6px 10px', borderRadius: 8 }}
				>
					<X size={14} />
					Cancel
				</button>
			</div>
			<div
				role="progressbar"
				aria-valuemin={0}
				aria-valuemax={100}
				aria-valuenow={percent}
				style={{ height: 8, borderRadius: 4, backgroundColor: '#E6DED6', overflow: 'hidden' }}
			>
				<div style={{ width: `${percent}%`, height: '100%', backgroundColor: '#3B2F2F', transition: 'width 0.3s ease' }} />
			</div>
		</div>
	);
}

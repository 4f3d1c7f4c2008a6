'use client';

// src/components/SpeakerSettings.tsx
import type { SpeakerPair } from '@/types/podcast';
import { isVoiceId, VOICE_CATALOG, VOICE_IDS, type VoiceId } from '@/lib/voices';

type Props = {
	speakers: SpeakerPair;
	disabled?: boolean;
	onChange: (slot: 0 | 1, change: { name?: string; voice?: VoiceId }) => void;
};

const SLOTS = [0, 1] as const;

export default function SpeakerSettings({ speakers, disabled, onChange }: Props) {
	return (
		<fieldset
			style={{ border: '1px solid #D8CFC6', borderRadius: 12, padding: 16, display: 'grid', gap: 12 }}
			disabled={disabled}
		>
			<legend style={{ padding: '0 6px', fontWeight: 600 }}>Speakers</legend>
			{SLOTS.map((slot) => (
				<div key={slot} style={{ display: 'flex', gap: 12, alignItems: 'center', flexWrap: 'wrap' }}>
					<label style={{ display: 'flex', flexDirection: 'column', gap: 4, flex: '1 1 160px' }}>
						<span style={{ fontSize: 13 }}>Speaker {slot === 0 ? 'A' : 'B'} name</span>
						<input
							value={speakers[slot].name}
							maxLength={40}
							onChange={(e) => onChange(slot, { name: e.target.value })}
							style={{ padding: '8px 10px', borderRadius: 8, border: '1px solid #C9BEB3' }}
						/>
					</label>
					<label style={{ display: 'flex', flexDirection: 'column', gap: 4, flex: '1 1 160px' }}>
						<span style={{ fontSize: 13 }}>Voice</span>
						<select
							value={speakers[slot].voice}
							onChange={(e) => {
								const voice = e.target.value;
								if (isVoiceId(voice)) onChange(slot, { voice });
							}}
							style={{ padding: '8px 10px', borderRadius: 8, border: '1px solid #C9BEB3' }}
						>
							{VOICE_IDS.map((id) => (
								<option key={id} value={id}>
									{VOICE_CATALOG[id].label}
								</option>
							))}
						</select>
					</label>
				</div>
			))}
		</fieldset>
	);
}

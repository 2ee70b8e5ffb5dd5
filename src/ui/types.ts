export type SessionPhase = 'reviewing' | 'done' | 'error';
export type StatusKind = 'error' | 'success' | 'info';

export interface StatusNotice {
	kind: StatusKind;
	message: string;
}

export interface ShortcutHint {
	key: string;
	label: string;
}

export interface SessionTally {
	deleted: number;
	skipped: number;
	pruned: number;
	vanished: number;
	failures: number;
	reclaimedBytes: number;
}

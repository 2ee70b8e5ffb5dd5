import path from 'node:path';
import {describeFilesystemError} from '../../core/errors.js';
import {human} from '../../core/format.js';
import type {TreeLine} from '../../core/tree.js';
import type {
	FileRecord,
	SessionEvent,
	SessionPosition,
	SessionSummary,
} from '../../core/types.js';
import type {
	SessionPhase,
	SessionTally,
	StatusNotice,
} from '../types.js';
import type {UiAction} from './events.js';

export interface UiState {
	phase: SessionPhase;
	current: FileRecord | null;
	position: SessionPosition | null;
	tree: TreeLine[];
	helpOpen: boolean;
	invalidKey: string | null;
	status: StatusNotice | null;
	tally: SessionTally;
	summary: SessionSummary | null;
}

export const createInitialUiState = (): UiState => ({
	phase: 'reviewing',
	current: null,
	position: null,
	tree: [],
	helpOpen: false,
	invalidKey: null,
	status: null,
	tally: {
		deleted: 0,
		skipped: 0,
		pruned: 0,
		vanished: 0,
		failures: 0,
		reclaimedBytes: 0,
	},
	summary: null,
});

const reduceSessionEvent = (state: UiState, event: SessionEvent): UiState => {
	switch (event.type) {
		case 'present':
			return {
				...state,
				current: event.record,
				position: event.position,
				tree: [],
				helpOpen: false,
				invalidKey: null,
			};

		case 'help':
			return {
				...state,
				helpOpen: true,
				invalidKey: event.key ?? null,
			};

		case 'deleted': {
			const {result} = event;
			const verb = result.dryRun ? 'Would delete' : 'Deleted';
			return {
				...state,
				status: {
					kind: result.dryRun ? 'info' : 'success',
					message: `${verb} ${event.target} ${path.basename(result.path)} (${human(result.size)})`,
				},
				tally: {
					...state.tally,
					deleted: state.tally.deleted + 1,
					reclaimedBytes: state.tally.reclaimedBytes + result.size,
				},
			};
		}

		case 'warning':
			return {
				...state,
				status: {
					kind: 'error',
					message: `Could not delete ${path.basename(event.result.path)}: ${describeFilesystemError(event.result.error)}`,
				},
				tally: {...state.tally, failures: state.tally.failures + 1},
			};

		case 'root-guard':
			return {
				...state,
				status: {
					kind: 'info',
					message: 'Not removing the scanned directory itself; deleting the file only',
				},
			};

		case 'skipped':
			return {
				...state,
				status:
					event.target === 'directory'
						? {
								kind: 'info',
								message: `Skipping ${path.basename(event.record.parentDirectory)}/`,
							}
						: state.status,
				tally: {...state.tally, skipped: state.tally.skipped + 1},
			};

		case 'pruned':
			return {
				...state,
				tally: {...state.tally, pruned: state.tally.pruned + 1},
			};

		case 'vanished':
			return {
				...state,
				tally: {...state.tally, vanished: state.tally.vanished + 1},
			};

		case 'done':
			return {
				...state,
				phase: 'done',
				current: null,
				tree: [],
				helpOpen: false,
				invalidKey: null,
				summary: event.summary,
			};
	}
};

export const uiReducer = (state: UiState, action: UiAction): UiState => {
	switch (action.type) {
		case 'SESSION_EVENT':
			return reduceSessionEvent(state, action.event);

		case 'SET_TREE':
			if (state.current?.absolutePath !== action.path) return state;
			return {...state, tree: action.lines};

		case 'SET_STATUS':
			return {...state, status: action.status};

		case 'SESSION_FAILURE':
			return {
				...state,
				phase: 'error',
				status: {kind: 'error', message: action.message},
			};
	}
};

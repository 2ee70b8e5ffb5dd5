import type {SessionEvent} from '../../core/types.js';
import type {TreeLine} from '../../core/tree.js';
import type {StatusNotice} from '../types.js';

export type UiAction =
	| {
			type: 'SESSION_EVENT';
			event: SessionEvent;
	  }
	| {
			type: 'SET_TREE';
			path: string;
			lines: TreeLine[];
	  }
	| {
			type: 'SET_STATUS';
			status: StatusNotice | null;
	  }
	| {
			type: 'SESSION_FAILURE';
			message: string;
	  };

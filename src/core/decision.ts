import type {Decision} from './types.js';

export interface KeyBinding {
	key: string;
	decision: Exclude<Decision, 'invalid'>;
	label: string;
}

export const KEY_BINDINGS: readonly KeyBinding[] = [
	{key: 'd', decision: 'delete-file', label: 'delete the file'},
	{
		key: 'D',
		decision: 'delete-directory',
		label: 'delete the directory which contains the file',
	},
	{
		key: 's',
		decision: 'skip-file',
		label: 'skip this file and go on to the next one',
	},
	{
		key: 'S',
		decision: 'skip-directory',
		label: 'skip this directory and go on to the next one',
	},
	{key: '?', decision: 'help', label: 'print this help menu'},
	{
		key: 'q',
		decision: 'quit',
		label: 'quit without reviewing the remaining files',
	},
];

const DECISIONS_BY_KEY: ReadonlyMap<string, Decision> = new Map(
	KEY_BINDINGS.map(binding => [binding.key, binding.decision]),
);

/** Case-sensitive: `d` and `D` are different decisions. */
export const parseDecision = (key: string): Decision =>
	DECISIONS_BY_KEY.get(key) ?? 'invalid';

import {useEffect, useMemo, useReducer} from 'react';
import {Box, Text, useApp, useInput, useStdout} from 'ink';
import {toErrorMessage} from './core/errors.js';
import {runSession} from './core/session.js';
import {buildDirectoryTree, type TreeOptions} from './core/tree.js';
import type {
	CandidateSequence,
	DeleteOperations,
	OrderBy,
	SessionSummary,
} from './core/types.js';
import {SummaryStrip} from './ui/chrome/summary-strip.js';
import {StatusLine} from './ui/chrome/status-line.js';
import {Footer} from './ui/footer.js';
import {Header} from './ui/header.js';
import {KeyBridgeClosedError, createKeyBridge} from './ui/key-bridge.js';
import {HelpOverlay} from './ui/overlays/help-overlay.js';
import {RecordPane} from './ui/panes/record-pane.js';
import {createInitialUiState, uiReducer} from './ui/state/reducer.js';
import type {ShortcutHint} from './ui/types.js';

export interface AppProps {
	sequence: CandidateSequence;
	rootDirectory: string;
	orderBy: OrderBy;
	operations: DeleteOperations;
	dryRun?: boolean;
	treeOptions?: TreeOptions;
	now?: number;
	exists?: (targetPath: string) => Promise<boolean>;
	onComplete?: (summary: SessionSummary) => void;
}

const SHORTCUTS: ShortcutHint[] = [
	{key: 'd', label: 'delete file'},
	{key: 'D', label: 'delete directory'},
	{key: 's', label: 'skip file'},
	{key: 'S', label: 'skip directory'},
	{key: '?', label: 'help'},
	{key: 'q', label: 'quit'},
];

const DEFAULT_TERMINAL_WIDTH = 100;

export default function App({
	sequence,
	rootDirectory,
	orderBy,
	operations,
	dryRun = false,
	treeOptions,
	now,
	exists,
	onComplete,
}: AppProps) {
	const {exit} = useApp();
	const {stdout} = useStdout();
	const [state, dispatch] = useReducer(
		uiReducer,
		undefined,
		createInitialUiState,
	);
	const bridge = useMemo(() => createKeyBridge(), []);
	const renderNow = useMemo(() => now ?? Date.now(), [now, state.current]);
	const terminalWidth = stdout.columns || DEFAULT_TERMINAL_WIDTH;

	useInput(input => {
		bridge.push(input);
	});

	useEffect(() => {
		let unmounted = false;

		runSession(sequence, operations, {
			rootDirectory,
			readKey: bridge.readKey,
			exists,
			onEvent(event) {
				if (!unmounted) dispatch({type: 'SESSION_EVENT', event});
			},
		})
			.then(summary => {
				onComplete?.(summary);
				exit();
			})
			.catch((error: unknown) => {
				if (unmounted && error instanceof KeyBridgeClosedError) return;
				dispatch({type: 'SESSION_FAILURE', message: toErrorMessage(error)});
				exit(error instanceof Error ? error : new Error(String(error)));
			});

		return () => {
			unmounted = true;
			bridge.close();
		};
		// One session per mount, over the sequence it was mounted with.
	}, []);

	const currentPath = state.current?.absolutePath;
	const currentDirectory = state.current?.parentDirectory;
	useEffect(() => {
		if (!currentPath || !currentDirectory) return;

		let stale = false;
		buildDirectoryTree(currentDirectory, currentPath, treeOptions)
			.then(lines => {
				if (!stale) dispatch({type: 'SET_TREE', path: currentPath, lines});
			})
			.catch((error: unknown) => {
				if (stale) return;
				dispatch({
					type: 'SET_STATUS',
					status: {kind: 'error', message: toErrorMessage(error)},
				});
			});

		return () => {
			stale = true;
		};
	}, [currentPath, currentDirectory, treeOptions]);

	if (state.phase === 'error') {
		return (
			<Box flexDirection="column">
				<Header rootDirectory={rootDirectory} orderBy={orderBy} dryRun={dryRun} />
				<StatusLine status={state.status} terminalWidth={terminalWidth} />
			</Box>
		);
	}

	return (
		<Box flexDirection="column">
			<Header rootDirectory={rootDirectory} orderBy={orderBy} dryRun={dryRun} />
			<SummaryStrip position={state.position} tally={state.tally} />
			{state.current ? (
				<RecordPane record={state.current} tree={state.tree} now={renderNow} />
			) : state.phase === 'done' ? (
				<Box paddingX={1}>
					<Text color="green">
						{state.summary?.quit ? 'Stopped early.' : 'All files reviewed.'}
					</Text>
				</Box>
			) : (
				<Box paddingX={1}>
					<Text color="gray">Looking for the next file…</Text>
				</Box>
			)}
			{state.helpOpen ? <HelpOverlay invalidKey={state.invalidKey} /> : null}
			<StatusLine status={state.status} terminalWidth={terminalWidth} />
			{state.phase === 'reviewing' && state.current ? (
				<Footer shortcuts={SHORTCUTS} />
			) : null}
		</Box>
	);
}

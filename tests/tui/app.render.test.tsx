import {render} from 'ink-testing-library';
import {expect, test, vi} from 'vitest';
import App from '../../src/app.js';
import type {
	DeleteOperations,
	DeleteResult,
	FileRecord,
	SessionSummary,
} from '../../src/core/types.js';
import {HelpOverlay} from '../../src/ui/overlays/help-overlay.js';
import {RecordPane} from '../../src/ui/panes/record-pane.js';

const ANSI_PATTERN = /\u001B\[[0-9;]*m/g;

const plain = (frame: string | undefined): string =>
	(frame ?? '').replaceAll(ANSI_PATTERN, '');

const record = (absolutePath: string, sizeBytes: number): FileRecord => ({
	absolutePath,
	parentDirectory: absolutePath.slice(0, absolutePath.lastIndexOf('/')),
	sizeBytes,
	modifiedTime: new Date('2026-01-01T00:00:00.000Z'),
});

const NOW = new Date('2026-01-11T00:00:00.000Z').getTime();

test('HelpOverlay lists every option and names the unrecognized key', () => {
	const {lastFrame} = render(<HelpOverlay invalidKey="x" />);
	const frame = plain(lastFrame());

	expect(frame).toContain('Unrecognized input "x". Nothing was changed.');
	expect(frame).toContain('Choose from one of these options:');
	expect(frame).toContain('d  delete the file');
	expect(frame).toContain('D  delete the directory which contains the file');
	expect(frame).toContain('S  skip this directory and go on to the next one');
	expect(frame).toContain('q  quit without reviewing the remaining files');
});

test('HelpOverlay opened with ? shows only the options', () => {
	const {lastFrame} = render(<HelpOverlay invalidKey={null} />);
	const lines = plain(lastFrame()).split('\n');

	expect(lines[1]).toContain('Choose from one of these options:');
});

test('RecordPane shows path, size, age and the highlighted tree entry', () => {
	const {lastFrame} = render(
		<RecordPane
			record={record('/music/live/a.flac', 1536)}
			now={NOW}
			tree={[
				{prefix: '', name: 'live/', isDirectory: true, highlighted: false},
				{prefix: '├── ', name: 'a.flac', isDirectory: false, highlighted: true},
				{prefix: '└── ', name: 'b.flac', isDirectory: false, highlighted: false},
			]}
		/>,
	);
	const frame = plain(lastFrame());

	expect(frame).toContain('Absolute path: /music/live/a.flac');
	expect(frame).toContain('Size: 1.5 KB · Age: 10 days (10d ago)');
	expect(frame).toContain('├── a.flac');
	expect(frame).toContain('└── b.flac');
});

test('App walks the session from keyboard input', async () => {
	const deleteFile = vi.fn(
		async (targetPath: string): Promise<DeleteResult> => ({
			path: targetPath,
			ok: true,
			size: 1000,
		}),
	);
	const operations: DeleteOperations = {
		deleteFile,
		deleteDirectory: vi.fn(async (targetPath: string): Promise<DeleteResult> => ({
			path: targetPath,
			ok: true,
			size: 0,
		})),
	};
	const onComplete = vi.fn((_summary: SessionSummary) => undefined);

	const {lastFrame, stdin} = render(
		<App
			sequence={[
				record('/music/live/a.flac', 5000),
				record('/music/live/b.flac', 3000),
				record('/music/studio/c.flac', 1000),
			]}
			rootDirectory="/music"
			orderBy="size"
			operations={operations}
			now={NOW}
			exists={async () => true}
			onComplete={onComplete}
		/>,
	);

	await vi.waitFor(() => {
		expect(plain(lastFrame())).toContain('Absolute path: /music/live/a.flac');
	});
	expect(plain(lastFrame())).toContain('largest first');

	stdin.write('x');
	await vi.waitFor(() => {
		expect(plain(lastFrame())).toContain(
			'Unrecognized input "x". Nothing was changed.',
		);
	});

	stdin.write('S');
	await vi.waitFor(() => {
		expect(plain(lastFrame())).toContain(
			'Absolute path: /music/studio/c.flac',
		);
	});
	const afterSkip = plain(lastFrame());
	expect(afterSkip).toContain('File 3/3');
	expect(afterSkip).toContain('Pruned 1');
	expect(afterSkip).toContain('Skipping live/');

	stdin.write('d');
	await vi.waitFor(() => {
		expect(onComplete).toHaveBeenCalledTimes(1);
	});

	expect(deleteFile.mock.calls).toEqual([['/music/studio/c.flac']]);
	expect(onComplete.mock.calls[0]?.[0]).toMatchObject({
		presented: 2,
		skippedDirectories: 1,
		pruned: 1,
		deletedFiles: 1,
		reclaimedBytes: 1000,
	});
	expect(plain(lastFrame())).toContain('All files reviewed.');
});

test('App marks dry-run sessions in the header', async () => {
	const {lastFrame, unmount} = render(
		<App
			sequence={[record('/music/live/a.flac', 5000)]}
			rootDirectory="/music"
			orderBy="age"
			operations={{
				deleteFile: async targetPath => ({path: targetPath, ok: true, size: 0}),
				deleteDirectory: async targetPath => ({
					path: targetPath,
					ok: true,
					size: 0,
				}),
			}}
			dryRun
			now={NOW}
			exists={async () => true}
		/>,
	);

	await vi.waitFor(() => {
		expect(plain(lastFrame())).toContain('stalest first · dry-run');
	});
	unmount();
});

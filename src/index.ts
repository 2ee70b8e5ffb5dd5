import path from 'node:path';
import process from 'node:process';
import {cancel, intro, log, note, outro, spinner} from '@clack/prompts';
import {collectCandidates, getTotalSize} from './core/candidates.js';
import {createDeleteOperations} from './core/delete.js';
import {describeFilesystemError} from './core/errors.js';
import {human} from './core/format.js';
import type {
	AntichonkConfig,
	FileRecord,
	OrderBy,
	SessionSummary,
} from './core/types.js';
import {runSessionApp} from './tui.js';

export interface RuntimeProps {
	rootDirectory: string;
	orderBy: OrderBy;
	dryRun: boolean;
	config: AntichonkConfig;
	maxDepth?: number;
}

const isRunningAsRoot = (): boolean =>
	typeof process.getuid !== 'function' || process.getuid() === 0;

export const formatSummary = (
	summary: SessionSummary,
	dryRun: boolean,
): string => {
	const deleteVerb = dryRun ? 'Would delete' : 'Deleted';
	const lines = [
		`Reviewed: ${summary.presented} of ${summary.total} files`,
		`${deleteVerb}: ${summary.deletedFiles} files, ${summary.deletedDirectories} directories (${human(summary.reclaimedBytes)})`,
		`Skipped: ${summary.skippedFiles} files, ${summary.skippedDirectories} directories`,
		`Pruned: ${summary.pruned} files in skipped or deleted directories`,
	];

	if (summary.vanished > 0) {
		lines.push(`Gone before review: ${summary.vanished} files`);
	}

	if (summary.unreviewed > 0) {
		lines.push(`Left unreviewed: ${summary.unreviewed} files`);
	}

	if (summary.failures.length > 0) {
		lines.push(`Failed deletions: ${summary.failures.length}`);
	}

	return lines.join('\n');
};

const scanWithSpinner = async (props: RuntimeProps): Promise<FileRecord[]> => {
	const scanSpinner = spinner();
	scanSpinner.start(`Scanning ${props.rootDirectory}`);

	try {
		const sequence = await collectCandidates(
			props.rootDirectory,
			props.orderBy,
			props.config,
			{maxDepth: props.maxDepth},
		);
		scanSpinner.stop(
			`Found ${sequence.length} files (${human(getTotalSize(sequence))})`,
		);
		return sequence;
	} catch (error) {
		scanSpinner.stop('Scan failed', 1);
		throw error;
	}
};

/**
 * Scan, review file by file, then report. Resolves with null when there was
 * nothing to review or the operator interrupted the review.
 */
export const runInteractiveSession = async (
	props: RuntimeProps,
): Promise<SessionSummary | null> => {
	intro('antichonk');

	if (!isRunningAsRoot()) {
		log.info(
			'Not running as root: files owned by other users may fail to delete.',
		);
	}

	if (props.dryRun) {
		log.warn('Dry-run: nothing will be deleted.');
	}

	const sequence = await scanWithSpinner(props);
	if (sequence.length === 0) {
		outro('Nothing to review.');
		return null;
	}

	const summary = await runSessionApp({
		sequence,
		rootDirectory: props.rootDirectory,
		orderBy: props.orderBy,
		operations: createDeleteOperations({dryRun: props.dryRun}),
		dryRun: props.dryRun,
		treeOptions: {
			depth: props.config.treeDepth,
			maxEntries: props.config.treeMaxEntries,
		},
	});

	if (!summary) {
		cancel('Review interrupted.');
		return null;
	}

	for (const failure of summary.failures) {
		const relativePath =
			path.relative(props.rootDirectory, failure.path) || '.';
		log.error(
			`Failed to delete ${relativePath}: ${describeFilesystemError(failure.error)}`,
		);
	}

	note(formatSummary(summary, props.dryRun), 'Session summary');

	if (summary.failures.length > 0) {
		outro('Finished with errors.');
	} else if (summary.quit) {
		outro('Stopped early.');
	} else {
		outro(props.dryRun ? 'Dry-run complete.' : 'All files reviewed.');
	}

	return summary;
};

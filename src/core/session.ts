import path from 'node:path';
import {parseDecision} from './decision.js';
import {describeFilesystemError} from './errors.js';
import {PruneSet} from './prune-set.js';
import {pathExists} from './scanner.js';
import type {
	CandidateSequence,
	DeleteOperations,
	DeleteResult,
	FileRecord,
	SessionEvent,
	SessionSummary,
} from './types.js';

export interface SessionOptions {
	rootDirectory: string;
	/** The single point where the loop waits on the operator. */
	readKey: () => Promise<string>;
	exists?: (targetPath: string) => Promise<boolean>;
	onEvent?: (event: SessionEvent) => void;
}

interface PendingRecord {
	record: FileRecord;
	index: number;
}

const createSummary = (total: number): SessionSummary => ({
	total,
	presented: 0,
	deletedFiles: 0,
	deletedDirectories: 0,
	skippedFiles: 0,
	skippedDirectories: 0,
	pruned: 0,
	vanished: 0,
	failures: [],
	unreviewed: 0,
	reclaimedBytes: 0,
	quit: false,
});

/**
 * Lazily yields the records whose directory has not been pruned. The prune
 * set is consulted on every step, so additions made while the consumer
 * holds a record affect everything after it.
 */
export function* remainingCandidates(
	sequence: CandidateSequence,
	pruneSet: PruneSet,
	onPruned?: (record: FileRecord) => void,
): Generator<PendingRecord, void, undefined> {
	for (const [index, record] of sequence.entries()) {
		if (pruneSet.covers(record.parentDirectory)) {
			onPruned?.(record);
			continue;
		}

		yield {record, index};
	}
}

const runDelete = async (
	operation: (targetPath: string) => Promise<DeleteResult>,
	targetPath: string,
): Promise<DeleteResult> => {
	try {
		return await operation(targetPath);
	} catch (error) {
		return {path: targetPath, ok: false, size: 0, error};
	}
};

export const runSession = async (
	sequence: CandidateSequence,
	operations: DeleteOperations,
	options: SessionOptions,
): Promise<SessionSummary> => {
	const rootDirectory = path.resolve(options.rootDirectory);
	const exists = options.exists ?? pathExists;
	const emit = (event: SessionEvent): void => options.onEvent?.(event);
	const summary = createSummary(sequence.length);
	const pruneSet = new PruneSet();

	const applyDelete = async (
		target: 'file' | 'directory',
		targetPath: string,
	): Promise<void> => {
		const result = await runDelete(
			target === 'file' ? operations.deleteFile : operations.deleteDirectory,
			targetPath,
		);

		if (!result.ok) {
			summary.failures.push(result);
			emit({
				type: 'warning',
				target,
				result,
				message: `Failed to delete ${targetPath}: ${describeFilesystemError(result.error)}`,
			});
			return;
		}

		if (target === 'file') {
			summary.deletedFiles++;
		} else {
			summary.deletedDirectories++;
		}

		summary.reclaimedBytes += result.size;
		emit({type: 'deleted', target, result});
	};

	const candidates = remainingCandidates(sequence, pruneSet, record => {
		summary.pruned++;
		emit({type: 'pruned', record});
	});

	for (const {record, index} of candidates) {
		if (!(await exists(record.absolutePath))) {
			summary.vanished++;
			emit({type: 'vanished', record});
			continue;
		}

		summary.presented++;
		emit({
			type: 'present',
			record,
			position: {index: index + 1, total: sequence.length},
		});

		let decided = false;
		while (!decided) {
			const key = await options.readKey();
			const decision = parseDecision(key);
			decided = true;

			switch (decision) {
				case 'delete-file': {
					await applyDelete('file', record.absolutePath);
					break;
				}

				case 'delete-directory': {
					if (path.resolve(record.parentDirectory) === rootDirectory) {
						emit({type: 'root-guard', record});
						await applyDelete('file', record.absolutePath);
						break;
					}

					await applyDelete('directory', record.parentDirectory);
					pruneSet.add(record.parentDirectory);
					break;
				}

				case 'skip-file': {
					summary.skippedFiles++;
					emit({type: 'skipped', target: 'file', record});
					break;
				}

				case 'skip-directory': {
					summary.skippedDirectories++;
					pruneSet.add(record.parentDirectory);
					emit({type: 'skipped', target: 'directory', record});
					break;
				}

				case 'quit': {
					summary.quit = true;
					break;
				}

				case 'help': {
					decided = false;
					emit({type: 'help', record});
					break;
				}

				case 'invalid': {
					decided = false;
					emit({type: 'help', record, key});
					break;
				}
			}
		}

		if (summary.quit) {
			summary.unreviewed = sequence
				.slice(index + 1)
				.filter(next => !pruneSet.covers(next.parentDirectory)).length;
			break;
		}
	}

	emit({type: 'done', summary});
	return summary;
};

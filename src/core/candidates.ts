import path from 'node:path';
import {filterNeverDelete} from './config.js';
import {scanFiles} from './scanner.js';
import type {AntichonkConfig, FileRecord, OrderBy} from './types.js';

export interface CollectOptions {
	maxDepth?: number;
}

export interface CandidateJson {
	path: string;
	relativePath: string;
	directory: string;
	size: number;
	mtime: string;
}

/**
 * Scan, then drop what the configuration protects. Filtering keeps the
 * scanner's order, so the result is still the presentation order.
 */
export const collectCandidates = async (
	rootDirectory: string,
	orderBy: OrderBy,
	config: AntichonkConfig,
	{maxDepth}: CollectOptions = {},
): Promise<FileRecord[]> => {
	const records = await scanFiles(rootDirectory, orderBy, {
		skipDirs: config.skipDirs,
		maxDepth: maxDepth ?? config.maxScanDepth,
	});

	return filterNeverDelete(
		records,
		path.resolve(rootDirectory),
		config.neverDelete,
	);
};

export const getTotalSize = (
	records: Iterable<Pick<FileRecord, 'sizeBytes'>>,
): number => {
	let total = 0;
	for (const record of records) {
		total += record.sizeBytes;
	}

	return total;
};

export const toCandidateJson = (
	records: readonly FileRecord[],
	rootDirectory: string,
): CandidateJson[] =>
	records.map(record => ({
		path: record.absolutePath,
		relativePath: path.relative(rootDirectory, record.absolutePath),
		directory: record.parentDirectory,
		size: record.sizeBytes,
		mtime: record.modifiedTime.toISOString(),
	}));

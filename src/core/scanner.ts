import fs from 'node:fs/promises';
import type {Dirent, Stats} from 'node:fs';
import path from 'node:path';
import {
	InvalidOrderByError,
	ScanRootError,
	toErrorMessage,
} from './errors.js';
import {
	DEFAULT_FS_CONCURRENCY,
	createConcurrencyLimiter,
	type ConcurrencyLimiter,
} from './limiter.js';
import type {
	FileRecord,
	OrderBy,
	PathStats,
	ScannerOptions,
} from './types.js';

export const ORDER_BY_VALUES: readonly OrderBy[] = ['age', 'size'];

export const isOrderBy = (value: unknown): value is OrderBy =>
	typeof value === 'string' && ORDER_BY_VALUES.some(entry => entry === value);

export const parseOrderBy = (value: string): OrderBy => {
	const normalized = value.trim().toLowerCase();
	if (!isOrderBy(normalized)) throw new InvalidOrderByError(value);
	return normalized;
};

const compareText = (left: string, right: string): number =>
	left < right ? -1 : left > right ? 1 : 0;

const byStalest = (left: FileRecord, right: FileRecord): number =>
	left.modifiedTime.getTime() - right.modifiedTime.getTime();

const byLargest = (left: FileRecord, right: FileRecord): number =>
	right.sizeBytes - left.sizeBytes;

/** Largest or stalest first; equal keys fall back to the absolute path. */
export const compareCandidates =
	(orderBy: OrderBy) =>
	(left: FileRecord, right: FileRecord): number =>
		(orderBy === 'size' ? byLargest(left, right) : byStalest(left, right)) ||
		compareText(left.absolutePath, right.absolutePath);

export const sortCandidates = (
	records: readonly FileRecord[],
	orderBy: OrderBy,
): FileRecord[] => [...records].sort(compareCandidates(orderBy));

/** Throws a ScanRootError unless `rootDirectory` is a readable directory. */
export const assertScanRoot = async (rootDirectory: string): Promise<void> => {
	let stat: Stats;
	try {
		stat = await fs.stat(rootDirectory);
	} catch (error) {
		throw new ScanRootError(
			`Directory not found: ${rootDirectory} (${toErrorMessage(error)})`,
			'ROOT_NOT_FOUND',
			rootDirectory,
		);
	}

	if (!stat.isDirectory()) {
		throw new ScanRootError(
			`Not a directory: ${rootDirectory}`,
			'ROOT_NOT_DIRECTORY',
			rootDirectory,
		);
	}

	try {
		await fs.access(rootDirectory, fs.constants.R_OK | fs.constants.X_OK);
	} catch (error) {
		throw new ScanRootError(
			`Directory is not readable: ${rootDirectory} (${toErrorMessage(error)})`,
			'ROOT_UNREADABLE',
			rootDirectory,
		);
	}
};

const resolveMaxDepth = (value: number | undefined): number | undefined =>
	typeof value === 'number' && Number.isInteger(value) && value >= 0
		? value
		: undefined;

/**
 * Collects every regular file below `rootDirectory` and returns them in
 * presentation order. Links are followed; a directory whose real path is
 * already on the current descent path is not entered again.
 */
export const scanFiles = async (
	rootDirectory: string,
	orderBy: OrderBy,
	options: ScannerOptions = {},
): Promise<FileRecord[]> => {
	if (!isOrderBy(orderBy)) throw new InvalidOrderByError(String(orderBy));

	const root = path.resolve(rootDirectory);
	await assertScanRoot(root);

	const limit: ConcurrencyLimiter = createConcurrencyLimiter(
		options.concurrency ?? DEFAULT_FS_CONCURRENCY,
	);
	const skipDirs = new Set<string>();
	for (const skipDir of options.skipDirs ?? []) {
		if (typeof skipDir === 'string' && skipDir.length > 0) {
			skipDirs.add(skipDir);
		}
	}

	const maxDepth = resolveMaxDepth(options.maxDepth);
	const records: FileRecord[] = [];

	const walk = async (
		directory: string,
		descentPath: ReadonlySet<string>,
		depth: number,
	): Promise<void> => {
		let realDirectory: string;
		try {
			realDirectory = await limit(async () => fs.realpath(directory));
		} catch {
			return;
		}

		if (descentPath.has(realDirectory)) return;
		const nextDescentPath = new Set(descentPath).add(realDirectory);

		let entries: Dirent[];
		try {
			entries = await limit(async () =>
				fs.readdir(directory, {withFileTypes: true}),
			);
		} catch (error) {
			if (depth === 0) {
				throw new ScanRootError(
					`Directory is not readable: ${directory} (${toErrorMessage(error)})`,
					'ROOT_UNREADABLE',
					directory,
				);
			}

			return;
		}

		const subdirectories: string[] = [];
		await Promise.all(
			entries.map(async entry => {
				const entryPath = path.join(directory, entry.name);
				let stat: Stats;
				try {
					stat = await limit(async () => fs.stat(entryPath));
				} catch {
					return;
				}

				if (stat.isDirectory()) {
					if (skipDirs.has(entry.name)) return;
					if (maxDepth !== undefined && depth >= maxDepth) return;
					subdirectories.push(entryPath);
					return;
				}

				if (!stat.isFile()) return;

				records.push({
					absolutePath: entryPath,
					parentDirectory: directory,
					sizeBytes: stat.size,
					modifiedTime: stat.mtime,
				});
			}),
		);

		await Promise.all(
			subdirectories.map(async subdirectory =>
				walk(subdirectory, nextDescentPath, depth + 1),
			),
		);
	};

	await walk(root, new Set(), 0);

	return sortCandidates(records, orderBy);
};

const collectStats = async (targetPath: string): Promise<PathStats> => {
	let stat: Stats;
	try {
		stat = await fs.lstat(targetPath);
	} catch (error) {
		return {size: 0, error: toErrorMessage(error)};
	}

	if (!stat.isDirectory()) {
		return {size: stat.size};
	}

	let entries: Dirent[];
	try {
		entries = await fs.readdir(targetPath, {withFileTypes: true});
	} catch (error) {
		return {size: 0, error: toErrorMessage(error)};
	}

	const nestedStats = await Promise.all(
		entries.map(async entry => collectStats(path.join(targetPath, entry.name))),
	);

	let size = 0;
	for (const nested of nestedStats) {
		size += nested.size;
	}

	return {size};
};

/** Bytes that removing `targetPath` itself would reclaim; links are not followed. */
export const getPathStats = async (targetPath: string): Promise<PathStats> =>
	collectStats(targetPath);

export const pathExists = async (targetPath: string): Promise<boolean> => {
	try {
		await fs.lstat(targetPath);
		return true;
	} catch {
		return false;
	}
};

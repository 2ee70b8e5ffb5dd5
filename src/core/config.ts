import fs from 'node:fs/promises';
import path from 'node:path';
import type {AntichonkConfig, FileRecord} from './types.js';

const PATH_SEGMENT_NORMALIZER = /\/+/g;
const CONFIG_KEY = 'antichonk';
const RC_FILE_NAME = '.antichonkrc.json';

export const DEFAULT_TREE_DEPTH = 1;
export const DEFAULT_TREE_MAX_ENTRIES = 12;

export const DEFAULT_CONFIG: AntichonkConfig = {
	neverDelete: [],
	skipDirs: [],
	maxScanDepth: undefined,
	treeDepth: DEFAULT_TREE_DEPTH,
	treeMaxEntries: DEFAULT_TREE_MAX_ENTRIES,
};

const toPosixPath = (value: string): string => value.replaceAll('\\', '/');

const isRecord = (value: unknown): value is Record<string, unknown> =>
	Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const normalizePathPattern = (
	value: string,
	{allowEmpty = false}: {allowEmpty?: boolean} = {},
): string | null => {
	let normalized = toPosixPath(value.trim());
	if (!normalized) return allowEmpty ? '' : null;

	normalized = normalized.replace(/^\.\/+/, '');
	normalized = normalized.replace(/^\/+/, '');
	normalized = normalized.replace(PATH_SEGMENT_NORMALIZER, '/');
	normalized = normalized.replace(/\/+$/, '');

	if (!normalized || normalized === '.') {
		return allowEmpty ? '' : null;
	}

	normalized = path.posix.normalize(normalized);
	if (normalized === '.' || normalized === '') {
		return allowEmpty ? '' : null;
	}

	if (
		normalized === '..' ||
		normalized.startsWith('../') ||
		normalized.includes('/../') ||
		/^[A-Za-z]:\//.test(normalized)
	) {
		return null;
	}

	return normalized;
};

const normalizePatternList = (value: unknown): string[] => {
	if (!Array.isArray(value)) return [];

	const unique = new Set<string>();
	for (const entry of value) {
		if (typeof entry !== 'string') continue;
		const normalized = normalizePathPattern(entry);
		if (normalized) unique.add(normalized);
	}

	return [...unique];
};

/** Directory names only; anything with a separator is dropped. */
const normalizeNameList = (value: unknown): string[] => {
	if (!Array.isArray(value)) return [];

	const unique = new Set<string>();
	for (const entry of value) {
		if (typeof entry !== 'string') continue;
		const name = entry.trim();
		if (!name || name === '.' || name === '..') continue;
		if (name.includes('/') || name.includes('\\')) continue;
		unique.add(name);
	}

	return [...unique];
};

const parseNonNegativeInteger = (value: unknown): number | undefined => {
	if (typeof value !== 'number') return undefined;
	if (!Number.isInteger(value) || value < 0) return undefined;
	return value;
};

const parsePositiveInteger = (value: unknown, fallback: number): number =>
	typeof value === 'number' && Number.isInteger(value) && value > 0
		? value
		: fallback;

const normalizeConfig = (value: unknown): AntichonkConfig => {
	const raw = isRecord(value) ? value : {};

	return {
		neverDelete: normalizePatternList(raw.neverDelete),
		skipDirs: normalizeNameList(raw.skipDirs),
		maxScanDepth: parseNonNegativeInteger(raw.maxScanDepth),
		treeDepth: parsePositiveInteger(raw.treeDepth, DEFAULT_TREE_DEPTH),
		treeMaxEntries: parsePositiveInteger(
			raw.treeMaxEntries,
			DEFAULT_TREE_MAX_ENTRIES,
		),
	};
};

const readJson = async (filePath: string): Promise<Record<string, unknown>> => {
	try {
		const content = await fs.readFile(filePath, 'utf8');
		const parsed = JSON.parse(content) as unknown;
		return isRecord(parsed) ? parsed : {};
	} catch {
		return {};
	}
};

export const normalizeConfigPattern = (
	pattern: string | null | undefined,
): string | null => {
	if (typeof pattern !== 'string') return null;
	return normalizePathPattern(pattern);
};

export const normalizeRelativePath = (relativePath: string): string => {
	const normalized = normalizePathPattern(relativePath, {allowEmpty: true});
	return normalized ?? '';
};

export const matchesConfigPattern = (
	relativePath: string,
	pattern: string,
): boolean => {
	const normalizedPattern = normalizeConfigPattern(pattern);
	if (!normalizedPattern) return false;

	const normalizedRelativePath = normalizeRelativePath(relativePath);
	return (
		normalizedRelativePath === normalizedPattern ||
		normalizedRelativePath.startsWith(`${normalizedPattern}/`)
	);
};

export const matchesAnyConfigPattern = (
	relativePath: string,
	patterns: Iterable<string>,
): boolean => {
	for (const pattern of patterns) {
		if (matchesConfigPattern(relativePath, pattern)) return true;
	}

	return false;
};

export const filterNeverDelete = <T extends Pick<FileRecord, 'absolutePath'>>(
	records: readonly T[],
	rootDirectory: string,
	neverDeletePatterns: Iterable<string>,
): T[] => {
	const normalizedPatterns = normalizePatternList([...neverDeletePatterns]);
	if (normalizedPatterns.length === 0) return [...records];

	return records.filter(record => {
		const relativePath = path.relative(rootDirectory, record.absolutePath);
		return !matchesAnyConfigPattern(relativePath, normalizedPatterns);
	});
};

/**
 * `package.json#antichonk` in the scanned directory, overridden key by key
 * by `.antichonkrc.json` next to it.
 */
export const loadConfig = async (
	rootDirectory: string,
): Promise<AntichonkConfig> => {
	const packageJson = await readJson(path.join(rootDirectory, 'package.json'));
	const packageSection = packageJson[CONFIG_KEY];
	const packageConfig = isRecord(packageSection) ? packageSection : {};
	const rcConfig = await readJson(path.join(rootDirectory, RC_FILE_NAME));

	return normalizeConfig({
		...DEFAULT_CONFIG,
		...packageConfig,
		...rcConfig,
	});
};

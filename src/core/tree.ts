import fs from 'node:fs/promises';
import type {Dirent} from 'node:fs';
import path from 'node:path';
import {DEFAULT_TREE_DEPTH, DEFAULT_TREE_MAX_ENTRIES} from './config.js';

const BRANCH_MIDDLE = '├── ';
const BRANCH_LAST = '└── ';
const INDENT_MIDDLE = '│   ';
const INDENT_LAST = '    ';

export interface TreeLine {
	prefix: string;
	name: string;
	isDirectory: boolean;
	highlighted: boolean;
	/** Marks the "… N more" line for entries that did not fit. */
	overflow?: boolean;
}

export interface TreeOptions {
	depth?: number;
	maxEntries?: number;
}

const compareEntries = (left: Dirent, right: Dirent): number => {
	const leftName = left.name.toLowerCase();
	const rightName = right.name.toLowerCase();
	return leftName < rightName ? -1 : leftName > rightName ? 1 : 0;
};

const selectVisibleEntries = (
	entries: readonly Dirent[],
	directory: string,
	highlightPath: string,
	maxEntries: number,
): Dirent[] => {
	if (entries.length <= maxEntries) return [...entries];

	const highlightIndex = entries.findIndex(
		entry => path.join(directory, entry.name) === highlightPath,
	);
	const highlighted = entries[highlightIndex];
	if (!highlighted || highlightIndex < maxEntries) {
		return entries.slice(0, maxEntries);
	}

	return [...entries.slice(0, maxEntries - 1), highlighted];
};

/**
 * The containing directory of the record under review, the record itself
 * highlighted. Unreadable directories render as their own line only.
 */
export const buildDirectoryTree = async (
	directory: string,
	highlightPath: string,
	{
		depth = DEFAULT_TREE_DEPTH,
		maxEntries = DEFAULT_TREE_MAX_ENTRIES,
	}: TreeOptions = {},
): Promise<TreeLine[]> => {
	const lines: TreeLine[] = [
		{
			prefix: '',
			name: `${path.basename(directory) || directory}/`,
			isDirectory: true,
			highlighted: false,
		},
	];

	const visit = async (
		current: string,
		indent: string,
		level: number,
	): Promise<void> => {
		let entries: Dirent[];
		try {
			entries = await fs.readdir(current, {withFileTypes: true});
		} catch {
			return;
		}

		entries.sort(compareEntries);
		const visible = selectVisibleEntries(
			entries,
			current,
			highlightPath,
			Math.max(1, maxEntries),
		);
		const hiddenCount = entries.length - visible.length;

		for (const [index, entry] of visible.entries()) {
			const isLast = index === visible.length - 1 && hiddenCount === 0;
			const entryPath = path.join(current, entry.name);
			const isDirectory = entry.isDirectory();

			lines.push({
				prefix: `${indent}${isLast ? BRANCH_LAST : BRANCH_MIDDLE}`,
				name: isDirectory ? `${entry.name}/` : entry.name,
				isDirectory,
				highlighted: entryPath === highlightPath,
			});

			if (isDirectory && level < depth) {
				await visit(
					entryPath,
					`${indent}${isLast ? INDENT_LAST : INDENT_MIDDLE}`,
					level + 1,
				);
			}
		}

		if (hiddenCount > 0) {
			lines.push({
				prefix: `${indent}${BRANCH_LAST}`,
				name: `… ${hiddenCount} more`,
				isDirectory: false,
				highlighted: false,
				overflow: true,
			});
		}
	};

	await visit(directory, '', 1);
	return lines;
};

export const formatTreeLine = (line: TreeLine): string =>
	`${line.prefix}${line.name}`;

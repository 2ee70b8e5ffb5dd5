import fs from 'node:fs/promises';
import {SymbolicLinkError} from './errors.js';
import {getPathStats} from './scanner.js';
import type {DeleteOperations, DeleteResult} from './types.js';

const normalizeSize = (size: unknown): number =>
	typeof size === 'number' && Number.isFinite(size) && size > 0 ? size : 0;

const resolveLinkTarget = async (linkPath: string): Promise<string> => {
	try {
		return await fs.realpath(linkPath);
	} catch {
		return fs.readlink(linkPath);
	}
};

/**
 * A directory reached through a link cannot be removed by removing the
 * link. Missing paths pass through; `fs.rm` reports them.
 */
const findLinkedDirectory = async (
	targetPath: string,
): Promise<SymbolicLinkError | null> => {
	let isLink: boolean;
	try {
		isLink = (await fs.lstat(targetPath)).isSymbolicLink();
	} catch {
		return null;
	}

	if (!isLink) return null;
	return new SymbolicLinkError(targetPath, await resolveLinkTarget(targetPath));
};

const removePath = async (
	targetPath: string,
	recursive: boolean,
): Promise<DeleteResult> => {
	if (recursive) {
		const linkError = await findLinkedDirectory(targetPath);
		if (linkError) {
			return {path: targetPath, ok: false, size: 0, error: linkError};
		}
	}

	const stats = await getPathStats(targetPath);
	const size = normalizeSize(stats.size);

	try {
		// Not forced: a path that is already gone is reported as a failure.
		await fs.rm(targetPath, {recursive});
		return {path: targetPath, ok: true, size};
	} catch (error) {
		return {path: targetPath, ok: false, size, error};
	}
};

export const deleteFile = async (targetPath: string): Promise<DeleteResult> =>
	removePath(targetPath, false);

export const deleteDirectory = async (
	targetPath: string,
): Promise<DeleteResult> => removePath(targetPath, true);

const reportOnly =
	(recursive: boolean) =>
	async (targetPath: string): Promise<DeleteResult> => {
		const linkError = recursive ? await findLinkedDirectory(targetPath) : null;
		if (linkError) {
			return {path: targetPath, ok: false, size: 0, error: linkError};
		}

		const stats = await getPathStats(targetPath);
		if (stats.error) {
			return {path: targetPath, ok: false, size: 0, error: stats.error};
		}

		return {
			path: targetPath,
			ok: true,
			size: normalizeSize(stats.size),
			dryRun: true,
		};
	};

export const createDeleteOperations = ({
	dryRun = false,
}: {dryRun?: boolean} = {}): DeleteOperations =>
	dryRun
		? {deleteFile: reportOnly(false), deleteDirectory: reportOnly(true)}
		: {deleteFile, deleteDirectory};

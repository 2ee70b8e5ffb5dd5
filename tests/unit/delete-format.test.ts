import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {expect, test} from 'vitest';
import {
	createDeleteOperations,
	deleteDirectory,
	deleteFile,
} from '../../src/core/delete.js';
import {
	SymbolicLinkError,
	describeFilesystemError,
} from '../../src/core/errors.js';
import {
	ageInDays,
	formatDays,
	human,
	timeAgo,
	truncateMiddle,
} from '../../src/core/format.js';

const createTempDirectory = async (): Promise<string> =>
	fs.mkdtemp(path.join(os.tmpdir(), 'antichonk-delete-'));

test('human and timeAgo handle baseline formatting', () => {
	expect(human(0)).toBe('0 B');
	expect(human(1000)).toBe('1000 B');
	expect(human(1024)).toBe('1.0 KB');
	expect(human(1536)).toBe('1.5 KB');
	expect(human(10 * 1024)).toBe('10 KB');
	expect(human(undefined)).toBe('-');

	const now = new Date('2026-02-08T12:00:00.000Z').getTime();
	expect(timeAgo(new Date(now - 65_000), now)).toBe('1m ago');
	expect(timeAgo(new Date(now + 10_000), now)).toBe('0s ago');
	expect(timeAgo(null)).toBe('');
});

test('ageInDays and formatDays count whole days', () => {
	const now = new Date('2026-02-08T12:00:00.000Z').getTime();
	expect(ageInDays(new Date(now - 36 * 3_600_000), now)).toBe(1);
	expect(ageInDays(new Date(now + 3_600_000), now)).toBe(0);
	expect(ageInDays(Number.NaN, now)).toBeNull();
	expect(formatDays(1)).toBe('1 day');
	expect(formatDays(0)).toBe('0 days');
	expect(formatDays(400)).toBe('400 days');
	expect(formatDays(null)).toBe('unknown age');
});

test('truncateMiddle keeps both ends', () => {
	expect(truncateMiddle('abcdefghij', 7)).toBe('ab...ij');
	expect(truncateMiddle('short', 10)).toBe('short');
});

test('describeFilesystemError prefixes the errno code once', () => {
	const withCode = Object.assign(new Error('permission denied'), {
		code: 'EACCES',
	});
	const alreadyPrefixed = Object.assign(
		new Error("ENOENT: no such file or directory, unlink '/x'"),
		{code: 'ENOENT'},
	);

	expect(describeFilesystemError(withCode)).toBe('EACCES: permission denied');
	expect(describeFilesystemError(alreadyPrefixed)).toBe(
		"ENOENT: no such file or directory, unlink '/x'",
	);
	expect(describeFilesystemError('plain')).toBe('plain');
});

test('deleteFile removes one file and reports its size', async () => {
	const root = await createTempDirectory();
	const filePath = path.join(root, 'video.mp4');
	await fs.writeFile(filePath, 'x'.repeat(64));

	const result = await deleteFile(filePath);

	expect(result).toEqual({path: filePath, ok: true, size: 64});
	expect(await fs.readdir(root)).toEqual([]);
});

test('deleteFile reports a missing path as a failure', async () => {
	const root = await createTempDirectory();
	const missing = path.join(root, 'missing.txt');

	const result = await deleteFile(missing);

	expect(result.ok).toBe(false);
	expect(result.size).toBe(0);
	if (!result.ok) {
		expect(describeFilesystemError(result.error)).toMatch(/^ENOENT: /);
	}
});

test('deleteDirectory removes the whole subtree', async () => {
	const root = await createTempDirectory();
	const target = path.join(root, 'downloads');
	await fs.mkdir(path.join(target, 'nested'), {recursive: true});
	await fs.writeFile(path.join(target, 'a.iso'), 'x'.repeat(30));
	await fs.writeFile(path.join(target, 'nested/b.iso'), 'x'.repeat(12));

	const result = await deleteDirectory(target);

	expect(result).toEqual({path: target, ok: true, size: 42});
	expect(await fs.readdir(root)).toEqual([]);
});

test('dry-run operations measure without removing anything', async () => {
	const root = await createTempDirectory();
	const target = path.join(root, 'cache');
	await fs.mkdir(target);
	await fs.writeFile(path.join(target, 'blob'), 'x'.repeat(9));

	const operations = createDeleteOperations({dryRun: true});

	expect(await operations.deleteDirectory(target)).toEqual({
		path: target,
		ok: true,
		size: 9,
		dryRun: true,
	});
	expect(await operations.deleteFile(path.join(target, 'blob'))).toEqual({
		path: path.join(target, 'blob'),
		ok: true,
		size: 9,
		dryRun: true,
	});
	expect(await fs.readdir(target)).toEqual(['blob']);

	const missing = await operations.deleteFile(path.join(root, 'nope'));
	expect(missing.ok).toBe(false);
});

test('deleteDirectory refuses a linked directory and leaves both ends alone', async () => {
	const root = await createTempDirectory();
	const real = path.join(root, 'real');
	const link = path.join(root, 'link');
	await fs.mkdir(real);
	await fs.writeFile(path.join(real, 'f.bin'), 'x'.repeat(100));
	await fs.symlink(real, link, 'dir');

	const result = await deleteDirectory(link);

	expect(result.ok).toBe(false);
	expect(result.size).toBe(0);
	if (!result.ok) {
		expect(result.error).toBeInstanceOf(SymbolicLinkError);
		expect(describeFilesystemError(result.error)).toBe(
			`SYMBOLIC_LINK: ${link} is a symbolic link to ${await fs.realpath(real)}; only the link would be removed`,
		);
	}

	expect((await fs.lstat(link)).isSymbolicLink()).toBe(true);
	expect(await fs.readdir(real)).toEqual(['f.bin']);

	const dryRun = await createDeleteOperations({dryRun: true}).deleteDirectory(
		link,
	);
	expect(dryRun.ok).toBe(false);
});

test('deleteFile through a linked directory removes the real file', async () => {
	const root = await createTempDirectory();
	const real = path.join(root, 'real');
	await fs.mkdir(real);
	await fs.writeFile(path.join(real, 'f.bin'), 'x'.repeat(100));
	await fs.symlink(real, path.join(root, 'link'), 'dir');

	const result = await deleteFile(path.join(root, 'link', 'f.bin'));

	expect(result).toEqual({
		path: path.join(root, 'link', 'f.bin'),
		ok: true,
		size: 100,
	});
	expect(await fs.readdir(real)).toEqual([]);
});

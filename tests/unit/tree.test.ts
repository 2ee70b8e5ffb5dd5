import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {expect, test} from 'vitest';
import {buildDirectoryTree, formatTreeLine} from '../../src/core/tree.js';

const createTempDirectory = async (): Promise<string> =>
	fs.mkdtemp(path.join(os.tmpdir(), 'antichonk-tree-'));

test('buildDirectoryTree draws one level and highlights the record', async () => {
	const root = await createTempDirectory();
	const directory = path.join(root, 'albums');
	await fs.mkdir(path.join(directory, 'Live'), {recursive: true});
	await fs.writeFile(path.join(directory, 'b.flac'), 'x');
	await fs.writeFile(path.join(directory, 'a.flac'), 'x');
	await fs.writeFile(path.join(directory, 'Live/track.flac'), 'x');

	const lines = await buildDirectoryTree(
		directory,
		path.join(directory, 'b.flac'),
	);

	expect(lines.map(formatTreeLine)).toEqual([
		'albums/',
		'├── a.flac',
		'├── b.flac',
		'└── Live/',
	]);
	expect(lines.filter(line => line.highlighted).map(line => line.name)).toEqual([
		'b.flac',
	]);
});

test('buildDirectoryTree descends to the requested depth', async () => {
	const root = await createTempDirectory();
	await fs.mkdir(path.join(root, 'inner/deeper'), {recursive: true});
	await fs.writeFile(path.join(root, 'inner/file.txt'), 'x');
	await fs.writeFile(path.join(root, 'inner/deeper/hidden.txt'), 'x');
	await fs.writeFile(path.join(root, 'top.txt'), 'x');

	const lines = await buildDirectoryTree(root, path.join(root, 'top.txt'), {
		depth: 2,
	});

	expect(lines.slice(1).map(formatTreeLine)).toEqual([
		'├── inner/',
		'│   ├── deeper/',
		'│   └── file.txt',
		'└── top.txt',
	]);
});

test('buildDirectoryTree keeps the highlighted entry visible when truncating', async () => {
	const root = await createTempDirectory();
	for (const name of ['a', 'b', 'c', 'd', 'e']) {
		await fs.writeFile(path.join(root, `${name}.log`), 'x');
	}

	const lines = await buildDirectoryTree(root, path.join(root, 'e.log'), {
		maxEntries: 3,
	});

	expect(lines.slice(1).map(formatTreeLine)).toEqual([
		'├── a.log',
		'├── b.log',
		'├── e.log',
		'└── … 2 more',
	]);
	expect(lines.at(-1)?.overflow).toBe(true);
});

test('buildDirectoryTree renders only the root line when unreadable', async () => {
	const root = await createTempDirectory();
	const missing = path.join(root, 'gone');

	const lines = await buildDirectoryTree(missing, path.join(missing, 'x'));

	expect(lines.map(formatTreeLine)).toEqual(['gone/']);
});

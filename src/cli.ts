#!/usr/bin/env node

import path from 'node:path';
import process from 'node:process';
import meow from 'meow';
import {
	collectCandidates,
	getTotalSize,
	toCandidateJson,
} from './core/candidates.js';
import {loadConfig} from './core/config.js';
import {AntichonkError, toErrorMessage} from './core/errors.js';
import {human, timeAgo} from './core/format.js';
import {assertScanRoot, parseOrderBy} from './core/scanner.js';
import type {FileRecord} from './core/types.js';
import {runInteractiveSession} from './index.js';

const cli = meow(
	`
	Usage
	  $ antichonk DIRECTORY ORDER_BY

	Description
	  Interactive program to delete files based on certain characteristics.
	  Files under DIRECTORY are shown one at a time, largest first (size)
	  or stalest first (age). For each one choose:

	    d  delete the file
	    D  delete the directory which contains the file
	    s  skip this file and go on to the next one
	    S  skip this directory and go on to the next one
	    ?  print this help menu
	    q  quit without reviewing the remaining files

	  Run with elevated privileges (sudo) to be able to delete any file.

	Arguments
	  DIRECTORY     Directory to review
	  ORDER_BY      age | size

	Options
	  --dry-run     Don't delete anything; report what would be removed
	  --list        Non-interactive list of files in review order, then exit
	  --json        Output JSON (implies --list)
	  --max-depth=<n>
	                  Maximum directory depth below DIRECTORY

	Examples
	  $ sudo antichonk ~/Downloads size
	  $ antichonk /srv/media age --dry-run
	  $ antichonk . size --json
	`,
	{
		importMeta: import.meta,
		flags: {
			dryRun: {
				type: 'boolean',
				default: false,
			},
			list: {
				type: 'boolean',
				default: false,
			},
			json: {
				type: 'boolean',
				default: false,
			},
			maxDepth: {
				type: 'number',
			},
		},
	},
);

const outputListResults = (
	records: readonly FileRecord[],
	rootDirectory: string,
): void => {
	for (const record of records) {
		const rel = path.relative(rootDirectory, record.absolutePath);
		const time = `(${timeAgo(record.modifiedTime)})`;
		process.stdout.write(
			`${human(record.sizeBytes).padStart(8)}  ${time.padEnd(10)} ${rel}\n`,
		);
	}

	process.stdout.write(
		`\nTotal: ${human(getTotalSize(records))} in ${records.length} files\n`,
	);
};

const reportFatal = (error: unknown): void => {
	const code = error instanceof AntichonkError ? ` [${error.code}]` : '';
	process.stderr.write(`${toErrorMessage(error)}${code}\n`);
	process.exitCode = 1;
};

const main = async (): Promise<void> => {
	const [directoryArgument, orderByArgument] = cli.input;
	if (directoryArgument === undefined || orderByArgument === undefined) {
		cli.showHelp(1);
		return;
	}

	const maxDepthFlag = cli.flags.maxDepth;
	if (
		typeof maxDepthFlag !== 'undefined' &&
		(!Number.isInteger(maxDepthFlag) || maxDepthFlag < 0)
	) {
		process.stderr.write('--max-depth must be a non-negative integer.\n');
		process.exitCode = 1;
		return;
	}

	const rootDirectory = path.resolve(directoryArgument);

	try {
		const orderBy = parseOrderBy(orderByArgument);
		await assertScanRoot(rootDirectory);
		const config = await loadConfig(rootDirectory);

		if (cli.flags.list || cli.flags.json) {
			const records = await collectCandidates(rootDirectory, orderBy, config, {
				maxDepth: maxDepthFlag,
			});
			if (cli.flags.json) {
				process.stdout.write(
					JSON.stringify(toCandidateJson(records, rootDirectory), null, 2) +
						'\n',
				);
				return;
			}

			outputListResults(records, rootDirectory);
			return;
		}

		const summary = await runInteractiveSession({
			rootDirectory,
			orderBy,
			dryRun: cli.flags.dryRun,
			config,
			maxDepth: maxDepthFlag,
		});

		if (summary && summary.failures.length > 0) {
			process.exitCode = 1;
		}
	} catch (error) {
		reportFatal(error);
	}
};

await main();

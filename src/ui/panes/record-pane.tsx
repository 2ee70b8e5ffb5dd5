import {Box, Text} from 'ink';
import {ageInDays, formatDays, human, timeAgo} from '../../core/format.js';
import type {TreeLine} from '../../core/tree.js';
import type {FileRecord} from '../../core/types.js';

interface RecordPaneProps {
	record: FileRecord;
	tree: TreeLine[];
	now: number;
}

function TreeRow({line}: {line: TreeLine}) {
	if (line.highlighted) {
		return (
			<Text>
				<Text color="gray">{line.prefix}</Text>
				<Text color="green" bold>
					{line.name}
				</Text>
			</Text>
		);
	}

	return (
		<Text color="gray">
			{line.prefix}
			<Text color={line.isDirectory ? 'blue' : undefined} dimColor={line.overflow}>
				{line.name}
			</Text>
		</Text>
	);
}

export function RecordPane({record, tree, now}: RecordPaneProps) {
	const days = ageInDays(record.modifiedTime, now);

	return (
		<Box
			borderStyle="round"
			borderColor="blue"
			paddingX={1}
			flexDirection="column"
		>
			<Text>
				<Text color="gray">Absolute path: </Text>
				<Text bold>{record.absolutePath}</Text>
			</Text>
			<Text>
				<Text color="gray">Size: </Text>
				<Text color="magenta" bold>
					{human(record.sizeBytes)}
				</Text>
				<Text color="gray"> · Age: </Text>
				<Text color="yellow">{formatDays(days)}</Text>
				<Text color="gray"> ({timeAgo(record.modifiedTime, now)})</Text>
			</Text>
			{tree.length > 0 ? (
				<Box flexDirection="column" marginTop={1}>
					{tree.map((line, index) => (
						<TreeRow key={`${index}-${line.name}`} line={line} />
					))}
				</Box>
			) : null}
		</Box>
	);
}

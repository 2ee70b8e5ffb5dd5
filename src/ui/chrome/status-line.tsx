import {Box, Text} from 'ink';
import {truncateMiddle} from '../../core/format.js';
import type {StatusNotice} from '../types.js';

interface StatusLineProps {
	status: StatusNotice | null;
	terminalWidth: number;
}

const statusColor = (kind: StatusNotice['kind']): string => {
	if (kind === 'error') return 'red';
	if (kind === 'success') return 'green';
	return 'yellow';
};

export function StatusLine({status, terminalWidth}: StatusLineProps) {
	const message = status ? status.message : 'Ready';

	return (
		<Box paddingX={1}>
			<Text color={status ? statusColor(status.kind) : 'gray'}>
				{truncateMiddle(message, Math.max(20, terminalWidth - 4))}
			</Text>
		</Box>
	);
}

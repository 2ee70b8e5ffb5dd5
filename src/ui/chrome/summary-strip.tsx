import {Box, Text} from 'ink';
import {human} from '../../core/format.js';
import type {SessionPosition} from '../../core/types.js';
import type {SessionTally} from '../types.js';

interface SummaryStripProps {
	position: SessionPosition | null;
	tally: SessionTally;
}

interface SummaryCellProps {
	label: string;
	value: string;
	color: string;
}

function SummaryCell({label, value, color}: SummaryCellProps) {
	return (
		<Box marginRight={3}>
			<Text color="gray">{label} </Text>
			<Text color={color} bold>
				{value}
			</Text>
		</Box>
	);
}

export function SummaryStrip({position, tally}: SummaryStripProps) {
	return (
		<Box paddingX={1} flexWrap="wrap">
			<SummaryCell
				label="File"
				value={position ? `${position.index}/${position.total}` : '-'}
				color="cyan"
			/>
			<SummaryCell label="Deleted" value={String(tally.deleted)} color="green" />
			<SummaryCell label="Skipped" value={String(tally.skipped)} color="white" />
			<SummaryCell label="Pruned" value={String(tally.pruned)} color="white" />
			<SummaryCell
				label="Failed"
				value={String(tally.failures)}
				color={tally.failures > 0 ? 'red' : 'white'}
			/>
			<SummaryCell
				label="Reclaimed"
				value={human(tally.reclaimedBytes)}
				color="green"
			/>
		</Box>
	);
}

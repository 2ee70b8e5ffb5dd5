import {Box, Text} from 'ink';
import type {OrderBy} from '../core/types.js';

interface HeaderProps {
	rootDirectory: string;
	orderBy: OrderBy;
	dryRun: boolean;
}

const ORDER_LABELS: Record<OrderBy, string> = {
	size: 'largest first',
	age: 'stalest first',
};

export function Header({rootDirectory, orderBy, dryRun}: HeaderProps) {
	return (
		<Box
			borderStyle="round"
			borderColor="cyan"
			paddingX={1}
			justifyContent="space-between"
		>
			<Text color="cyan" bold>
				Antichonk
			</Text>
			<Text color="gray">
				{rootDirectory} · {ORDER_LABELS[orderBy]}
				{dryRun ? <Text color="yellow"> · dry-run</Text> : null}
			</Text>
		</Box>
	);
}

import {Box, Text} from 'ink';
import {KEY_BINDINGS} from '../../core/decision.js';

interface HelpOverlayProps {
	invalidKey: string | null;
}

const describeKey = (key: string): string => {
	if (key.length === 0) return 'that key';
	return JSON.stringify(key);
};

export function HelpOverlay({invalidKey}: HelpOverlayProps) {
	return (
		<Box
			borderStyle="double"
			borderColor="cyan"
			paddingX={1}
			flexDirection="column"
		>
			{invalidKey === null ? null : (
				<Text color="yellow">
					Unrecognized input {describeKey(invalidKey)}. Nothing was changed.
				</Text>
			)}
			<Text bold>Choose from one of these options:</Text>
			{KEY_BINDINGS.map(binding => (
				<Text key={binding.key}>
					{'  '}
					<Text color="cyan" bold>
						{binding.key}
					</Text>
					{'  '}
					<Text color="gray">{binding.label}</Text>
				</Text>
			))}
		</Box>
	);
}

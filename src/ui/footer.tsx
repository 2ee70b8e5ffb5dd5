import {Box, Text} from 'ink';
import type {ShortcutHint} from './types.js';

interface FooterProps {
	shortcuts: ShortcutHint[];
}

export function Footer({shortcuts}: FooterProps) {
	return (
		<Box paddingX={1} flexWrap="wrap">
			{shortcuts.map((shortcut, index) => (
				<Text key={shortcut.key}>
					{index > 0 ? <Text color="gray"> | </Text> : null}
					<Text color="cyan" bold>
						{shortcut.key}
					</Text>{' '}
					<Text color="gray">{shortcut.label}</Text>
				</Text>
			))}
		</Box>
	);
}

import {render} from 'ink';
import App, {type AppProps} from './app.js';
import type {SessionSummary} from './core/types.js';

export type SessionAppProps = Omit<AppProps, 'onComplete'>;

/**
 * Mounts the review screen and resolves once it unmounts: with the session
 * summary, or null when the operator interrupted with Ctrl+C.
 */
export const runSessionApp = async (
	props: SessionAppProps,
): Promise<SessionSummary | null> => {
	const outcome: {summary: SessionSummary | null} = {summary: null};

	const instance = render(
		<App
			{...props}
			onComplete={summary => {
				outcome.summary = summary;
			}}
		/>,
		{exitOnCtrlC: true},
	);

	await instance.waitUntilExit();
	return outcome.summary;
};

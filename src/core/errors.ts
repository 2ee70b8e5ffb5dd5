export type AntichonkErrorCode =
	| 'ROOT_NOT_FOUND'
	| 'ROOT_NOT_DIRECTORY'
	| 'ROOT_UNREADABLE'
	| 'INVALID_ORDER_BY'
	| 'INVALID_ARGUMENT'
	| 'SYMBOLIC_LINK';

/**
 * Precondition failures. Raised before any output is produced, reported
 * once by the CLI, which then exits non-zero.
 */
export class AntichonkError extends Error {
	constructor(
		message: string,
		readonly code: AntichonkErrorCode,
	) {
		super(message);
		this.name = 'AntichonkError';
	}
}

export class ScanRootError extends AntichonkError {
	constructor(
		message: string,
		code: Extract<
			AntichonkErrorCode,
			'ROOT_NOT_FOUND' | 'ROOT_NOT_DIRECTORY' | 'ROOT_UNREADABLE'
		>,
		readonly rootDirectory: string,
	) {
		super(message, code);
		this.name = 'ScanRootError';
	}
}

export class InvalidOrderByError extends AntichonkError {
	constructor(readonly value: string) {
		super(
			`Invalid ORDER_BY value: "${value}". Expected one of: age, size`,
			'INVALID_ORDER_BY',
		);
		this.name = 'InvalidOrderByError';
	}
}

/** `fs.rm` on a link removes the link, never what it points at. */
export class SymbolicLinkError extends AntichonkError {
	constructor(
		readonly linkPath: string,
		readonly targetPath: string,
	) {
		super(
			`${linkPath} is a symbolic link to ${targetPath}; only the link would be removed`,
			'SYMBOLIC_LINK',
		);
		this.name = 'SymbolicLinkError';
	}
}

const hasErrorCode = (error: unknown): error is Error & {code: string} =>
	error instanceof Error &&
	'code' in error &&
	typeof error.code === 'string';

export const toErrorMessage = (error: unknown): string =>
	String(error instanceof Error ? error.message : error);

/** `EACCES: permission denied, unlink '/x'` keeps the errno code visible. */
export const describeFilesystemError = (error: unknown): string => {
	const message = toErrorMessage(error);
	if (!hasErrorCode(error)) return message;
	return message.startsWith(error.code) ? message : `${error.code}: ${message}`;
};

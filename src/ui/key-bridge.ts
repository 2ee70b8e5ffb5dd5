export class KeyBridgeClosedError extends Error {
	constructor() {
		super('Key input closed before a key was read');
		this.name = 'KeyBridgeClosedError';
	}
}

interface PendingRead {
	resolve: (key: string) => void;
	reject: (error: Error) => void;
}

export interface KeyBridge {
	readKey: () => Promise<string>;
	/** Returns false when nobody is waiting; the key is dropped. */
	push: (key: string) => boolean;
	close: () => void;
	readonly waiting: boolean;
}

/**
 * Hands keypresses from the terminal to the session one prompt at a time.
 * Nothing is buffered, so a key typed while a deletion is still running
 * never answers the next prompt.
 */
export const createKeyBridge = (): KeyBridge => {
	let pending: PendingRead | null = null;
	let closed = false;

	return {
		readKey: async () => {
			if (closed) throw new KeyBridgeClosedError();
			if (pending) throw new Error('A key read is already pending');

			return new Promise<string>((resolve, reject) => {
				pending = {resolve, reject};
			});
		},
		push: key => {
			if (!pending) return false;
			const {resolve} = pending;
			pending = null;
			resolve(key);
			return true;
		},
		close: () => {
			closed = true;
			if (!pending) return;
			const {reject} = pending;
			pending = null;
			reject(new KeyBridgeClosedError());
		},
		get waiting() {
			return pending !== null;
		},
	};
};

export type ConcurrencyLimiter = <T>(task: () => Promise<T>) => Promise<T>;

export const DEFAULT_FS_CONCURRENCY = 32;

/**
 * FIFO limiter for filesystem calls. Only leaf calls (readdir, stat,
 * realpath) go through it: a recursive walk holding a slot while it waits
 * on its children would deadlock once the tree is deeper than the limit.
 */
export const createConcurrencyLimiter = (
	maxConcurrency: number,
): ConcurrencyLimiter => {
	const limit =
		Number.isInteger(maxConcurrency) && maxConcurrency > 0
			? maxConcurrency
			: DEFAULT_FS_CONCURRENCY;
	let active = 0;
	const queue: Array<() => void> = [];

	const acquire = async (): Promise<void> => {
		if (active < limit) {
			active++;
			return;
		}

		await new Promise<void>(resolve => {
			queue.push(() => {
				active++;
				resolve();
			});
		});
	};

	const release = (): void => {
		active--;
		const next = queue.shift();
		if (next) next();
	};

	return async <T>(task: () => Promise<T>): Promise<T> => {
		await acquire();
		try {
			return await task();
		} finally {
			release();
		}
	};
};

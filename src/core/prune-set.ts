import path from 'node:path';

/**
 * Directories marked with `S` or `D` during one session. Membership covers
 * the whole subtree, so a record is suppressed when its parent or any
 * ancestor of it has been added. Only grows.
 */
export class PruneSet {
	private readonly directories = new Set<string>();

	add(directory: string): void {
		this.directories.add(path.resolve(directory));
	}

	covers(targetPath: string): boolean {
		if (this.directories.size === 0) return false;

		let current = path.resolve(targetPath);
		for (;;) {
			if (this.directories.has(current)) return true;
			const parent = path.dirname(current);
			if (parent === current) return false;
			current = parent;
		}
	}
}

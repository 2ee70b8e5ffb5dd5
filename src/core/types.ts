export type OrderBy = 'age' | 'size';

export type Decision =
	| 'delete-file'
	| 'delete-directory'
	| 'skip-file'
	| 'skip-directory'
	| 'help'
	| 'quit'
	| 'invalid';

export interface FileRecord {
	readonly absolutePath: string;
	readonly parentDirectory: string;
	readonly sizeBytes: number;
	readonly modifiedTime: Date;
}

export type CandidateSequence = readonly FileRecord[];

export interface PathStats {
	size: number;
	error?: string;
}

export interface ScannerOptions {
	skipDirs?: Iterable<string>;
	maxDepth?: number;
	concurrency?: number;
}

export interface AntichonkConfig {
	neverDelete: string[];
	skipDirs: string[];
	maxScanDepth?: number;
	treeDepth: number;
	treeMaxEntries: number;
}

export interface DeleteSuccessResult {
	path: string;
	ok: true;
	size: number;
	dryRun?: boolean;
}

export interface DeleteFailureResult {
	path: string;
	ok: false;
	size: number;
	error: unknown;
}

export type DeleteResult = DeleteSuccessResult | DeleteFailureResult;

export interface DeleteOperations {
	deleteFile: (targetPath: string) => Promise<DeleteResult>;
	deleteDirectory: (targetPath: string) => Promise<DeleteResult>;
}

export interface SessionPosition {
	index: number;
	total: number;
}

export type SessionEvent =
	| {
			type: 'present';
			record: FileRecord;
			position: SessionPosition;
	  }
	| {
			type: 'help';
			record: FileRecord;
			key?: string;
	  }
	| {
			type: 'deleted';
			target: 'file' | 'directory';
			result: DeleteSuccessResult;
	  }
	| {
			type: 'warning';
			target: 'file' | 'directory';
			result: DeleteFailureResult;
			message: string;
	  }
	| {
			type: 'skipped';
			target: 'file' | 'directory';
			record: FileRecord;
	  }
	| {
			type: 'pruned';
			record: FileRecord;
	  }
	| {
			type: 'vanished';
			record: FileRecord;
	  }
	| {
			type: 'root-guard';
			record: FileRecord;
	  }
	| {
			type: 'done';
			summary: SessionSummary;
	  };

export interface SessionSummary {
	total: number;
	presented: number;
	deletedFiles: number;
	deletedDirectories: number;
	skippedFiles: number;
	skippedDirectories: number;
	pruned: number;
	vanished: number;
	failures: DeleteFailureResult[];
	unreviewed: number;
	reclaimedBytes: number;
	quit: boolean;
}

export enum ChangeKind {
  NewFile = 'NEW_FILE',
  ModifiedFile = 'MODIFIED_FILE',
}

export type FileChange =
  | { kind: ChangeKind.NewFile }
  | { kind: ChangeKind.ModifiedFile; lineNumbers: ReadonlySet<number> };

// Keys are paths relative to the submission root, using forward slashes.
export type ChangeSet = ReadonlyMap<string, FileChange>;

export enum SkipReason {
  BelowThreshold = 'BELOW_THRESHOLD',
  Extension = 'EXTENSION',
}

export type SkippedFile = {
  path: string;
  reason: SkipReason;
  changedLines?: number;
};

export type DiffAnalysis = {
  changeSet: ChangeSet;
  skipped: SkippedFile[];
  rawDiff: string;
};

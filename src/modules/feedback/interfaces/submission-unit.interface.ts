export enum SubmissionMode {
  SingleFile = 'SINGLE_FILE',
  Repository = 'REPOSITORY',
}

export type SubmissionUnit = {
  // Path relative to the submission root; also the unit's identity.
  id: string;
  sourcePath: string;
  // Intermediate artifacts for this unit are written under this directory.
  intermediateDir: string;
  outputDir: string;
  mode: SubmissionMode;
};

import type { SkippedFile } from '../diff/interfaces/change-set.interface';
import type { SubmissionMode } from './submission-unit.interface';

export type FeedbackRunReport = {
  mode: SubmissionMode;
  unitIds: string[];
  // Written feedback files, in merge order.
  outputs: string[];
  skipped: SkippedFile[];
};

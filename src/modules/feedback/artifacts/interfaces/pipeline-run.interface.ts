import type { PipelineStage } from '../../annotation/interfaces/pipeline-stage.enum';
import type { SubmissionMode } from '../../interfaces/submission-unit.interface';

export type UnitArtifactPaths = {
  document: string;
  draft: string;
  final: string;
  log: string;
  linter: string;
  run: string;
};

export type PipelineRun = {
  unitId: string;
  mode: SubmissionMode;
  stage: PipelineStage;
  sourcePath: string;
  artifacts: UnitArtifactPaths;
  updatedAt: string;
};

export enum PipelineStage {
  Draft = 'DRAFT',
  Reviewed = 'REVIEWED',
  Merged = 'MERGED',
}

export enum MeteredCall {
  Draft = 'Draft',
  Linter = 'Linter',
  Review = 'Review',
  Summarizer = 'Summarizer',
}

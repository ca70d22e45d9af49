export enum AnnotationCategory {
  CodeReadability = 'code_readability',
  LanguageConvention = 'language_convention',
  ProgramDesign = 'program_design',
  DataStructures = 'data_structures',
  PointersMemory = 'pointers_memory',
}

export enum AnnotationSeverity {
  Suggestion = 'suggestion',
  Issue = 'issue',
  Critical = 'critical',
}

export type Annotation = {
  line_number: number;
  category: AnnotationCategory;
  comment: string;
  severity: AnnotationSeverity;
};

export type FeedbackSummary = {
  strengths: string;
  areas_for_improvement: string;
  overall_assessment: string;
};

export type FeedbackBundle = {
  annotations: Annotation[];
  summary?: FeedbackSummary;
};

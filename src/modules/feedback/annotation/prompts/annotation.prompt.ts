import {
  AnnotationCategory,
  AnnotationSeverity,
} from '../interfaces/feedback-bundle.interface';

export type PromptContext = {
  language: string;
  problemStatement: string;
  rubric: string;
  numberedProgram: string;
  withSummary: boolean;
};

type ReviewPromptParams = PromptContext & {
  draftJson: string;
  linterDigest?: string;
};

export const buildSystemPrompt = (language: string) =>
  [
    `You are a teaching assistant giving qualitative feedback on a student ${language} programming assignment.`,
    'Good feedback is relevant to the education of undergraduate computer science students and is not overwhelming in quantity.',
    'Stick to the rubric.',
  ].join('\n');

// Shared prefix of the Draft and Review prompts; keep it identical so the
// upstream prompt cache can reuse it.
const buildContextPrompt = (params: PromptContext) => {
  const categories = Object.values(AnnotationCategory).join(', ');
  const severities = Object.values(AnnotationSeverity).join(', ');

  return [
    'Below are the problem statement, the rubric for code quality feedback and the program submission.',
    "Every program line is prefixed with its line number, like '42 | int a;'.",
    "A '+' after the bar marks lines the student added or changed, like '42 | + int a;'.",
    '',
    '<problem_statement>',
    params.problemStatement,
    '</problem_statement>',
    '',
    '<rubric>',
    params.rubric,
    '</rubric>',
    '',
    '<submission>',
    params.numberedProgram,
    '</submission>',
    '',
    "If every line is marked with '+', the submission is either a single program file or a file the student added to the codebase.",
    'If only some lines are marked, the student modified an existing file, and this file is only part of the solution.',
    `Annotation categories: ${categories}.`,
    `Annotation severities: ${severities}.`,
    'Adhere to the structured output schema.',
  ].join('\n');
};

export const buildDraftPrompt = (params: PromptContext) =>
  [
    buildContextPrompt(params),
    '',
    'Suggest a list of annotations (line-specific comments) based on the rubric.',
    "If only some lines are marked with '+', comment only on those lines.",
    'It is fine to return no annotations when there is no strong need for one.',
    ...(params.withSummary
      ? ['Also write a summary of the feedback for the whole submission.']
      : []),
  ].join('\n');

export const buildReviewPrompt = (params: ReviewPromptParams) =>
  [
    buildContextPrompt(params),
    '',
    ...(params.linterDigest
      ? [
          'A static-analysis linter reported the following (condensed) findings for the submission.',
          '<linter>',
          params.linterDigest,
          '</linter>',
          '',
        ]
      : []),
    params.withSummary
      ? 'Below are the draft annotations and the draft summary.'
      : 'Below are the draft annotations. Files that are part of a larger codebase get no summary.',
    'Do the following:',
    '1. For each annotation, check that the line number is correct and that the annotation is valid and worth giving.',
    params.linterDigest
      ? '2. Fold the linter findings into the annotations or the summary where relevant.'
      : '2. Keep annotations consistent with the rubric.',
    '3. Drop annotations that are unhelpful or redundant and would clutter the feedback.',
    'Return the complete corrected feedback.',
    '<feedback>',
    params.draftJson,
    '</feedback>',
  ].join('\n');

export const buildLinterDigestPrompt = (linterOutput: string) => [
  'The following is output from a static-analysis linter.',
  'Retain the essential points only; they will guide an automated programming feedback tool.',
  'Leave out file paths and tool noise.',
  '',
  linterOutput,
];

export const buildSummaryReformatPrompt = (
  language: string,
  summaryJson: string,
) =>
  [
    `The following is a summary of feedback on a ${language} program from an automated tool.`,
    'Rewrite each field as clear, concise prose a student can read at the bottom of the submission.',
    'Do not add suggestions of your own.',
    'Use plain sentences without markdown or comment delimiters; formatting is applied afterwards.',
    'Adhere to the structured output schema.',
    '<summary>',
    summaryJson,
    '</summary>',
  ].join('\n');

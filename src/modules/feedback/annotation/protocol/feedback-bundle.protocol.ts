import type { JsonSchemaFormat } from '../interfaces/annotation-provider.interface';
import {
  AnnotationCategory,
  AnnotationSeverity,
} from '../interfaces/feedback-bundle.interface';

const ANNOTATION_SCHEMA = {
  type: 'object',
  properties: {
    line_number: {
      type: 'integer',
      description: 'Line number in the program file this annotation is for',
    },
    category: {
      type: 'string',
      enum: Object.values(AnnotationCategory),
      description: 'Rubric parameter the feedback pertains to',
    },
    comment: {
      type: 'string',
      description: 'Detailed feedback about the code at this line number',
    },
    severity: {
      type: 'string',
      enum: Object.values(AnnotationSeverity),
      description: 'Level of importance of this annotation',
    },
  },
  required: ['line_number', 'category', 'comment', 'severity'],
  additionalProperties: false,
} as const;

const SUMMARY_SCHEMA = {
  type: 'object',
  properties: {
    strengths: {
      type: 'string',
      description: 'Positive aspects of the submission',
    },
    areas_for_improvement: {
      type: 'string',
      description: 'Aspects of the submission that need improvement',
    },
    overall_assessment: {
      type: 'string',
      description: 'Brief overall evaluation of the submission',
    },
  },
  required: ['strengths', 'areas_for_improvement', 'overall_assessment'],
  additionalProperties: false,
} as const;

export const SUMMARY_FIELDS = [
  'strengths',
  'areas_for_improvement',
  'overall_assessment',
] as const;

export const FEEDBACK_FORMAT_NAMES = {
  bundle: 'feedback_bundle',
  bundleWithSummary: 'feedback_bundle_with_summary',
  summary: 'feedback_summary',
} as const;

export const feedbackBundleFormat = (
  withSummary: boolean,
): JsonSchemaFormat => ({
  name: withSummary
    ? FEEDBACK_FORMAT_NAMES.bundleWithSummary
    : FEEDBACK_FORMAT_NAMES.bundle,
  schema: {
    type: 'object',
    properties: {
      annotations: {
        type: 'array',
        items: ANNOTATION_SCHEMA,
        description: 'List of line-specific code feedback',
      },
      ...(withSummary ? { summary: SUMMARY_SCHEMA } : {}),
    },
    required: withSummary ? ['annotations', 'summary'] : ['annotations'],
    additionalProperties: false,
  },
});

export const FEEDBACK_SUMMARY_FORMAT: JsonSchemaFormat = {
  name: FEEDBACK_FORMAT_NAMES.summary,
  schema: SUMMARY_SCHEMA,
};

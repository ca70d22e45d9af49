export const PIPELINE_ERROR_KINDS = {
  CONFIGURATION: 'CONFIGURATION',
  EXTERNAL_TOOL: 'EXTERNAL_TOOL',
  PROVIDER: 'PROVIDER',
  MISSING_ARTIFACT: 'MISSING_ARTIFACT',
  INVALID_ARTIFACT: 'INVALID_ARTIFACT',
  IO: 'IO',
} as const;

export type PipelineErrorKind =
  (typeof PIPELINE_ERROR_KINDS)[keyof typeof PIPELINE_ERROR_KINDS];

export const PIPELINE_ERROR_CODES = {
  MISSING_PROBLEM_STATEMENT: 'MISSING_PROBLEM_STATEMENT',
  MISSING_RUBRIC: 'MISSING_RUBRIC',
  MISSING_SUMMARIZER_MODEL: 'MISSING_SUMMARIZER_MODEL',
  INVALID_SUBMISSION_PATH: 'INVALID_SUBMISSION_PATH',
  DIFF_FAILED: 'DIFF_FAILED',
  LINTER_FAILED: 'LINTER_FAILED',
  TOOL_NOT_STARTED: 'TOOL_NOT_STARTED',
  MISSING_API_KEY: 'MISSING_API_KEY',
  UNAUTHORIZED: 'UNAUTHORIZED',
  RATE_LIMIT_UPSTREAM: 'RATE_LIMIT_UPSTREAM',
  UPSTREAM_4XX: 'UPSTREAM_4XX',
  UPSTREAM_5XX: 'UPSTREAM_5XX',
  TIMEOUT: 'TIMEOUT',
  TRANSPORT: 'TRANSPORT',
  BAD_RESPONSE: 'BAD_RESPONSE',
  SCHEMA_VIOLATION: 'SCHEMA_VIOLATION',
  DRAFT_NOT_FOUND: 'DRAFT_NOT_FOUND',
  FINAL_NOT_FOUND: 'FINAL_NOT_FOUND',
  DOCUMENT_NOT_FOUND: 'DOCUMENT_NOT_FOUND',
  CORRUPT_ARTIFACT: 'CORRUPT_ARTIFACT',
  LINE_OUT_OF_RANGE: 'LINE_OUT_OF_RANGE',
  IO_FAILURE: 'IO_FAILURE',
} as const;

export type PipelineErrorCode =
  (typeof PIPELINE_ERROR_CODES)[keyof typeof PIPELINE_ERROR_CODES];

export const PIPELINE_ERROR_CODE_KINDS: Record<
  PipelineErrorCode,
  PipelineErrorKind
> = {
  MISSING_PROBLEM_STATEMENT: PIPELINE_ERROR_KINDS.CONFIGURATION,
  MISSING_RUBRIC: PIPELINE_ERROR_KINDS.CONFIGURATION,
  MISSING_SUMMARIZER_MODEL: PIPELINE_ERROR_KINDS.CONFIGURATION,
  INVALID_SUBMISSION_PATH: PIPELINE_ERROR_KINDS.CONFIGURATION,
  DIFF_FAILED: PIPELINE_ERROR_KINDS.EXTERNAL_TOOL,
  LINTER_FAILED: PIPELINE_ERROR_KINDS.EXTERNAL_TOOL,
  TOOL_NOT_STARTED: PIPELINE_ERROR_KINDS.EXTERNAL_TOOL,
  MISSING_API_KEY: PIPELINE_ERROR_KINDS.PROVIDER,
  UNAUTHORIZED: PIPELINE_ERROR_KINDS.PROVIDER,
  RATE_LIMIT_UPSTREAM: PIPELINE_ERROR_KINDS.PROVIDER,
  UPSTREAM_4XX: PIPELINE_ERROR_KINDS.PROVIDER,
  UPSTREAM_5XX: PIPELINE_ERROR_KINDS.PROVIDER,
  TIMEOUT: PIPELINE_ERROR_KINDS.PROVIDER,
  TRANSPORT: PIPELINE_ERROR_KINDS.PROVIDER,
  BAD_RESPONSE: PIPELINE_ERROR_KINDS.PROVIDER,
  SCHEMA_VIOLATION: PIPELINE_ERROR_KINDS.PROVIDER,
  DRAFT_NOT_FOUND: PIPELINE_ERROR_KINDS.MISSING_ARTIFACT,
  FINAL_NOT_FOUND: PIPELINE_ERROR_KINDS.MISSING_ARTIFACT,
  DOCUMENT_NOT_FOUND: PIPELINE_ERROR_KINDS.MISSING_ARTIFACT,
  CORRUPT_ARTIFACT: PIPELINE_ERROR_KINDS.INVALID_ARTIFACT,
  LINE_OUT_OF_RANGE: PIPELINE_ERROR_KINDS.INVALID_ARTIFACT,
  IO_FAILURE: PIPELINE_ERROR_KINDS.IO,
};

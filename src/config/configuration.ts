export type AnnotatorProviderName = 'openrouter' | 'stub';

export type FeedbackSettings = {
  problemStatementPath: string;
  rubricPath: string;
  draftReviewModel: string;
  summarizerModel: string;
  sourceExtension: string;
  sourceLanguage: string;
  changeThreshold: number;
  wrapWidth: number;
  maxConcurrency: number;
};

export type PathSettings = {
  inputDir: string;
  outputDir: string;
  intermediateDir: string;
};

export type DiffSettings = {
  command: string;
  contextLines: number;
};

export type LinterSettings = {
  enabled: boolean;
  command: string;
  args: string[];
};

export type ProviderSettings = {
  name: AnnotatorProviderName;
  openrouter: {
    apiKey?: string;
    baseUrl: string;
    timeoutMs: number;
    httpReferer: string;
    xTitle: string;
  };
};

const readInt = (raw: string | undefined, fallback: number) => {
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const splitArgs = (raw: string | undefined) =>
  (raw ?? '').split(/\s+/).filter((part) => part.length > 0);

export default () => ({
  feedback: {
    problemStatementPath: process.env.PROBLEM_STATEMENT ?? '',
    rubricPath: process.env.RUBRIC ?? '',
    draftReviewModel: process.env.DRAFT_REVIEW_MODEL ?? '',
    summarizerModel: process.env.SUMMARIZER_MODEL ?? '',
    sourceExtension: process.env.SOURCE_EXTENSION ?? '.c',
    sourceLanguage: process.env.SOURCE_LANGUAGE ?? 'C',
    changeThreshold: readInt(process.env.CHANGE_THRESHOLD, 10),
    wrapWidth: readInt(process.env.WRAP_WIDTH, 80),
    maxConcurrency: readInt(process.env.FEEDBACK_MAX_CONCURRENCY, 1),
  } satisfies FeedbackSettings,
  paths: {
    inputDir: process.env.INPUT_DIR ?? 'input',
    outputDir: process.env.OUTPUT_DIR ?? 'output',
    intermediateDir: process.env.INTERMEDIATE_DIR ?? 'intermediates',
  } satisfies PathSettings,
  diff: {
    command: process.env.DIFF_COMMAND ?? 'diff',
    contextLines: readInt(process.env.DIFF_CONTEXT_LINES, 0),
  } satisfies DiffSettings,
  linter: {
    enabled: process.env.LINTER_ENABLED === 'true',
    command: process.env.LINTER_COMMAND ?? 'clang-tidy',
    args: splitArgs(process.env.LINTER_ARGS ?? '-- -std=gnu11'),
  } satisfies LinterSettings,
  provider: {
    name:
      (process.env.ANNOTATION_PROVIDER ?? 'openrouter').toLowerCase() ===
      'stub'
        ? 'stub'
        : 'openrouter',
    openrouter: {
      apiKey: process.env.OPENROUTER_API_KEY,
      baseUrl:
        process.env.OPENROUTER_BASE_URL ?? 'https://openrouter.ai/api/v1',
      timeoutMs: readInt(process.env.OPENROUTER_TIMEOUT_MS, 120000),
      httpReferer:
        process.env.OPENROUTER_HTTP_REFERER ?? 'https://submission-annotator.local',
      xTitle: process.env.OPENROUTER_X_TITLE ?? 'Submission Annotator',
    },
  } satisfies ProviderSettings,
});

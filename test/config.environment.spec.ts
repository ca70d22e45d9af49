import configuration from '../src/config/configuration';
import { envValidationSchema } from '../src/config/env.validation';

const REQUIRED = {
  PROBLEM_STATEMENT: 'context/problem.md',
  RUBRIC: 'context/rubric.md',
  DRAFT_REVIEW_MODEL: 'test/model',
};

describe('envValidationSchema', () => {
  it('fills defaults for an offline run', () => {
    const { error, value } = envValidationSchema.validate({
      ...REQUIRED,
      ANNOTATION_PROVIDER: 'stub',
    });

    expect(error).toBeUndefined();
    expect(value).toMatchObject({
      SOURCE_EXTENSION: '.c',
      CHANGE_THRESHOLD: 10,
      WRAP_WIDTH: 80,
      DIFF_CONTEXT_LINES: 0,
      LINTER_ENABLED: 'false',
      FEEDBACK_MAX_CONCURRENCY: 1,
    });
  });

  it('requires an API key for the OpenRouter provider', () => {
    const { error } = envValidationSchema.validate(REQUIRED);

    expect(error?.message).toBe('"OPENROUTER_API_KEY" is required');
  });

  it('accepts the provider name in any case', () => {
    const { error } = envValidationSchema.validate({
      ...REQUIRED,
      ANNOTATION_PROVIDER: 'Stub',
    });

    expect(error).toBeUndefined();
  });

  it('rejects an unknown provider', () => {
    const { error } = envValidationSchema.validate({
      ...REQUIRED,
      ANNOTATION_PROVIDER: 'local',
      OPENROUTER_API_KEY: 'test-key',
    });

    expect(error?.details.map((detail) => detail.path.join('.'))).toEqual([
      'ANNOTATION_PROVIDER',
    ]);
  });

  it('requires the problem statement and rubric', () => {
    const { error } = envValidationSchema.validate({
      DRAFT_REVIEW_MODEL: 'test/model',
      ANNOTATION_PROVIDER: 'stub',
    });

    expect(error?.details.map((detail) => detail.path.join('.'))).toEqual([
      'PROBLEM_STATEMENT',
      'RUBRIC',
    ]);
  });
});

describe('configuration', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('maps the environment onto typed settings', () => {
    process.env = {
      ...REQUIRED,
      SUMMARIZER_MODEL: 'test/summarizer',
      ANNOTATION_PROVIDER: 'Stub',
      CHANGE_THRESHOLD: '4',
      LINTER_ENABLED: 'true',
      LINTER_ARGS: '  --quiet   -- -std=c99 ',
      OPENROUTER_API_KEY: 'test-key',
    };

    const settings = configuration();

    expect(settings.feedback).toMatchObject({
      problemStatementPath: 'context/problem.md',
      summarizerModel: 'test/summarizer',
      changeThreshold: 4,
      wrapWidth: 80,
    });
    expect(settings.linter).toEqual({
      enabled: true,
      command: 'clang-tidy',
      args: ['--quiet', '--', '-std=c99'],
    });
    expect(settings.provider.name).toBe('stub');
    expect(settings.provider.openrouter.apiKey).toBe('test-key');
    expect(settings.diff).toEqual({ command: 'diff', contextLines: 0 });
  });
});

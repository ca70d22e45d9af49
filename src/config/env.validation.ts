import Joi from 'joi';

export const envValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'test', 'production')
    .default('development'),
  PROBLEM_STATEMENT: Joi.string().required(),
  RUBRIC: Joi.string().required(),
  DRAFT_REVIEW_MODEL: Joi.string().required(),
  SUMMARIZER_MODEL: Joi.string().allow('').default(''),
  ANNOTATION_PROVIDER: Joi.string()
    .valid('openrouter', 'stub')
    .insensitive()
    .default('openrouter'),
  OPENROUTER_API_KEY: Joi.string().when('ANNOTATION_PROVIDER', {
    is: Joi.string().valid('stub').insensitive(),
    then: Joi.optional(),
    otherwise: Joi.required(),
  }),
  OPENROUTER_BASE_URL: Joi.string()
    .uri({ scheme: [/https?/] })
    .default('https://openrouter.ai/api/v1'),
  OPENROUTER_HTTP_REFERER: Joi.string()
    .uri({ scheme: [/https?/] })
    .default('https://submission-annotator.local'),
  OPENROUTER_X_TITLE: Joi.string().default('Submission Annotator'),
  OPENROUTER_TIMEOUT_MS: Joi.number().integer().min(1000).default(120000),
  INPUT_DIR: Joi.string().default('input'),
  OUTPUT_DIR: Joi.string().default('output'),
  INTERMEDIATE_DIR: Joi.string().default('intermediates'),
  SOURCE_EXTENSION: Joi.string()
    .pattern(/^\.[A-Za-z0-9_+-]+$/)
    .default('.c'),
  SOURCE_LANGUAGE: Joi.string().default('C'),
  CHANGE_THRESHOLD: Joi.number().integer().min(0).default(10),
  WRAP_WIDTH: Joi.number().integer().min(20).max(400).default(80),
  DIFF_COMMAND: Joi.string().default('diff'),
  DIFF_CONTEXT_LINES: Joi.number().integer().min(0).max(20).default(0),
  LINTER_ENABLED: Joi.string().valid('true', 'false').default('false'),
  LINTER_COMMAND: Joi.string().default('clang-tidy'),
  LINTER_ARGS: Joi.string().allow('').default('-- -std=gnu11'),
  FEEDBACK_MAX_CONCURRENCY: Joi.number().integer().min(1).max(16).default(1),
})
  .unknown(true)
  .options({ abortEarly: false });

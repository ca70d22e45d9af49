import type { FeedbackPipelineError } from '../errors/pipeline.error';

export type Result<T, E = FeedbackPipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

import {
  PIPELINE_ERROR_CODE_KINDS,
  PipelineErrorCode,
  PipelineErrorKind,
} from './pipeline.error-codes';

export class FeedbackPipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'FeedbackPipelineError';
    this.kind = PIPELINE_ERROR_CODE_KINDS[code];
  }

  toDiagnostic() {
    return `[${this.kind}] ${this.code}: ${this.message}`;
  }
}

import { FeedbackPipelineError } from '../../../../common/errors/pipeline.error';
import { PIPELINE_ERROR_CODES } from '../../../../common/errors/pipeline.error-codes';
import { splitLines } from '../../../../common/lib/text-lines';
import { err, ok, Result } from '../../../../common/types/result.type';
import type {
  Annotation,
  FeedbackSummary,
} from '../../annotation/interfaces/feedback-bundle.interface';
import { formatAnnotationBlock, formatSummaryBlock } from './comment-block';

// Source lines pass through untouched; blocks for the same line keep the
// order they have in the bundle.
export const mergeAnnotations = (
  source: string,
  annotations: readonly Annotation[],
  wrapWidth: number,
): Result<string> => {
  const lines = splitLines(source);
  const blocks = new Map<number, string[]>();

  for (const annotation of annotations) {
    const lineNumber = annotation.line_number;
    if (lineNumber < 1 || lineNumber > lines.length) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.LINE_OUT_OF_RANGE,
          `Annotation targets line ${lineNumber}, but the file has ${lines.length} lines`,
        ),
      );
    }
    blocks.set(lineNumber, [
      ...(blocks.get(lineNumber) ?? []),
      formatAnnotationBlock(annotation.comment, wrapWidth),
    ]);
  }

  return ok(
    lines
      .map((line, index) => `${(blocks.get(index + 1) ?? []).join('')}${line}`)
      .join(''),
  );
};

export const appendSummary = (
  merged: string,
  summary: FeedbackSummary,
  wrapWidth: number,
) => {
  const separator = merged.length > 0 && !merged.endsWith('\n') ? '\n' : '';
  return `${merged}${separator}${formatSummaryBlock(summary, wrapWidth)}`;
};

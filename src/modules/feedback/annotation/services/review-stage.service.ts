import { Inject, Injectable, Logger } from '@nestjs/common';
import { FeedbackPipelineError } from '../../../../common/errors/pipeline.error';
import { PIPELINE_ERROR_CODES } from '../../../../common/errors/pipeline.error-codes';
import { countLines } from '../../../../common/lib/text-lines';
import { err, ok, Result } from '../../../../common/types/result.type';
import { ArtifactStoreService } from '../../artifacts/services/artifact-store.service';
import {
  SubmissionMode,
  SubmissionUnit,
} from '../../interfaces/submission-unit.interface';
import { ANNOTATION_PROVIDER_TOKEN } from '../interfaces/annotation-provider.interface';
import type { AnnotationProvider } from '../interfaces/annotation-provider.interface';
import type { FeedbackBundle } from '../interfaces/feedback-bundle.interface';
import type { FeedbackContext } from '../interfaces/feedback-context.interface';
import {
  MeteredCall,
  PipelineStage,
} from '../interfaces/pipeline-stage.enum';
import { parseFeedbackBundle } from '../lib/feedback-bundle.validator';
import {
  buildReviewPrompt,
  buildSystemPrompt,
} from '../prompts/annotation.prompt';
import { feedbackBundleFormat } from '../protocol/feedback-bundle.protocol';

@Injectable()
export class ReviewStageService {
  private readonly logger = new Logger(ReviewStageService.name);

  constructor(
    @Inject(ANNOTATION_PROVIDER_TOKEN)
    private readonly annotationProvider: AnnotationProvider,
    private readonly artifactStore: ArtifactStoreService,
  ) {}

  // Works from persisted artifacts only, so it can run in a separate
  // invocation from the Draft stage.
  async run(
    unit: SubmissionUnit,
    context: FeedbackContext,
    linterDigest?: string,
  ): Promise<Result<FeedbackBundle>> {
    const withSummary = unit.mode === SubmissionMode.SingleFile;

    const draft = await this.artifactStore.readBundle(unit, 'draft', {
      requireSummary: withSummary,
    });
    if (!draft.ok) {
      return draft;
    }
    const document = await this.artifactStore.readDocument(unit);
    if (!document.ok) {
      return document;
    }

    const response = await this.annotationProvider.generateStructured({
      model: context.draftReviewModel,
      operation: `review:${unit.id}`,
      system: buildSystemPrompt(context.language),
      user: [
        buildReviewPrompt({
          language: context.language,
          problemStatement: context.problemStatement,
          rubric: context.rubric,
          numberedProgram: document.value,
          withSummary,
          draftJson: JSON.stringify(draft.value),
          linterDigest,
        }),
      ],
      format: feedbackBundleFormat(withSummary),
    });
    if (!response.ok) {
      return response;
    }

    const bundle = await parseFeedbackBundle(response.value.value, {
      requireSummary: withSummary,
      lineCount: countLines(document.value),
    });
    if (!bundle.ok) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.SCHEMA_VIOLATION,
          `Review response for ${unit.id} violates the feedback schema: ${bundle.error.join('; ')}`,
        ),
      );
    }

    for (const step of [
      () => this.artifactStore.writeBundle(unit, 'final', bundle.value),
      () =>
        this.artifactStore.recordUsage(
          unit,
          MeteredCall.Review,
          response.value.usage,
        ),
      () => this.artifactStore.recordStage(unit, PipelineStage.Reviewed),
    ]) {
      const written = await step();
      if (!written.ok) {
        return written;
      }
    }

    this.logger.log(
      `Review complete: unit=${unit.id}, draft=${draft.value.annotations.length}, final=${bundle.value.annotations.length}`,
    );
    return ok(bundle.value);
  }
}

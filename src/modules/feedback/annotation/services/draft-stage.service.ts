import { Inject, Injectable, Logger } from '@nestjs/common';
import { FeedbackPipelineError } from '../../../../common/errors/pipeline.error';
import { PIPELINE_ERROR_CODES } from '../../../../common/errors/pipeline.error-codes';
import { err, ok, Result } from '../../../../common/types/result.type';
import { ArtifactStoreService } from '../../artifacts/services/artifact-store.service';
import {
  SubmissionMode,
  SubmissionUnit,
} from '../../interfaces/submission-unit.interface';
import type { ProvenanceDocument } from '../../provenance/lib/provenance-renderer';
import { ANNOTATION_PROVIDER_TOKEN } from '../interfaces/annotation-provider.interface';
import type { AnnotationProvider } from '../interfaces/annotation-provider.interface';
import type { FeedbackBundle } from '../interfaces/feedback-bundle.interface';
import type { FeedbackContext } from '../interfaces/feedback-context.interface';
import {
  MeteredCall,
  PipelineStage,
} from '../interfaces/pipeline-stage.enum';
import { parseFeedbackBundle } from '../lib/feedback-bundle.validator';
import { buildDraftPrompt, buildSystemPrompt } from '../prompts/annotation.prompt';
import { feedbackBundleFormat } from '../protocol/feedback-bundle.protocol';

@Injectable()
export class DraftStageService {
  private readonly logger = new Logger(DraftStageService.name);

  constructor(
    @Inject(ANNOTATION_PROVIDER_TOKEN)
    private readonly annotationProvider: AnnotationProvider,
    private readonly artifactStore: ArtifactStoreService,
  ) {}

  async run(
    unit: SubmissionUnit,
    context: FeedbackContext,
    document: ProvenanceDocument,
  ): Promise<Result<FeedbackBundle>> {
    const withSummary = unit.mode === SubmissionMode.SingleFile;

    const persistedDocument = await this.artifactStore.writeDocument(
      unit,
      document.rendered,
    );
    if (!persistedDocument.ok) {
      return persistedDocument;
    }

    const response = await this.annotationProvider.generateStructured({
      model: context.draftReviewModel,
      operation: `draft:${unit.id}`,
      system: buildSystemPrompt(context.language),
      user: [
        buildDraftPrompt({
          language: context.language,
          problemStatement: context.problemStatement,
          rubric: context.rubric,
          numberedProgram: document.rendered,
          withSummary,
        }),
      ],
      format: feedbackBundleFormat(withSummary),
    });
    if (!response.ok) {
      return response;
    }

    const bundle = await parseFeedbackBundle(response.value.value, {
      requireSummary: withSummary,
    });
    if (!bundle.ok) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.SCHEMA_VIOLATION,
          `Draft response for ${unit.id} violates the feedback schema: ${bundle.error.join('; ')}`,
        ),
      );
    }

    for (const step of [
      () => this.artifactStore.writeBundle(unit, 'draft', bundle.value),
      () =>
        this.artifactStore.recordUsage(
          unit,
          MeteredCall.Draft,
          response.value.usage,
        ),
      () => this.artifactStore.recordStage(unit, PipelineStage.Draft),
    ]) {
      const written = await step();
      if (!written.ok) {
        return written;
      }
    }

    this.logger.log(
      `Draft complete: unit=${unit.id}, annotations=${bundle.value.annotations.length}`,
    );
    return ok(bundle.value);
  }
}

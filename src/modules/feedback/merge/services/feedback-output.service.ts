import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FeedbackPipelineError } from '../../../../common/errors/pipeline.error';
import { PIPELINE_ERROR_CODES } from '../../../../common/errors/pipeline.error-codes';
import { err, ok, Result } from '../../../../common/types/result.type';
import type { FeedbackSettings } from '../../../../config/configuration';
import { ANNOTATION_PROVIDER_TOKEN } from '../../annotation/interfaces/annotation-provider.interface';
import type { AnnotationProvider } from '../../annotation/interfaces/annotation-provider.interface';
import type { FeedbackSummary } from '../../annotation/interfaces/feedback-bundle.interface';
import type { FeedbackContext } from '../../annotation/interfaces/feedback-context.interface';
import {
  MeteredCall,
  PipelineStage,
} from '../../annotation/interfaces/pipeline-stage.enum';
import { parseFeedbackSummary } from '../../annotation/lib/feedback-bundle.validator';
import { buildSummaryReformatPrompt } from '../../annotation/prompts/annotation.prompt';
import { FEEDBACK_SUMMARY_FORMAT } from '../../annotation/protocol/feedback-bundle.protocol';
import { ArtifactStoreService } from '../../artifacts/services/artifact-store.service';
import {
  SubmissionMode,
  SubmissionUnit,
} from '../../interfaces/submission-unit.interface';
import { appendSummary, mergeAnnotations } from '../lib/annotation-merger';
import { formatSectionHeader } from '../lib/comment-block';

export const AGGREGATE_FEEDBACK_BASENAME = 'feedback';
export const SINGLE_FEEDBACK_SUFFIX = '_feedback';

@Injectable()
export class FeedbackOutputService {
  private readonly logger = new Logger(FeedbackOutputService.name);

  constructor(
    private readonly configService: ConfigService,
    @Inject(ANNOTATION_PROVIDER_TOKEN)
    private readonly annotationProvider: AnnotationProvider,
    private readonly artifactStore: ArtifactStoreService,
  ) {}

  outputPathFor(unit: SubmissionUnit) {
    const { sourceExtension } =
      this.configService.getOrThrow<FeedbackSettings>('feedback');
    if (unit.mode === SubmissionMode.Repository) {
      return path.join(
        unit.outputDir,
        `${AGGREGATE_FEEDBACK_BASENAME}${sourceExtension}`,
      );
    }
    const { name, ext } = path.parse(unit.sourcePath);
    return path.join(unit.outputDir, `${name}${SINGLE_FEEDBACK_SUFFIX}${ext}`);
  }

  // Resolves to the written path, or null when an aggregate unit has no
  // annotations and contributes nothing.
  async merge(
    unit: SubmissionUnit,
    context: FeedbackContext,
  ): Promise<Result<string | null>> {
    const { wrapWidth } =
      this.configService.getOrThrow<FeedbackSettings>('feedback');
    const aggregate = unit.mode === SubmissionMode.Repository;

    const bundle = await this.artifactStore.readBundle(unit, 'final', {
      requireSummary: !aggregate,
    });
    if (!bundle.ok) {
      return bundle;
    }
    if (aggregate && bundle.value.annotations.length === 0) {
      this.logger.log(`No annotations, nothing merged: unit=${unit.id}`);
      return ok(null);
    }

    const source = await this.readSource(unit);
    if (!source.ok) {
      return source;
    }
    const merged = mergeAnnotations(
      source.value,
      bundle.value.annotations,
      wrapWidth,
    );
    if (!merged.ok) {
      return err(
        new FeedbackPipelineError(
          merged.error.code,
          `${unit.id}: ${merged.error.message}`,
        ),
      );
    }

    let content = merged.value;
    if (aggregate) {
      const separator = content.endsWith('\n') ? '' : '\n';
      content = `${formatSectionHeader(unit.id)}${content}${separator}`;
    } else if (bundle.value.summary) {
      const summary = await this.reformatSummary(
        unit,
        context,
        bundle.value.summary,
      );
      if (!summary.ok) {
        return summary;
      }
      content = appendSummary(content, summary.value, wrapWidth);
    }

    const target = this.outputPathFor(unit);
    try {
      await mkdir(path.dirname(target), { recursive: true });
      if (aggregate) {
        await appendFile(target, content, 'utf8');
      } else {
        await writeFile(target, content, 'utf8');
      }
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.IO_FAILURE,
          `Could not write ${target}`,
          error,
        ),
      );
    }

    const stage = await this.artifactStore.recordStage(
      unit,
      PipelineStage.Merged,
    );
    if (!stage.ok) {
      return stage;
    }
    this.logger.log(
      `Merged: unit=${unit.id}, annotations=${bundle.value.annotations.length}, output=${target}`,
    );
    return ok(target);
  }

  private async reformatSummary(
    unit: SubmissionUnit,
    context: FeedbackContext,
    summary: FeedbackSummary,
  ): Promise<Result<FeedbackSummary>> {
    const response = await this.annotationProvider.generateStructured({
      model: context.summarizerModel,
      operation: `summary:${unit.id}`,
      user: [
        buildSummaryReformatPrompt(context.language, JSON.stringify(summary)),
      ],
      format: FEEDBACK_SUMMARY_FORMAT,
    });
    if (!response.ok) {
      return response;
    }

    const parsed = await parseFeedbackSummary(response.value.value);
    if (!parsed.ok) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.SCHEMA_VIOLATION,
          `Summary response for ${unit.id} violates the summary schema: ${parsed.error.join('; ')}`,
        ),
      );
    }

    const usage = await this.artifactStore.recordUsage(
      unit,
      MeteredCall.Summarizer,
      response.value.usage,
    );
    return usage.ok ? ok(parsed.value) : usage;
  }

  private async readSource(unit: SubmissionUnit): Promise<Result<string>> {
    try {
      return ok(await readFile(unit.sourcePath, 'utf8'));
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.IO_FAILURE,
          `Could not read submission file ${unit.sourcePath}`,
          error,
        ),
      );
    }
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FeedbackPipelineError } from '../../../../common/errors/pipeline.error';
import { PIPELINE_ERROR_CODES } from '../../../../common/errors/pipeline.error-codes';
import { PROCESS_RUNNER_TOKEN } from '../../../../common/process/process-runner.interface';
import type {
  ProcessOutcome,
  ProcessRunner,
} from '../../../../common/process/process-runner.interface';
import { err, ok, Result } from '../../../../common/types/result.type';
import type { LinterSettings } from '../../../../config/configuration';
import { ArtifactStoreService } from '../../artifacts/services/artifact-store.service';
import type { SubmissionUnit } from '../../interfaces/submission-unit.interface';
import { ANNOTATION_PROVIDER_TOKEN } from '../interfaces/annotation-provider.interface';
import type { AnnotationProvider } from '../interfaces/annotation-provider.interface';
import type { FeedbackContext } from '../interfaces/feedback-context.interface';
import { MeteredCall } from '../interfaces/pipeline-stage.enum';
import { buildLinterDigestPrompt } from '../prompts/annotation.prompt';

@Injectable()
export class LinterDigestService {
  private readonly logger = new Logger(LinterDigestService.name);
  private readonly settings: LinterSettings;

  constructor(
    private readonly configService: ConfigService,
    @Inject(PROCESS_RUNNER_TOKEN)
    private readonly processRunner: ProcessRunner,
    @Inject(ANNOTATION_PROVIDER_TOKEN)
    private readonly annotationProvider: AnnotationProvider,
    private readonly artifactStore: ArtifactStoreService,
  ) {
    this.settings = this.configService.getOrThrow<LinterSettings>('linter');
  }

  // Resolves to undefined when linting is disabled or the linter had
  // nothing to say.
  async digest(
    unit: SubmissionUnit,
    context: FeedbackContext,
  ): Promise<Result<string | undefined>> {
    if (!this.settings.enabled) {
      return ok(undefined);
    }

    let outcome: ProcessOutcome;
    try {
      outcome = await this.processRunner.run(this.settings.command, [
        unit.sourcePath,
        ...this.settings.args,
      ]);
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.TOOL_NOT_STARTED,
          `Could not start linter "${this.settings.command}"`,
          error,
        ),
      );
    }

    const output = `${outcome.stdout}${outcome.stderr}`;
    const written = await this.artifactStore.writeLinterOutput(unit, output);
    if (!written.ok) {
      return written;
    }
    if (outcome.exitCode !== 0) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.LINTER_FAILED,
          `Linter exited with code ${outcome.exitCode} for ${unit.id}: ${outcome.stderr.trim()}`,
        ),
      );
    }
    if (output.trim().length === 0) {
      this.logger.debug(`Linter reported nothing: unit=${unit.id}`);
      return ok(undefined);
    }

    const response = await this.annotationProvider.generateText({
      model: context.summarizerModel,
      operation: `linter:${unit.id}`,
      user: buildLinterDigestPrompt(output),
    });
    if (!response.ok) {
      return response;
    }

    const usage = await this.artifactStore.recordUsage(
      unit,
      MeteredCall.Linter,
      response.value.usage,
    );
    if (!usage.ok) {
      return usage;
    }
    return ok(response.value.value.trim());
  }
}

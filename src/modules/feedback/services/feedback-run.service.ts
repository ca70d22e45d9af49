import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FeedbackPipelineError } from '../../../common/errors/pipeline.error';
import {
  PIPELINE_ERROR_CODES,
  PipelineErrorCode,
} from '../../../common/errors/pipeline.error-codes';
import { isInsideRoot } from '../../../common/lib/relative-path';
import { err, ok, Result } from '../../../common/types/result.type';
import type {
  FeedbackSettings,
  PathSettings,
} from '../../../config/configuration';
import type { FeedbackBundle } from '../annotation/interfaces/feedback-bundle.interface';
import type { FeedbackContext } from '../annotation/interfaces/feedback-context.interface';
import { AnnotationGuardsService } from '../annotation/services/annotation-guards.service';
import { DraftStageService } from '../annotation/services/draft-stage.service';
import { LinterDigestService } from '../annotation/services/linter-digest.service';
import { ReviewStageService } from '../annotation/services/review-stage.service';
import {
  ChangeKind,
  FileChange,
} from '../diff/interfaces/change-set.interface';
import { DiffAnalyzerService } from '../diff/services/diff-analyzer.service';
import type { FeedbackRunReport } from '../interfaces/feedback-run.interface';
import {
  SubmissionMode,
  SubmissionUnit,
} from '../interfaces/submission-unit.interface';
import { FeedbackOutputService } from '../merge/services/feedback-output.service';
import { ProvenanceAnnotatorService } from '../provenance/services/provenance-annotator.service';

export const RAW_DIFF_FILENAME = 'repo.diff';

type Workspace = {
  intermediateDir: string;
  outputDir: string;
};

type PlannedUnit = {
  unit: SubmissionUnit;
  change: FileChange;
};

@Injectable()
export class FeedbackRunService {
  private readonly logger = new Logger(FeedbackRunService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly diffAnalyzer: DiffAnalyzerService,
    private readonly provenanceAnnotator: ProvenanceAnnotatorService,
    private readonly draftStage: DraftStageService,
    private readonly linterDigest: LinterDigestService,
    private readonly reviewStage: ReviewStageService,
    private readonly feedbackOutput: FeedbackOutputService,
    private readonly guards: AnnotationGuardsService,
  ) {}

  async runSingleFile(filePath: string): Promise<Result<FeedbackRunReport>> {
    const context = await this.loadContext(SubmissionMode.SingleFile);
    if (!context.ok) {
      return context;
    }
    const isFile = await this.checkPath(filePath, 'file');
    if (!isFile.ok) {
      return isFile;
    }

    const relative = this.relativeToInput(filePath);
    const workspace = await this.prepareWorkspace(
      relative === null ? '' : path.dirname(relative),
    );
    if (!workspace.ok) {
      return workspace;
    }

    const unit: SubmissionUnit = {
      id: relative ?? path.basename(filePath),
      sourcePath: filePath,
      intermediateDir: workspace.value.intermediateDir,
      outputDir: workspace.value.outputDir,
      mode: SubmissionMode.SingleFile,
    };
    this.logger.log(`Single-file run: unit=${unit.id}`);

    const reviewed = await this.annotateUnit(unit, context.value, {
      kind: ChangeKind.NewFile,
    });
    if (!reviewed.ok) {
      return reviewed;
    }
    const written = await this.feedbackOutput.merge(unit, context.value);
    if (!written.ok) {
      return written;
    }

    return ok({
      mode: SubmissionMode.SingleFile,
      unitIds: [unit.id],
      outputs: written.value === null ? [] : [written.value],
      skipped: [],
    });
  }

  async runRepository(
    baselineRoot: string,
    submissionRoot: string,
  ): Promise<Result<FeedbackRunReport>> {
    const context = await this.loadContext(SubmissionMode.Repository);
    if (!context.ok) {
      return context;
    }
    for (const root of [baselineRoot, submissionRoot]) {
      const isDirectory = await this.checkPath(root, 'directory');
      if (!isDirectory.ok) {
        return isDirectory;
      }
    }

    const workspace = await this.prepareWorkspace(
      this.relativeToInput(submissionRoot) ??
        path.basename(path.resolve(submissionRoot)),
    );
    if (!workspace.ok) {
      return workspace;
    }

    const analysis = await this.diffAnalyzer.analyze(
      baselineRoot,
      submissionRoot,
    );
    if (!analysis.ok) {
      return analysis;
    }
    const rawDiff = await this.writeFileResult(
      path.join(workspace.value.intermediateDir, RAW_DIFF_FILENAME),
      analysis.value.rawDiff,
    );
    if (!rawDiff.ok) {
      return rawDiff;
    }

    const planned: PlannedUnit[] = [...analysis.value.changeSet].map(
      ([id, change]) => ({
        unit: {
          id,
          sourcePath: path.join(submissionRoot, id),
          intermediateDir: path.join(
            workspace.value.intermediateDir,
            path.dirname(id),
          ),
          outputDir: workspace.value.outputDir,
          mode: SubmissionMode.Repository,
        },
        change,
      }),
    );
    this.logger.log(
      `Repository run: units=${planned.length}, skipped=${analysis.value.skipped.length}, concurrency=${this.guards.limit}`,
    );

    // Once a unit fails, units still waiting for a slot never start.
    const failures: FeedbackPipelineError[] = [];
    await Promise.all(
      planned.map(({ unit, change }) =>
        this.guards.withSlot(async () => {
          if (failures.length > 0) {
            return;
          }
          const reviewed = await this.annotateUnit(unit, context.value, change);
          if (!reviewed.ok) {
            failures.push(reviewed.error);
          }
        }),
      ),
    );
    const [failure] = failures;
    if (failure) {
      return err(failure);
    }

    const outputs = new Set<string>();
    for (const { unit } of planned) {
      const written = await this.feedbackOutput.merge(unit, context.value);
      if (!written.ok) {
        return written;
      }
      if (written.value !== null) {
        outputs.add(written.value);
      }
    }

    return ok({
      mode: SubmissionMode.Repository,
      unitIds: planned.map(({ unit }) => unit.id),
      outputs: [...outputs],
      skipped: analysis.value.skipped,
    });
  }

  private async annotateUnit(
    unit: SubmissionUnit,
    context: FeedbackContext,
    change: FileChange,
  ): Promise<Result<FeedbackBundle>> {
    const document = await this.provenanceAnnotator.annotate(
      unit,
      change.kind === ChangeKind.ModifiedFile ? change.lineNumbers : undefined,
    );
    if (!document.ok) {
      return document;
    }

    const draft = await this.draftStage.run(unit, context, document.value);
    if (!draft.ok) {
      return draft;
    }

    let linterDigest: string | undefined;
    if (unit.mode === SubmissionMode.SingleFile) {
      const digest = await this.linterDigest.digest(unit, context);
      if (!digest.ok) {
        return digest;
      }
      linterDigest = digest.value;
    }

    return this.reviewStage.run(unit, context, linterDigest);
  }

  private async loadContext(
    mode: SubmissionMode,
  ): Promise<Result<FeedbackContext>> {
    const settings = this.configService.getOrThrow<FeedbackSettings>('feedback');

    const problemStatement = await this.readContextFile(
      settings.problemStatementPath,
      PIPELINE_ERROR_CODES.MISSING_PROBLEM_STATEMENT,
    );
    if (!problemStatement.ok) {
      return problemStatement;
    }
    const rubric = await this.readContextFile(
      settings.rubricPath,
      PIPELINE_ERROR_CODES.MISSING_RUBRIC,
    );
    if (!rubric.ok) {
      return rubric;
    }
    if (mode === SubmissionMode.SingleFile && !settings.summarizerModel) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.MISSING_SUMMARIZER_MODEL,
          'SUMMARIZER_MODEL must be set for single-file submissions',
        ),
      );
    }

    return ok({
      problemStatement: problemStatement.value,
      rubric: rubric.value,
      language: settings.sourceLanguage,
      draftReviewModel: settings.draftReviewModel,
      summarizerModel: settings.summarizerModel,
    });
  }

  private async readContextFile(
    filePath: string,
    code: PipelineErrorCode,
  ): Promise<Result<string>> {
    try {
      return ok(await readFile(filePath, 'utf8'));
    } catch (error) {
      return err(
        new FeedbackPipelineError(code, `Error: ${filePath} not found`, error),
      );
    }
  }

  private async checkPath(
    target: string,
    expected: 'file' | 'directory',
  ): Promise<Result<string>> {
    try {
      const info = await stat(target);
      const matches =
        expected === 'file' ? info.isFile() : info.isDirectory();
      if (matches) {
        return ok(target);
      }
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.INVALID_SUBMISSION_PATH,
          `Error: ${target} not found`,
          error,
        ),
      );
    }
    return err(
      new FeedbackPipelineError(
        PIPELINE_ERROR_CODES.INVALID_SUBMISSION_PATH,
        `Error: ${target} is not a ${expected}`,
      ),
    );
  }

  // Submissions under INPUT_DIR keep their relative layout in the
  // intermediate and output trees.
  private relativeToInput(target: string) {
    const { inputDir } = this.configService.getOrThrow<PathSettings>('paths');
    const relative = path.relative(path.resolve(inputDir), path.resolve(target));
    return isInsideRoot(relative) ? relative.split(path.sep).join('/') : null;
  }

  private async prepareWorkspace(
    relativeDir: string,
  ): Promise<Result<Workspace>> {
    const { intermediateDir, outputDir } =
      this.configService.getOrThrow<PathSettings>('paths');
    const workspace: Workspace = {
      intermediateDir: path.join(intermediateDir, relativeDir),
      outputDir: path.join(outputDir, relativeDir),
    };
    try {
      for (const directory of Object.values(workspace)) {
        await rm(directory, { recursive: true, force: true });
        await mkdir(directory, { recursive: true });
      }
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.IO_FAILURE,
          'Could not prepare the intermediate and output directories',
          error,
        ),
      );
    }
    return ok(workspace);
  }

  private async writeFileResult(
    target: string,
    content: string,
  ): Promise<Result<string>> {
    try {
      await writeFile(target, content, 'utf8');
      return ok(target);
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.IO_FAILURE,
          `Could not write ${target}`,
          error,
        ),
      );
    }
  }
}

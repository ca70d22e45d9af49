import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import { FeedbackPipelineError } from '../../../../common/errors/pipeline.error';
import {
  PIPELINE_ERROR_CODES,
  PipelineErrorCode,
} from '../../../../common/errors/pipeline.error-codes';
import { err, ok, Result } from '../../../../common/types/result.type';
import type { TokenUsage } from '../../annotation/interfaces/annotation-provider.interface';
import type { FeedbackBundle } from '../../annotation/interfaces/feedback-bundle.interface';
import {
  MeteredCall,
  PipelineStage,
} from '../../annotation/interfaces/pipeline-stage.enum';
import {
  BundleValidationOptions,
  parseFeedbackBundle,
} from '../../annotation/lib/feedback-bundle.validator';
import type { SubmissionUnit } from '../../interfaces/submission-unit.interface';
import type {
  PipelineRun,
  UnitArtifactPaths,
} from '../interfaces/pipeline-run.interface';
import { formatUsageLine } from '../lib/usage-log';

export type BundleKind = 'draft' | 'final';

const NOT_FOUND_CODES: Record<BundleKind, PipelineErrorCode> = {
  draft: PIPELINE_ERROR_CODES.DRAFT_NOT_FOUND,
  final: PIPELINE_ERROR_CODES.FINAL_NOT_FOUND,
};

// fs errors raised in another realm fail `instanceof Error`.
const isNotFound = (error: unknown) =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'ENOENT';

@Injectable()
export class ArtifactStoreService {
  private readonly logger = new Logger(ArtifactStoreService.name);

  pathsFor(unit: SubmissionUnit): UnitArtifactPaths {
    const { name, ext } = path.parse(unit.sourcePath);
    const at = (fileName: string) => path.join(unit.intermediateDir, fileName);
    return {
      document: at(`${name}_numbered${ext}`),
      draft: at(`${name}_intermediate.json`),
      final: at(`${name}_final.json`),
      log: at(`${name}_log.txt`),
      linter: at(`${name}_linter_out.txt`),
      run: at(`${name}_run.json`),
    };
  }

  async writeDocument(
    unit: SubmissionUnit,
    rendered: string,
  ): Promise<Result<string>> {
    return this.write(this.pathsFor(unit).document, rendered);
  }

  async readDocument(unit: SubmissionUnit): Promise<Result<string>> {
    const target = this.pathsFor(unit).document;
    try {
      return ok(await readFile(target, 'utf8'));
    } catch (error) {
      return err(
        isNotFound(error)
          ? new FeedbackPipelineError(
              PIPELINE_ERROR_CODES.DOCUMENT_NOT_FOUND,
              `Error: ${target} not found`,
              error,
            )
          : this.ioError(`Could not read ${target}`, error),
      );
    }
  }

  async writeBundle(
    unit: SubmissionUnit,
    kind: BundleKind,
    bundle: FeedbackBundle,
  ): Promise<Result<string>> {
    return this.write(
      this.pathsFor(unit)[kind],
      `${JSON.stringify(bundle, null, 4)}\n`,
    );
  }

  async readBundle(
    unit: SubmissionUnit,
    kind: BundleKind,
    options: BundleValidationOptions,
  ): Promise<Result<FeedbackBundle>> {
    const target = this.pathsFor(unit)[kind];
    let text: string;
    try {
      text = await readFile(target, 'utf8');
    } catch (error) {
      return err(
        isNotFound(error)
          ? new FeedbackPipelineError(
              NOT_FOUND_CODES[kind],
              `Error: ${target} not found`,
              error,
            )
          : this.ioError(`Could not read ${target}`, error),
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.CORRUPT_ARTIFACT,
          `${target} is not valid JSON`,
          error,
        ),
      );
    }

    const parsed = await parseFeedbackBundle(raw, options);
    if (!parsed.ok) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.CORRUPT_ARTIFACT,
          `${target} does not match the feedback schema: ${parsed.error.join('; ')}`,
        ),
      );
    }
    return parsed;
  }

  async writeLinterOutput(
    unit: SubmissionUnit,
    output: string,
  ): Promise<Result<string>> {
    return this.write(this.pathsFor(unit).linter, output);
  }

  // The Draft call starts a fresh log; every later call appends to it.
  async recordUsage(
    unit: SubmissionUnit,
    call: MeteredCall,
    usage: TokenUsage,
    now = new Date(),
  ): Promise<Result<string>> {
    const target = this.pathsFor(unit).log;
    const line = formatUsageLine(now, call, usage);
    this.logger.debug(`${unit.id}: ${line.trimEnd()}`);
    if (call === MeteredCall.Draft) {
      return this.write(target, line);
    }
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await appendFile(target, line, 'utf8');
      return ok(target);
    } catch (error) {
      return err(this.ioError(`Could not append to ${target}`, error));
    }
  }

  async recordStage(
    unit: SubmissionUnit,
    stage: PipelineStage,
  ): Promise<Result<PipelineRun>> {
    const artifacts = this.pathsFor(unit);
    const run: PipelineRun = {
      unitId: unit.id,
      mode: unit.mode,
      stage,
      sourcePath: unit.sourcePath,
      artifacts,
      updatedAt: new Date().toISOString(),
    };
    const written = await this.write(
      artifacts.run,
      `${JSON.stringify(run, null, 2)}\n`,
    );
    return written.ok ? ok(run) : written;
  }

  private async write(target: string, content: string): Promise<Result<string>> {
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content, 'utf8');
      return ok(target);
    } catch (error) {
      return err(this.ioError(`Could not write ${target}`, error));
    }
  }

  private ioError(message: string, cause: unknown) {
    return new FeedbackPipelineError(
      PIPELINE_ERROR_CODES.IO_FAILURE,
      message,
      cause,
    );
  }
}

import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  DiffSettings,
  FeedbackSettings,
} from '../../../../config/configuration';
import { FeedbackPipelineError } from '../../../../common/errors/pipeline.error';
import { PIPELINE_ERROR_CODES } from '../../../../common/errors/pipeline.error-codes';
import { isInsideRoot } from '../../../../common/lib/relative-path';
import { countLines } from '../../../../common/lib/text-lines';
import {
  PROCESS_RUNNER_TOKEN,
  ProcessOutcome,
} from '../../../../common/process/process-runner.interface';
import type { ProcessRunner } from '../../../../common/process/process-runner.interface';
import { err, ok, Result } from '../../../../common/types/result.type';
import {
  ChangeKind,
  DiffAnalysis,
  FileChange,
  SkippedFile,
  SkipReason,
} from '../interfaces/change-set.interface';
import {
  hunkTargetLines,
  parseUnifiedDiff,
} from '../lib/unified-diff.parser';

const DIFF_ERROR_EXIT_CODE = 2;

const toPosix = (relativePath: string) =>
  relativePath.split(path.sep).join('/');

@Injectable()
export class DiffAnalyzerService {
  private readonly logger = new Logger(DiffAnalyzerService.name);

  constructor(
    private readonly configService: ConfigService,
    @Inject(PROCESS_RUNNER_TOKEN)
    private readonly processRunner: ProcessRunner,
  ) {}

  async analyze(
    baselineRoot: string,
    submissionRoot: string,
  ): Promise<Result<DiffAnalysis>> {
    const diffSettings = this.configService.getOrThrow<DiffSettings>('diff');
    const { sourceExtension, changeThreshold } =
      this.configService.getOrThrow<FeedbackSettings>('feedback');

    const outcome = await this.runDiff(
      diffSettings,
      baselineRoot,
      submissionRoot,
    );
    if (!outcome.ok) {
      return outcome;
    }

    const resolvedRoot = path.resolve(submissionRoot);
    const newFiles: string[] = [];
    const modified = new Map<string, Set<number>>();
    const skipped: SkippedFile[] = [];

    for (const entry of parseUnifiedDiff(outcome.value.stdout)) {
      if (entry.kind === 'only-in') {
        const absolute = path.resolve(entry.directory, entry.name);
        if (!isInsideRoot(path.relative(resolvedRoot, absolute))) {
          continue;
        }
        const expanded = await this.expandNewEntry(absolute);
        if (!expanded.ok) {
          return expanded;
        }
        for (const file of expanded.value) {
          newFiles.push(toPosix(path.relative(resolvedRoot, file)));
        }
        continue;
      }
      if (entry.kind === 'binary') {
        this.logger.warn(`Skipping binary file ${entry.targetPath}`);
        continue;
      }
      const relative = path.relative(
        resolvedRoot,
        path.resolve(entry.targetPath),
      );
      if (!isInsideRoot(relative)) {
        continue;
      }
      const lineNumbers = modified.get(toPosix(relative)) ?? new Set<number>();
      for (const hunk of entry.hunks) {
        for (const lineNumber of hunkTargetLines(hunk)) {
          lineNumbers.add(lineNumber);
        }
      }
      modified.set(toPosix(relative), lineNumbers);
    }

    const files = new Map<string, FileChange>();
    for (const file of [...newFiles].sort()) {
      if (path.extname(file) !== sourceExtension) {
        skipped.push({ path: file, reason: SkipReason.Extension });
        continue;
      }
      files.set(file, { kind: ChangeKind.NewFile });
    }

    for (const file of [...modified.keys()].sort()) {
      if (path.extname(file) !== sourceExtension) {
        skipped.push({ path: file, reason: SkipReason.Extension });
        continue;
      }
      const bounded = await this.boundToFile(
        path.join(resolvedRoot, file),
        modified.get(file) ?? new Set<number>(),
      );
      if (!bounded.ok) {
        return bounded;
      }
      if (bounded.value.size < changeThreshold) {
        this.logger.warn(
          `Skipping ${file}: ${bounded.value.size} changed lines is below threshold ${changeThreshold}`,
        );
        skipped.push({
          path: file,
          reason: SkipReason.BelowThreshold,
          changedLines: bounded.value.size,
        });
        continue;
      }
      files.set(file, {
        kind: ChangeKind.ModifiedFile,
        lineNumbers: bounded.value,
      });
    }

    this.logger.log(
      `Diff analyzed: qualifying=${files.size}, skipped=${skipped.length}`,
    );
    return ok({ changeSet: files, skipped, rawDiff: outcome.value.stdout });
  }

  private async runDiff(
    settings: DiffSettings,
    baselineRoot: string,
    submissionRoot: string,
  ): Promise<Result<ProcessOutcome>> {
    let outcome: ProcessOutcome;
    try {
      outcome = await this.processRunner.run(settings.command, [
        '-r',
        `-U${settings.contextLines}`,
        baselineRoot,
        submissionRoot,
      ]);
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.TOOL_NOT_STARTED,
          `Could not start ${settings.command}`,
          error,
        ),
      );
    }
    if (outcome.exitCode >= DIFF_ERROR_EXIT_CODE) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.DIFF_FAILED,
          `${settings.command} exited with code ${outcome.exitCode}: ${outcome.stderr.trim()}`,
        ),
      );
    }
    return ok(outcome);
  }

  private async expandNewEntry(absolute: string): Promise<Result<string[]>> {
    try {
      return ok(await this.walk(absolute));
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.IO_FAILURE,
          `Could not read new submission entry ${absolute}`,
          error,
        ),
      );
    }
  }

  private async walk(absolute: string): Promise<string[]> {
    const info = await stat(absolute);
    if (!info.isDirectory()) {
      return [absolute];
    }
    const files: string[] = [];
    for (const name of await readdir(absolute)) {
      files.push(...(await this.walk(path.join(absolute, name))));
    }
    return files;
  }

  private async boundToFile(
    filePath: string,
    lineNumbers: ReadonlySet<number>,
  ): Promise<Result<ReadonlySet<number>>> {
    try {
      const lineCount = countLines(await readFile(filePath, 'utf8'));
      return ok(
        new Set(
          [...lineNumbers]
            .filter((lineNumber) => lineNumber >= 1 && lineNumber <= lineCount)
            .sort((a, b) => a - b),
        ),
      );
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.IO_FAILURE,
          `Could not read modified file ${filePath}`,
          error,
        ),
      );
    }
  }
}

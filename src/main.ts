#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { INestApplicationContext } from '@nestjs/common';
import { AppModule } from './app.module';
import { CliUsageError, parseCliArgs, USAGE } from './cli/parse-args';
import type { CliCommand } from './cli/parse-args';
import { FeedbackPipelineError } from './common/errors/pipeline.error';
import { FeedbackRunService } from './modules/feedback/services/feedback-run.service';

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

const logger = new Logger('SubmissionAnnotator');

const execute = (runService: FeedbackRunService, command: CliCommand) =>
  command.kind === 'single'
    ? runService.runSingleFile(command.filePath)
    : runService.runRepository(command.baselineRoot, command.submissionRoot);

async function bootstrap(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      logger.error(error.message);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  let app: INestApplicationContext | undefined;
  try {
    app = await NestFactory.createApplicationContext(
      AppModule.forRoot({ envFilePath: command.envFilePath }),
      { abortOnError: false },
    );
    const result = await execute(app.get(FeedbackRunService), command);
    if (!result.ok) {
      logger.error(result.error.toDiagnostic());
      return EXIT_FAILURE;
    }
    for (const output of result.value.outputs) {
      logger.log(`Feedback written: ${output}`);
    }
    if (result.value.outputs.length === 0) {
      logger.log('No feedback files were written');
    }
    return EXIT_OK;
  } catch (error) {
    logger.error(
      error instanceof FeedbackPipelineError
        ? error.toDiagnostic()
        : error instanceof Error
          ? error.message
          : String(error),
    );
    return EXIT_FAILURE;
  } finally {
    if (app) {
      await app.close();
    }
  }
}

void bootstrap().then((exitCode) => {
  process.exitCode = exitCode;
});

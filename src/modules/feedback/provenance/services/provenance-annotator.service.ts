import { readFile } from 'node:fs/promises';
import { Injectable, Logger } from '@nestjs/common';
import { FeedbackPipelineError } from '../../../../common/errors/pipeline.error';
import { PIPELINE_ERROR_CODES } from '../../../../common/errors/pipeline.error-codes';
import { err, ok, Result } from '../../../../common/types/result.type';
import type { SubmissionUnit } from '../../interfaces/submission-unit.interface';
import {
  buildProvenanceDocument,
  LineProvenance,
  ProvenanceDocument,
} from '../lib/provenance-renderer';

@Injectable()
export class ProvenanceAnnotatorService {
  private readonly logger = new Logger(ProvenanceAnnotatorService.name);

  async annotate(
    unit: SubmissionUnit,
    lineNumbers?: ReadonlySet<number>,
  ): Promise<Result<ProvenanceDocument>> {
    let source: string;
    try {
      source = await readFile(unit.sourcePath, 'utf8');
    } catch (error) {
      return err(
        new FeedbackPipelineError(
          PIPELINE_ERROR_CODES.IO_FAILURE,
          `Could not read submission file ${unit.sourcePath}`,
          error,
        ),
      );
    }

    const document = buildProvenanceDocument(source, lineNumbers);
    const added = document.lines.filter(
      (line) => line.provenance === LineProvenance.Added,
    ).length;
    this.logger.debug(
      `Provenance rendered: unit=${unit.id}, lines=${document.lines.length}, added=${added}`,
    );
    return ok(document);
  }
}

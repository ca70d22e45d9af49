import { Injectable, Logger } from '@nestjs/common';
import { ok, Result } from '../../../../common/types/result.type';
import {
  AnnotationProvider,
  GenerationOutput,
  GenerationRequest,
  StructuredGenerationRequest,
  TokenUsage,
} from '../interfaces/annotation-provider.interface';
import type { FeedbackSummary } from '../interfaces/feedback-bundle.interface';
import { FEEDBACK_FORMAT_NAMES } from '../protocol/feedback-bundle.protocol';

const NO_USAGE: TokenUsage = {
  inputTokens: 0,
  cachedTokens: 0,
  outputTokens: 0,
};

const STUB_SUMMARY: FeedbackSummary = {
  strengths: 'Offline provider: no strengths assessed.',
  areas_for_improvement: 'Offline provider: no improvements assessed.',
  overall_assessment: 'Offline provider: no assessment generated.',
};

@Injectable()
export class StubAnnotationProvider implements AnnotationProvider {
  private readonly logger = new Logger(StubAnnotationProvider.name);

  async generateStructured(
    request: StructuredGenerationRequest,
  ): Promise<Result<GenerationOutput<unknown>>> {
    await Promise.resolve();
    this.logger.debug(`Stub structured call: operation=${request.operation}`);

    switch (request.format.name) {
      case FEEDBACK_FORMAT_NAMES.summary:
        return ok({ value: { ...STUB_SUMMARY }, usage: NO_USAGE });
      case FEEDBACK_FORMAT_NAMES.bundleWithSummary:
        return ok({
          value: { annotations: [], summary: { ...STUB_SUMMARY } },
          usage: NO_USAGE,
        });
      default:
        return ok({ value: { annotations: [] }, usage: NO_USAGE });
    }
  }

  async generateText(
    request: GenerationRequest,
  ): Promise<Result<GenerationOutput<string>>> {
    await Promise.resolve();
    this.logger.debug(`Stub text call: operation=${request.operation}`);
    const input = request.user[request.user.length - 1] ?? '';
    const firstLines = input.split('\n').slice(0, 20).join('\n').trim();
    return ok({ value: firstLines, usage: NO_USAGE });
  }
}

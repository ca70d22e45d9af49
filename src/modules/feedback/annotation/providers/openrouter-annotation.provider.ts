import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ProviderSettings } from '../../../../config/configuration';
import { FeedbackPipelineError } from '../../../../common/errors/pipeline.error';
import {
  PIPELINE_ERROR_CODES,
  PipelineErrorCode,
} from '../../../../common/errors/pipeline.error-codes';
import { err, ok, Result } from '../../../../common/types/result.type';
import {
  AnnotationProvider,
  GenerationOutput,
  GenerationRequest,
  StructuredGenerationRequest,
  TokenUsage,
} from '../interfaces/annotation-provider.interface';

type OpenRouterChatResponse = {
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    prompt_tokens_details?: { cached_tokens?: number } | null;
  };
};

type OpenRouterConfig = ProviderSettings['openrouter'];

type ChatCompletion = {
  content: string;
  usage: TokenUsage;
};

type ResponseFormat = {
  type: 'json_schema';
  json_schema: { name: string; strict: true; schema: Record<string, unknown> };
};

const PROVIDER_NAME = 'openrouter';

class OpenRouterProviderError extends FeedbackPipelineError {
  constructor(code: PipelineErrorCode, detail?: string, cause?: unknown) {
    super(
      code,
      `OPENROUTER_ANNOTATION: ${code}${detail ? ` (${detail})` : ''}`,
      cause,
    );
  }
}

@Injectable()
export class OpenRouterAnnotationProvider implements AnnotationProvider {
  private readonly logger = new Logger(OpenRouterAnnotationProvider.name);

  constructor(private readonly configService: ConfigService) {}

  async generateStructured(
    request: StructuredGenerationRequest,
  ): Promise<Result<GenerationOutput<unknown>>> {
    const completion = await this.complete(request, {
      type: 'json_schema',
      json_schema: {
        name: request.format.name,
        strict: true,
        schema: request.format.schema,
      },
    });
    if (!completion.ok) {
      return completion;
    }

    const raw = completion.value.content.trim();
    const direct = this.tryParseJson(raw);
    if (direct.ok) {
      return ok({ value: direct.value, usage: completion.value.usage });
    }
    const fenced = this.extractJsonFencedBlock(raw);
    if (fenced) {
      const fencedResult = this.tryParseJson(fenced);
      if (fencedResult.ok) {
        return ok({ value: fencedResult.value, usage: completion.value.usage });
      }
    }
    return err(
      new OpenRouterProviderError(
        PIPELINE_ERROR_CODES.BAD_RESPONSE,
        `${request.operation} returned content that is not JSON`,
      ),
    );
  }

  async generateText(
    request: GenerationRequest,
  ): Promise<Result<GenerationOutput<string>>> {
    const completion = await this.complete(request);
    if (!completion.ok) {
      return completion;
    }
    return ok({
      value: completion.value.content.trim(),
      usage: completion.value.usage,
    });
  }

  private async complete(
    request: GenerationRequest,
    responseFormat?: ResponseFormat,
  ): Promise<Result<ChatCompletion>> {
    const config = this.getConfig();
    if (!config.apiKey) {
      return err(
        new OpenRouterProviderError(PIPELINE_ERROR_CODES.MISSING_API_KEY),
      );
    }

    const startMs = Date.now();
    try {
      const data = await this.callOpenRouter(
        this.buildRequest(request, config, responseFormat),
        config.timeoutMs,
      );
      const content = data.choices?.[0]?.message?.content;
      if (typeof content !== 'string') {
        throw new OpenRouterProviderError(
          PIPELINE_ERROR_CODES.BAD_RESPONSE,
          'missing message content',
        );
      }
      const usage = this.readUsage(data);
      this.logger.debug(
        `OpenRouter call success: operation=${request.operation}, provider=${PROVIDER_NAME}, model=${request.model}, durationMs=${Date.now() - startMs}, inputTokens=${usage.inputTokens}, outputTokens=${usage.outputTokens}`,
      );
      return ok({ content, usage });
    } catch (error) {
      const providerError = this.toProviderError(error);
      this.logger.warn(
        `OpenRouter call failed: operation=${request.operation}, provider=${PROVIDER_NAME}, model=${request.model}, durationMs=${Date.now() - startMs}, error=${providerError.code}`,
      );
      return err(providerError);
    }
  }

  private getConfig(): OpenRouterConfig {
    return this.configService.getOrThrow<ProviderSettings>('provider')
      .openrouter;
  }

  private buildRequest(
    request: GenerationRequest,
    config: OpenRouterConfig,
    responseFormat?: ResponseFormat,
  ) {
    const baseUrl = config.baseUrl.replace(/\/+$/g, '');
    const endpoint = `${baseUrl}/chat/completions`;
    const messages = [
      ...(request.system ? [{ role: 'system', content: request.system }] : []),
      ...request.user.map((content) => ({ role: 'user', content })),
    ];
    const payload = {
      model: request.model,
      messages,
      ...(responseFormat ? { response_format: responseFormat } : {}),
    };
    const headers = {
      Authorization: `Bearer ${config.apiKey ?? ''}`,
      'Content-Type': 'application/json',
      'HTTP-Referer': config.httpReferer,
      'X-Title': config.xTitle,
    };

    return { endpoint, payload, headers };
  }

  private async callOpenRouter(
    request: {
      endpoint: string;
      payload: unknown;
      headers: Record<string, string>;
    },
    timeoutMs: number,
  ): Promise<OpenRouterChatResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(request.endpoint, {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.payload),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw this.mapHttpError(response.status);
      }
      try {
        return (await response.json()) as OpenRouterChatResponse;
      } catch (error) {
        throw new OpenRouterProviderError(
          PIPELINE_ERROR_CODES.BAD_RESPONSE,
          'response body is not JSON',
          error,
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private mapHttpError(status: number) {
    const detail = `HTTP ${status}`;
    if (status === 401 || status === 403) {
      return new OpenRouterProviderError(
        PIPELINE_ERROR_CODES.UNAUTHORIZED,
        detail,
      );
    }
    if (status === 429) {
      return new OpenRouterProviderError(
        PIPELINE_ERROR_CODES.RATE_LIMIT_UPSTREAM,
        detail,
      );
    }
    if (status >= 500) {
      return new OpenRouterProviderError(
        PIPELINE_ERROR_CODES.UPSTREAM_5XX,
        detail,
      );
    }
    if (status >= 400) {
      return new OpenRouterProviderError(
        PIPELINE_ERROR_CODES.UPSTREAM_4XX,
        detail,
      );
    }
    return new OpenRouterProviderError(
      PIPELINE_ERROR_CODES.BAD_RESPONSE,
      detail,
    );
  }

  private readUsage(data: OpenRouterChatResponse): TokenUsage {
    const toCount = (value: unknown) =>
      typeof value === 'number' && Number.isFinite(value)
        ? Math.max(0, Math.floor(value))
        : 0;
    return {
      inputTokens: toCount(data.usage?.prompt_tokens),
      cachedTokens: toCount(data.usage?.prompt_tokens_details?.cached_tokens),
      outputTokens: toCount(data.usage?.completion_tokens),
    };
  }

  private isAbortError(error: unknown) {
    const name = this.readErrorField(error, 'name');
    const message = this.readErrorField(error, 'message') ?? '';
    return (
      name === 'AbortError' ||
      name === 'TimeoutError' ||
      message.toLowerCase().includes('aborted')
    );
  }

  // fetch and timer errors may come from another realm, so they are read by
  // shape rather than with `instanceof Error`.
  private readErrorField(error: unknown, field: 'name' | 'message') {
    if (typeof error !== 'object' || error === null || !(field in error)) {
      return undefined;
    }
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
  }

  private toProviderError(error: unknown): FeedbackPipelineError {
    if (error instanceof FeedbackPipelineError) {
      return error;
    }
    if (this.isAbortError(error)) {
      return new OpenRouterProviderError(
        PIPELINE_ERROR_CODES.TIMEOUT,
        undefined,
        error,
      );
    }
    return new OpenRouterProviderError(
      PIPELINE_ERROR_CODES.TRANSPORT,
      this.readErrorField(error, 'message'),
      error,
    );
  }

  private tryParseJson(
    text: string,
  ): { ok: true; value: unknown } | { ok: false } {
    try {
      return { ok: true, value: JSON.parse(text) };
    } catch {
      return { ok: false };
    }
  }

  private extractJsonFencedBlock(text: string): string | null {
    const lower = text.toLowerCase();
    const startIndex = lower.indexOf('```json');
    if (startIndex < 0) {
      return null;
    }
    const contentStart = startIndex + '```json'.length;
    const endIndex = text.indexOf('```', contentStart);
    if (endIndex < 0) {
      return null;
    }
    const inner = text.slice(contentStart, endIndex).trim();
    return inner ? inner : null;
  }
}

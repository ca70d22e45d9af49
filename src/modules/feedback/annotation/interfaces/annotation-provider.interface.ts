import type { Result } from '../../../../common/types/result.type';

export const ANNOTATION_PROVIDER_TOKEN = 'ANNOTATION_PROVIDER_TOKEN';

export type TokenUsage = {
  inputTokens: number;
  cachedTokens: number;
  outputTokens: number;
};

export type JsonSchemaFormat = {
  name: string;
  schema: Record<string, unknown>;
};

export type GenerationRequest = {
  model: string;
  // Label used in logs only.
  operation: string;
  system?: string;
  user: string[];
};

export type StructuredGenerationRequest = GenerationRequest & {
  format: JsonSchemaFormat;
};

export type GenerationOutput<T> = {
  value: T;
  usage: TokenUsage;
};

export interface AnnotationProvider {
  generateStructured(
    request: StructuredGenerationRequest,
  ): Promise<Result<GenerationOutput<unknown>>>;
  generateText(
    request: GenerationRequest,
  ): Promise<Result<GenerationOutput<string>>>;
}

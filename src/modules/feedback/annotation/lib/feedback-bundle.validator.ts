import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { err, ok, Result } from '../../../../common/types/result.type';
import {
  FeedbackBundleDto,
  FeedbackSummaryDto,
} from '../dto/feedback-bundle.dto';
import type {
  FeedbackBundle,
  FeedbackSummary,
} from '../interfaces/feedback-bundle.interface';

export type BundleValidationOptions = {
  requireSummary: boolean;
  // When set, every annotation must point at an existing line.
  lineCount?: number;
};

const VALIDATOR_OPTIONS = {
  whitelist: true,
  forbidNonWhitelisted: true,
  forbidUnknownValues: true,
};

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

const flattenErrors = (
  errors: ValidationError[],
  parentPath = '',
): string[] =>
  errors.flatMap((error) => {
    const propertyPath = parentPath
      ? `${parentPath}.${error.property}`
      : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${propertyPath}: ${message}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], propertyPath)];
  });

const toSummary = (dto: FeedbackSummaryDto): FeedbackSummary => ({
  strengths: dto.strengths,
  areas_for_improvement: dto.areas_for_improvement,
  overall_assessment: dto.overall_assessment,
});

export const parseFeedbackBundle = async (
  raw: unknown,
  options: BundleValidationOptions,
): Promise<Result<FeedbackBundle, string[]>> => {
  if (!isPlainRecord(raw)) {
    return err(['bundle must be a JSON object']);
  }

  const dto = plainToInstance(FeedbackBundleDto, raw);
  const violations = flattenErrors(await validate(dto, VALIDATOR_OPTIONS));

  if (options.requireSummary && dto.summary == null) {
    violations.push('summary: summary is required');
  }
  if (!options.requireSummary && dto.summary != null) {
    violations.push('summary: summary is not allowed');
  }
  if (violations.length === 0 && options.lineCount !== undefined) {
    for (const [index, annotation] of dto.annotations.entries()) {
      if (annotation.line_number > options.lineCount) {
        violations.push(
          `annotations.${index}.line_number: line ${annotation.line_number} does not exist (file has ${options.lineCount} lines)`,
        );
      }
    }
  }
  if (violations.length > 0) {
    return err(violations);
  }

  return ok({
    annotations: dto.annotations.map((annotation) => ({
      line_number: annotation.line_number,
      category: annotation.category,
      comment: annotation.comment,
      severity: annotation.severity,
    })),
    ...(dto.summary ? { summary: toSummary(dto.summary) } : {}),
  });
};

export const parseFeedbackSummary = async (
  raw: unknown,
): Promise<Result<FeedbackSummary, string[]>> => {
  if (!isPlainRecord(raw)) {
    return err(['summary must be a JSON object']);
  }
  const dto = plainToInstance(FeedbackSummaryDto, raw);
  const violations = flattenErrors(await validate(dto, VALIDATOR_OPTIONS));
  return violations.length > 0 ? err(violations) : ok(toSummary(dto));
};

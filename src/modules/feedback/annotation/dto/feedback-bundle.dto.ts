import { Type } from 'class-transformer';
import {
  IsArray,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  AnnotationCategory,
  AnnotationSeverity,
} from '../interfaces/feedback-bundle.interface';

export class AnnotationDto {
  @IsInt()
  @Min(1)
  line_number!: number;

  @IsEnum(AnnotationCategory)
  category!: AnnotationCategory;

  @IsString()
  @IsNotEmpty()
  comment!: string;

  @IsEnum(AnnotationSeverity)
  severity!: AnnotationSeverity;
}

export class FeedbackSummaryDto {
  @IsString()
  strengths!: string;

  @IsString()
  areas_for_improvement!: string;

  @IsString()
  overall_assessment!: string;
}

export class FeedbackBundleDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AnnotationDto)
  annotations!: AnnotationDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => FeedbackSummaryDto)
  summary?: FeedbackSummaryDto;
}

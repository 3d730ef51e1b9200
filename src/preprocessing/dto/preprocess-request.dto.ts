/**
 * Preprocess Request DTO
 * Input from the Extractor (HTTP body / TCP payload)
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
  registerDecorator,
  type ValidationOptions,
} from 'class-validator';

/**
 * Record<string, string[]>, e.g. { "Shipping": ["delivery", "courier"] }
 */
export function IsKeywordRecord(validationOptions?: ValidationOptions) {
  return (object: object, propertyName: string): void => {
    registerDecorator({
      name: 'isKeywordRecord',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown): boolean {
          if (typeof value !== 'object' || value === null || Array.isArray(value)) {
            return false;
          }
          return Object.values(value).every(
            (keywords) =>
              Array.isArray(keywords) &&
              keywords.every((keyword) => typeof keyword === 'string'),
          );
        },
        defaultMessage(): string {
          return `${propertyName} must map group names to arrays of keywords`;
        },
      },
    });
  };
}

export class TextSpanDto {
  @IsInt()
  @Min(1)
  declare page: number;

  @IsString()
  declare text: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  declare fontSize?: number;

  @IsOptional()
  @IsNumber()
  declare yPosition?: number;
}

export class PageDto {
  @IsInt()
  @Min(1)
  declare pageNumber: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TextSpanDto)
  declare spans: TextSpanDto[];
}

export class NormalizerOptionsDto {
  @IsOptional()
  @IsBoolean()
  declare normalizeUnicode?: boolean;

  @IsOptional()
  @IsBoolean()
  declare removeControlChars?: boolean;

  @IsOptional()
  @IsBoolean()
  declare normalizeWhitespace?: boolean;

  @IsOptional()
  @IsBoolean()
  declare normalizeQuotes?: boolean;

  @IsOptional()
  @IsBoolean()
  declare normalizeWidth?: boolean;
}

export class PreprocessOptionsDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  declare minRepetition?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  declare positionThreshold?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  declare similarityThreshold?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  declare minHeadingFontSize?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  declare fontSizeRatioThreshold?: number;

  @IsOptional()
  @IsBoolean()
  declare normalizeText?: boolean;

  @IsOptional()
  @IsBoolean()
  declare removeHeadersFooters?: boolean;

  @IsOptional()
  @IsBoolean()
  declare groupByFunction?: boolean;

  @IsOptional()
  @ValidateNested()
  @Type(() => NormalizerOptionsDto)
  declare normalizer?: NormalizerOptionsDto;

  @IsOptional()
  @IsKeywordRecord()
  declare customKeywords?: Record<string, string[]>;
}

export class PreprocessRequestDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PageDto)
  declare pages: PageDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => PreprocessOptionsDto)
  declare options?: PreprocessOptionsDto;
}

import {
  IsString,
  IsArray,
  IsOptional,
  IsIn,
  IsInt,
  Min,
  Max,
  Length,
  ValidateNested,
  ArrayMinSize,
  IsNotEmpty,
} from 'class-validator';
import { Type, Transform } from 'class-transformer';

export const REPORT_FORMATS = ['delimited', 'html'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const EXPORT_ENCODINGS = ['latin1', 'utf-8'] as const;
export type ExportEncoding = (typeof EXPORT_ENCODINGS)[number];

export const CODE_SOURCES = ['plain', 'trailing-token', 'leading-token'] as const;
export type CodeSource = (typeof CODE_SOURCES)[number];

const trimFragments = ({ value }: { value: unknown }): unknown =>
  Array.isArray(value)
    ? value.map((fragment) =>
        typeof fragment === 'string' ? fragment.trim() : fragment,
      )
    : value;

export class ReportProfileDto {
  @IsString({ message: 'reportType must be a string' })
  @IsNotEmpty({ message: 'reportType cannot be empty' })
  reportType!: string;

  @IsOptional()
  @IsString({ message: 'label must be a string' })
  label?: string;

  @IsIn(REPORT_FORMATS, { message: 'format must be delimited or html' })
  format!: ReportFormat;

  @IsOptional()
  @IsIn(EXPORT_ENCODINGS, { message: 'encoding must be latin1 or utf-8' })
  encoding?: ExportEncoding;

  @IsOptional()
  @IsString({ message: 'delimiter must be a string' })
  @Length(1, 1, { message: 'delimiter must be a single character' })
  delimiter?: string;

  @IsArray({ message: 'discardLineIndices must be an array' })
  @IsInt({ each: true, message: 'each discard index must be an integer' })
  discardLineIndices!: number[];

  @IsInt({ message: 'headerRowCount must be an integer' })
  @Min(1, { message: 'headerRowCount must be at least 1' })
  @Max(5, { message: 'headerRowCount cannot exceed 5' })
  headerRowCount!: number;

  @IsOptional()
  @IsInt({ message: 'dropTrailingRows must be an integer' })
  @Min(0, { message: 'dropTrailingRows must be non-negative' })
  dropTrailingRows?: number;

  @IsArray({ message: 'codeColumn must be an array' })
  @ArrayMinSize(1, { message: 'codeColumn must have at least one fragment' })
  @IsString({ each: true, message: 'each codeColumn fragment must be a string' })
  @Transform(trimFragments)
  codeColumn!: string[];

  @IsOptional()
  @IsIn(CODE_SOURCES, {
    message: 'codeSource must be plain, trailing-token or leading-token',
  })
  codeSource?: CodeSource;

  @IsOptional()
  @IsArray({ message: 'numericColumns must be an array' })
  @IsArray({ each: true, message: 'each numeric column must be an array' })
  numericColumns?: string[][];

  @IsOptional()
  @IsInt({ message: 'numericColumnsFrom must be an integer' })
  @Min(0, { message: 'numericColumnsFrom must be non-negative' })
  numericColumnsFrom?: number;
}

export class ReportProfilesFileDto {
  @IsArray({ message: 'profiles must be an array' })
  @ArrayMinSize(1, { message: 'profiles must have at least one item' })
  @ValidateNested({ each: true })
  @Type(() => ReportProfileDto)
  profiles!: ReportProfileDto[];
}

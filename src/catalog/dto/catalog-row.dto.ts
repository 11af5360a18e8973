import { IsString, IsNotEmpty, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

/**
 * 마스터 카탈로그 파일(WBS_NAMES.xlsx)의 한 행
 */
export class CatalogRowDto {
  @IsString({ message: 'WBS_element must be a string' })
  @IsNotEmpty({ message: 'WBS_element cannot be empty' })
  @MaxLength(255, { message: 'WBS_element cannot exceed 255 characters' })
  @Transform(trim)
  wbs_element!: string;

  @IsString({ message: 'Name must be a string' })
  @IsNotEmpty({ message: 'Name cannot be empty' })
  @MaxLength(255, { message: 'Name cannot exceed 255 characters' })
  @Transform(trim)
  name!: string;
}

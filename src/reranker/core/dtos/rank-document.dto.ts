import {
  IsArray,
  IsDefined,
  IsNumber,
  IsOptional,
  IsString,
} from "class-validator";

/**
 * Validation shape of a candidate document. Extra fields are allowed and
 * carried through untouched.
 */
export class RankDocumentDto {
  @IsDefined()
  id!: string | number;

  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @IsString()
  summary?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  "extra-tags"?: string[];

  @IsOptional()
  @IsNumber()
  score?: number;

  [field: string]: unknown;
}

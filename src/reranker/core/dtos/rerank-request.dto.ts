import { Type } from "class-transformer";
import { IsArray, IsNotEmpty, IsString, ValidateNested } from "class-validator";
import { RankDocumentDto } from "./rank-document.dto";

/**
 * Body of `POST /rerank`.
 */
export class RerankRequestDto {
  @IsString()
  @IsNotEmpty()
  query!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RankDocumentDto)
  documents!: RankDocumentDto[];
}

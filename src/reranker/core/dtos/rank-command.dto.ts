import { Type } from "class-transformer";
import {
  Equals,
  IsArray,
  IsInt,
  IsString,
  Min,
  ValidateNested,
} from "class-validator";
import { RankDocumentDto } from "./rank-document.dto";

export class RankCommandDto {
  @Equals("rank")
  type!: "rank";

  @IsInt()
  @Min(1)
  requestId!: number;

  @IsString()
  queryText!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RankDocumentDto)
  documents!: RankDocumentDto[];
}

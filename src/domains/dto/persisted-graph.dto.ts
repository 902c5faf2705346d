import { Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

/**
 * On-disk form of one domain graph. Field names are snake_case to match the
 * files shipped under the graph directory.
 */
export class PersistedNodeDto {
  @IsString()
  @IsNotEmpty()
  term!: string;

  @IsInt()
  @Min(1)
  doc_frequency!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  centrality!: number;
}

export class PersistedEdgeDto {
  @IsString()
  @IsNotEmpty()
  source!: string;

  @IsString()
  @IsNotEmpty()
  target!: string;

  @IsInt()
  @Min(1)
  weight!: number;
}

export class PersistedGraphDto {
  @IsString()
  @IsNotEmpty()
  domain!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PersistedNodeDto)
  nodes!: PersistedNodeDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PersistedEdgeDto)
  edges!: PersistedEdgeDto[];

  @IsISO8601({ strict: true })
  built_at!: string;
}

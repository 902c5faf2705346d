import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { COVER_IMAGE_STYLES } from '../../cover-image/cover-image-prompt.service';
import { IMAGE_ENGINE_PRIORITY } from '../../cover-image/image-engine.interface';
import { GLOSSARY_FORMATS } from '../../glossary/glossary-builder.service';

export const DEFAULT_TOOL_DOMAIN = 'cancer_care';
export const MAX_NODES_LIMIT = 1000;

// Accepts real booleans and their string forms; anything else fails @IsBoolean.
const toBoolean = ({ value }: { value: unknown }): unknown => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
};

// ============================================
// build_knowledge_graph
// ============================================

export class BuildKnowledgeGraphArgsDto {
  @ApiProperty({ example: 'cancer health care' })
  @IsString()
  @IsNotEmpty()
  domain!: string;

  @ApiProperty({
    description: 'Raw documents forming the corpus',
    type: [String],
  })
  @IsArray()
  @IsString({ each: true })
  documents!: string[];

  @ApiPropertyOptional({ default: 50, minimum: 1, maximum: MAX_NODES_LIMIT })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_NODES_LIMIT) // Larger graphs block the event loop while ranking
  @Type(() => Number)
  max_nodes?: number = 50;

  @ApiPropertyOptional({
    description: 'Drop nodes whose centrality is below this score',
    default: 0.05,
    minimum: 0,
    maximum: 1,
  })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  @Type(() => Number)
  min_centrality?: number = 0.05;

  @ApiPropertyOptional({ default: 2, minimum: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  min_edge_weight?: number = 2;

  @ApiPropertyOptional({
    description: 'Recompute even when a graph is already published',
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  @Transform(toBoolean)
  rebuild?: boolean = false;
}

// ============================================
// extract_keywords
// ============================================

export class ExtractKeywordsArgsDto {
  @ApiProperty({ description: 'Text to extract keywords from' })
  @IsString()
  text!: string;

  @ApiPropertyOptional({ default: DEFAULT_TOOL_DOMAIN })
  @IsOptional()
  @IsString()
  domain?: string = DEFAULT_TOOL_DOMAIN;

  @ApiPropertyOptional({ default: 10, minimum: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  max_keywords?: number = 10;

  @ApiPropertyOptional({ default: 0.05, minimum: 0, maximum: 1 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  @Type(() => Number)
  min_centrality?: number = 0.05;
}

// ============================================
// build_glossary
// ============================================

export class BuildGlossaryArgsDto {
  @ApiPropertyOptional({ default: DEFAULT_TOOL_DOMAIN })
  @IsOptional()
  @IsString()
  domain?: string = DEFAULT_TOOL_DOMAIN;

  @ApiPropertyOptional({ default: 20, minimum: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  max_terms?: number = 20;

  @ApiPropertyOptional({ default: 0.1, minimum: 0, maximum: 1 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  @Type(() => Number)
  min_centrality?: number = 0.1;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  @Transform(toBoolean)
  include_definitions?: boolean = true;

  @ApiPropertyOptional({ enum: GLOSSARY_FORMATS, default: 'json' })
  @IsOptional()
  @IsString()
  format?: string = 'json';
}

// ============================================
// generate_cover_image
// ============================================

export class GenerateCoverImageArgsDto {
  @ApiProperty({ description: 'Editorial text the cover illustrates' })
  @IsString()
  editorial_text!: string;

  @ApiPropertyOptional({ default: DEFAULT_TOOL_DOMAIN })
  @IsOptional()
  @IsString()
  domain?: string = DEFAULT_TOOL_DOMAIN;

  @ApiPropertyOptional({ enum: COVER_IMAGE_STYLES, default: 'professional' })
  @IsOptional()
  @IsString()
  style?: string = 'professional';

  @ApiPropertyOptional({ example: '1792x1024', default: '1024x1024' })
  @IsOptional()
  @IsString()
  dimensions?: string = '1024x1024';

  @ApiPropertyOptional({ enum: IMAGE_ENGINE_PRIORITY, default: 'dall-e-3' })
  @IsOptional()
  @IsString()
  image_engine?: string = 'dall-e-3';
}

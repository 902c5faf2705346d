import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class DomainSummaryResponseDto {
  @ApiProperty({ example: 'cancer health care' })
  domain!: string;

  @ApiProperty({ example: ['cancer health care', 'cancer_care', 'cancer care'] })
  aliases!: string[];

  @ApiProperty({ enum: ['prebuilt', 'built'], example: 'prebuilt' })
  source!: string;

  @ApiProperty({ example: 50 })
  nodeCount!: number;

  @ApiProperty({ example: 212 })
  edgeCount!: number;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  builtAt!: Date;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  loadedAt!: Date;
}

export class CentralitySummaryDto {
  @ApiProperty({ example: 0 })
  min!: number;

  @ApiProperty({ example: 1 })
  max!: number;

  @ApiProperty({ example: 0.31 })
  mean!: number;
}

export class DomainStatsResponseDto extends DomainSummaryResponseDto {
  @ApiProperty({ type: CentralitySummaryDto })
  centrality!: CentralitySummaryDto;

  @ApiProperty({ example: 3 })
  isolatedNodes!: number;
}

export class LoadResultResponseDto {
  @ApiProperty({ example: 'cancer health care' })
  domain!: string;

  @ApiProperty({ example: 'knowledge_graphs/cancer_health_care.json' })
  path!: string;

  @ApiProperty({ example: true })
  loaded!: boolean;

  @ApiPropertyOptional({ example: 'Failed to read graph file ...' })
  error?: string;
}

export class EvictResponseDto {
  @ApiProperty({ example: 'cancer health care' })
  domain!: string;

  @ApiProperty({ example: true })
  evicted!: boolean;
}

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { CategoryRelevance } from '../../search/interfaces/search.interface';

export class LogicalDocumentDto {
  @ApiProperty({ example: 'prefrio_services_base' })
  collection!: string;

  @ApiProperty({ example: '8f14e45f' })
  id!: string;

  @ApiPropertyOptional({ example: 'Segunda via do IPTU' })
  title?: string;

  @ApiPropertyOptional({ example: 'Taxas' })
  category?: string;

  @ApiPropertyOptional({ example: 1 })
  status?: number;

  @ApiProperty({
    description: 'Every other stored field',
    example: { resumo: 'Emita a segunda via da guia do IPTU' },
  })
  extraFields!: Record<string, unknown>;
}

export class MergedResultDto {
  @ApiProperty({
    description: 'Sum of each collection\'s own match count, before redirected documents are removed',
    example: 42,
  })
  found!: number;

  @ApiProperty({ example: 1 })
  page!: number;

  @ApiProperty({ type: [LogicalDocumentDto] })
  hits!: LogicalDocumentDto[];
}

export class CategoryRelevanceDto implements CategoryRelevance {
  @ApiProperty({ example: 'Saúde' })
  name!: string;

  @ApiProperty({ example: 'saude' })
  normalizedName!: string;

  @ApiProperty({ example: 1250 })
  totalRelevance!: number;

  @ApiProperty({ example: 25 })
  documentCount!: number;

  @ApiProperty({ example: 50 })
  averageRelevance!: number;
}

export class CategoryRelevanceReportDto {
  @ApiProperty({ type: [CategoryRelevanceDto] })
  categories!: CategoryRelevanceDto[];

  @ApiProperty({ example: 16 })
  totalCategories!: number;

  @ApiProperty({ example: '2025-01-01T12:00:00.000Z' })
  lastUpdated!: string;
}

export class CategoryDiagnosticsDto {
  @ApiProperty({ example: ['prefrio_services_base', '1746_v2_llm'] })
  collections!: string[];

  @ApiProperty({
    description: 'Stored document count per category value',
    example: { Taxas: 12, Saúde: 30 },
  })
  categories!: Record<string, number>;
}

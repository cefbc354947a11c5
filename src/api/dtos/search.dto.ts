import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, TransformFnParams } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsNotEmpty, IsString } from 'class-validator';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PER_PAGE = 10;
export const MAX_PER_PAGE = 100;

const toInteger = (value: unknown): number | undefined => {
  const parsed = typeof value === 'number' ? value : parseInt(String(value), 10);
  return Number.isInteger(parsed) ? parsed : undefined;
};

/**
 * Pages start at 1; anything lower or unparsable becomes 1.
 */
export const toPage = ({ value }: TransformFnParams): number => {
  const page = toInteger(value);
  return page !== undefined && page >= 1 ? page : DEFAULT_PAGE;
};

/**
 * Page sizes outside 1-100 fall back to the default rather than being
 * rejected.
 */
export const toPerPage = ({ value }: TransformFnParams): number => {
  const perPage = toInteger(value);
  return perPage !== undefined && perPage >= 1 && perPage <= MAX_PER_PAGE
    ? perPage
    : DEFAULT_PER_PAGE;
};

/**
 * `a,b` or repeated `collections=a&collections=b`, blanks dropped.
 */
export const toCollectionList = ({ value }: TransformFnParams): string[] => {
  const raw: unknown[] = Array.isArray(value) ? value : [value];
  return raw
    .filter((item): item is string => typeof item === 'string')
    .flatMap(item => item.split(','))
    .map(item => item.trim())
    .filter(item => item.length > 0);
};

export class CollectionsQueryDto {
  @ApiProperty({
    description: 'Comma-separated collection names',
    example: 'prefrio_services_base,1746_v2_llm',
    type: String,
  })
  @Transform(toCollectionList)
  @IsArray()
  @ArrayNotEmpty({ message: 'At least one collection is required' })
  @IsString({ each: true })
  collections!: string[];
}

export class PaginatedCollectionsQueryDto extends CollectionsQueryDto {
  @ApiPropertyOptional({ description: 'Page number, starting at 1', default: DEFAULT_PAGE, example: 1 })
  @Transform(toPage)
  page: number = DEFAULT_PAGE;

  @ApiPropertyOptional({
    description: `Results per page (1-${MAX_PER_PAGE})`,
    default: DEFAULT_PER_PAGE,
    example: 10,
  })
  @Transform(toPerPage)
  per_page: number = DEFAULT_PER_PAGE;
}

export class SearchQueryDto extends PaginatedCollectionsQueryDto {
  @ApiProperty({ description: 'Search text', example: 'segunda via iptu' })
  @IsString()
  @IsNotEmpty({ message: 'Search text is required' })
  q!: string;
}

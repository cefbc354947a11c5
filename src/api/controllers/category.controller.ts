import { Controller, Get, Inject, Logger, Param, Query, Res } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CategoryRelevanceService } from '../../category/category-relevance.service';
import searchConfig, { SearchConfig } from '../../config/search.config';
import { CANONICAL_CATEGORIES } from '../../constants/categories';
import { denormalizeCategory } from '../../common/utils/normalize';
import { FederatedSearchService } from '../../search/federated-search.service';
import {
  CategoryRelevanceReport,
  MergedResult,
} from '../../search/interfaces/search.interface';
import {
  CategoryDiagnosticsDto,
  CategoryRelevanceReportDto,
  MergedResultDto,
} from '../dtos/responses.dto';
import { CollectionsQueryDto, PaginatedCollectionsQueryDto } from '../dtos/search.dto';
import { toHttpException } from '../utils/http-errors';
import { ResponseLifecycle, requestScope } from '../utils/request-signal';

@ApiTags('Categories')
@Controller('api/v1/categories')
export class CategoryController {
  private readonly logger = new Logger(CategoryController.name);

  constructor(
    private readonly categories: CategoryRelevanceService,
    private readonly federatedSearch: FederatedSearchService,
    @Inject(searchConfig.KEY) private readonly config: SearchConfig,
  ) {}

  @Get('relevance')
  @ApiOperation({
    summary: 'Relevance per category',
    description:
      'Sums the access-based relevance of every document per category across the given ' +
      'collections. Every canonical category is listed, including empty ones.',
  })
  @ApiResponse({ status: 200, type: CategoryRelevanceReportDto })
  async relevance(
    @Query() query: CollectionsQueryDto,
    @Res({ passthrough: true }) response: ResponseLifecycle,
  ): Promise<CategoryRelevanceReport> {
    const { signal, release } = requestScope(response, this.config.requestTimeoutMs);
    try {
      return await this.categories.categoryRelevance(query.collections, signal);
    } catch (error) {
      throw toHttpException(error, this.logger, 'Category relevance', signal);
    } finally {
      release();
    }
  }

  @Get('diagnostics')
  @ApiOperation({
    summary: 'Stored category values',
    description: 'Document count per category value as stored, drafts included.',
  })
  @ApiResponse({ status: 200, type: CategoryDiagnosticsDto })
  async diagnostics(
    @Query() query: CollectionsQueryDto,
    @Res({ passthrough: true }) response: ResponseLifecycle,
  ): Promise<CategoryDiagnosticsDto> {
    const { signal, release } = requestScope(response, this.config.requestTimeoutMs);
    try {
      const categories = await this.categories.diagnoseCategories(query.collections, signal);
      return { collections: query.collections, categories };
    } catch (error) {
      throw toHttpException(error, this.logger, 'Category diagnostics', signal);
    } finally {
      release();
    }
  }

  @Get(':category/documents')
  @ApiOperation({
    summary: 'Documents of one category',
    description:
      'Every document of the category across the given collections, most accessed first. ' +
      'The category may be given without accents or in lower case.',
  })
  @ApiParam({ name: 'category', example: 'saude' })
  @ApiResponse({ status: 200, type: MergedResultDto })
  @ApiResponse({ status: 400, description: 'Missing collections or malformed category' })
  async documents(
    @Param('category') category: string,
    @Query() query: PaginatedCollectionsQueryDto,
    @Res({ passthrough: true }) response: ResponseLifecycle,
  ): Promise<MergedResult> {
    const canonical = denormalizeCategory(category, CANONICAL_CATEGORIES);
    const { signal, release } = requestScope(response, this.config.requestTimeoutMs);
    try {
      return await this.federatedSearch.searchByCategory(
        query.collections,
        canonical,
        query.page,
        query.per_page,
        signal,
      );
    } catch (error) {
      throw toHttpException(error, this.logger, `Category ${canonical}`, signal);
    } finally {
      release();
    }
  }
}

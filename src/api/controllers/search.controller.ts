import { Controller, Get, Inject, Logger, Query, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import searchConfig, { SearchConfig } from '../../config/search.config';
import { FederatedSearchService } from '../../search/federated-search.service';
import { MergedResult } from '../../search/interfaces/search.interface';
import { MergedResultDto } from '../dtos/responses.dto';
import { SearchQueryDto } from '../dtos/search.dto';
import { toHttpException } from '../utils/http-errors';
import { ResponseLifecycle, requestScope } from '../utils/request-signal';

@ApiTags('Search')
@Controller('api/v1/search')
export class SearchController {
  private readonly logger = new Logger(SearchController.name);

  constructor(
    private readonly federatedSearch: FederatedSearchService,
    @Inject(searchConfig.KEY) private readonly config: SearchConfig,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Search several collections at once',
    description:
      'Hybrid text and vector search across the given collections. Results are merged into one ' +
      'ranking, decommissioned legacy documents are removed, and the requested page is returned.',
  })
  @ApiResponse({ status: 200, description: 'Merged results', type: MergedResultDto })
  @ApiResponse({ status: 400, description: 'Missing collections or search text' })
  @ApiResponse({ status: 504, description: 'The search did not finish in time' })
  async search(
    @Query() query: SearchQueryDto,
    @Res({ passthrough: true }) response: ResponseLifecycle,
  ): Promise<MergedResult> {
    const { signal, release } = requestScope(response, this.config.requestTimeoutMs);
    try {
      const result = await this.federatedSearch.searchAcrossCollections(
        query.collections,
        query.q,
        query.page,
        query.per_page,
        signal,
      );
      this.logger.log(
        `Search "${query.q}" over ${query.collections.join(',')}: ${result.found} found, ${result.hits.length} returned`,
      );
      return result;
    } catch (error) {
      throw toHttpException(error, this.logger, 'Search', signal);
    } finally {
      release();
    }
  }
}

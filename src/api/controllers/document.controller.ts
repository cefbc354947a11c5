import { Controller, Get, Inject, Logger, Param, Res } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import searchConfig, { SearchConfig } from '../../config/search.config';
import { FederatedSearchService } from '../../search/federated-search.service';
import { LogicalDocument } from '../../search/interfaces/search.interface';
import { LogicalDocumentDto } from '../dtos/responses.dto';
import { toHttpException } from '../utils/http-errors';
import { ResponseLifecycle, requestScope } from '../utils/request-signal';

@ApiTags('Documents')
@Controller('api/v1/collections/:collection/documents')
export class DocumentController {
  private readonly logger = new Logger(DocumentController.name);

  constructor(
    private readonly federatedSearch: FederatedSearchService,
    @Inject(searchConfig.KEY) private readonly config: SearchConfig,
  ) {}

  @Get(':id')
  @ApiOperation({
    summary: 'Get a document by id',
    description:
      'A decommissioned legacy document is answered with its replacement from the published collection.',
  })
  @ApiParam({ name: 'collection', example: '1746_v2_llm' })
  @ApiParam({ name: 'id', example: '12345' })
  @ApiResponse({ status: 200, type: LogicalDocumentDto })
  @ApiResponse({ status: 404, description: 'Collection or document not found' })
  async getById(
    @Param('collection') collection: string,
    @Param('id') id: string,
    @Res({ passthrough: true }) response: ResponseLifecycle,
  ): Promise<LogicalDocument> {
    const { signal, release } = requestScope(response, this.config.requestTimeoutMs);
    try {
      return await this.federatedSearch.getByID(collection, id, signal);
    } catch (error) {
      throw toHttpException(error, this.logger, `Document ${id} in ${collection}`, signal);
    } finally {
      release();
    }
  }
}

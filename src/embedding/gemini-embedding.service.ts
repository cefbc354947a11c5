import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import searchConfig, { SearchConfig } from '../config/search.config';
import {
  DimensionMismatchError,
  EmbeddingUnavailableError,
  errorMessage,
} from '../common/errors/search.errors';
import { rethrowIfAborted } from '../common/utils/abort';
import { EmbeddingProvider } from './interfaces/embedding.interface';
import {
  GEMINI_HTTP,
  GeminiEmbedContentRequest,
  GeminiEmbedContentResponse,
} from './gemini.types';

/**
 * EmbeddingProvider over the Gemini `embedContent` endpoint.
 */
@Injectable()
export class GeminiEmbeddingService implements EmbeddingProvider {
  private readonly logger = new Logger(GeminiEmbeddingService.name);

  constructor(
    @Inject(GEMINI_HTTP) private readonly http: AxiosInstance,
    @Inject(searchConfig.KEY) private readonly config: SearchConfig,
  ) {}

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const { apiKey, model, dimensions } = this.config.embedding;
    if (!apiKey) {
      throw new EmbeddingUnavailableError('No embedding API key configured');
    }

    const body: GeminiEmbedContentRequest = {
      content: { parts: [{ text }] },
      outputDimensionality: dimensions,
    };

    let data: GeminiEmbedContentResponse;
    try {
      ({ data } = await this.http.post<GeminiEmbedContentResponse>(
        `/models/${encodeURIComponent(model)}:embedContent`,
        body,
        { params: { key: apiKey }, signal },
      ));
    } catch (error) {
      rethrowIfAborted(error, signal);
      const detail = axios.isAxiosError(error) && error.response
        ? `HTTP ${error.response.status}`
        : errorMessage(error);
      this.logger.warn(`Embedding request failed: ${detail}`);
      throw new EmbeddingUnavailableError(`Embedding request failed: ${detail}`);
    }

    const values = data.embedding?.values;
    if (!values || values.length === 0) {
      throw new EmbeddingUnavailableError('Embedding response carried no values');
    }
    if (values.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, values.length);
    }
    return values;
  }
}

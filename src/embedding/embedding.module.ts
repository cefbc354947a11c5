import { Module } from '@nestjs/common';
import axios from 'axios';
import searchConfig, { SearchConfig } from '../config/search.config';
import { GeminiEmbeddingService } from './gemini-embedding.service';
import { GEMINI_HTTP } from './gemini.types';
import { EMBEDDING_PROVIDER } from './interfaces/embedding.interface';

@Module({
  providers: [
    {
      provide: GEMINI_HTTP,
      inject: [searchConfig.KEY],
      useFactory: ({ embedding }: SearchConfig) =>
        axios.create({
          baseURL: embedding.baseUrl,
          timeout: embedding.timeoutMs,
          headers: { 'Content-Type': 'application/json' },
        }),
    },
    GeminiEmbeddingService,
    {
      provide: EMBEDDING_PROVIDER,
      useExisting: GeminiEmbeddingService,
    },
  ],
  exports: [EMBEDDING_PROVIDER],
})
export class EmbeddingModule {}

import { Module } from '@nestjs/common';
import axios from 'axios';
import searchConfig, { SearchConfig } from '../../config/search.config';
import { DOCUMENT_STORE } from '../interfaces/document-store.interface';
import { TypesenseDocumentStore } from './typesense-document-store.service';
import { parseTypesenseJson } from './typesense-json';
import { TYPESENSE_HTTP } from './typesense.types';

@Module({
  providers: [
    {
      provide: TYPESENSE_HTTP,
      inject: [searchConfig.KEY],
      useFactory: ({ typesense }: SearchConfig) =>
        axios.create({
          baseURL: `${typesense.protocol}://${typesense.host}:${typesense.port}`,
          timeout: typesense.timeoutMs,
          transformResponse: [parseTypesenseJson],
          headers: {
            'Content-Type': 'application/json',
            'X-TYPESENSE-API-KEY': typesense.apiKey,
          },
        }),
    },
    TypesenseDocumentStore,
    {
      provide: DOCUMENT_STORE,
      useExisting: TypesenseDocumentStore,
    },
  ],
  exports: [DOCUMENT_STORE],
})
export class TypesenseModule {}

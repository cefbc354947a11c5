import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import searchConfig, { SearchConfig } from '../config/search.config';
import {
  CollectionAlreadyExistsError,
  NotFoundError,
  errorMessage,
} from '../common/errors/search.errors';
import { DOCUMENT_STORE, DocumentStore } from '../storage/interfaces/document-store.interface';
import {
  crossSourceSchema,
  publishedRecordsSchema,
  redirectionOverlaySchema,
  versionHistorySchema,
} from './collection-schemas';
import { CollectionSchema } from './interfaces/schema.interface';

/**
 * Makes sure collections exist with their declared schema before they are
 * used. Schemas are immutable once created, so a successful check is kept
 * for the lifetime of the process.
 */
@Injectable()
export class SchemaManagerService implements OnModuleInit {
  private readonly logger = new Logger(SchemaManagerService.name);
  private readonly ensured = new Map<string, Promise<void>>();

  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(searchConfig.KEY) private readonly config: SearchConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.ensureAll();
  }

  /**
   * Ensures every collection this service owns. Failures are logged so the
   * process still starts when the store is briefly unavailable.
   */
  async ensureAll(): Promise<void> {
    const { overlay, published, versions, hub } = this.config.collections;
    for (const name of [overlay, published, versions, hub]) {
      try {
        await this.ensureCollectionExists(name);
        this.logger.log(`Collection ${name} verified`);
      } catch (error) {
        this.logger.warn(`Could not verify collection ${name}: ${errorMessage(error)}`);
      }
    }
  }

  ensureCollectionExists(name: string): Promise<void> {
    let pending = this.ensured.get(name);
    if (!pending) {
      pending = this.ensure(name);
      this.ensured.set(name, pending);
      pending.catch(() => this.ensured.delete(name));
    }
    return pending;
  }

  schemaFor(name: string): CollectionSchema {
    const { overlay, versions, hub } = this.config.collections;
    switch (name) {
      case overlay:
        return redirectionOverlaySchema(name);
      case versions:
        return versionHistorySchema(name);
      case hub:
        return crossSourceSchema(name);
      default:
        return publishedRecordsSchema(name);
    }
  }

  private async ensure(name: string): Promise<void> {
    try {
      await this.store.retrieveCollection(name);
      return;
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
    }

    try {
      await this.store.createCollection(this.schemaFor(name));
    } catch (error) {
      if (error instanceof CollectionAlreadyExistsError) {
        // Another instance created it between our check and create
        this.logger.debug(`Collection ${name} was created concurrently`);
        return;
      }
      throw error;
    }
  }
}

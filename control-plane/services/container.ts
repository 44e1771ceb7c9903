import type { AppConfig } from '@config';
import { DocumentService } from '@domain/documents/application/DocumentService';
import { articleCodec } from '@domain/documents/domain/entities/Article';
import { userCodec } from '@domain/documents/domain/entities/User';
import { ARTICLES_INDEX, USERS_INDEX } from '@domain/documents/domain/mappings';
import { IndexedDocumentStore } from '@domain/documents/infra/persistence/IndexedDocumentStore';
import { getLogger } from '@kernel/logger';
import { createElasticsearchBackend, type SearchBackend } from '@search';

const logger = getLogger('ContainerService');

/**
* Dependency Injection Container
* Provides centralized dependency wiring for application services
*/

export interface ContainerConfig {
  indexes: AppConfig['indexes'];
  /** Connection settings; required unless a backend is supplied */
  elasticsearch?: AppConfig['elasticsearch'] | undefined;
  /** Pre-built backend, e.g. an in-process one in tests */
  backend?: SearchBackend | undefined;
}

export class Container {
  private backendInstance: SearchBackend | undefined;
  private documentServiceInstance: DocumentService | undefined;

  constructor(private readonly config: ContainerConfig) {
    this.backendInstance = config.backend;
  }

  /**
  * Search backend (singleton)
  */
  get searchBackend(): SearchBackend {
    if (!this.backendInstance) {
      const settings = this.config.elasticsearch;
      if (!settings) {
        throw new Error('Elasticsearch settings are required when no search backend is supplied');
      }
      this.backendInstance = createElasticsearchBackend(settings);
    }
    return this.backendInstance;
  }

  get documentService(): DocumentService {
    if (!this.documentServiceInstance) {
      const backend = this.searchBackend;
      this.documentServiceInstance = new DocumentService({
        articles: new IndexedDocumentStore(backend, this.config.indexes.articles, articleCodec),
        users: new IndexedDocumentStore(backend, this.config.indexes.users, userCodec),
      });
    }
    return this.documentServiceInstance;
  }

  /**
  * Create both indexes with their mappings when missing
  */
  async ensureIndexes(): Promise<void> {
    const backend = this.searchBackend;
    const created = await Promise.all([
      backend.ensureIndex(this.config.indexes.articles, ARTICLES_INDEX),
      backend.ensureIndex(this.config.indexes.users, USERS_INDEX),
    ]);
    logger.info('Search indexes ready', {
      articles: this.config.indexes.articles,
      users: this.config.indexes.users,
      created: created.filter(Boolean).length,
    });
  }

  /**
  * Cleanup all resources
  */
  async dispose(): Promise<void> {
    if (this.backendInstance) {
      await this.backendInstance.close();
      this.backendInstance = undefined;
      this.documentServiceInstance = undefined;
    }
  }
}

export function createContainer(config: ContainerConfig): Container {
  return new Container(config);
}

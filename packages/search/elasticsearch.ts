import { Client, errors, type estypes, type TransportRequestOptionsWithOutMeta } from '@elastic/elasticsearch';

import { BackendUnavailableError, SearchBackendError } from '@errors';
import { getLogger } from '@kernel/logger';
import { sanitizeUrl } from '@kernel/redaction';

import type {
  ClusterHealthStatus,
  DocumentSource,
  FieldMapping,
  IndexDefinition,
  QueryClause,
  SearchBackend,
  SearchRequest,
  StoredSource,
} from './types';

const logger = getLogger('search');

/**
* The slice of the Elasticsearch client this backend calls.
* `Client` satisfies it; tests pass a stub object.
*/
export interface ElasticsearchApi {
  get(
    params: estypes.GetRequest,
    options?: TransportRequestOptionsWithOutMeta
  ): Promise<{ found: boolean; _id: string; _source?: unknown }>;
  index(params: estypes.IndexRequest<DocumentSource>): Promise<{ _id: string }>;
  search(params: estypes.SearchRequest): Promise<{ hits: { hits: Array<{ _id?: string; _source?: unknown }> } }>;
  delete(
    params: estypes.DeleteRequest,
    options?: TransportRequestOptionsWithOutMeta
  ): Promise<{ result: string }>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
  indices: {
    exists(params: estypes.IndicesExistsRequest): Promise<boolean>;
    create(params: estypes.IndicesCreateRequest): Promise<unknown>;
  };
  cluster: {
    health(): Promise<{ status: string }>;
  };
}

export interface ElasticsearchBackendConfig {
  url: string;
  requestTimeoutMs: number;
  maxRetries: number;
  /** Refresh policy for writes; false leaves it to the engine */
  refresh: boolean | 'wait_for';
}

const NOT_FOUND: TransportRequestOptionsWithOutMeta = { ignore: [404], meta: false };

// ============================================================================
// Error translation
// ============================================================================

function isTransportFailure(error: unknown): boolean {
  return error instanceof errors.ConnectionError
    || error instanceof errors.TimeoutError
    || error instanceof errors.NoLivingConnectionsError;
}

function translateError(error: unknown, operation: string): Error {
  const cause = error instanceof Error ? error : new Error(String(error));
  if (isTransportFailure(error)) {
    return new BackendUnavailableError(`Search backend unavailable during ${operation}`, { cause });
  }
  if (error instanceof errors.ResponseError) {
    return new SearchBackendError(
      `Search backend rejected ${operation}`,
      { statusCode: error.meta.statusCode },
      { cause }
    );
  }
  return new SearchBackendError(`Search backend failed during ${operation}`, undefined, { cause });
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof errors.ResponseError
    && error.message.includes('resource_already_exists_exception');
}

// ============================================================================
// Query and mapping conversion
// ============================================================================

export function toEsQuery(clause: QueryClause): estypes.QueryDslQueryContainer {
  if ('match_all' in clause) {
    return { match_all: {} };
  }
  if ('multi_match' in clause) {
    return { multi_match: { query: clause.multi_match.query, fields: clause.multi_match.fields } };
  }
  if ('term' in clause) {
    const term: Partial<Record<string, estypes.QueryDslTermQuery>> = {};
    term[clause.term.field] = { value: clause.term.value };
    return { term };
  }
  if ('terms' in clause) {
    const terms: estypes.QueryDslTermsQuery = {};
    terms[clause.terms.field] = clause.terms.values;
    return { terms };
  }
  const bool: estypes.QueryDslBoolQuery = {};
  if (clause.bool.must) bool.must = clause.bool.must.map(toEsQuery);
  if (clause.bool.filter) bool.filter = clause.bool.filter.map(toEsQuery);
  return { bool };
}

function toEsProperty(mapping: FieldMapping): estypes.MappingProperty {
  switch (mapping.type) {
    case 'text':
      return mapping.analyzer ? { type: 'text', analyzer: mapping.analyzer } : { type: 'text' };
    case 'keyword':
      return { type: 'keyword' };
    case 'integer':
      return { type: 'integer' };
    case 'float':
      return { type: 'float' };
    case 'date':
      return { type: 'date' };
  }
}

function isDocumentSource(value: unknown): value is DocumentSource {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toHealthStatus(status: string): ClusterHealthStatus {
  const normalized = status.toLowerCase();
  if (normalized === 'green' || normalized === 'yellow') return normalized;
  return 'red';
}

// ============================================================================
// Backend
// ============================================================================

/**
* SearchBackend on Elasticsearch 8.
*
* Transport failures surface as BackendUnavailableError, engine errors as
* SearchBackendError. A missing document or index on read is null.
*/
export class ElasticsearchBackend implements SearchBackend {
  constructor(
    private readonly client: ElasticsearchApi,
    private readonly refresh: boolean | 'wait_for' = false
  ) {}

  async get(index: string, id: string): Promise<StoredSource | null> {
    try {
      const result = await this.client.get({ index, id }, NOT_FOUND);
      if (result.found !== true) {
        return null;
      }
      if (!isDocumentSource(result._source)) {
        throw new SearchBackendError('Stored document has no source', { index, id });
      }
      return { id: result._id, source: result._source };
    } catch (error) {
      if (error instanceof SearchBackendError) throw error;
      throw translateError(error, 'get');
    }
  }

  async indexDocument(index: string, source: DocumentSource, id?: string): Promise<string> {
    try {
      const params: estypes.IndexRequest<DocumentSource> = {
        index,
        document: source,
        refresh: this.refresh,
      };
      if (id !== undefined) params.id = id;
      const result = await this.client.index(params);
      return result._id;
    } catch (error) {
      throw translateError(error, 'index');
    }
  }

  async search(index: string, request: SearchRequest): Promise<StoredSource[]> {
    let hits: Array<{ _id?: string; _source?: unknown }>;
    try {
      const result = await this.client.search({
        index,
        query: toEsQuery(request.query),
        from: request.from,
        size: request.size,
      });
      hits = result.hits.hits;
    } catch (error) {
      throw translateError(error, 'search');
    }

    const documents: StoredSource[] = [];
    for (const hit of hits) {
      if (typeof hit._id !== 'string' || !isDocumentSource(hit._source)) {
        logger.warn('Skipping search hit without id or source', { index });
        continue;
      }
      documents.push({ id: hit._id, source: hit._source });
    }
    return documents;
  }

  async delete(index: string, id: string): Promise<boolean> {
    try {
      const result = await this.client.delete({ index, id, refresh: this.refresh }, NOT_FOUND);
      return result.result === 'deleted';
    } catch (error) {
      throw translateError(error, 'delete');
    }
  }

  async ensureIndex(index: string, definition: IndexDefinition): Promise<boolean> {
    try {
      if (await this.client.indices.exists({ index })) {
        return false;
      }

      const properties: Record<string, estypes.MappingProperty> = {};
      for (const [field, mapping] of Object.entries(definition.properties)) {
        properties[field] = toEsProperty(mapping);
      }

      await this.client.indices.create({
        index,
        settings: {
          number_of_shards: definition.settings.numberOfShards,
          number_of_replicas: definition.settings.numberOfReplicas,
        },
        mappings: { properties },
      });
      logger.info('Created search index', { index });
      return true;
    } catch (error) {
      // Another instance created it between exists and create
      if (isAlreadyExists(error)) return false;
      throw translateError(error, 'ensureIndex');
    }
  }

  async ping(): Promise<void> {
    let reachable: boolean;
    try {
      reachable = await this.client.ping();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new BackendUnavailableError('Search backend unreachable', { cause });
    }
    if (!reachable) {
      throw new BackendUnavailableError('Search backend unreachable');
    }
  }

  async clusterHealth(): Promise<ClusterHealthStatus> {
    try {
      const result = await this.client.cluster.health();
      return toHealthStatus(result.status);
    } catch (error) {
      throw translateError(error, 'clusterHealth');
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/**
* Build a backend on a real Elasticsearch client.
* Request-level retries are the client's; startup retries are the caller's.
*/
export function createElasticsearchBackend(config: ElasticsearchBackendConfig): ElasticsearchBackend {
  logger.info('Connecting to Elasticsearch', { node: sanitizeUrl(config.url) });
  const client = new Client({
    node: config.url,
    requestTimeout: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
  });
  return new ElasticsearchBackend(client, config.refresh);
}

/**
 * Search backend package
 *
 * Port, Elasticsearch implementation and health check.
 */

export {
  ElasticsearchBackend,
  createElasticsearchBackend,
  toEsQuery,
  type ElasticsearchApi,
  type ElasticsearchBackendConfig,
} from './elasticsearch';

export { checkSearchBackendHealth, type HealthCheckResult } from './health';

export type {
  ClusterHealthStatus,
  DocumentSource,
  FieldMapping,
  IndexDefinition,
  QueryClause,
  SearchBackend,
  SearchRequest,
  StoredSource,
  TermValue,
} from './types';

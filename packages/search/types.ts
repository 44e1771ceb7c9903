/**
 * Search backend port.
 *
 * The document layer talks to the search engine only through this
 * interface, so tests can swap in an in-process implementation.
 */

/** A raw document source as stored in an index */
export type DocumentSource = Record<string, unknown>;

export interface StoredSource {
  id: string;
  source: DocumentSource;
}

export type TermValue = string | number | boolean;

/**
 * Query clause subset used by the service.
 * `fields` in multi_match take the engine's boost syntax, e.g. `title^2`.
 */
export type QueryClause =
  | { match_all: Record<string, never> }
  | { multi_match: { query: string; fields: string[] } }
  | { term: { field: string; value: TermValue } }
  | { terms: { field: string; values: TermValue[] } }
  | { bool: { must?: QueryClause[]; filter?: QueryClause[] } };

export interface SearchRequest {
  query: QueryClause;
  from: number;
  size: number;
}

export type FieldMapping =
  | { type: 'text'; analyzer?: string }
  | { type: 'keyword' }
  | { type: 'integer' }
  | { type: 'float' }
  | { type: 'date' };

export interface IndexDefinition {
  settings: {
    numberOfShards: number;
    numberOfReplicas: number;
  };
  properties: Record<string, FieldMapping>;
}

export type ClusterHealthStatus = 'green' | 'yellow' | 'red';

export interface SearchBackend {
  /** Resolves to null when the document or the index does not exist */
  get(index: string, id: string): Promise<StoredSource | null>;

  /** Stores a source under `id`, or under a backend-assigned id; resolves to the id */
  indexDocument(index: string, source: DocumentSource, id?: string): Promise<string>;

  /** Hits in the order the engine ranked them */
  search(index: string, request: SearchRequest): Promise<StoredSource[]>;

  /** Resolves to false when there was nothing to delete */
  delete(index: string, id: string): Promise<boolean>;

  /** Creates the index when missing; resolves to true when it was created */
  ensureIndex(index: string, definition: IndexDefinition): Promise<boolean>;

  /** @throws BackendUnavailableError when the engine cannot be reached */
  ping(): Promise<void>;

  clusterHealth(): Promise<ClusterHealthStatus>;

  close(): Promise<void>;
}

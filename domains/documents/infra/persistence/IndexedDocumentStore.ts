import { ZodError } from 'zod';

import { SearchBackendError } from '@errors';
import type { DocumentSource, SearchBackend, SearchRequest, StoredSource } from '@search';

import { decodeTimestamps, encodeTimestamps, type DocumentCodec, type Stored } from '../../domain/codec';
import { stampTimestamps } from '../../domain/timestamps';

export type { Stored };

/**
* Document store over one search index.
*
* Stamps timestamps on every save and decodes every read through the
* codec; a source that fails to decode is a SearchBackendError.
*/
export class IndexedDocumentStore<F extends object> {
  constructor(
    private readonly backend: SearchBackend,
    private readonly index: string,
    private readonly codec: DocumentCodec<F>,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async get(id: string): Promise<Stored<F> | null> {
    const found = await this.backend.get(this.index, id);
    return found ? this.decode(found) : null;
  }

  /**
  * Persist fields, as a new document or over `existing`.
  * The returned document carries the timestamps that were written.
  */
  async save(fields: F, existing?: Stored<F>): Promise<Stored<F>> {
    const timestamps = stampTimestamps(existing, this.clock());
    const source: DocumentSource = {
      ...this.codec.encode(fields),
      ...encodeTimestamps(timestamps),
    };
    const id = await this.backend.indexDocument(this.index, source, existing?.id);
    return { ...fields, ...timestamps, id };
  }

  async search(request: SearchRequest): Promise<Stored<F>[]> {
    const hits = await this.backend.search(this.index, request);
    return hits.map(hit => this.decode(hit));
  }

  async delete(id: string): Promise<boolean> {
    return this.backend.delete(this.index, id);
  }

  private decode(stored: StoredSource): Stored<F> {
    try {
      return {
        ...this.codec.decode(stored.source),
        ...decodeTimestamps(stored.source),
        id: stored.id,
      };
    } catch (error) {
      if (error instanceof ZodError) {
        throw new SearchBackendError(
          'Stored document does not match the expected shape',
          { index: this.index, id: stored.id, issues: error.issues },
          { cause: error }
        );
      }
      throw error;
    }
  }
}

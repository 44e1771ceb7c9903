import { z } from 'zod';

import type { DocumentSource } from '@search';

import type { Timestamps } from './timestamps';

/** A persisted document: its fields plus id and timestamps */
export type Stored<F> = F & Timestamps & { id: string };

/**
* Maps a document's fields to and from its indexed source.
* Sources are snake_case; timestamps are handled by the store.
*/
export interface DocumentCodec<F> {
  encode(fields: F): DocumentSource;
  /** @throws ZodError when the source does not match the document shape */
  decode(source: DocumentSource): F;
}

const isoDate = z.string().pipe(z.coerce.date());

export const timestampSourceSchema = z.object({
  created_at: isoDate,
  updated_at: isoDate,
});

export function encodeTimestamps(timestamps: Timestamps): DocumentSource {
  return {
    created_at: timestamps.createdAt.toISOString(),
    updated_at: timestamps.updatedAt.toISOString(),
  };
}

export function decodeTimestamps(source: DocumentSource): Timestamps {
  const parsed = timestampSourceSchema.parse(source);
  return { createdAt: parsed.created_at, updatedAt: parsed.updated_at };
}

import type { IndexDefinition } from '@search';

/**
* Index definitions created at startup when an index is missing.
* Exact-match fields are keywords; free text uses the standard analyzer.
*/

const settings = { numberOfShards: 1, numberOfReplicas: 0 };

export const ARTICLES_INDEX: IndexDefinition = {
  settings,
  properties: {
    title: { type: 'text', analyzer: 'standard' },
    content: { type: 'text', analyzer: 'standard' },
    author: { type: 'keyword' },
    category: { type: 'keyword' },
    tags: { type: 'keyword' },
    views: { type: 'integer' },
    rating: { type: 'float' },
    created_at: { type: 'date' },
    updated_at: { type: 'date' },
  },
};

export const USERS_INDEX: IndexDefinition = {
  settings,
  properties: {
    username: { type: 'keyword' },
    email: { type: 'keyword' },
    full_name: { type: 'text', analyzer: 'standard' },
    bio: { type: 'text', analyzer: 'standard' },
    is_active: { type: 'keyword' },
    created_at: { type: 'date' },
    updated_at: { type: 'date' },
  },
};

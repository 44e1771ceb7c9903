import { ValidationError } from '@errors';
import type { QueryClause, SearchRequest } from '@search';

import { ArticleIndexFields } from '../domain/entities/Article';

export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

export interface ArticleSearchCriteria {
  query?: string | undefined;
  category?: string | undefined;
  tags?: string[] | undefined;
  limit?: number | undefined;
  offset?: number | undefined;
}

export interface Pagination {
  limit: number;
  offset: number;
}

/** Title matches weigh twice as much as content matches */
export const ARTICLE_TEXT_FIELDS = [`${ArticleIndexFields.title}^2`, ArticleIndexFields.content];

/**
* Apply pagination defaults and bounds.
* @throws ValidationError when limit is outside 1-100 or offset is negative
*/
export function normalizePagination(criteria: Pick<ArticleSearchCriteria, 'limit' | 'offset'>): Pagination {
  const limit = criteria.limit ?? DEFAULT_LIMIT;
  const offset = criteria.offset ?? 0;

  const issues: Array<{ path: string[]; message: string }> = [];
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
    issues.push({ path: ['limit'], message: `limit must be an integer between 1 and ${MAX_LIMIT}` });
  }
  if (!Number.isInteger(offset) || offset < 0) {
    issues.push({ path: ['offset'], message: 'offset must be a non-negative integer' });
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid pagination', issues);
  }

  return { limit, offset };
}

/** Only an absent or empty value is skipped; whitespace is searched as given */
function isPresent(value: string | undefined): value is string {
  return value !== undefined && value !== '';
}

/**
* Compose the article search request.
*
* Text (or match-all) ranks; category and tags only filter. Without
* filters the text clause is sent on its own.
*/
export function buildArticleSearchRequest(criteria: ArticleSearchCriteria): SearchRequest {
  const { limit, offset } = normalizePagination(criteria);

  const text: QueryClause = isPresent(criteria.query)
    ? { multi_match: { query: criteria.query, fields: [...ARTICLE_TEXT_FIELDS] } }
    : { match_all: {} };

  const filter: QueryClause[] = [];
  if (isPresent(criteria.category)) {
    filter.push({ term: { field: ArticleIndexFields.category, value: criteria.category } });
  }
  if (criteria.tags && criteria.tags.length > 0) {
    filter.push({ terms: { field: ArticleIndexFields.tags, values: [...criteria.tags] } });
  }

  return {
    query: filter.length > 0 ? { bool: { must: [text], filter } } : text,
    from: offset,
    size: limit,
  };
}

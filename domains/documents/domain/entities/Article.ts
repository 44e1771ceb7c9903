import { z } from 'zod';

import type { DocumentCodec, Stored } from '../codec';

/**
* Article Domain Entity
*
* Title and content are full-text; author, category and tags match exactly.
* Values are plain and immutable: updates return new field sets.
*
* @module domains/documents/domain/entities/Article
*/

export interface ArticleFields {
  title: string;
  content: string;
  author: string;
  category: string;
  /** Unordered; duplicates are kept as given */
  tags: string[];
  views: number;
  rating: number;
}

export interface NewArticleInput {
  title: string;
  content: string;
  author: string;
  category: string;
  tags?: string[] | undefined;
  views?: number | undefined;
  rating?: number | undefined;
}

/** null and undefined both leave a field unchanged */
export type ArticlePatch = {
  [K in keyof ArticleFields]?: ArticleFields[K] | null | undefined;
};

export function newArticle(input: NewArticleInput): ArticleFields {
  return {
    title: input.title,
    content: input.content,
    author: input.author,
    category: input.category,
    tags: input.tags ? [...input.tags] : [],
    views: input.views ?? 0,
    rating: input.rating ?? 0,
  };
}

export function applyArticlePatch(article: ArticleFields, patch: ArticlePatch): ArticleFields {
  return {
    title: patch.title ?? article.title,
    content: patch.content ?? article.content,
    author: patch.author ?? article.author,
    category: patch.category ?? article.category,
    tags: patch.tags ? [...patch.tags] : [...article.tags],
    views: patch.views ?? article.views,
    rating: patch.rating ?? article.rating,
  };
}

/** Names of article fields in the index */
export const ArticleIndexFields = {
  title: 'title',
  content: 'content',
  author: 'author',
  category: 'category',
  tags: 'tags',
  views: 'views',
  rating: 'rating',
} as const;

const articleSourceSchema = z.object({
  title: z.string(),
  content: z.string(),
  author: z.string(),
  category: z.string(),
  tags: z.array(z.string()).default([]),
  views: z.number().int().default(0),
  rating: z.number().default(0),
});

export const articleCodec: DocumentCodec<ArticleFields> = {
  encode: (fields) => ({
    title: fields.title,
    content: fields.content,
    author: fields.author,
    category: fields.category,
    tags: [...fields.tags],
    views: fields.views,
    rating: fields.rating,
  }),
  decode: (source) => articleSourceSchema.parse(source),
};

export type Article = Stored<ArticleFields>;

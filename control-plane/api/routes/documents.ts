import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { DocumentService } from '@domain/documents/application/DocumentService';
import { MAX_LIMIT, DEFAULT_LIMIT } from '@domain/documents/application/ArticleSearch';
import type { Article } from '@domain/documents/domain/entities/Article';
import type { User } from '@domain/documents/domain/entities/User';
import { createRouteErrorHandler, ErrorCodes } from '@errors';
import { errors } from '@errors/responses';

const handleError = createRouteErrorHandler({ logger: 'documents' });

/** Upper bound of the `integer` field type in the index mapping */
const MAX_VIEWS = 2_147_483_647;

const ArticleCreateSchema = z.object({
  title: z.string(),
  content: z.string(),
  author: z.string(),
  category: z.string(),
  tags: z.array(z.string()).optional(),
  views: z.number().int().min(0).max(MAX_VIEWS).optional(),
  rating: z.number().optional(),
});

/** null leaves a field unchanged */
const ArticleUpdateSchema = z.object({
  title: z.string().nullish(),
  content: z.string().nullish(),
  author: z.string().nullish(),
  category: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
  views: z.number().int().min(0).max(MAX_VIEWS).nullish(),
  rating: z.number().nullish(),
});

const stringList = z.union([z.string(), z.array(z.string())])
  .transform(value => (Array.isArray(value) ? value : [value]));

const ArticleSearchQuerySchema = z.object({
  query: z.string().optional(),
  category: z.string().optional(),
  tags: stringList.optional(),
  'tags[]': stringList.optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
  offset: z.coerce.number().int().min(0).default(0),
});

const UserCreateSchema = z.object({
  username: z.string().min(1),
  email: z.string().email(),
  full_name: z.string(),
  bio: z.string().optional(),
  is_active: z.enum(['true', 'false']).optional(),
});

const IdParamsSchema = z.object({
  id: z.string().min(1).max(512),
});

export interface ArticleResponse {
  id: string;
  title: string;
  content: string;
  author: string;
  category: string;
  tags: string[];
  views: number;
  rating: number;
  created_at: string;
  updated_at: string;
}

export interface UserResponse {
  id: string;
  username: string;
  email: string;
  full_name: string;
  bio: string;
  is_active: string;
  created_at: string;
  updated_at: string;
}

export function toArticleResponse(article: Article): ArticleResponse {
  return {
    id: article.id,
    title: article.title,
    content: article.content,
    author: article.author,
    category: article.category,
    tags: article.tags,
    views: article.views,
    rating: article.rating,
    created_at: article.createdAt.toISOString(),
    updated_at: article.updatedAt.toISOString(),
  };
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    full_name: user.fullName,
    bio: user.bio,
    is_active: user.isActive,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

export interface DocumentRoutesOptions {
  service: DocumentService;
}

/**
* Article and user routes, registered under the /documents prefix
*/
export async function documentRoutes(app: FastifyInstance, { service }: DocumentRoutesOptions): Promise<void> {
  app.post('/articles', {
    schema: { operationId: 'createArticle', summary: 'Create an article', tags: ['Articles'] },
  }, async (req, res) => {
    const parsed = ArticleCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return errors.validationFailed(res, parsed.error.issues);
    }

    try {
      const article = await service.createArticle(parsed.data);
      return res.send(toArticleResponse(article));
    } catch (error) {
      return handleError(res, error, 'create article');
    }
  });

  app.get('/articles', {
    schema: { operationId: 'searchArticles', summary: 'Search articles', tags: ['Articles'] },
  }, async (req, res) => {
    const parsed = ArticleSearchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return errors.validationFailed(res, parsed.error.issues);
    }

    const { query, category, limit, offset } = parsed.data;
    const tags = [...(parsed.data.tags ?? []), ...(parsed.data['tags[]'] ?? [])];

    try {
      const articles = await service.searchArticles({ query, category, tags, limit, offset });
      return res.send(articles.map(toArticleResponse));
    } catch (error) {
      return handleError(res, error, 'search articles');
    }
  });

  app.get('/articles/:id', {
    schema: { operationId: 'getArticle', summary: 'Get an article by id', tags: ['Articles'] },
  }, async (req, res) => {
    const params = IdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return errors.badRequest(res, 'Invalid id', ErrorCodes.INVALID_PARAMS, params.error.issues);
    }

    try {
      const article = await service.getArticle(params.data.id);
      if (!article) {
        return errors.notFound(res, 'Article', ErrorCodes.ARTICLE_NOT_FOUND);
      }
      return res.send(toArticleResponse(article));
    } catch (error) {
      return handleError(res, error, 'get article');
    }
  });

  app.put('/articles/:id', {
    schema: { operationId: 'updateArticle', summary: 'Update an article', tags: ['Articles'] },
  }, async (req, res) => {
    const params = IdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return errors.badRequest(res, 'Invalid id', ErrorCodes.INVALID_PARAMS, params.error.issues);
    }
    const parsed = ArticleUpdateSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return errors.validationFailed(res, parsed.error.issues);
    }

    try {
      const article = await service.updateArticle(params.data.id, parsed.data);
      if (!article) {
        return errors.notFound(res, 'Article', ErrorCodes.ARTICLE_NOT_FOUND);
      }
      return res.send(toArticleResponse(article));
    } catch (error) {
      return handleError(res, error, 'update article');
    }
  });

  app.delete('/articles/:id', {
    schema: { operationId: 'deleteArticle', summary: 'Delete an article', tags: ['Articles'] },
  }, async (req, res) => {
    const params = IdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return errors.badRequest(res, 'Invalid id', ErrorCodes.INVALID_PARAMS, params.error.issues);
    }

    try {
      const deleted = await service.deleteArticle(params.data.id);
      if (!deleted) {
        return errors.notFound(res, 'Article', ErrorCodes.ARTICLE_NOT_FOUND);
      }
      return res.send({ message: 'Article deleted successfully' });
    } catch (error) {
      return handleError(res, error, 'delete article');
    }
  });

  app.post('/users', {
    schema: { operationId: 'createUser', summary: 'Create a user', tags: ['Users'] },
  }, async (req, res) => {
    const parsed = UserCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return errors.validationFailed(res, parsed.error.issues);
    }

    try {
      const user = await service.createUser({
        username: parsed.data.username,
        email: parsed.data.email,
        fullName: parsed.data.full_name,
        bio: parsed.data.bio,
        isActive: parsed.data.is_active,
      });
      return res.send(toUserResponse(user));
    } catch (error) {
      return handleError(res, error, 'create user');
    }
  });

  app.get('/users/:id', {
    schema: { operationId: 'getUser', summary: 'Get a user by id', tags: ['Users'] },
  }, async (req, res) => {
    const params = IdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return errors.badRequest(res, 'Invalid id', ErrorCodes.INVALID_PARAMS, params.error.issues);
    }

    try {
      const user = await service.getUser(params.data.id);
      if (!user) {
        return errors.notFound(res, 'User', ErrorCodes.USER_NOT_FOUND);
      }
      return res.send(toUserResponse(user));
    } catch (error) {
      return handleError(res, error, 'get user');
    }
  });
}

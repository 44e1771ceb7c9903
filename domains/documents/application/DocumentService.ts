import { toError, withContext } from '@errors';
import { getLogger } from '@kernel/logger';

import {
  applyArticlePatch,
  newArticle,
  type Article,
  type ArticleFields,
  type ArticlePatch,
  type NewArticleInput,
} from '../domain/entities/Article';
import { newUser, type NewUserInput, type User, type UserFields } from '../domain/entities/User';
import type { IndexedDocumentStore } from '../infra/persistence/IndexedDocumentStore';
import { buildArticleSearchRequest, type ArticleSearchCriteria } from './ArticleSearch';

const logger = getLogger('documents:service');

export interface DocumentStores {
  articles: IndexedDocumentStore<ArticleFields>;
  users: IndexedDocumentStore<UserFields>;
}

/**
* Article and user operations over their index stores.
*
* A missing document is null (get, update) or false (delete) and is not
* an error. Backend failures are logged and rethrown with the operation
* attached; their status and code are kept.
*/
export class DocumentService {
  constructor(private readonly stores: DocumentStores) {}

  async createArticle(input: NewArticleInput): Promise<Article> {
    try {
      const article = await this.stores.articles.save(newArticle(input));
      logger.info('Article created', { articleId: article.id });
      return article;
    } catch (error) {
      logger.error('Failed to create article', toError(error));
      throw withContext(error, { operation: 'createArticle', resource: 'article' });
    }
  }

  async getArticle(id: string): Promise<Article | null> {
    try {
      const article = await this.stores.articles.get(id);
      if (!article) {
        logger.warn('Article not found', { articleId: id });
      }
      return article;
    } catch (error) {
      logger.error('Failed to get article', toError(error), { articleId: id });
      throw withContext(error, { operation: 'getArticle', resource: 'article', resourceId: id });
    }
  }

  /**
  * @throws ValidationError for out-of-range pagination, before any backend call
  */
  async searchArticles(criteria: ArticleSearchCriteria = {}): Promise<Article[]> {
    const request = buildArticleSearchRequest(criteria);
    try {
      const articles = await this.stores.articles.search(request);
      logger.debug('Article search completed', {
        results: articles.length,
        from: request.from,
        size: request.size,
      });
      return articles;
    } catch (error) {
      logger.error('Failed to search articles', toError(error));
      throw withContext(error, { operation: 'searchArticles', resource: 'article' });
    }
  }

  async updateArticle(id: string, patch: ArticlePatch): Promise<Article | null> {
    try {
      const existing = await this.stores.articles.get(id);
      if (!existing) {
        logger.warn('Article not found for update', { articleId: id });
        return null;
      }
      const updated = await this.stores.articles.save(applyArticlePatch(existing, patch), existing);
      logger.info('Article updated', { articleId: id });
      return updated;
    } catch (error) {
      logger.error('Failed to update article', toError(error), { articleId: id });
      throw withContext(error, { operation: 'updateArticle', resource: 'article', resourceId: id });
    }
  }

  async deleteArticle(id: string): Promise<boolean> {
    try {
      const deleted = await this.stores.articles.delete(id);
      if (deleted) {
        logger.info('Article deleted', { articleId: id });
      } else {
        logger.warn('Article not found for delete', { articleId: id });
      }
      return deleted;
    } catch (error) {
      logger.error('Failed to delete article', toError(error), { articleId: id });
      throw withContext(error, { operation: 'deleteArticle', resource: 'article', resourceId: id });
    }
  }

  async createUser(input: NewUserInput): Promise<User> {
    try {
      const user = await this.stores.users.save(newUser(input));
      logger.info('User created', { userId: user.id });
      return user;
    } catch (error) {
      logger.error('Failed to create user', toError(error));
      throw withContext(error, { operation: 'createUser', resource: 'user' });
    }
  }

  async getUser(id: string): Promise<User | null> {
    try {
      const user = await this.stores.users.get(id);
      if (!user) {
        logger.warn('User not found', { userId: id });
      }
      return user;
    } catch (error) {
      logger.error('Failed to get user', toError(error), { userId: id });
      throw withContext(error, { operation: 'getUser', resource: 'user', resourceId: id });
    }
  }
}

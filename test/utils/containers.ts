/**
 * Test Containers
 *
 * Wires the real service graph onto an in-process search backend.
 */

import type { FastifyInstance } from 'fastify';

import { buildApp } from '../../control-plane/api/app';
import { createContainer, type Container } from '../../control-plane/services/container';
import type { DocumentService } from '../../domains/documents/application/DocumentService';
import { InMemorySearchBackend } from '../mocks/search-backend';

export const TEST_INDEXES = {
  articles: 'test_articles',
  users: 'test_users',
} as const;

export interface TestContainer {
  backend: InMemorySearchBackend;
  container: Container;
  service: DocumentService;
}

export async function createTestContainer(): Promise<TestContainer> {
  const backend = new InMemorySearchBackend();
  const container = createContainer({ indexes: { ...TEST_INDEXES }, backend });
  await container.ensureIndexes();
  return { backend, container, service: container.documentService };
}

export interface TestApp extends TestContainer {
  app: FastifyInstance;
}

/**
* Full HTTP application over an in-process backend, for `app.inject`
*/
export async function createTestApp(): Promise<TestApp> {
  const testContainer = await createTestContainer();
  const app = await buildApp({
    service: testContainer.service,
    backend: testContainer.backend,
    docs: false,
  });
  await app.ready();
  return { ...testContainer, app };
}

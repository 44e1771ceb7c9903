import type { FastifyInstance } from 'fastify';

import { errors } from '@errors/responses';
import { checkSearchBackendHealth, type SearchBackend } from '@search';

export interface HealthRoutesOptions {
  backend: SearchBackend;
}

/**
* Liveness and search backend health, registered under the /health prefix
*/
export async function healthRoutes(app: FastifyInstance, { backend }: HealthRoutesOptions): Promise<void> {
  app.get('/', {
    schema: {
      operationId: 'getHealth',
      summary: 'Service health check',
      description: 'Returns 503 when the search backend is unhealthy. Public endpoint used by load balancers.',
      tags: ['Health'],
    },
  }, async (_req, res) => {
    const result = await checkSearchBackendHealth(backend);
    if (!result.healthy) {
      return errors.serviceUnavailable(res, 'Elasticsearch is not healthy');
    }
    return res.send({ status: 'healthy', elasticsearch: 'connected' });
  });

  app.get('/elasticsearch', {
    schema: {
      operationId: 'getElasticsearchHealth',
      summary: 'Search backend health',
      description: 'Always 200; the body reports whether the cluster is healthy.',
      tags: ['Health'],
    },
  }, async (_req, res) => {
    const result = await checkSearchBackendHealth(backend);
    return res.send({ elasticsearch: result.healthy ? 'healthy' : 'unhealthy' });
  });
}

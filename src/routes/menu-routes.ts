import { FastifyInstance } from 'fastify';
import { Catalog } from '../catalog/catalog';
import { childLogger } from '../observability/logger';

/**
 * Register menu browsing endpoints.
 */
export function registerMenuRoutes(app: FastifyInstance, catalog: Catalog): void {
  // GET /menu — full catalog
  app.get('/menu', async (req, reply) => {
    childLogger(req.id, { tool: 'getFullMenu' }).info('Menu requested');
    return reply.send(catalog.getAll());
  });

  // GET /menu/:category — one category, 404 if unknown
  app.get<{ Params: { category: string } }>('/menu/:category', async (req, reply) => {
    const { category } = req.params;
    childLogger(req.id, { tool: 'getMenuCategory' }).info({ category }, 'Menu category requested');
    const found = catalog.findCategory(category);
    return reply.send({ category: found.name, items: found.items });
  });
}

/**
 * CRUD Routes
 *
 * POST /, GET /, GET /:id, PUT /:id, DELETE /:id for one collection.
 */

import { Router } from 'express';
import type { Router as RouterType } from 'express';
import type { CollectionRepository } from '@cityscope/store';
import { crudHandlers } from '../handlers/crud-handlers.js';
import type { CrudHandlers } from '../handlers/crud-handlers.js';
import type { BodySchemas } from '../middleware/validation.js';

/**
 * Mount CRUD routes on `router`. Call after any fixed sub-paths so they are
 * not captured by `/:id`.
 */
export function mountCrudRoutes(router: RouterType, handlers: CrudHandlers): RouterType {
    router.post('/', handlers.create);
    router.get('/:id', handlers.get);
    router.put('/:id', handlers.update);
    router.delete('/:id', handlers.remove);

    return router;
}

export function crudRouter(repository: CollectionRepository, schemas: BodySchemas): RouterType {
    const handlers = crudHandlers(repository, schemas);
    const router = Router();

    router.get('/', handlers.list);
    return mountCrudRoutes(router, handlers);
}

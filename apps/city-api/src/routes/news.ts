/**
 * News Routes
 *
 * GET /api/news/search - Aggregated provider feed
 * plus CRUD for stored news
 */

import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { newsSearchHandler } from '../handlers/news-handler.js';
import { NEWS_BODY } from '../middleware/validation.js';
import type { Services } from '../services.js';
import { crudRouter } from './crud.js';

export function newsRouter(services: Services): RouterType {
    const router = Router();

    router.get('/search', newsSearchHandler(services.news));
    router.use(crudRouter(services.repositories.news, NEWS_BODY));

    return router;
}

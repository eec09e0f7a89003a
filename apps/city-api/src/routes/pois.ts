/**
 * POI Routes
 *
 * GET /api/pois/nearby plus CRUD.
 */

import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { COLLECTIONS } from '@cityscope/types';
import { nearbyHandler } from '../handlers/nearby-handler.js';
import { POI_BODY } from '../middleware/validation.js';
import type { Services } from '../services.js';
import { crudRouter } from './crud.js';

export function poisRouter(services: Services): RouterType {
    const router = Router();

    router.get('/nearby', nearbyHandler(services.proximity, COLLECTIONS.pois));
    router.use(crudRouter(services.repositories.pois, POI_BODY));

    return router;
}

/**
 * Post Routes
 *
 * GET /api/posts/nearby      - Posts around a coordinate
 * GET /api/posts/ai-search   - Natural-language search
 * GET /api/posts             - Listing by category and time window
 * plus CRUD on /api/posts/:id; a body's institutionId must name an
 * existing institution
 */

import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { COLLECTIONS, InvalidReferenceError } from '@cityscope/types';
import type { DocumentData } from '@cityscope/types';
import { nearbyHandler } from '../handlers/nearby-handler.js';
import { aiSearchHandler } from '../handlers/ai-search-handler.js';
import { postListHandler } from '../handlers/post-list-handler.js';
import { crudHandlers } from '../handlers/crud-handlers.js';
import { POST_BODY } from '../middleware/validation.js';
import type { Services } from '../services.js';
import { mountCrudRoutes } from './crud.js';

export function postsRouter(services: Services, now?: () => Date): RouterType {
    const router = Router();

    router.get('/nearby', nearbyHandler(services.proximity, COLLECTIONS.posts));
    router.get('/ai-search', aiSearchHandler(services.postSearch));
    router.get('/', postListHandler(services.repositories.posts, now));

    const { institutions } = services.repositories;
    const checkInstitution = async (data: DocumentData): Promise<void> => {
        const institutionId = data.institutionId;
        if (typeof institutionId === 'string' && !(await institutions.exists(institutionId))) {
            throw new InvalidReferenceError('Institution not found');
        }
    };

    return mountCrudRoutes(router, crudHandlers(services.repositories.posts, POST_BODY, {
        checkBody: checkInstitution,
    }));
}

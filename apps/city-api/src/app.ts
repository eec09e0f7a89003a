/**
 * Express application
 *
 * Built from a Services container so tests can run it against a memory
 * store and fake providers.
 */

import express from 'express';
import type { Express } from 'express';
import { loggingMiddleware } from './middleware/logging.js';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/errors.js';
import { INSTITUTION_BODY, USER_BODY } from './middleware/validation.js';
import { crudRouter } from './routes/crud.js';
import { poisRouter } from './routes/pois.js';
import { postsRouter } from './routes/posts.js';
import { newsRouter } from './routes/news.js';
import type { Services } from './services.js';

export interface AppOptions {
    /** Clock for time-window listings */
    now?: () => Date;
}

export function createApp(services: Services, options: AppOptions = {}): Express {
    const app: Express = express();

    // Middleware
    app.use(express.json({ limit: '1mb' }));
    app.use(loggingMiddleware);

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            store: services.store.name,
            newsProviders: services.providers.all()
                .filter(provider => provider.isConfigured())
                .map(provider => provider.name),
        });
    });

    app.get('/health/providers', asyncHandler(async (_req, res) => {
        res.json(await services.providers.healthCheck());
    }));

    // Routes
    app.use('/api/users', crudRouter(services.repositories.users, USER_BODY));
    app.use('/api/pois', poisRouter(services));
    app.use('/api/institutions', crudRouter(services.repositories.institutions, INSTITUTION_BODY));
    app.use('/api/posts', postsRouter(services, options.now));
    app.use('/api/news', newsRouter(services));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

/**
 * CRUD Handlers
 *
 * One handler set per collection repository. Bodies go through the
 * collection's create or update schema before reaching the store.
 */

import type { RequestHandler } from 'express';
import type { DocumentData } from '@cityscope/types';
import type { CollectionRepository } from '@cityscope/store';
import { asyncHandler } from '../middleware/errors.js';
import { parseBody } from '../middleware/validation.js';
import type { BodySchemas } from '../middleware/validation.js';
import { toDocumentJson } from './serialize.js';

export interface CrudHandlers {
    create: RequestHandler;
    list: RequestHandler;
    get: RequestHandler;
    update: RequestHandler;
    remove: RequestHandler;
}

export interface CrudOptions {
    /** Runs on every parsed create and update body before it is written */
    checkBody?: (data: DocumentData) => Promise<void>;
}

export function crudHandlers(
    repository: CollectionRepository,
    schemas: BodySchemas,
    options: CrudOptions = {}
): CrudHandlers {
    const tag = `[${repository.collection}]`;
    const checkBody = options.checkBody ?? (async () => undefined);

    return {
        create: asyncHandler(async (req, res) => {
            const data = parseBody(schemas.create, req);
            await checkBody(data);
            const doc = await repository.create(data);
            console.log(`${tag} ✓ Created ${doc.id}`);
            res.status(201).json(toDocumentJson(doc));
        }),

        list: asyncHandler(async (_req, res) => {
            const docs = await repository.list();
            res.json(docs.map(toDocumentJson));
        }),

        get: asyncHandler(async (req, res) => {
            const doc = await repository.get(req.params.id);
            res.json(toDocumentJson(doc));
        }),

        update: asyncHandler(async (req, res) => {
            const data = parseBody(schemas.update, req);
            await checkBody(data);
            const doc = await repository.update(req.params.id, data);
            console.log(`${tag} ✓ Updated ${doc.id}`);
            res.json(toDocumentJson(doc));
        }),

        remove: asyncHandler(async (req, res) => {
            await repository.delete(req.params.id);
            console.log(`${tag} ✓ Deleted ${req.params.id}`);
            res.status(204).end();
        }),
    };
}

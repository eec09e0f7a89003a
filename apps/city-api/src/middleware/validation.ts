/**
 * Validation
 *
 * Zod schemas for query strings and request bodies. Parse failures throw
 * ZodError, which the error middleware turns into a 400 with details.
 */

import type { Request } from 'express';
import { z } from 'zod';
import type { DocumentData, DocumentValue } from '@cityscope/types';

// ============================================================================
// Shared pieces
// ============================================================================

const Latitude = z.coerce.number().min(-90).max(90);
const Longitude = z.coerce.number().min(-180).max(180);

const Tags = z.array(z.string().trim().min(1));

const MapLocationBody = z.object({
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
    label: z.string().optional(),
}).transform((location): DocumentData => definedFields(location));

// ============================================================================
// Query strings
// ============================================================================

export const NearbyQuerySchema = z.object({
    lat: Latitude,
    lng: Longitude,
    radius: z.coerce.number().positive().default(500),
    precision: z.coerce.number().int().min(5).max(9).default(7),
});

export const AiSearchQuerySchema = z.object({
    q: z.string().trim().min(1, 'Query text is required'),
    lat: Latitude.optional(),
    lng: Longitude.optional(),
    radius: z.coerce.number().positive().default(5000),
}).refine(query => (query.lat === undefined) === (query.lng === undefined), {
    message: 'lat and lng must be given together',
    path: ['lat'],
});

export const NewsSearchQuerySchema = z.object({
    q: z.string().default(''),
    page: z.coerce.number().int().min(1).default(1),
    pageSize: z.coerce.number().int().min(1).max(50).default(20),
    provider: z.string().trim().min(1).optional(),
});

export const PostListQuerySchema = z.object({
    category: z.string().trim().min(1).optional(),
    timeWindow: z.string().trim().min(1).optional(),
    limit: z.coerce.number().int().min(1).max(100).default(50),
    sort: z.enum(['newest', 'popular']).default('newest'),
});

// ============================================================================
// Bodies
// ============================================================================

const UserBody = z.object({
    fullName: z.string().trim().min(1),
    email: z.string().email(),
    role: z.string().default('user'),
    preferredCategories: Tags.default([]),
    language: z.string().default('en'),
    mapLocation: MapLocationBody.optional(),
    profileImageUrl: z.string().url().optional(),
    bio: z.string().optional(),
    followers: z.array(z.string()).default([]),
    following: z.array(z.string()).default([]),
});

const PoiBody = z.object({
    name: z.string().trim().min(1),
    description: z.string().optional(),
    type: z.string().trim().min(1),
    radiusM: z.number().int().positive(),
    tags: Tags.default([]),
    coverImageUrl: z.string().url().optional(),
    mapLocation: MapLocationBody,
});

const InstitutionBody = z.object({
    ownerId: z.string().min(1),
    name: z.string().trim().min(1),
    category: z.string().trim().min(1),
    region: z.string().trim().min(1),
    description: z.string().optional(),
    logoUrl: z.string().url().optional(),
    website: z.string().url().optional(),
    contactEmail: z.string().email().optional(),
    coverImageUrl: z.string().url().optional(),
    poiId: z.string().optional(),
    verified: z.boolean().default(false),
    mapLocation: MapLocationBody,
});

const SmartSuggestionsBody = z.object({
    suggestedTags: Tags.default([]),
    relatedPosts: z.array(z.string().min(1)).default([]),
});

const PostBody = z.object({
    institutionId: z.string().min(1),
    title: z.string().trim().min(1),
    content: z.string().trim().min(1),
    typeOfPost: z.string().trim().min(1),
    tags: Tags.default([]),
    categories: Tags.default([]),
    sentiment: z.string().optional(),
    poiId: z.string().optional(),
    imageUrl: z.string().url().optional(),
    visibility: z.string().default('public'),
    summary: z.string().optional(),
    smartSuggestions: SmartSuggestionsBody.default({}),
    mapLocation: MapLocationBody.optional(),
});

const NewsBody = z.object({
    headline: z.string().trim().min(1),
    summary: z.string().trim().min(1),
    source: z.string().trim().min(1),
    topic: z.string().trim().min(1),
    tags: Tags.default([]),
    showFullArticle: z.boolean().default(false),
    articleUrl: z.string().url().optional(),
    mapLocation: MapLocationBody.optional(),
});

// Updates take any subset of fields; `.partial()` also skips the defaults,
// so attributes absent from the body stay untouched. `mapLocation: null`
// clears the location.
const ClearableLocation = MapLocationBody.nullable().optional();

export interface BodySchemas {
    create: z.ZodType<DocumentData, z.ZodTypeDef, unknown>;
    update: z.ZodType<DocumentData, z.ZodTypeDef, unknown>;
}

export const USER_BODY: BodySchemas = {
    create: UserBody.transform(definedFields),
    update: UserBody.partial().extend({ mapLocation: ClearableLocation }).transform(definedFields),
};

export const POI_BODY: BodySchemas = {
    create: PoiBody.transform(definedFields),
    update: PoiBody.partial().extend({ mapLocation: ClearableLocation }).transform(definedFields),
};

export const INSTITUTION_BODY: BodySchemas = {
    create: InstitutionBody.transform(definedFields),
    update: InstitutionBody.partial().extend({ mapLocation: ClearableLocation }).transform(definedFields),
};

export const POST_BODY: BodySchemas = {
    create: PostBody.transform(definedFields),
    update: PostBody.partial().extend({ mapLocation: ClearableLocation }).transform(definedFields),
};

export const NEWS_BODY: BodySchemas = {
    create: NewsBody.transform(definedFields),
    update: NewsBody.partial().extend({ mapLocation: ClearableLocation }).transform(definedFields),
};

// ============================================================================
// Helpers
// ============================================================================

export function parseQuery<S extends z.ZodTypeAny>(schema: S, req: Request): z.output<S> {
    return schema.parse(req.query);
}

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request): T {
    return schema.parse(req.body);
}

/**
 * Drop attributes whose value is undefined; the store has no undefined.
 */
export function definedFields(data: { [key: string]: DocumentValue | undefined }): DocumentData {
    const result: DocumentData = {};
    for (const [key, value] of Object.entries(data)) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}

export function validationErrorBody(error: z.ZodError): { error: string; details: { path: string; message: string }[] } {
    return {
        error: 'Validation failed',
        details: error.errors.map(e => ({
            path: e.path.join('.'),
            message: e.message,
        })),
    };
}

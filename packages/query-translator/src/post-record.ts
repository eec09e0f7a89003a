import { z } from 'zod';
import type { InstitutionPost, StoredDocument } from '@cityscope/types';
import { readMapLocation } from '@cityscope/store';

const PostDocumentSchema = z.object({
    institutionId: z.string().default(''),
    title: z.string(),
    content: z.string().default(''),
    typeOfPost: z.string(),
    tags: z.array(z.string()).default([]),
    categories: z.array(z.string()).default([]),
    summary: z.string().nullish(),
    imageUrl: z.string().nullish(),
    visibility: z.string().default('public'),
    geohash: z.string().nullish(),
    createdAt: z.date().nullish(),
});

/**
 * Validate a stored post. Throws when required attributes are missing or
 * the map location is malformed.
 */
export function readInstitutionPost(doc: StoredDocument): InstitutionPost {
    const parsed = PostDocumentSchema.parse(doc.data);
    const mapLocation = readMapLocation(doc.data);

    return {
        id: doc.id,
        institutionId: parsed.institutionId,
        title: parsed.title,
        content: parsed.content,
        typeOfPost: parsed.typeOfPost,
        tags: parsed.tags,
        categories: parsed.categories,
        summary: parsed.summary ?? undefined,
        imageUrl: parsed.imageUrl ?? undefined,
        visibility: parsed.visibility,
        mapLocation: mapLocation ?? undefined,
        geohash: parsed.geohash ?? undefined,
        createdAt: parsed.createdAt ?? undefined,
    };
}

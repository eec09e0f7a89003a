/**
 * Post Types
 *
 * Institution-authored posts, the target of natural-language search.
 */

import type { MapLocation } from './geo.js';

export type PostType = 'job' | 'internship' | 'event' | 'news' | (string & {});

export interface InstitutionPost {
    id: string;
    institutionId: string;
    title: string;
    content: string;
    typeOfPost: PostType;
    tags: string[];
    categories: string[];
    summary?: string;
    imageUrl?: string;
    visibility: string;
    mapLocation?: MapLocation;
    geohash?: string;
    createdAt?: Date;
}

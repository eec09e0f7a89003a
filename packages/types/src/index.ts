/**
 * CityScope Types - Shared TypeScript interfaces
 */

export * from './geo.js';
export * from './documents.js';
export * from './news.js';
export * from './posts.js';
export * from './query.js';
export * from './errors.js';

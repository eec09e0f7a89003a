/**
 * CityScope Proximity Package
 *
 * Geohash range scan plus exact-distance ranking.
 */

export {
    ProximitySearch,
    MAX_PROXIMITY_RESULTS,
    DEFAULT_QUERY_PRECISION,
    MIN_QUERY_PRECISION,
    MAX_QUERY_PRECISION,
    type ProximitySearchOptions,
    type ProximitySearchStats,
} from './proximity-search.js';
export { rankByDistance } from './rank.js';

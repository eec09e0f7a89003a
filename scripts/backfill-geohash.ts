/**
 * Geohash Backfill
 *
 * Writes the geohash attribute on every geo-tagged document that lacks a
 * current one.
 *
 * Usage:
 *   npx tsx scripts/backfill-geohash.ts                    # pois, institutions, posts
 *   npx tsx scripts/backfill-geohash.ts institution_posts  # one collection
 */

import 'dotenv/config';
import { COLLECTIONS } from '@cityscope/types';
import { backfillGeohashes, createDocumentStore } from '@cityscope/store';
import type { BackfillReport } from '@cityscope/store';
import { loadConfig } from '../apps/city-api/src/config.js';

const GEO_TAGGED = [COLLECTIONS.pois, COLLECTIONS.institutions, COLLECTIONS.posts];

async function main(): Promise<void> {
    const config = loadConfig();
    const store = createDocumentStore(config.store);
    const collections = process.argv.length > 2 ? process.argv.slice(2) : GEO_TAGGED;

    const reports: BackfillReport[] = [];
    for (const collection of collections) {
        reports.push(await backfillGeohashes(store, collection));
    }

    console.log('\n' + '═'.repeat(60));
    console.log('BACKFILL SUMMARY');
    console.log('═'.repeat(60));
    for (const report of reports) {
        console.log(`  ${report.collection.padEnd(20)} updated ${report.updated}, skipped ${report.skipped}, errors ${report.errors}`);
    }

    if (reports.some(report => report.errors > 0)) {
        process.exitCode = 1;
    }
}

main().catch(error => {
    console.error('✗ Backfill failed:', error);
    process.exit(1);
});

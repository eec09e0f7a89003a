/**
 * CityScope API
 *
 * REST API server for proximity search, news aggregation and
 * natural-language post search.
 */

import 'dotenv/config';
import { loadConfig, ConfigError } from './config.js';
import type { AppConfig } from './config.js';
import { createServices } from './services.js';
import { createApp } from './app.js';

function start(): void {
    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`✗ ${error.message}`);
            process.exit(1);
        }
        throw error;
    }

    const app = createApp(createServices(config));
    const PORT = config.port;

    app.listen(PORT, () => {
        console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║                     🏙️  CITYSCOPE                         ║
║        Proximity, News and Natural-Language Search        ║
║                                                           ║
║   Server running at http://localhost:${PORT}               ║
║   Endpoints: /api/{users,pois,institutions,posts,news}    ║
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
  `);
    });
}

start();

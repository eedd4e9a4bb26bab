#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config/index.js';
import { LogWatcher } from './watcher/index.js';
import { logger, setLogLevel } from './utils/logger.js';

/**
 * Application Entry Point
 */
async function main() {
    const config = loadConfig();
    if (config.debug) {
        setLogLevel('debug');
    }

    const watcher = new LogWatcher(config);

    process.on('SIGINT', () => {
        logger.info('Received SIGINT, exiting');
        watcher.stop();
        process.exit(0);
    });

    process.on('SIGTERM', () => {
        logger.info('Received SIGTERM, exiting');
        watcher.stop();
        process.exit(0);
    });

    process.on('uncaughtException', (error) => {
        logger.error('Uncaught Exception:', error);
        process.exit(1);
    });

    await watcher.start();
}

main().catch((error) => {
    logger.error('Fatal error:', error);
    process.exit(1);
});

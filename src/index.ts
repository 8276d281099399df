import 'dotenv/config';

import logger from './util/logger';
import { loadConfig } from './util/config';
import { OverlapBot } from './discord/client';

export async function main(): Promise<OverlapBot> {
    const config = loadConfig();
    const bot = new OverlapBot(config);

    let stopping = false;
    const shutdown = (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;
        logger.info(`Received ${signal}, shutting down...`);
        bot.stop()
            .then(() => process.exit(0))
            .catch((e) => {
                logger.error({ err: e }, 'Error during shutdown');
                process.exit(1);
            });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    process.on('unhandledRejection', (reason) => {
        logger.error({ err: reason }, 'Unhandled promise rejection');
    });
    process.on('uncaughtException', (err) => {
        logger.fatal({ err }, 'Uncaught exception');
        process.exit(1);
    });

    await bot.start();
    logger.info(`Application started. Letterboxd request delay: ${config.letterboxd.requestDelayMs / 1000}s`);
    return bot;
}

if (require.main === module) {
    main().catch((e) => {
        logger.fatal({ err: e }, 'Failed to start');
        process.exit(1);
    });
}

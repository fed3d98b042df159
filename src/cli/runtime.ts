import { logger, errorMeta } from '../logger.js';

/**
 * Global handlers so a stray rejection is logged instead of dumping a raw stack
 */
export function installProcessHandlers(): void {
    process.on('unhandledRejection', (reason: unknown) => {
        logger.error('Unhandled Promise Rejection', errorMeta(reason));
    });

    process.on('uncaughtException', (error: Error) => {
        logger.error('Uncaught Exception', errorMeta(error));
        process.exit(1);
    });
}

/**
 * Run an entry point, logging banner lines and any error that escapes it
 */
export function runMain(title: string, main: () => Promise<number | void>): void {
    installProcessHandlers();
    logger.info('='.repeat(50));
    logger.info(`Starting ${title}`);

    main()
        .then(code => {
            logger.info(`${title} finished.`);
            logger.info('='.repeat(50));
            if (typeof code === 'number') process.exitCode = code;
        })
        .catch((error: unknown) => {
            logger.error('An unhandled exception occurred in main execution', errorMeta(error));
            process.exitCode = 1;
        });
}

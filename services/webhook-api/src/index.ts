import { logger } from '../../../libs/logging/logger.js';
import { bootstrap } from '../../../libs/bootstrap/startup.js';
import { loadSettings } from '../../../libs/bootstrap/settings.js';
import { describeError } from '../../../libs/errors/sanitizer.js';
import { createApp } from './app.js';

const CACHE_PRUNE_INTERVAL_MS = 60 * 60 * 1000;

async function main(): Promise<void> {
    const settings = loadSettings();
    const components = await bootstrap(settings);

    const app = createApp({ ...components, bodyLimit: settings.server.bodyLimit });
    const server = app.listen(settings.server.port, settings.server.host, () => {
        logger.info({ host: settings.server.host, port: settings.server.port }, 'Webhook API listening');
    });

    const pruneTimer = setInterval(() => components.dedupIndex.prune(), CACHE_PRUNE_INTERVAL_MS);
    pruneTimer.unref();

    const stop = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, 'Shutting down');
        clearInterval(pruneTimer);
        server.close(() => {
            components.shutdown()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error({ error: describeError(error) }, 'Shutdown failed');
                    process.exit(1);
                });
        });
    };

    process.once('SIGTERM', stop);
    process.once('SIGINT', stop);
}

main().catch((err: unknown) => {
    logger.fatal({ error: describeError(err) }, 'Webhook API failed to start');
    process.exit(1);
});

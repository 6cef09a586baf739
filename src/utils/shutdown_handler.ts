import { Logger } from './logger';

/**
 * 🛑 GRACEFUL SHUTDOWN HANDLER
 * First signal: stop handing out work and let in-flight rows land.
 * Second signal: exit immediately.
 */
export class ShutdownHandler {
    private static signals = 0;

    static init(onStop: () => void) {
        const handle = (signal: NodeJS.Signals) => {
            this.signals++;
            if (this.signals > 1) {
                Logger.warn(`[Shutdown] Second ${signal}, exiting now`);
                process.exit(130);
            }
            Logger.info(`[Shutdown] Received ${signal}. Finishing in-flight candidates...`);
            onStop();
        };
        process.on('SIGINT', handle);
        process.on('SIGTERM', handle);

        process.on('unhandledRejection', (reason) => {
            Logger.logError('[Fatal] Unhandled Rejection', reason);
        });
    }
}

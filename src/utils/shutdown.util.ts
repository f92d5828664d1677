import { toErrorMessage, type ILogger } from '../config/logger';

export interface ShutdownStep {
    name: string;
    close(): Promise<void>;
}

/**
 * Build a signal handler that closes resources in order, then exits.
 * A step that fails to close is logged and the exit code becomes 1;
 * the remaining steps still run. Repeated signals are ignored.
 */
export function createShutdownHandler(
    steps: ShutdownStep[],
    logger: ILogger,
    exit: (code: number) => void
): (signal: string) => Promise<void> {
    let shuttingDown = false;

    return async (signal: string) => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;

        logger.info({ signal }, 'Shutting down');

        let exitCode = 0;
        for (const step of steps) {
            try {
                await step.close();
                logger.info({ resource: step.name }, 'Resource closed');
            } catch (error: unknown) {
                exitCode = 1;
                logger.error({
                    resource: step.name,
                    error: toErrorMessage(error)
                }, 'Failed to close resource');
            }
        }

        exit(exitCode);
    };
}

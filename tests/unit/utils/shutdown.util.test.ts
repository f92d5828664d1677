import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createShutdownHandler } from '../../../src/utils/shutdown.util';
import { createMockLogger } from '../../helpers/fixtures';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    },
    toErrorMessage: (error: unknown) => error instanceof Error ? error.message : 'Unknown error'
}));

describe('createShutdownHandler', () => {
    let mockLogger: ReturnType<typeof createMockLogger>;
    let exit: ReturnType<typeof vi.fn>;

    beforeEach(() => {
        vi.clearAllMocks();
        mockLogger = createMockLogger();
        exit = vi.fn();
    });

    it('should close every resource in order and exit cleanly', async () => {
        const closed: string[] = [];
        const step = (name: string) => ({
            name,
            close: vi.fn(async () => {
                closed.push(name);
            })
        });

        const shutdown = createShutdownHandler([step('http server'), step('queue'), step('database')], mockLogger, exit);
        await shutdown('SIGTERM');

        expect(closed).toEqual(['http server', 'queue', 'database']);
        expect(exit).toHaveBeenCalledWith(0);
        expect(mockLogger.info).toHaveBeenCalledWith({ signal: 'SIGTERM' }, 'Shutting down');
        expect(mockLogger.info).toHaveBeenCalledWith({ resource: 'queue' }, 'Resource closed');
    });

    it('should keep closing after a failure and exit with 1', async () => {
        const database = { name: 'database', close: vi.fn().mockResolvedValue(undefined) };
        const shutdown = createShutdownHandler([
            { name: 'queue', close: vi.fn().mockRejectedValue(new Error('Connection is closed')) },
            database
        ], mockLogger, exit);

        await shutdown('SIGINT');

        expect(database.close).toHaveBeenCalledTimes(1);
        expect(mockLogger.error).toHaveBeenCalledWith(
            { resource: 'queue', error: 'Connection is closed' },
            'Failed to close resource'
        );
        expect(exit).toHaveBeenCalledWith(1);
    });

    it('should ignore a second signal', async () => {
        const queue = { name: 'queue', close: vi.fn().mockResolvedValue(undefined) };
        const shutdown = createShutdownHandler([queue], mockLogger, exit);

        await shutdown('SIGTERM');
        await shutdown('SIGINT');

        expect(queue.close).toHaveBeenCalledTimes(1);
        expect(exit).toHaveBeenCalledTimes(1);
    });
});

/**
 * Shutdown Coordinator
 *
 * Runs registered shutdown handlers in parallel, each bounded by its own
 * timeout, so the process can exit once the worker has drained its poll
 * and the database pool is closed.
 */

import logger from './logger.js';

const log = logger.child({ module: 'shutdown' });

// ============================================
// TYPE DEFINITIONS
// ============================================

export type ShutdownHandlerFn = () => Promise<void> | void;

interface ShutdownHandler {
    name: string;
    handler: ShutdownHandlerFn;
    timeout: number;
}

export interface ShutdownOutcome {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private readonly handlers = new Map<string, ShutdownHandler>();
    private isShuttingDown = false;

    /**
     * @param timeout - max wait for the handler in ms
     */
    register(name: string, handler: ShutdownHandlerFn, timeout = 10_000): void {
        if (this.handlers.has(name)) {
            log.warn({ name }, 'Shutdown handler already registered, replacing');
        }
        this.handlers.set(name, { name, handler, timeout });
        log.debug({ name, timeout }, 'Shutdown handler registered');
    }

    unregister(name: string): void {
        if (this.handlers.delete(name)) {
            log.debug({ name }, 'Shutdown handler unregistered');
        }
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    registeredNames(): string[] {
        return [...this.handlers.keys()];
    }

    async shutdown(): Promise<ShutdownOutcome[]> {
        if (this.isShuttingDown) {
            log.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        log.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results = await Promise.all([...this.handlers.values()].map((entry) => this.runHandler(entry)));

        const successful = results.filter((r) => r.success).length;
        log.info({ successful, failed: results.length - successful, total: results.length }, 'Shutdown complete');
        return results;
    }

    private async runHandler({ name, handler, timeout }: ShutdownHandler): Promise<ShutdownOutcome> {
        const start = Date.now();
        let timer: ReturnType<typeof setTimeout> | undefined;

        try {
            const timedOut = await Promise.race([
                Promise.resolve(handler()).then(() => false),
                new Promise<boolean>((resolve) => {
                    timer = setTimeout(() => resolve(true), timeout);
                }),
            ]);
            const duration = Date.now() - start;

            if (timedOut) {
                log.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                return { name, success: false, error: 'Timeout', duration };
            }
            log.debug({ name, duration }, 'Shutdown handler completed');
            return { name, success: true, duration };
        } catch (error: unknown) {
            const duration = Date.now() - start;
            const message = error instanceof Error ? error.message : 'Unknown error';
            log.error({ name, error: message, duration }, 'Shutdown handler failed');
            return { name, success: false, error: message, duration };
        } finally {
            clearTimeout(timer);
        }
    }
}

// ============================================
// EXPORTS
// ============================================

export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;

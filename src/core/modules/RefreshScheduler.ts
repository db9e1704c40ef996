import { Logger, LogSink } from '../logging/Logger';
import { RefreshSummary } from './types';

export interface Refreshable {
    refresh(): Promise<RefreshSummary>;
}

/**
 * RefreshScheduler
 *
 * Runs a registry refresh cycle on a fixed interval. Lives outside the
 * registry: the registry itself only refreshes when asked.
 */
export class RefreshScheduler {
    private interval: NodeJS.Timeout | null = null;
    private isRunning: boolean = false;

    constructor(
        private readonly registry: Refreshable,
        private readonly logger: LogSink = Logger
    ) { }

    /**
     * Start the refresh loop. Runs one cycle immediately.
     */
    public start(intervalMs: number): void {
        if (this.interval) return;
        if (intervalMs <= 0) {
            throw new RangeError(`Refresh interval must be positive, got ${intervalMs}`);
        }

        this.logger.info('RefreshScheduler', `Refreshing modules every ${intervalMs}ms`);
        this.interval = setInterval(() => void this.runCycle(), intervalMs);

        void this.runCycle();
    }

    public stop(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
        }
    }

    public isStarted(): boolean {
        return this.interval !== null;
    }

    /**
     * One refresh cycle, or null when the previous one is still in flight.
     */
    public async runCycle(): Promise<RefreshSummary | null> {
        if (this.isRunning) {
            this.logger.debug('RefreshScheduler', 'Previous refresh still running; skipping tick');
            return null;
        }
        this.isRunning = true;

        try {
            const summary = await this.registry.refresh();
            this.logger.info('RefreshScheduler', 'Refresh cycle finished', {
                updated: summary.updated.length,
                unchanged: summary.unchanged.length,
                failed: summary.failed.length
            });
            return summary;
        } catch (error) {
            this.logger.error('RefreshScheduler', 'Refresh cycle failed', error);
            return null;
        } finally {
            this.isRunning = false;
        }
    }
}

import { LogHandler } from './log-handler';

/**
 * Throttled logger for messages raised on every frame or every click.
 *
 * Emits at most one entry per `throttleMs` for each key and reports how many
 * messages with that key were suppressed in between.
 *
 * Usage:
 *   const tl = new ThrottledLogger(log, 1000);
 *   tl.warn('rate:click', 'click is rate limited');
 */
export class ThrottledLogger {
    private state = new Map<string, { lastTime: number; suppressed: number }>();

    constructor(
        private readonly log: LogHandler,
        private readonly throttleMs: number,
        private readonly now: () => number = () => performance.now()
    ) {}

    /** Returns null if suppressed, otherwise the message (with suppression count if any). */
    private shouldLog(key: string, message: string): string | null {
        const now = this.now();
        const entry = this.state.get(key);
        if (entry && now - entry.lastTime < this.throttleMs) {
            entry.suppressed++;
            return null;
        }

        const suppressed = entry?.suppressed ?? 0;
        this.state.set(key, { lastTime: now, suppressed: 0 });
        return suppressed > 0 ? `${message} (${suppressed} similar suppressed)` : message;
    }

    /**
     * Log a warning if enough time has passed since the last one with this key.
     * Returns `true` when the message was actually logged.
     */
    warn(key: string, message: string): boolean {
        const finalMessage = this.shouldLog(key, message);
        if (finalMessage === null) return false;
        this.log.warn(finalMessage);
        return true;
    }

    /** Same throttling as warn() at debug level. */
    debug(key: string, message: string): boolean {
        const finalMessage = this.shouldLog(key, message);
        if (finalMessage === null) return false;
        this.log.debug(finalMessage);
        return true;
    }

    reset(): void {
        this.state.clear();
    }
}

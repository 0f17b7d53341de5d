export enum LogType {
    Error,
    Warn,
    Info,
    Debug
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical console lines (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept in the in-memory history */
const LOG_HISTORY_SIZE = 100;

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;

    /** Messages with a type above this level are kept in history but not written to the console */
    private consoleLevel: LogType = LogType.Info;

    /** Throttle state: source+type+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // replay history
        for (const msg of this.log) {
            callback(msg);
        }
    }

    public setConsoleLevel(level: LogType): void {
        this.consoleLevel = level;
    }

    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;

        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }

        if (this.listener) {
            this.listener(msg);
        }

        if (msg.type > this.consoleLevel) {
            return;
        }

        const throttleKey = `${msg.source}:${msg.type}:${msg.msg}`;
        const now = performance.now();
        const state = this.throttleState.get(throttleKey);

        if (state && now - state.lastTime < LOG_THROTTLE_MS) {
            state.suppressedCount++;
            return;
        }

        const suppressedNote = state && state.suppressedCount > 0
            ? ` (${state.suppressedCount} similar suppressed)`
            : '';

        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });

        let formatted = msg.source + '\t' + msg.msg + suppressedNote;
        if (msg.exception) {
            formatted += '\n' + (msg.exception.stack ?? msg.exception.message);
        }

        switch (msg.type) {
        case LogType.Error:
            console.error(formatted);
            break;
        case LogType.Warn:
            console.warn(formatted);
            break;
        case LogType.Info:
            console.info(formatted);
            break;
        case LogType.Debug:
            console.log(formatted);
            break;
        }
    }
}

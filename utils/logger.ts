import { type ILogObj, Logger } from 'tslog';
import { browser } from 'wxt/browser';
import { type LogContext, type LogEntry, logsStorage } from '@/utils/logs-storage';
import { STORAGE_KEYS } from '@/utils/settings';
import { isRecord } from '@/utils/type-guards';

/**
 * Log levels supported by the extension
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const MIN_LEVEL_BY_NAME: Record<LogLevel, number> = {
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
};

const isLogLevel = (value: unknown): value is LogLevel =>
    value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

/**
 * Background runs without a window; both content scripts live in http(s) tabs.
 */
const getContext = (): LogContext => {
    if (typeof window === 'undefined' || typeof location === 'undefined') {
        return 'background';
    }
    if (location.protocol.startsWith('http')) {
        return 'content';
    }
    return 'background';
};

const resolveLevelName = (logObj: ILogObj): string => {
    // tslog level ids: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal
    const meta = logObj._meta;
    const levelId = isRecord(meta) && typeof meta.logLevelId === 'number' ? meta.logLevelId : 3;
    if (levelId >= 5) {
        return 'error';
    }
    if (levelId === 4) {
        return 'warn';
    }
    return levelId <= 2 ? 'debug' : 'info';
};

/**
 * Extension Logger
 *
 * Singleton that writes JSON logs through tslog and routes every entry to
 * persistent storage: directly from the background, by message elsewhere.
 */
class ExtensionLogger {
    private static instance: ExtensionLogger | undefined;
    private readonly logger: Logger<ILogObj>;
    private readonly context: LogContext;
    private storageListenerAttached = false;

    private constructor() {
        this.context = getContext();

        this.logger = new Logger({
            name: 'SmsCodeRelay',
            minLevel: MIN_LEVEL_BY_NAME.info,
            hideLogPositionForProduction: true,
            type: 'json',
        });

        this.logger.attachTransport((logObj) => {
            this.handleTransport(logObj);
        });

        void this.hydrateLogLevelFromStorage();
        this.attachStorageListener();
    }

    public static getInstance(): ExtensionLogger {
        if (!ExtensionLogger.instance) {
            ExtensionLogger.instance = new ExtensionLogger();
        }
        return ExtensionLogger.instance;
    }

    public debug(message: string, ...args: unknown[]) {
        this.logger.debug(message, ...args);
    }

    public info(message: string, ...args: unknown[]) {
        this.logger.info(message, ...args);
    }

    public warn(message: string, ...args: unknown[]) {
        this.logger.warn(message, ...args);
    }

    public error(message: string, ...args: unknown[]) {
        this.logger.error(message, ...args);
    }

    public setLevel(level: LogLevel) {
        this.logger.settings.minLevel = MIN_LEVEL_BY_NAME[level];
    }

    private handleTransport(logObj: ILogObj) {
        const first = logObj['0'];
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: resolveLevelName(logObj),
            message: typeof first === 'string' ? first : String(first ?? ''),
            data: Object.keys(logObj)
                .filter((key) => !Number.isNaN(Number(key)) && key !== '0')
                .map((key) => logObj[key]),
            context: this.context,
        };

        if (this.context === 'background') {
            logsStorage.saveLog(entry).catch((err) => console.error('Logger failed to save:', err));
            return;
        }

        // The background may be unreachable while the extension reloads.
        try {
            browser.runtime.sendMessage({ type: 'LOG_ENTRY', payload: entry }).catch(() => {});
        } catch {
            // Extension context invalidated.
        }
    }

    private async hydrateLogLevelFromStorage() {
        if (!browser?.storage?.local?.get) {
            return;
        }
        try {
            const result = await browser.storage.local.get(STORAGE_KEYS.LOG_LEVEL);
            const storedLevel = result[STORAGE_KEYS.LOG_LEVEL];
            if (isLogLevel(storedLevel)) {
                this.setLevel(storedLevel);
            }
        } catch {
            // Default level stays in effect.
        }
    }

    private attachStorageListener() {
        if (this.storageListenerAttached || !browser?.storage?.onChanged?.addListener) {
            return;
        }
        this.storageListenerAttached = true;

        browser.storage.onChanged.addListener((changes, areaName) => {
            if (areaName !== 'local') {
                return;
            }
            const changedLevel = changes[STORAGE_KEYS.LOG_LEVEL]?.newValue;
            if (isLogLevel(changedLevel)) {
                this.setLevel(changedLevel);
            }
        });
    }
}

export const logger = ExtensionLogger.getInstance();

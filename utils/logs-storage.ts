import { browser } from 'wxt/browser';
import { isRecord } from '@/utils/type-guards';

type StorageBackend = {
    get: (key: string) => Promise<Record<string, unknown>>;
    set: (value: Record<string, unknown>) => Promise<void>;
};

export type LogContext = 'background' | 'content' | 'unknown';

export type LogEntry = {
    timestamp: string;
    level: string;
    message: string;
    data?: unknown[];
    context: LogContext;
};

export const MAX_LOGS = 1000;
export const LOGS_STORAGE_KEY = 'diagnostics.logs';
export const FLUSH_INTERVAL_MS = 2000;
export const FLUSH_THRESHOLD = 25;

export const isLogContext = (value: unknown): value is LogContext =>
    value === 'background' || value === 'content' || value === 'unknown';

export const isLogEntry = (value: unknown): value is LogEntry => {
    if (!isRecord(value)) {
        return false;
    }
    if (typeof value.timestamp !== 'string' || typeof value.level !== 'string') {
        return false;
    }
    if (typeof value.message !== 'string' || !isLogContext(value.context)) {
        return false;
    }
    return value.data === undefined || Array.isArray(value.data);
};

const readStoredLogs = (result: Record<string, unknown>): LogEntry[] => {
    const stored = result[LOGS_STORAGE_KEY];
    return Array.isArray(stored) ? stored.filter(isLogEntry) : [];
};

const createInMemoryStorage = (): StorageBackend => {
    const store = new Map<string, unknown>();

    return {
        async get(key: string) {
            return { [key]: store.get(key) };
        },
        async set(value: Record<string, unknown>) {
            for (const [key, entry] of Object.entries(value)) {
                store.set(key, entry);
            }
        },
    };
};

/**
 * Batches log entries in memory and appends them to extension storage,
 * keeping only the newest {@link MAX_LOGS}.
 */
export class BufferedLogsStorage {
    private buffer: LogEntry[] = [];
    private flushTimer: ReturnType<typeof setTimeout> | null = null;
    private isFlushing = false;
    private readonly storage: StorageBackend;

    constructor(storageBackend?: StorageBackend) {
        this.storage = storageBackend ?? browser?.storage?.local ?? createInMemoryStorage();
    }

    async saveLog(entry: LogEntry) {
        this.buffer.push(entry);

        if (this.buffer.length >= FLUSH_THRESHOLD) {
            await this.flush();
        } else {
            this.scheduleFlush();
        }
    }

    private scheduleFlush() {
        if (this.flushTimer) {
            return;
        }
        this.flushTimer = setTimeout(() => {
            void this.flush();
        }, FLUSH_INTERVAL_MS);
    }

    private async flush() {
        if (this.isFlushing || this.buffer.length === 0) {
            return;
        }

        this.isFlushing = true;
        if (this.flushTimer) {
            clearTimeout(this.flushTimer);
            this.flushTimer = null;
        }

        const batch = this.buffer;
        this.buffer = [];
        try {
            const result = await this.storage.get(LOGS_STORAGE_KEY);
            const merged = readStoredLogs(result).concat(batch);
            if (merged.length > MAX_LOGS) {
                merged.splice(0, merged.length - MAX_LOGS);
            }
            await this.storage.set({ [LOGS_STORAGE_KEY]: merged });
        } catch (e) {
            console.error('Failed to flush logs to storage', e);
            // Failed batch goes back ahead of anything buffered meanwhile.
            this.buffer = [...batch, ...this.buffer].slice(-MAX_LOGS);
        } finally {
            this.isFlushing = false;
        }
    }
}

export const logsStorage = new BufferedLogsStorage();

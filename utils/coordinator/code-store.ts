import { browser } from 'wxt/browser';
import type { CodeRecord } from '@/utils/protocol/code-messages';
import { hasString, isDigitCode, isFiniteNumber, isRecord } from '@/utils/type-guards';

type StorageAreaLike = {
    get(key: string): Promise<Record<string, unknown>>;
    set(items: Record<string, unknown>): Promise<void>;
};

export interface CodeStore {
    load(): Promise<unknown>;
    save(records: CodeRecord[]): Promise<void>;
}

/**
 * Accepts persisted entries written before `isNew` existed, or with a missing
 * source, and rejects anything without a usable code and timestamp.
 */
export const toCodeRecord = (value: unknown): CodeRecord | null => {
    if (!isRecord(value) || !isDigitCode(value.code) || !isFiniteNumber(value.timestamp)) {
        return null;
    }
    return {
        code: value.code,
        source: hasString(value.source) ? value.source : null,
        timestamp: value.timestamp,
        isNew: typeof value.isNew === 'boolean' ? value.isNew : true,
    };
};

export const toCodeRecords = (value: unknown): CodeRecord[] => {
    if (!Array.isArray(value)) {
        return [];
    }
    const records: CodeRecord[] = [];
    for (const entry of value) {
        const record = toCodeRecord(entry);
        if (record) {
            records.push(record);
        }
    }
    return records;
};

export class LocalStorageCodeStore implements CodeStore {
    private readonly storage: StorageAreaLike;
    private readonly key: string;

    public constructor(storage: StorageAreaLike, key: string) {
        this.storage = storage;
        this.key = key;
    }

    public async load(): Promise<unknown> {
        const result = await this.storage.get(this.key);
        return result[this.key];
    }

    public async save(records: CodeRecord[]) {
        await this.storage.set({ [this.key]: records });
    }
}

export class InMemoryCodeStore implements CodeStore {
    private snapshot: CodeRecord[] | undefined;

    public async load(): Promise<unknown> {
        return this.snapshot?.map((record) => ({ ...record }));
    }

    public async save(records: CodeRecord[]) {
        this.snapshot = records.map((record) => ({ ...record }));
    }
}

export const createCodeStore = (key: string): CodeStore => {
    const localStorage = browser?.storage?.local;
    if (localStorage) {
        return new LocalStorageCodeStore(localStorage, key);
    }
    return new InMemoryCodeStore();
};

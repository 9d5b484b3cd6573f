import { pruneMapEntries, setBoundedMapValue } from '@/utils/bounded-collections';
import type { CodeRecord } from '@/utils/protocol/code-messages';

export interface CodeBufferOptions {
    maxEntries: number;
    ttlMs: number;
}

/**
 * Recency-ordered set of codes, unique by code value. Map insertion order is
 * oldest-first internally; every read hands out newest-first copies.
 */
export class CodeBuffer {
    private readonly records = new Map<string, CodeRecord>();
    private readonly maxEntries: number;
    private readonly ttlMs: number;

    public constructor(options: CodeBufferOptions) {
        this.maxEntries = Math.max(1, options.maxEntries);
        this.ttlMs = options.ttlMs;
    }

    public get size(): number {
        return this.records.size;
    }

    /** Inserts or refreshes a record as the most recent one. */
    public upsert(record: CodeRecord): void {
        setBoundedMapValue(this.records, record.code, { ...record }, this.maxEntries);
    }

    /** Drops records whose message time is at least one TTL old. */
    public purgeExpired(now: number): string[] {
        return pruneMapEntries(this.records, (record) => now - record.timestamp < this.ttlMs);
    }

    public latest(): CodeRecord | null {
        let newest: CodeRecord | null = null;
        for (const record of this.records.values()) {
            newest = record;
        }
        return newest ? { ...newest } : null;
    }

    public list(): CodeRecord[] {
        return [...this.records.values()].reverse().map((record) => ({ ...record }));
    }

    /** Replaces the contents with a newest-first snapshot. */
    public load(newestFirst: readonly CodeRecord[]): void {
        this.records.clear();
        for (const record of [...newestFirst].reverse()) {
            this.upsert(record);
        }
    }
}

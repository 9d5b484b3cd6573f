import { CodeBuffer } from '@/utils/coordinator/code-buffer';
import { type CodeStore, toCodeRecords } from '@/utils/coordinator/code-store';
import { inferSource } from '@/utils/inference/message-source';
import { logger } from '@/utils/logger';
import type {
    AckResponse,
    AllCodesResponse,
    CodeAvailableMessage,
    LatestCodeResponse,
    StatusResponse,
} from '@/utils/protocol/code-messages';
import { CODE_LIMITS } from '@/utils/settings';

type CoordinatorLogger = Pick<typeof logger, 'debug' | 'info' | 'warn'>;

export type CodeSubmission = {
    code: string;
    source?: string | null;
    timestamp?: number;
    messageText?: string | null;
};

export interface CodeCoordinatorOptions {
    store: CodeStore;
    notifyTab: (tabId: number, message: CodeAvailableMessage) => Promise<unknown>;
    now?: () => number;
    maxCodes?: number;
    ttlMs?: number;
    logger?: CoordinatorLogger;
}

/**
 * Owns the recent-code buffer and the set of tabs waiting for a code.
 * Every operation hydrates first and purges expired codes before it reads.
 */
export class CodeCoordinator {
    private readonly store: CodeStore;
    private readonly notifyTab: CodeCoordinatorOptions['notifyTab'];
    private readonly now: () => number;
    private readonly buffer: CodeBuffer;
    private readonly pendingTabs = new Set<number>();
    private readonly log: CoordinatorLogger;
    private hydrated = false;
    private hydrationPromise: Promise<void> | null = null;

    public constructor(options: CodeCoordinatorOptions) {
        this.store = options.store;
        this.notifyTab = options.notifyTab;
        this.now = options.now ?? (() => Date.now());
        this.log = options.logger ?? logger;
        this.buffer = new CodeBuffer({
            maxEntries: options.maxCodes ?? CODE_LIMITS.MAX_CODES,
            ttlMs: options.ttlMs ?? CODE_LIMITS.CODE_TTL_MS,
        });
    }

    public get pendingTabCount(): number {
        return this.pendingTabs.size;
    }

    public async submitCode(submission: CodeSubmission): Promise<AckResponse> {
        await this.ensureHydrated();
        const now = this.now();
        this.buffer.purgeExpired(now);

        const source = submission.source || inferSource(submission.messageText ?? '');
        this.buffer.upsert({
            code: submission.code,
            source: source ?? null,
            timestamp: submission.timestamp ?? now,
            isNew: true,
        });
        this.buffer.purgeExpired(now);
        this.log.info('Code received', { source: source ?? null });

        await this.persist();
        await this.notifyPendingTabs();
        return { success: true };
    }

    public async requestLatest(tabId?: number): Promise<LatestCodeResponse> {
        await this.ensureHydrated();
        this.buffer.purgeExpired(this.now());

        const latest = this.buffer.latest();
        if (latest) {
            return { code: latest.code, timestamp: latest.timestamp, source: latest.source };
        }
        if (tabId !== undefined) {
            this.pendingTabs.add(tabId);
            this.log.debug('Tab waiting for a code', { tabId });
        }
        return { code: null, waiting: true };
    }

    public async listAll(): Promise<AllCodesResponse> {
        await this.ensureHydrated();
        this.buffer.purgeExpired(this.now());
        return { codes: this.buffer.list() };
    }

    public reportFilled(code: string): AckResponse {
        this.log.debug('Code filled', { code });
        return { success: true };
    }

    public removeTab(tabId: number): void {
        this.pendingTabs.delete(tabId);
    }

    public async getStatus(): Promise<StatusResponse> {
        await this.ensureHydrated();
        this.buffer.purgeExpired(this.now());

        const latest = this.buffer.latest();
        if (!latest) {
            return { hasCode: false, pendingTabs: this.pendingTabs.size };
        }
        return {
            hasCode: true,
            code: latest.code,
            timestamp: latest.timestamp,
            source: latest.source,
            pendingTabs: this.pendingTabs.size,
        };
    }

    public async ensureHydrated(): Promise<void> {
        if (this.hydrated) {
            return;
        }
        if (!this.hydrationPromise) {
            this.hydrationPromise = this.hydrate();
        }
        await this.hydrationPromise;
    }

    private async hydrate(): Promise<void> {
        try {
            const records = toCodeRecords(await this.store.load());
            this.buffer.load(records);
            const expired = this.buffer.purgeExpired(this.now());
            this.log.debug('Recent codes restored', { restored: this.buffer.size, expired: expired.length });
        } catch (error) {
            this.log.warn('Failed to restore recent codes', error);
        } finally {
            this.hydrated = true;
            this.hydrationPromise = null;
        }
    }

    private async persist(): Promise<void> {
        try {
            await this.store.save(this.buffer.list());
        } catch (error) {
            this.log.warn('Failed to persist recent codes', error);
        }
    }

    private async notifyPendingTabs(): Promise<void> {
        const latest = this.buffer.latest();
        if (!latest || this.pendingTabs.size === 0) {
            return;
        }
        const tabIds = [...this.pendingTabs];
        this.pendingTabs.clear();

        const message: CodeAvailableMessage = {
            type: 'CODE_AVAILABLE',
            code: latest.code,
            timestamp: latest.timestamp,
            source: latest.source,
        };
        await Promise.all(
            tabIds.map(async (tabId) => {
                try {
                    await this.notifyTab(tabId, message);
                } catch (error) {
                    this.log.debug('Could not notify waiting tab', { tabId, error });
                }
            }),
        );
    }
}

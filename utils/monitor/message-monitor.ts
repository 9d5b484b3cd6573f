import { createDebouncedTask, type DebouncedTask } from '@/utils/debounced-task';
import { inferSource } from '@/utils/inference/message-source';
import { logger } from '@/utils/logger';
import { findLatestMessage } from '@/utils/monitor/message-scanner';
import { extractCode } from '@/utils/otp/code-extractor';
import type { NewCodeMessage } from '@/utils/protocol/code-messages';
import { MONITOR_TIMING } from '@/utils/settings';

type MonitorLogger = Pick<typeof logger, 'debug' | 'info' | 'error'>;

export type ScanOutcome = 'no-message' | 'no-code' | 'duplicate' | 'dispatched';

export interface MessageMonitorOptions {
    dispatch: (message: NewCodeMessage) => Promise<unknown>;
    root?: Document;
    now?: () => number;
    mutationDebounceMs?: number;
    initialScanDelayMs?: number;
    fallbackIntervalMs?: number;
    duplicateWindowMs?: number;
    logger?: MonitorLogger;
}

/**
 * Watches the inbox tab and forwards each newly seen code to the background
 * once. Mutations are debounced; a slow interval covers missed mutations.
 */
export class MessageMonitor {
    private readonly root: Document;
    private readonly dispatch: MessageMonitorOptions['dispatch'];
    private readonly now: () => number;
    private readonly initialScanDelayMs: number;
    private readonly fallbackIntervalMs: number;
    private readonly duplicateWindowMs: number;
    private readonly log: MonitorLogger;
    private readonly mutationScan: DebouncedTask;
    private observer: MutationObserver | null = null;
    private initialTimer: ReturnType<typeof setTimeout> | null = null;
    private fallbackTimer: ReturnType<typeof setInterval> | null = null;
    private lastSentCode: string | null = null;
    private lastSentAt = 0;

    public constructor(options: MessageMonitorOptions) {
        this.root = options.root ?? document;
        this.dispatch = options.dispatch;
        this.now = options.now ?? (() => Date.now());
        this.initialScanDelayMs = options.initialScanDelayMs ?? MONITOR_TIMING.INITIAL_SCAN_DELAY_MS;
        this.fallbackIntervalMs = options.fallbackIntervalMs ?? MONITOR_TIMING.FALLBACK_INTERVAL_MS;
        this.duplicateWindowMs = options.duplicateWindowMs ?? MONITOR_TIMING.DUPLICATE_WINDOW_MS;
        this.log = options.logger ?? logger;
        this.mutationScan = createDebouncedTask(
            () => this.scanNow(),
            options.mutationDebounceMs ?? MONITOR_TIMING.MUTATION_DEBOUNCE_MS,
        );
    }

    public start(): void {
        if (this.observer) {
            return;
        }
        this.observer = new MutationObserver(() => this.mutationScan.schedule());
        this.observer.observe(this.root.body, {
            childList: true,
            subtree: true,
            characterData: true,
        });
        this.initialTimer = setTimeout(() => {
            this.initialTimer = null;
            this.scanNow();
        }, this.initialScanDelayMs);
        this.fallbackTimer = setInterval(() => this.scanNow(), this.fallbackIntervalMs);
        this.log.info('Inbox monitor active');
    }

    public stop(): void {
        this.observer?.disconnect();
        this.observer = null;
        this.mutationScan.cancel();
        if (this.initialTimer !== null) {
            clearTimeout(this.initialTimer);
            this.initialTimer = null;
        }
        if (this.fallbackTimer !== null) {
            clearInterval(this.fallbackTimer);
            this.fallbackTimer = null;
        }
    }

    public scanNow(): ScanOutcome {
        const detectedAt = this.now();
        const message = findLatestMessage(this.root, detectedAt);
        if (!message) {
            return 'no-message';
        }
        const code = extractCode(message.text);
        if (!code) {
            return 'no-code';
        }
        if (code === this.lastSentCode && detectedAt - this.lastSentAt < this.duplicateWindowMs) {
            return 'duplicate';
        }

        const source = inferSource(message.text) ?? message.contact;
        this.lastSentCode = code;
        this.lastSentAt = detectedAt;
        this.log.info('Found code', {
            source,
            layer: message.layer,
            time: new Date(message.timestamp).toISOString(),
        });

        void this.dispatch({
            type: 'NEW_CODE',
            code,
            source,
            messageText: message.text,
            timestamp: message.timestamp,
        }).catch((error) => {
            this.log.error('Failed to send code to background', error);
        });
        return 'dispatched';
    }
}

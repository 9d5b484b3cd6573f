import { createDebouncedTask, type DebouncedTask } from '@/utils/debounced-task';
import { fillCode } from '@/utils/field-agent/code-filler';
import { findOtpFields, isOtpField } from '@/utils/field-agent/field-classifier';
import { SuggestionPanel } from '@/utils/field-agent/suggestion-panel';
import { logger } from '@/utils/logger';
import {
    type CodeRecord,
    type CodeRuntimeMessage,
    isAllCodesResponse,
    isCodeAvailableMessage,
    isCodeRecord,
    isLatestCodeResponse,
} from '@/utils/protocol/code-messages';
import { CODE_LIMITS, FIELD_AGENT_TIMING } from '@/utils/settings';

type AgentLogger = Pick<typeof logger, 'debug' | 'info' | 'warn'>;

type IncomingCode = Pick<CodeRecord, 'code' | 'timestamp' | 'source'>;

export interface FieldAgentOptions {
    sendMessage: (message: CodeRuntimeMessage) => Promise<unknown>;
    root?: Document;
    now?: () => number;
    maxCodes?: number;
    ttlMs?: number;
    mutationDebounceMs?: number;
    initialScanDelayMs?: number;
    pollIntervalMs?: number;
    logger?: AgentLogger;
}

/**
 * Runs in every page. Finds code fields, offers recent codes in a panel
 * anchored below the tracked field and fills the one the user picks.
 */
export class FieldAgent {
    private readonly root: Document;
    private readonly sendMessage: FieldAgentOptions['sendMessage'];
    private readonly now: () => number;
    private readonly maxCodes: number;
    private readonly ttlMs: number;
    private readonly initialScanDelayMs: number;
    private readonly pollIntervalMs: number;
    private readonly log: AgentLogger;
    private readonly panel: SuggestionPanel;
    private readonly mutationScan: DebouncedTask;
    private codes: CodeRecord[] = [];
    private currentField: HTMLInputElement | null = null;
    private dismissedField: HTMLInputElement | null = null;
    private observer: MutationObserver | null = null;
    private initialTimer: ReturnType<typeof setTimeout> | null = null;
    private pollTimer: ReturnType<typeof setInterval> | null = null;

    public constructor(options: FieldAgentOptions) {
        this.root = options.root ?? document;
        this.sendMessage = options.sendMessage;
        this.now = options.now ?? (() => Date.now());
        this.maxCodes = options.maxCodes ?? CODE_LIMITS.PANEL_MAX_CODES;
        this.ttlMs = options.ttlMs ?? CODE_LIMITS.CODE_TTL_MS;
        this.initialScanDelayMs = options.initialScanDelayMs ?? FIELD_AGENT_TIMING.INITIAL_SCAN_DELAY_MS;
        this.pollIntervalMs = options.pollIntervalMs ?? FIELD_AGENT_TIMING.POLL_INTERVAL_MS;
        this.log = options.logger ?? logger;
        this.panel = new SuggestionPanel({
            root: this.root,
            now: this.now,
            onPick: (code) => this.pick(code),
            onClose: () => this.dismiss(),
        });
        this.mutationScan = createDebouncedTask(
            () => {
                void this.scanForFields();
            },
            options.mutationDebounceMs ?? FIELD_AGENT_TIMING.MUTATION_DEBOUNCE_MS,
        );
    }

    public get trackedField(): HTMLInputElement | null {
        return this.currentField;
    }

    /** Local copy of the offered codes, newest first. */
    public getCodes(): CodeRecord[] {
        return this.codes.map((record) => ({ ...record }));
    }

    public start(): void {
        if (this.observer) {
            return;
        }
        this.observer = new MutationObserver(() => this.mutationScan.schedule());
        this.observer.observe(this.root.body, { childList: true, subtree: true });
        this.root.addEventListener('focusin', this.handleFocusIn);
        this.root.defaultView?.addEventListener('scroll', this.reposition, { passive: true });
        this.root.defaultView?.addEventListener('resize', this.reposition, { passive: true });
        this.initialTimer = setTimeout(() => {
            this.initialTimer = null;
            void this.scanForFields();
        }, this.initialScanDelayMs);
        this.pollTimer = setInterval(() => {
            if (this.currentField) {
                void this.refreshCodes();
            }
        }, this.pollIntervalMs);
    }

    public stop(): void {
        this.observer?.disconnect();
        this.observer = null;
        this.mutationScan.cancel();
        this.root.removeEventListener('focusin', this.handleFocusIn);
        this.root.defaultView?.removeEventListener('scroll', this.reposition);
        this.root.defaultView?.removeEventListener('resize', this.reposition);
        if (this.initialTimer !== null) {
            clearTimeout(this.initialTimer);
            this.initialTimer = null;
        }
        if (this.pollTimer !== null) {
            clearInterval(this.pollTimer);
            this.pollTimer = null;
        }
        this.panel.destroy();
        this.currentField = null;
    }

    /** Runtime listener for pushes from the background. */
    public handleRuntimeMessage(message: unknown): void {
        if (!isCodeAvailableMessage(message)) {
            return;
        }
        this.log.info('New code pushed', { source: message.source });
        this.addCode(message, true);
    }

    /**
     * Adds a code to the local list. Known codes move to the front only when
     * they arrive as new; the list keeps at most `maxCodes` entries.
     */
    public addCode(incoming: IncomingCode, isNew: boolean): void {
        const index = this.codes.findIndex((record) => record.code === incoming.code);
        if (index >= 0) {
            if (isNew) {
                const [existing] = this.codes.splice(index, 1);
                this.codes.unshift({
                    code: existing.code,
                    timestamp: incoming.timestamp,
                    source: incoming.source ?? existing.source,
                    isNew: true,
                });
            }
        } else {
            this.codes.unshift({ code: incoming.code, timestamp: incoming.timestamp, source: incoming.source, isNew });
            if (this.codes.length > this.maxCodes) {
                this.codes.length = this.maxCodes;
            }
        }
        this.panel.render(this.codes);
    }

    public async scanForFields(): Promise<void> {
        const [field] = findOtpFields(this.root);
        if (!field) {
            this.panel.hide();
            this.currentField = null;
            return;
        }
        if (field === this.currentField || field === this.dismissedField) {
            return;
        }
        this.log.debug('Code field found');
        await this.track(field);
    }

    public async track(field: HTMLInputElement): Promise<void> {
        this.currentField = field;
        this.dismissedField = null;
        this.panel.show(field, this.codes);
        await this.refreshCodes();
        await this.registerInterest();
    }

    public async refreshCodes(): Promise<void> {
        this.dropExpired();
        try {
            const response = await this.sendMessage({ type: 'GET_ALL_CODES' });
            if (!isAllCodesResponse(response)) {
                return;
            }
            // oldest first so the newest lands on top
            for (const record of [...response.codes].reverse()) {
                if (isCodeRecord(record)) {
                    this.addCode(record, false);
                }
            }
        } catch (error) {
            this.log.warn('Failed to fetch recent codes', error);
        }
    }

    private dropExpired(): void {
        const now = this.now();
        const fresh = this.codes.filter((record) => now - record.timestamp < this.ttlMs);
        if (fresh.length !== this.codes.length) {
            this.codes = fresh;
            this.panel.render(this.codes);
        }
    }

    private async registerInterest(): Promise<void> {
        try {
            const response = await this.sendMessage({ type: 'REQUEST_CODE' });
            if (isLatestCodeResponse(response) && response.code !== null) {
                this.addCode(response, false);
            }
        } catch (error) {
            this.log.warn('Failed to register for new codes', error);
        }
    }

    private pick(code: string): void {
        const field = this.currentField;
        if (!field) {
            return;
        }
        const filled = fillCode(field, code);
        this.panel.hide();
        this.currentField = null;
        if (!filled) {
            this.log.warn('Could not fill code into field');
            return;
        }
        for (const record of this.codes) {
            if (record.code === code) {
                record.isNew = false;
            }
        }
        this.panel.render(this.codes);
        void this.sendMessage({ type: 'CODE_FILLED', code }).catch((error: unknown) => {
            this.log.warn('Failed to report filled code', error);
        });
    }

    private dismiss(): void {
        this.dismissedField = this.currentField;
        this.currentField = null;
    }

    private readonly handleFocusIn = (event: Event): void => {
        const target = event.target;
        if (!isOtpField(target) || target === this.currentField) {
            return;
        }
        void this.track(target);
    };

    private readonly reposition = (): void => {
        if (this.currentField && this.panel.isVisible()) {
            this.panel.position(this.currentField);
        }
    };
}

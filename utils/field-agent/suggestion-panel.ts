/**
 * Suggestion Panel
 *
 * Floating list of recent codes anchored below a code field.
 */
import type { CodeRecord } from '@/utils/protocol/code-messages';

export const PANEL_ID = 'sms-code-relay-panel';
const STYLE_ID = 'sms-code-relay-panel-styles';

export type SuggestionPanelOptions = {
    onPick: (code: string) => void;
    onClose: () => void;
    root?: Document;
    now?: () => number;
};

/** Compact age label: `now` under ten seconds, then seconds, minutes, hours. */
export const formatAge = (timestamp: number, now: number): string => {
    const seconds = Math.max(0, Math.floor((now - timestamp) / 1000));
    if (seconds < 10) {
        return 'now';
    }
    if (seconds < 60) {
        return `${seconds}s`;
    }
    if (seconds < 3600) {
        return `${Math.floor(seconds / 60)}m`;
    }
    return `${Math.floor(seconds / 3600)}h`;
};

export class SuggestionPanel {
    private readonly root: Document;
    private readonly now: () => number;
    private readonly onPick: (code: string) => void;
    private readonly onClose: () => void;
    private container: HTMLElement | null = null;
    private list: HTMLElement | null = null;

    public constructor(options: SuggestionPanelOptions) {
        this.root = options.root ?? document;
        this.now = options.now ?? (() => Date.now());
        this.onPick = options.onPick;
        this.onClose = options.onClose;
    }

    public isVisible(): boolean {
        return !!this.container && this.container.style.display !== 'none';
    }

    public show(field: HTMLElement, codes: readonly CodeRecord[]): void {
        const container = this.ensureContainer();
        this.position(field);
        this.render(codes);
        container.style.display = 'block';
    }

    public hide(): void {
        if (this.container) {
            this.container.style.display = 'none';
        }
    }

    public destroy(): void {
        this.container?.remove();
        this.container = null;
        this.list = null;
    }

    public position(field: HTMLElement): void {
        if (!this.container) {
            return;
        }
        const rect = field.getBoundingClientRect();
        const view = this.root.defaultView;
        const scrollTop = view?.scrollY ?? 0;
        const scrollLeft = view?.scrollX ?? 0;
        this.container.style.top = `${rect.bottom + scrollTop + 4}px`;
        this.container.style.left = `${rect.left + scrollLeft}px`;
    }

    public render(codes: readonly CodeRecord[]): void {
        if (!this.list) {
            return;
        }
        if (codes.length === 0) {
            this.list.replaceChildren(this.createWaitingState());
            return;
        }
        this.list.replaceChildren(...codes.map((record, index) => this.createItem(record, index === 0)));
    }

    private ensureContainer(): HTMLElement {
        if (this.container && this.root.contains(this.container)) {
            return this.container;
        }
        this.injectStyles();

        const container = this.root.createElement('div');
        container.id = PANEL_ID;
        container.style.display = 'none';

        const header = this.root.createElement('div');
        header.className = 'header';
        const title = this.root.createElement('span');
        title.className = 'title';
        title.textContent = 'Recent codes';
        const closeButton = this.root.createElement('button');
        closeButton.type = 'button';
        closeButton.className = 'close-btn';
        closeButton.title = 'Close';
        closeButton.textContent = '×';
        closeButton.addEventListener('click', () => {
            this.hide();
            this.onClose();
        });
        header.append(title, closeButton);

        const list = this.root.createElement('div');
        list.className = 'codes-list';
        container.append(header, list);
        this.root.body.appendChild(container);

        this.container = container;
        this.list = list;
        return container;
    }

    private createWaitingState(): HTMLElement {
        const waiting = this.root.createElement('div');
        waiting.className = 'waiting';
        const spinner = this.root.createElement('span');
        spinner.className = 'spinner';
        waiting.append(spinner, 'Waiting for a code…');
        return waiting;
    }

    private createItem(record: CodeRecord, isLatest: boolean): HTMLElement {
        const item = this.root.createElement('div');
        item.className = 'code-item';
        item.classList.toggle('new-code', record.isNew);
        item.classList.toggle('latest', isLatest);
        item.dataset.code = record.code;

        const value = this.root.createElement('span');
        value.className = 'code-value';
        value.textContent = record.code;

        const meta = this.root.createElement('div');
        meta.className = 'code-meta';
        if (record.source) {
            const source = this.root.createElement('div');
            source.className = 'code-source';
            source.textContent = record.source;
            meta.appendChild(source);
        }
        const badge = this.root.createElement('span');
        badge.className = 'code-badge';
        badge.textContent = record.isNew ? 'NEW' : formatAge(record.timestamp, this.now());
        meta.appendChild(badge);

        item.append(value, meta);
        // mousedown keeps focus on the field while the pick is handled
        item.addEventListener('mousedown', (event) => event.preventDefault());
        item.addEventListener('click', () => this.onPick(record.code));
        return item;
    }

    private injectStyles(): void {
        if (this.root.getElementById(STYLE_ID)) {
            return;
        }
        const style = this.root.createElement('style');
        style.id = STYLE_ID;
        style.textContent = `
            #${PANEL_ID} {
                position: absolute;
                z-index: 2147483647;
                min-width: 200px;
                padding: 8px;
                background: #fff;
                border: 1px solid #ddd;
                border-radius: 8px;
                box-shadow: 0 4px 12px rgba(0, 0, 0, 0.15);
                font: 13px -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
            }
            #${PANEL_ID} .header {
                display: flex;
                justify-content: space-between;
                align-items: center;
                margin-bottom: 6px;
                padding-bottom: 6px;
                border-bottom: 1px solid #eee;
            }
            #${PANEL_ID} .title {
                font-size: 11px;
                font-weight: 600;
                text-transform: uppercase;
                color: #333;
            }
            #${PANEL_ID} .close-btn {
                background: none;
                border: none;
                cursor: pointer;
                color: #999;
                font-size: 16px;
            }
            #${PANEL_ID} .code-item {
                display: flex;
                align-items: center;
                margin: 4px 0;
                padding: 8px 10px;
                background: #f8f9fa;
                border-radius: 6px;
                cursor: pointer;
            }
            #${PANEL_ID} .code-item:hover {
                background: #e8f0fe;
            }
            #${PANEL_ID} .code-item.latest {
                border-left: 3px solid #1a73e8;
            }
            #${PANEL_ID} .code-item.new-code {
                background: #e8f5e9;
                border: 1px solid #4caf50;
            }
            #${PANEL_ID} .code-value {
                flex-grow: 1;
                font: bold 18px 'SF Mono', Monaco, monospace;
                letter-spacing: 2px;
                color: #1a73e8;
            }
            #${PANEL_ID} .code-item.new-code .code-value {
                color: #2e7d32;
            }
            #${PANEL_ID} .code-meta {
                margin-left: auto;
                text-align: right;
            }
            #${PANEL_ID} .code-source {
                max-width: 80px;
                overflow: hidden;
                text-overflow: ellipsis;
                white-space: nowrap;
                font-size: 10px;
                color: #666;
            }
            #${PANEL_ID} .code-badge {
                padding: 2px 6px;
                border-radius: 10px;
                font-size: 10px;
                color: #fff;
                background: #1a73e8;
            }
            #${PANEL_ID} .code-item.new-code .code-badge {
                background: #4caf50;
            }
            #${PANEL_ID} .waiting {
                padding: 8px;
                text-align: center;
                font-size: 12px;
                color: #666;
            }
            #${PANEL_ID} .spinner {
                display: inline-block;
                width: 12px;
                height: 12px;
                margin-right: 6px;
                vertical-align: middle;
                border: 2px solid #ddd;
                border-top-color: #1a73e8;
                border-radius: 50%;
                animation: sms-code-relay-spin 1s linear infinite;
            }
            @keyframes sms-code-relay-spin {
                to { transform: rotate(360deg); }
            }
        `;
        this.root.head.appendChild(style);
    }
}

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FieldAgent, type FieldAgentOptions } from '@/utils/field-agent/field-agent';
import { PANEL_ID } from '@/utils/field-agent/suggestion-panel';
import type { CodeRecord, CodeRuntimeMessage } from '@/utils/protocol/code-messages';
import { CODE_LIMITS } from '@/utils/settings';

const NOW = 1_800_000_000_000;

// happy-dom delivers observer records on its own timers, which fake timers leave alone.
const realSetTimeout = globalThis.setTimeout;
const waitForObserverDelivery = () =>
    new Promise<void>((resolve) => {
        realSetTimeout(() => resolve(), 20);
    });

const createLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn() });

const panelCodes = () =>
    Array.from(document.querySelectorAll<HTMLElement>(`#${PANEL_ID} .code-item`)).map((item) => item.dataset.code);

const panelVisible = () => document.getElementById(PANEL_ID)?.style.display === 'block';

const inputById = (id: string) => {
    const input = document.getElementById(id);
    if (!(input instanceof HTMLInputElement)) {
        throw new Error(`missing input #${id}`);
    }
    return input;
};

describe('FieldAgent', () => {
    let backgroundCodes: CodeRecord[];
    let sent: CodeRuntimeMessage[];
    let log: ReturnType<typeof createLogger>;
    let agent: FieldAgent | null;

    const sendMessage = async (message: CodeRuntimeMessage): Promise<unknown> => {
        sent.push(message);
        switch (message.type) {
            case 'GET_ALL_CODES':
                return { codes: backgroundCodes };
            case 'REQUEST_CODE': {
                const [latest] = backgroundCodes;
                return latest
                    ? { code: latest.code, timestamp: latest.timestamp, source: latest.source }
                    : { code: null, waiting: true };
            }
            default:
                return { success: true };
        }
    };

    const createAgent = (overrides: Partial<FieldAgentOptions> = {}) => {
        agent = new FieldAgent({ sendMessage, now: () => NOW, logger: log, ...overrides });
        return agent;
    };

    beforeEach(() => {
        backgroundCodes = [];
        sent = [];
        log = createLogger();
        agent = null;
        document.head.innerHTML = '';
        document.body.innerHTML = '';
    });

    afterEach(() => {
        agent?.stop();
        vi.useRealTimers();
    });

    it('tracks the first code field and lists the background codes newest-first', async () => {
        document.body.innerHTML = '<input name="email" type="email"><input name="otp" id="otp">';
        backgroundCodes = [
            { code: '222222', source: 'Bank', timestamp: NOW - 60_000, isNew: true },
            { code: '111111', source: null, timestamp: NOW - 120_000, isNew: true },
        ];
        const fieldAgent = createAgent();

        await fieldAgent.scanForFields();

        expect(fieldAgent.trackedField).toBe(inputById('otp'));
        expect(sent.map((message) => message.type)).toEqual(['GET_ALL_CODES', 'REQUEST_CODE']);
        expect(fieldAgent.getCodes()).toEqual([
            { code: '222222', source: 'Bank', timestamp: NOW - 60_000, isNew: false },
            { code: '111111', source: null, timestamp: NOW - 120_000, isNew: false },
        ]);
        expect(panelVisible()).toBe(true);
        expect(panelCodes()).toEqual(['222222', '111111']);
    });

    it('shows the waiting state when no code is known yet', async () => {
        document.body.innerHTML = '<input autocomplete="one-time-code" id="otp">';
        const fieldAgent = createAgent();

        await fieldAgent.scanForFields();

        expect(panelVisible()).toBe(true);
        expect(document.querySelector(`#${PANEL_ID} .waiting`)).not.toBeNull();
    });

    it('hides the panel once the page has no code field', async () => {
        document.body.innerHTML = '<input name="otp" id="otp">';
        const fieldAgent = createAgent();
        await fieldAgent.scanForFields();

        inputById('otp').remove();
        await fieldAgent.scanForFields();

        expect(fieldAgent.trackedField).toBeNull();
        expect(panelVisible()).toBe(false);
    });

    it('adds pushed codes as new and moves a re-pushed code to the front', () => {
        const fieldAgent = createAgent();
        fieldAgent.addCode({ code: '111111', source: null, timestamp: NOW - 5_000 }, false);
        fieldAgent.addCode({ code: '222222', source: null, timestamp: NOW - 4_000 }, false);

        fieldAgent.handleRuntimeMessage({ type: 'CODE_AVAILABLE', code: '111111', timestamp: NOW, source: 'Okta' });

        expect(fieldAgent.getCodes()).toEqual([
            { code: '111111', source: 'Okta', timestamp: NOW, isNew: true },
            { code: '222222', source: null, timestamp: NOW - 4_000, isNew: false },
        ]);
    });

    it('keeps the position of known codes seen again in a refresh', () => {
        const fieldAgent = createAgent();
        fieldAgent.addCode({ code: '111111', source: null, timestamp: NOW - 5_000 }, false);
        fieldAgent.addCode({ code: '222222', source: null, timestamp: NOW - 4_000 }, true);

        fieldAgent.addCode({ code: '111111', source: 'Late', timestamp: NOW }, false);

        expect(fieldAgent.getCodes().map((record) => record.code)).toEqual(['222222', '111111']);
        expect(fieldAgent.getCodes()[1].source).toBeNull();
    });

    it('ignores runtime messages that are not code pushes', () => {
        const fieldAgent = createAgent();

        fieldAgent.handleRuntimeMessage({ type: 'CODE_AVAILABLE', code: 'abc', timestamp: NOW, source: null });
        fieldAgent.handleRuntimeMessage({ type: 'OTHER' });

        expect(fieldAgent.getCodes()).toEqual([]);
    });

    it('logs pushed codes by source only', () => {
        const fieldAgent = createAgent();

        fieldAgent.handleRuntimeMessage({ type: 'CODE_AVAILABLE', code: '604218', timestamp: NOW, source: 'Okta' });

        expect(log.info).toHaveBeenCalledWith('New code pushed', { source: 'Okta' });
    });

    it('drops local codes older than the retention window on refresh', async () => {
        const fieldAgent = createAgent();
        fieldAgent.addCode({ code: '111111', source: null, timestamp: NOW - CODE_LIMITS.CODE_TTL_MS }, true);
        fieldAgent.addCode({ code: '222222', source: null, timestamp: NOW - 60_000 }, true);

        await fieldAgent.refreshCodes();

        expect(fieldAgent.getCodes()).toEqual([{ code: '222222', source: null, timestamp: NOW - 60_000, isNew: true }]);
    });

    it('uses a custom retention window', async () => {
        const fieldAgent = createAgent({ ttlMs: 30_000 });
        fieldAgent.addCode({ code: '111111', source: null, timestamp: NOW - 30_001 }, false);
        fieldAgent.addCode({ code: '222222', source: null, timestamp: NOW - 29_999 }, false);

        await fieldAgent.refreshCodes();

        expect(fieldAgent.getCodes().map((record) => record.code)).toEqual(['222222']);
    });

    it('keeps the five most recent codes', () => {
        const fieldAgent = createAgent();
        for (const code of ['1111', '2222', '3333', '4444', '5555', '6666']) {
            fieldAgent.addCode({ code, source: null, timestamp: NOW }, true);
        }

        expect(fieldAgent.getCodes().map((record) => record.code)).toEqual(['6666', '5555', '4444', '3333', '2222']);
    });

    it('fills the picked code, reports it and hides the panel', async () => {
        document.body.innerHTML = '<input name="otp" id="otp">';
        const fieldAgent = createAgent();
        await fieldAgent.scanForFields();
        fieldAgent.handleRuntimeMessage({ type: 'CODE_AVAILABLE', code: '482913', timestamp: NOW, source: null });

        document.querySelector<HTMLElement>(`#${PANEL_ID} .code-item`)?.click();

        expect(inputById('otp').value).toBe('482913');
        expect(panelVisible()).toBe(false);
        expect(fieldAgent.trackedField).toBeNull();
        expect(fieldAgent.getCodes()[0].isNew).toBe(false);
        expect(sent.at(-1)).toEqual({ type: 'CODE_FILLED', code: '482913' });
    });

    it('spreads a picked code over one-digit inputs', async () => {
        document.body.innerHTML = `<div>${[0, 1, 2, 3, 4, 5]
            .map((index) => `<input maxlength="1" autocomplete="one-time-code" id="d${index}">`)
            .join('')}</div>`;
        backgroundCodes = [{ code: '731904', source: null, timestamp: NOW, isNew: true }];
        const fieldAgent = createAgent();
        await fieldAgent.scanForFields();

        document.querySelector<HTMLElement>(`#${PANEL_ID} .code-item`)?.click();

        expect([0, 1, 2, 3, 4, 5].map((index) => inputById(`d${index}`).value).join('')).toBe('731904');
    });

    it('stays dismissed for the same field until it is focused again', async () => {
        document.body.innerHTML = '<input name="otp" id="otp">';
        const fieldAgent = createAgent();
        fieldAgent.start();
        await fieldAgent.scanForFields();

        document.querySelector<HTMLButtonElement>(`#${PANEL_ID} .close-btn`)?.click();
        await fieldAgent.scanForFields();

        expect(panelVisible()).toBe(false);
        expect(fieldAgent.trackedField).toBeNull();

        inputById('otp').dispatchEvent(new FocusEvent('focusin', { bubbles: true }));

        expect(panelVisible()).toBe(true);
        expect(fieldAgent.trackedField).toBe(inputById('otp'));
    });

    it('scans after the initial delay and polls while a field is tracked', async () => {
        vi.useFakeTimers();
        document.body.innerHTML = '<input name="otp" id="otp">';
        const fieldAgent = createAgent({ initialScanDelayMs: 1_000, pollIntervalMs: 2_000 });
        fieldAgent.start();

        await vi.advanceTimersByTimeAsync(999);
        expect(sent).toEqual([]);

        await vi.advanceTimersByTimeAsync(1);
        expect(fieldAgent.trackedField).toBe(inputById('otp'));
        expect(sent.map((message) => message.type)).toEqual(['GET_ALL_CODES', 'REQUEST_CODE']);

        await vi.advanceTimersByTimeAsync(2_000);
        expect(sent.map((message) => message.type)).toEqual(['GET_ALL_CODES', 'REQUEST_CODE', 'GET_ALL_CODES']);
    });

    it('does not poll without a tracked field', async () => {
        vi.useFakeTimers();
        const fieldAgent = createAgent({ initialScanDelayMs: 1_000, pollIntervalMs: 2_000 });
        fieldAgent.start();

        await vi.advanceTimersByTimeAsync(6_000);

        expect(sent).toEqual([]);
    });

    it('logs a failed refresh without throwing', async () => {
        document.body.innerHTML = '<input name="otp" id="otp">';
        const failure = new Error('Extension context invalidated');
        const fieldAgent = createAgent({
            sendMessage: async () => {
                throw failure;
            },
        });

        await fieldAgent.scanForFields();

        expect(log.warn).toHaveBeenCalledWith('Failed to fetch recent codes', failure);
        expect(log.warn).toHaveBeenCalledWith('Failed to register for new codes', failure);
    });

    it('runs one scan 500 ms after a code field is added', async () => {
        vi.useFakeTimers();
        const fieldAgent = createAgent({ initialScanDelayMs: 60_000 });
        const scan = vi.spyOn(fieldAgent, 'scanForFields');
        fieldAgent.start();

        document.body.insertAdjacentHTML('beforeend', '<input name="otp" id="otp">');
        document.body.insertAdjacentHTML('beforeend', '<p>Enter the code we sent you</p>');
        await waitForObserverDelivery();

        await vi.advanceTimersByTimeAsync(499);
        expect(scan).not.toHaveBeenCalled();
        expect(sent).toEqual([]);

        await vi.advanceTimersByTimeAsync(1);
        expect(scan).toHaveBeenCalledTimes(1);
        expect(fieldAgent.trackedField).toBe(inputById('otp'));
        expect(sent.map((message) => message.type)).toEqual(['GET_ALL_CODES', 'REQUEST_CODE']);
    });

    it('moves the panel with the field on scroll and resize', async () => {
        document.body.innerHTML = '<input name="otp" id="otp">';
        const fieldAgent = createAgent({ initialScanDelayMs: 60_000 });
        fieldAgent.start();
        await fieldAgent.scanForFields();
        const rect = vi.spyOn(inputById('otp'), 'getBoundingClientRect');
        const panelStyle = () => {
            const panel = document.getElementById(PANEL_ID);
            return { top: panel?.style.top, left: panel?.style.left };
        };

        rect.mockReturnValue(new DOMRect(40, 300, 120, 24));
        window.dispatchEvent(new Event('scroll'));
        expect(panelStyle()).toEqual({ top: '328px', left: '40px' });

        rect.mockReturnValue(new DOMRect(10, 100, 200, 30));
        window.dispatchEvent(new Event('resize'));
        expect(panelStyle()).toEqual({ top: '134px', left: '10px' });
    });
});

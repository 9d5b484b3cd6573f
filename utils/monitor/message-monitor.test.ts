import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MessageMonitor } from '@/utils/monitor/message-monitor';
import type { NewCodeMessage } from '@/utils/protocol/code-messages';

const createLogger = () => ({ debug: vi.fn(), info: vi.fn(), error: vi.fn() });

describe('MessageMonitor', () => {
    let now: number;
    let sent: NewCodeMessage[];
    let monitor: MessageMonitor | null;

    const dispatch = async (message: NewCodeMessage) => {
        sent.push(message);
        return { success: true };
    };

    beforeEach(() => {
        now = 1_800_000_000_000;
        sent = [];
        monitor = null;
        document.body.innerHTML = '';
    });

    afterEach(() => {
        monitor?.stop();
        vi.useRealTimers();
    });

    it('dispatches one NEW_CODE per code inside the duplicate window', () => {
        document.body.innerHTML = '<div class="text-msg">Your code is 482910</div>';
        monitor = new MessageMonitor({ dispatch, now: () => now, logger: createLogger() });

        expect(monitor.scanNow()).toBe('dispatched');
        now += 5_000;
        expect(monitor.scanNow()).toBe('duplicate');

        expect(sent).toEqual([
            {
                type: 'NEW_CODE',
                code: '482910',
                source: null,
                messageText: 'Your code is 482910',
                timestamp: 1_800_000_000_000,
            },
        ]);
    });

    it('logs a found code without its digits', () => {
        document.body.innerHTML = '<div class="text-msg">Your code is 482910</div>';
        const log = createLogger();
        monitor = new MessageMonitor({ dispatch, now: () => now, logger: log });

        monitor.scanNow();

        expect(log.info).toHaveBeenCalledWith('Found code', {
            source: null,
            layer: 'open-conversation',
            time: new Date(1_800_000_000_000).toISOString(),
        });
    });

    it('dispatches the same code again once the window has passed', () => {
        document.body.innerHTML = '<div class="text-msg">Your code is 482910</div>';
        monitor = new MessageMonitor({ dispatch, now: () => now, logger: createLogger() });

        monitor.scanNow();
        now += 30_000;
        expect(monitor.scanNow()).toBe('dispatched');
        expect(sent).toHaveLength(2);
    });

    it('dispatches a different code immediately', () => {
        document.body.innerHTML = '<div class="text-msg">Your code is 482910</div>';
        monitor = new MessageMonitor({ dispatch, now: () => now, logger: createLogger() });
        monitor.scanNow();

        document.body.innerHTML = '<div class="text-msg">Your code is 551177</div>';
        now += 1_000;
        expect(monitor.scanNow()).toBe('dispatched');
        expect(sent.map((message) => message.code)).toEqual(['482910', '551177']);
    });

    it('prefers the service named in the text over the conversation contact', () => {
        document.body.innerHTML = `
            <h1>+1 555 0100</h1>
            <div class="text-msg">Amazon OTP: 4821 do not share</div>
        `;
        monitor = new MessageMonitor({ dispatch, now: () => now, logger: createLogger() });
        monitor.scanNow();

        expect(sent[0]?.source).toBe('Amazon');
    });

    it('falls back to the contact label when the text names no sender', () => {
        document.body.innerHTML = `
            <h1>Dentist</h1>
            <div class="text-msg">Your code is 302211</div>
        `;
        monitor = new MessageMonitor({ dispatch, now: () => now, logger: createLogger() });
        monitor.scanNow();

        expect(sent[0]?.source).toBe('Dentist');
    });

    it('is a silent no-op when the newest message carries no code', () => {
        document.body.innerHTML = '<div class="text-msg">See you at dinner tonight</div>';
        monitor = new MessageMonitor({ dispatch, now: () => now, logger: createLogger() });

        expect(monitor.scanNow()).toBe('no-code');
        expect(sent).toEqual([]);
    });

    it('logs instead of throwing when dispatch fails', async () => {
        document.body.innerHTML = '<div class="text-msg">Your code is 482910</div>';
        const log = createLogger();
        monitor = new MessageMonitor({
            dispatch: async () => {
                throw new Error('Receiving end does not exist');
            },
            now: () => now,
            logger: log,
        });

        expect(monitor.scanNow()).toBe('dispatched');
        await vi.waitFor(() => {
            expect(log.error).toHaveBeenCalledWith('Failed to send code to background', expect.any(Error));
        });
    });

    it('runs the initial scan and the fallback interval on their timers', () => {
        vi.useFakeTimers();
        document.body.innerHTML = '<div class="text-msg">Your code is 482910</div>';
        monitor = new MessageMonitor({
            dispatch,
            now: () => now,
            initialScanDelayMs: 2_000,
            fallbackIntervalMs: 10_000,
            logger: createLogger(),
        });
        monitor.start();

        vi.advanceTimersByTime(1_999);
        expect(sent).toHaveLength(0);
        vi.advanceTimersByTime(1);
        expect(sent).toHaveLength(1);

        now += 40_000;
        vi.advanceTimersByTime(8_000);
        expect(sent).toHaveLength(2);

        monitor.stop();
        now += 40_000;
        vi.advanceTimersByTime(20_000);
        expect(sent).toHaveLength(2);
    });

    it('rescans after DOM mutations settle', async () => {
        monitor = new MessageMonitor({
            dispatch,
            now: () => now,
            mutationDebounceMs: 10,
            initialScanDelayMs: 60_000,
            fallbackIntervalMs: 60_000,
            logger: createLogger(),
        });
        monitor.start();

        const bubble = document.createElement('div');
        bubble.className = 'text-msg';
        bubble.textContent = 'Your code is 640022';
        document.body.appendChild(bubble);

        await vi.waitFor(() => {
            expect(sent.map((message) => message.code)).toEqual(['640022']);
        });
    });
});

import { vi } from 'vitest';

const browserMock = vi.hoisted(() => ({
    storage: {
        local: {
            get: vi.fn(async () => ({})),
            set: vi.fn(async () => {}),
            remove: vi.fn(async () => {}),
        },
        onChanged: { addListener: vi.fn() },
    },
    runtime: {
        id: 'test',
        sendMessage: vi.fn(async () => undefined),
        onMessage: { addListener: vi.fn(), removeListener: vi.fn() },
        onInstalled: { addListener: vi.fn() },
        getManifest: () => ({ version: '0.0.0-test' }),
        getURL: (path: string) => `chrome-extension://mock/${path}`,
    },
    tabs: {
        sendMessage: vi.fn(async () => undefined),
        onRemoved: { addListener: vi.fn() },
    },
}));

vi.mock('wxt/browser', () => ({
    browser: browserMock,
}));

vi.mock('wxt/utils/define-background', () => ({
    defineBackground: (main: () => void) => ({ main }),
}));

vi.mock('wxt/utils/define-content-script', () => ({
    defineContentScript: <T>(definition: T) => definition,
}));

// Keeps tests from writing log entries to storage
vi.mock('@/utils/logger', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
}));

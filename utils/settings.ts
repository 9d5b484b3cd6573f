/**
 * Settings Utilities
 *
 * Shared storage keys plus the timing and size limits used by the
 * coordinator, the inbox monitor and the field agent.
 *
 * @module utils/settings
 */

export const STORAGE_KEYS = {
    LOG_LEVEL: 'userSettings.logLevel',
    RECENT_CODES: 'recentCodes',
} as const;

export const CODE_LIMITS = {
    MAX_CODES: 10,
    CODE_TTL_MS: 15 * 60 * 1000,
    PANEL_MAX_CODES: 5,
} as const;

export const MONITOR_TIMING = {
    MUTATION_DEBOUNCE_MS: 300,
    INITIAL_SCAN_DELAY_MS: 2000,
    FALLBACK_INTERVAL_MS: 10_000,
    DUPLICATE_WINDOW_MS: 30_000,
} as const;

export const FIELD_AGENT_TIMING = {
    MUTATION_DEBOUNCE_MS: 500,
    INITIAL_SCAN_DELAY_MS: 1000,
    POLL_INTERVAL_MS: 2000,
} as const;

export const INBOX_MATCHES = ['https://voice.google.com/*'] as const;

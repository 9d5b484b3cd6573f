/**
 * Layered search for the newest SMS text in the inbox DOM. Layers run in
 * order and the first that yields a candidate wins, so selector drift in one
 * layer degrades to the next instead of failing.
 *
 * @module utils/monitor/message-scanner
 */

import { resolveContactLabel, resolveConversationContact } from '@/utils/inference/contact-label';
import { resolveMessageTimestamp } from '@/utils/inference/message-time';
import { extractCode } from '@/utils/otp/code-extractor';

export type ScanLayerName = 'open-conversation' | 'list-preview' | 'list-rows' | 'page-text';

export type MessageCandidate = {
    text: string;
    contact: string | null;
    timestamp: number;
    layer: ScanLayerName;
};

type ScanLayer = {
    name: ScanLayerName;
    scan: (root: Document, nowMs: number) => Omit<MessageCandidate, 'layer'> | null;
};

export const CONVERSATION_MESSAGE_SELECTORS = [
    'gv-text-message-item',
    '[data-message-id]',
    '.message-content',
    '.text-msg',
] as const;

export const PREVIEW_SELECTORS = [
    'gv-thread-item .preview-text',
    'gv-message-list-item .message-preview',
    '[data-thread-id] .preview',
    '.thread-preview',
    '.message-snippet',
] as const;

const LIST_ROW_SELECTOR = '[role="listitem"], [role="row"]';
const PREVIEW_ROW_SELECTOR = '[role="listitem"], [role="row"], gv-thread-item';
const MAX_CONVERSATION_MESSAGES = 5;
const MAX_LIST_ROWS = 5;
const MAX_PAGE_LINES = 50;

/**
 * Rejects UI fragments: too short or long, phone-number-only, bare clock times.
 */
export const isValidMessageText = (text: string | null | undefined): text is string => {
    const trimmed = text?.trim();
    if (!trimmed || trimmed.length < 10 || trimmed.length > 300) {
        return false;
    }
    if (/^[\d\s\-().]+$/.test(trimmed)) {
        return false;
    }
    return !/^\d{1,2}:\d{2}\s*(AM|PM)?$/i.test(trimmed);
};

const scanOpenConversation = (root: Document, nowMs: number) => {
    let last: { text: string; element: Element } | null = null;
    for (const selector of CONVERSATION_MESSAGE_SELECTORS) {
        const elements = Array.from(root.querySelectorAll(selector));
        for (const element of elements.slice(-MAX_CONVERSATION_MESSAGES)) {
            const text = element.textContent;
            if (isValidMessageText(text)) {
                last = { text: text.trim(), element };
            }
        }
    }
    if (!last) {
        return null;
    }
    return {
        text: last.text,
        contact: resolveConversationContact(root),
        timestamp: resolveMessageTimestamp(last.element, nowMs),
    };
};

const scanListPreview = (root: Document, nowMs: number) => {
    for (const selector of PREVIEW_SELECTORS) {
        const preview = root.querySelector(selector);
        const text = preview?.textContent?.trim();
        if (!preview || !text) {
            continue;
        }
        const row = preview.closest(PREVIEW_ROW_SELECTOR);
        return {
            text,
            contact: resolveContactLabel(row),
            timestamp: resolveMessageTimestamp(row, nowMs),
        };
    }
    return null;
};

const scanListRows = (root: Document, nowMs: number) => {
    const rows = Array.from(root.querySelectorAll(LIST_ROW_SELECTOR)).slice(0, MAX_LIST_ROWS);
    for (const row of rows) {
        const text = row.textContent;
        if (isValidMessageText(text) && extractCode(text)) {
            return {
                text: text.trim(),
                contact: resolveContactLabel(row),
                timestamp: resolveMessageTimestamp(row, nowMs),
            };
        }
    }
    return null;
};

const readPageText = (root: Document) => root.body?.innerText || root.body?.textContent || '';

const scanPageText = (root: Document, nowMs: number) => {
    const lines = readPageText(root)
        .split('\n')
        .filter((line) => isValidMessageText(line))
        .slice(0, MAX_PAGE_LINES);
    const line = lines.find((candidate) => extractCode(candidate) !== null);
    if (!line) {
        return null;
    }
    return { text: line.trim(), contact: null, timestamp: nowMs };
};

export const SCAN_LAYERS: readonly ScanLayer[] = [
    { name: 'open-conversation', scan: scanOpenConversation },
    { name: 'list-preview', scan: scanListPreview },
    { name: 'list-rows', scan: scanListRows },
    { name: 'page-text', scan: scanPageText },
];

export const findLatestMessage = (root: Document, nowMs: number = Date.now()): MessageCandidate | null => {
    for (const layer of SCAN_LAYERS) {
        const found = layer.scan(root, nowMs);
        if (found) {
            return { ...found, layer: layer.name };
        }
    }
    return null;
};

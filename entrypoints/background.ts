/**
 * Background Service Worker
 *
 * Owns the code coordinator and answers runtime messages from the inbox
 * monitor and the field agents.
 *
 * @module entrypoints/background
 */

import { browser } from 'wxt/browser';
import { defineBackground } from 'wxt/utils/define-background';
import { CodeCoordinator } from '@/utils/coordinator/code-coordinator';
import { createCodeStore } from '@/utils/coordinator/code-store';
import { logger } from '@/utils/logger';
import { isLogEntry, type LogEntry, logsStorage } from '@/utils/logs-storage';
import {
    isCodeFilledMessage,
    isGetAllCodesMessage,
    isGetStatusMessage,
    isNewCodeMessage,
    isRequestCodeMessage,
} from '@/utils/protocol/code-messages';
import { STORAGE_KEYS } from '@/utils/settings';
import { isRecord } from '@/utils/type-guards';

type BackgroundLogger = Pick<typeof logger, 'info' | 'warn' | 'error'>;
type BackgroundSender = { tab?: { url?: string; id?: number } };
type SendResponse = (response: unknown) => void;

type CoordinatorLike = Pick<
    CodeCoordinator,
    'submitCode' | 'requestLatest' | 'listAll' | 'reportFilled' | 'getStatus'
>;

type BackgroundMessageHandlerDeps = {
    saveLog: (payload: LogEntry) => Promise<void>;
    coordinator: CoordinatorLike;
    logger: BackgroundLogger;
};

const messageTypeOf = (message: unknown) =>
    isRecord(message) && typeof message.type === 'string' ? message.type : 'unknown';

const respondWith = <T>(
    task: Promise<T>,
    sendResponse: SendResponse,
    onError: (error: unknown) => unknown,
): true => {
    void task.then(sendResponse).catch((error: unknown) => {
        sendResponse(onError(error));
    });
    return true;
};

export const createBackgroundMessageHandler = (deps: BackgroundMessageHandlerDeps) => {
    const failWith = (error: string) => (cause: unknown) => {
        deps.logger.error(error, cause);
        return { success: false, error };
    };

    return (message: unknown, sender: BackgroundSender, sendResponse: SendResponse) => {
        if (isNewCodeMessage(message)) {
            return respondWith(
                deps.coordinator.submitCode({
                    code: message.code,
                    source: message.source,
                    timestamp: message.timestamp,
                    messageText: message.messageText,
                }),
                sendResponse,
                failWith('Failed to store code'),
            );
        }

        if (isRequestCodeMessage(message)) {
            return respondWith(
                deps.coordinator.requestLatest(sender.tab?.id),
                sendResponse,
                failWith('Failed to look up latest code'),
            );
        }

        if (isGetAllCodesMessage(message)) {
            return respondWith(deps.coordinator.listAll(), sendResponse, (error) => {
                deps.logger.error('Failed to list codes', error);
                return { codes: [] };
            });
        }

        if (isCodeFilledMessage(message)) {
            sendResponse(deps.coordinator.reportFilled(message.code));
            return true;
        }

        if (isGetStatusMessage(message)) {
            return respondWith(
                deps.coordinator.getStatus(),
                sendResponse,
                failWith('Failed to read status'),
            );
        }

        const type = messageTypeOf(message);
        if (type === 'LOG_ENTRY' && isRecord(message)) {
            if (isLogEntry(message.payload)) {
                deps.saveLog(message.payload).catch((error) => {
                    deps.logger.error('Failed to save log from content script', error);
                });
            } else {
                deps.logger.warn('Discarding malformed LOG_ENTRY payload');
            }
            return;
        }

        deps.logger.warn('Unknown message type:', type, 'from', sender.tab?.url);
        sendResponse({ success: false, error: 'Unknown message type' });
        return true;
    };
};

export default defineBackground(() => {
    const coordinator = new CodeCoordinator({
        store: createCodeStore(STORAGE_KEYS.RECENT_CODES),
        notifyTab: (tabId, message) => browser.tabs.sendMessage(tabId, message),
    });
    void coordinator.ensureHydrated();

    logger.info('Background service worker started', {
        id: browser.runtime.id,
    });

    browser.runtime.onInstalled.addListener((details) => {
        if (details.reason === 'install') {
            logger.info('Extension installed');
        } else if (details.reason === 'update') {
            logger.info('Extension updated to version', browser.runtime.getManifest().version);
        }
    });

    browser.tabs.onRemoved.addListener((tabId) => {
        coordinator.removeTab(tabId);
    });

    browser.runtime.onMessage.addListener(
        createBackgroundMessageHandler({
            saveLog: (payload) => logsStorage.saveLog(payload),
            coordinator,
            logger,
        }),
    );
});

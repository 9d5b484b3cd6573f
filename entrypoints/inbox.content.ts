import { browser } from 'wxt/browser';
import { defineContentScript } from 'wxt/utils/define-content-script';
import { MessageMonitor } from '@/utils/monitor/message-monitor';
import { INBOX_MATCHES } from '@/utils/settings';

/**
 * Inbox Content Script
 *
 * Watches the messaging web app for incoming verification codes and hands
 * each new one to the background.
 */
export default defineContentScript({
    matches: [...INBOX_MATCHES],
    runAt: 'document_idle',
    main(ctx) {
        const monitor = new MessageMonitor({
            dispatch: (message) => browser.runtime.sendMessage(message),
        });
        monitor.start();
        ctx.onInvalidated(() => monitor.stop());
    },
});

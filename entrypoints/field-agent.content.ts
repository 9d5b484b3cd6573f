import { browser } from 'wxt/browser';
import { defineContentScript } from 'wxt/utils/define-content-script';
import { FieldAgent } from '@/utils/field-agent/field-agent';
import { INBOX_MATCHES } from '@/utils/settings';

/**
 * Field Agent Content Script
 *
 * Offers recent codes next to verification-code inputs on any page.
 */
export default defineContentScript({
    matches: ['<all_urls>'],
    excludeMatches: [...INBOX_MATCHES],
    runAt: 'document_idle',
    main(ctx) {
        const agent = new FieldAgent({
            sendMessage: (message) => browser.runtime.sendMessage(message),
        });
        const onMessage = (message: unknown) => {
            agent.handleRuntimeMessage(message);
        };
        browser.runtime.onMessage.addListener(onMessage);
        agent.start();
        ctx.onInvalidated(() => {
            browser.runtime.onMessage.removeListener(onMessage);
            agent.stop();
        });
    },
});

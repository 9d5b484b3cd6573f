import { defineConfig } from 'wxt';

// See https://wxt.dev/api/config.html
export default defineConfig({
    imports: false,
    manifest: {
        name: 'SMS Code Relay',
        description: 'Relays verification codes from your web SMS inbox to the sign-in page you are on',
        permissions: ['storage', 'tabs'],
        host_permissions: ['<all_urls>'],
        browser_specific_settings: {
            gecko: {
                id: 'sms-code-relay@example.com',
            },
        },
    },
});

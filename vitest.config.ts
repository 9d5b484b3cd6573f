import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: [{ find: /^@\//, replacement: fileURLToPath(new URL('./', import.meta.url)) }],
    },
    test: {
        environment: 'happy-dom',
        setupFiles: ['./test-setup.ts'],
        include: ['**/*.test.ts'],
        exclude: ['node_modules/**', '.output/**', '.wxt/**'],
    },
});

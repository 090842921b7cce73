// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // panels build real DOM nodes
        environment: 'happy-dom',
        environmentOptions: {
            happyDOM: {
                // <link rel="stylesheet"> must not reach the network in tests
                settings: {
                    disableCSSFileLoading: true,
                    disableJavaScriptFileLoading: true,
                },
            },
        },
        include: ['tests/**/*.test.ts'],
        globals: true,
        pool: 'threads',
    },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['__tests__/**/*.test.ts'],
        environment: 'node',
        testTimeout: 20_000,
    },
});

import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        environment: 'node',
        env: {
            LOG_LEVEL: 'silent',
            PRETTY_LOGS: 'false',
        },
        testTimeout: 10_000,
    },
})

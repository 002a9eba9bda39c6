import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

// Workspace packages export compiled JS at runtime; tests run on their sources
const source = (rel: string): string => fileURLToPath(new URL(rel, import.meta.url))

export default defineConfig({
    resolve: {
        alias: {
            '@v2v-wrapper/logging': source('./packages/logging/src/index.ts'),
        },
    },
    test: {
        environment: 'node',
        include: [
            'packages/*/src/__tests__/**/*.test.ts',
            'services/*/src/__tests__/**/*.test.ts',
        ],
        testTimeout: 15000,
        hookTimeout: 10000,
    },
})

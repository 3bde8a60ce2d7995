import { defineConfig } from 'vitest/config'
import tsconfigPaths from 'vite-tsconfig-paths'

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        setupFiles: ['./vitest.setup.ts'],
        coverage: {
            provider: 'v8',
            all: false,
            include: ['packages/*/src/**/*.ts'],
            exclude: ['**/*.d.ts', '**/*.test.ts', 'packages/tui/src/cli.ts'],
            reporter: ['text', 'lcov'],
            reportsDirectory: './coverage',
            thresholds: {
                statements: 70,
                branches: 70,
                functions: 70,
                lines: 70,
            },
        },
    },
    plugins: [tsconfigPaths()],
})

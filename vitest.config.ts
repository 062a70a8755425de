import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        environment: 'node',
        globals: true,
        setupFiles: ['./src/test/setup.ts'],
        include: ['src/test/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json-summary', 'lcov'],
            include: [
                'src/models/**/*.ts',
                'src/services/**/*.ts',
                'src/utils/decimal.ts',
                'src/utils/errors.ts',
                'src/api/validation.ts',
                'src/cli.ts'
            ],
            exclude: [
                'src/test/**'
            ],
            thresholds: {
                lines: 90,
                functions: 90,
                branches: 85
            }
        }
    }
})

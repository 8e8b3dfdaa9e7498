/// <reference types="vitest" />
import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['tests/unit/**/*.{test,spec}.ts', 'src/**/*.test.ts'],
    },
    resolve: {
        extensions: ['.ts', '.js', '.json']
    }
})

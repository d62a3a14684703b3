import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'url'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: [
      'packages/*/__tests__/**/*.test.ts',
      'review-app-scan/__tests__/**/*.test.ts'
    ],
    coverage: {
      provider: 'v8',
      reporter: ['json-summary', 'text', 'lcov'],
      reportsDirectory: './coverage',
      include: [
        'review-app-scan/src/**',
        'packages/shared/src/**',
        'packages/k8s-client/src/**'
      ],
      exclude: ['**/node_modules/**', '**/dist/**', '**/__tests__/**']
    }
  },
  resolve: {
    alias: [
      {
        find: /^@review-app-cleanup\/shared\/(.*)$/,
        replacement: `${root}packages/shared/src/$1`
      },
      {
        find: '@review-app-cleanup/k8s-client',
        replacement: `${root}packages/k8s-client/src/index.ts`
      },
      {
        find: '@kubernetes/client-node',
        replacement: `${root}__mocks__/@kubernetes/client-node.ts`
      }
    ]
  }
})

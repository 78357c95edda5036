import { defineConfig } from 'vitest/config'
import path from 'path'
import { fileURLToPath } from 'url'

const __dirname = path.dirname(fileURLToPath(import.meta.url))
const projectRoot = path.resolve(__dirname, '..')

export default defineConfig({
  root: projectRoot,
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Keep pino quiet unless a test run asks for logs
    env: {
      NODE_ENV: 'test',
    },
    restoreMocks: true,
  },
})

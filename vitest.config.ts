import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

const resolveSrc = (file: string) => fileURLToPath(new URL(`./src/${file}`, import.meta.url))

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    alias: [
      { find: /^chronid$/, replacement: resolveSrc('index.ts') },
      { find: /^chronid\/zod$/, replacement: resolveSrc('zod/index.ts') },
    ],
  },
})

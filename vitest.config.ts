import { defineConfig } from 'vitest/config'
import react from '@vitejs/plugin-react'

// Tests live beside the sources (*.test.ts, *.test.tsx) and run under plain Node.
export default defineConfig({
  plugins: [react()],
  test: {
    environment: 'node',
    include: ['src/**/*.test.{ts,tsx}'],
    restoreMocks: true,
  },
})

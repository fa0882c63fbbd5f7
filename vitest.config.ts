import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    include: ['core/src/**/*.test.ts', 'ui/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    setupFiles: ['./ui/src/test/setup.ts'],
  },
});

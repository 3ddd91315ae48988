import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['exporter-service/tests/**/*.test.ts'],
    environment: 'node',
  },
});

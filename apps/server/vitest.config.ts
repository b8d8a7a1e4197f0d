import { fileURLToPath } from 'url';
import { defineProject } from 'vitest/config';

export default defineProject({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    name: 'server',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    env: {
      // לוגרים שקטים בזמן בדיקות
      LOG_TO_CONSOLE: 'false',
    },
  },
});

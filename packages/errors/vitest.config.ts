import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'errors',
    environment: 'node',
    include: ['src/**/*.test.ts'],
    restoreMocks: true,
  },
});

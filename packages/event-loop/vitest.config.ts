import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'event-loop',
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    restoreMocks: true,
    setupFiles: ['../../test/mock-harden.ts'],
    testTimeout: 2000,
  },
});

import { defineConfig } from 'vitest/config';

// Calendar arithmetic is local-time; pin the zone so fixtures are stable.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});

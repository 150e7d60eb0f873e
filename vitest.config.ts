import { defineConfig } from 'vitest/config';

// local-calendar tests assume a zone with DST (spring forward on 2025-03-09)
process.env.TZ = 'America/New_York';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
});

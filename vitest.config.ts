import { defineConfig } from 'vitest/config';

// Workspace packages export their TypeScript sources under this condition,
// so tests run against src/ without a build.
const SOURCE_CONDITIONS = ['respack-source'];

export default defineConfig({
  resolve: {
    conditions: SOURCE_CONDITIONS,
  },
  ssr: {
    resolve: {
      conditions: SOURCE_CONDITIONS,
    },
  },
  test: {
    include: [
      'packages/*/test/**/*.test.ts',
      'modules/first-party/*/test/**/*.test.ts',
    ],
    environment: 'node',
  },
});

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their TypeScript sources so tests need no build.
    alias: {
      '@loopdesk/supervisor': source('supervisor'),
      '@loopdesk/runtime-host': source('runtime-host'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    // Child processes, not worker threads: the home-directory tests change
    // HOME, which os.homedir() only sees in a real process environment.
    pool: 'forks',
  },
});

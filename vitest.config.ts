import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const PACKAGES = ['core', 'change-core', 'connector-file', 'connector-db', 'cli'];

// Workspace packages export their built dist/ at run time; tests run on the sources
const sourceAliases = Object.fromEntries(
  PACKAGES.map((name) => [
    `@regwatch/${name}`,
    fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
  ])
);

export default defineConfig({
  resolve: {
    alias: sourceAliases,
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/** Workspace packages load from their TypeScript sources, so tests need no build. */
const workspace = (name: string, dir: string) => ({
  find: new RegExp(`^@egeria-sdk/${name}$`),
  replacement: fileURLToPath(new URL(`./${dir}/src/index.ts`, import.meta.url)),
});

export default defineConfig({
  resolve: {
    alias: [
      workspace('core', 'sdks/typescript/core'),
      workspace('client', 'sdks/typescript/client'),
      workspace('markdown', 'sdks/typescript/markdown'),
      workspace('cli', 'tools/cli'),
    ],
  },
  test: {
    environment: 'node',
    include: [
      'sdks/typescript/*/src/**/__tests__/**/*.test.ts',
      'tools/*/src/**/__tests__/**/*.test.ts',
    ],
    restoreMocks: true,
    unstubGlobals: true,
  },
});

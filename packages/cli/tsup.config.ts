import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  splitting: false,
  sourcemap: true,
  banner: {
    js: '#!/usr/bin/env node',
  },
  // Bundle workspace packages; they ship TypeScript sources only
  noExternal: [
    '@reposeed/config',
    '@reposeed/core',
    '@reposeed/shared',
    '@reposeed/plugin-azure-devops',
  ],
});

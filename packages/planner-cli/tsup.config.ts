import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/bin.ts', 'src/index.ts'],
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: ['@commit-planner/contracts', '@commit-planner/core'],
  clean: true,
  sourcemap: true,
});

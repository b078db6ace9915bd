import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  sourcemap: true,
  target: 'node20',
  // workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@dccscan\//],
});

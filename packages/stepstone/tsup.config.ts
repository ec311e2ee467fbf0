import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',
    'src/problem/index.ts',
    'src/errors/index.ts',
    'src/bfs/index.ts',
    'src/basis/index.ts',
    'src/potentials/index.ts',
    'src/loop/index.ts',
    'src/modi/index.ts',
    'src/io/index.ts',
    'src/compare/index.ts',
    'src/sensitivity/index.ts',
  ],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  splitting: true,
  target: 'node20',
});

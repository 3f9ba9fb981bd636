import { defineConfig } from 'vitest/config';
import path from 'node:path';

export default defineConfig(() => {
  const packageDir = import.meta.dirname;
  return {
    test: {
      include: [path.join(packageDir, 'tests', '**', '*.{test,spec,e2e-spec}.?(c|m)[jt]s?(x)')],
      exclude: [
        path.join(packageDir, '**', 'node_modules', '**'),
        path.join(packageDir, '**', 'dist', '**'),
        path.join(packageDir, '**', 'coverage', '**'),
      ],
      testTimeout: 20000,
      hookTimeout: 20000,
      silent: false,
    },
    resolve: {
      alias: {
        '@': path.join(packageDir, 'src'),
      },
    },
  };
});
